import { GraphQLError } from 'graphql';

import type { ObjMap } from '../types/ObjMap.js';

import { isIterableObject } from '../predicates/isIterableObject.js';
import { isObjectLike } from '../predicates/isObjectLike.js';

import { hasOwnProperty } from '../utilities/hasOwnProperty.js';
import { inspect } from '../utilities/inspect.js';
import { invariant } from '../utilities/invariant.js';
import type { Path } from '../utilities/Path.js';
import { addPath, pathToArray, printPathArray } from '../utilities/Path.js';

import type { EnumType, TypeRef } from '../type/definition.js';
import { isNonNullRef, printTypeRef } from '../type/definition.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

type OnErrorCB = (
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
) => void;

/**
 * Coerces an external value, such as an operation variable, given its type
 * reference. Each invalid element is reported through `onError` with its path
 * within the value; the result is `undefined` when anything failed.
 */
export function coerceInputValue(
  inputValue: unknown,
  type: TypeRef,
  registry: TypeRegistry,
  onError: OnErrorCB = defaultOnError,
): unknown {
  let failed = false;
  const coerced = coerceValueImpl(
    inputValue,
    type,
    registry,
    (path, invalidValue, error) => {
      failed = true;
      onError(path, invalidValue, error);
    },
    undefined,
  );
  return failed ? undefined : coerced;
}

function defaultOnError(
  path: ReadonlyArray<string | number>,
  invalidValue: unknown,
  error: GraphQLError,
): void {
  let errorPrefix = 'Invalid value ' + inspect(invalidValue);
  if (path.length > 0) {
    errorPrefix += ` at "value${printPathArray(path)}"`;
  }
  throw new GraphQLError(errorPrefix + ': ' + error.message, {
    originalError: error.originalError,
  });
}

function coerceValueImpl(
  inputValue: unknown,
  type: TypeRef,
  registry: TypeRegistry,
  onError: OnErrorCB,
  path: Path | undefined,
): unknown {
  if (isNonNullRef(type)) {
    if (inputValue != null) {
      return coerceValueImpl(inputValue, type.ofType, registry, onError, path);
    }
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(
        `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
      ),
    );
    return;
  }

  if (inputValue == null) {
    // Explicitly return the value null.
    return null;
  }

  if (typeof type !== 'string') {
    const itemType = type.ofType;
    if (isIterableObject(inputValue)) {
      return Array.from(inputValue, (itemValue, index) => {
        const itemPath = addPath(path, index, undefined);
        return coerceValueImpl(itemValue, itemType, registry, onError, itemPath);
      });
    }
    // Lists accept a non-list value as a list of one.
    return [coerceValueImpl(inputValue, itemType, registry, onError, path)];
  }

  const namedType = registry.lookup(type);
  invariant(namedType !== undefined, `Unknown type "${type}".`);

  switch (namedType.kind) {
    case 'INPUT_OBJECT': {
      if (!isObjectLike(inputValue) || isIterableObject(inputValue)) {
        onError(
          pathToArray(path),
          inputValue,
          new GraphQLError(`Expected type "${namedType.name}" to be an object.`),
        );
        return;
      }

      const coercedValue: ObjMap<unknown> = {};
      const fieldDefs = namedType.fields;

      for (const field of Object.values(fieldDefs)) {
        const fieldValue = hasOwnProperty(inputValue, field.name)
          ? inputValue[field.name]
          : undefined;

        if (fieldValue === undefined) {
          if (field.defaultValue !== undefined) {
            coercedValue[field.name] = field.defaultValue;
          } else if (isNonNullRef(field.type)) {
            const typeStr = printTypeRef(field.type);
            onError(
              pathToArray(path),
              inputValue,
              new GraphQLError(
                `Field "${field.name}" of required type "${typeStr}" was not provided.`,
              ),
            );
          }
          continue;
        }

        coercedValue[field.name] = coerceValueImpl(
          fieldValue,
          field.type,
          registry,
          onError,
          addPath(path, field.name, namedType.name),
        );
      }

      // Ensure every provided field is defined.
      if (registry.getUnknownInputFieldsPolicy() === 'reject') {
        for (const fieldName of Object.keys(inputValue)) {
          if (!hasOwnProperty(fieldDefs, fieldName)) {
            onError(
              pathToArray(path),
              inputValue,
              new GraphQLError(
                `Field "${fieldName}" is not defined by type "${namedType.name}".`,
              ),
            );
          }
        }
      }
      return coercedValue;
    }
    case 'ENUM':
      return coerceEnumValue(inputValue, namedType, onError, path);
    case 'SCALAR': {
      let parseResult;

      // Scalars determine if an input value is valid via parseValue(), which
      // can throw to indicate failure. If it throws, maintain a reference to
      // the original error.
      try {
        parseResult = namedType.parseValue(inputValue);
      } catch (error) {
        if (error instanceof GraphQLError) {
          onError(pathToArray(path), inputValue, error);
        } else {
          onError(
            pathToArray(path),
            inputValue,
            new GraphQLError(
              `Expected type "${namedType.name}". ` +
                (error instanceof Error ? error.message : inspect(error)),
              { originalError: error instanceof Error ? error : undefined },
            ),
          );
        }
        return;
      }
      if (parseResult === undefined) {
        onError(
          pathToArray(path),
          inputValue,
          new GraphQLError(`Expected type "${namedType.name}".`),
        );
      }
      return parseResult;
    }
    case 'OBJECT':
    case 'INTERFACE':
    case 'UNION':
      invariant(false, `Unexpected input type: ${namedType.name}`);
  }
}

function coerceEnumValue(
  inputValue: unknown,
  enumType: EnumType,
  onError: OnErrorCB,
  path: Path | undefined,
): unknown {
  if (typeof inputValue !== 'string') {
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(
        `Enum "${enumType.name}" cannot represent non-string value: ${inspect(inputValue)}.`,
      ),
    );
    return;
  }

  if (!hasOwnProperty(enumType.values, inputValue)) {
    onError(
      pathToArray(path),
      inputValue,
      new GraphQLError(
        `Value "${inputValue}" does not exist in "${enumType.name}" enum.`,
      ),
    );
    return;
  }
  return enumType.values[inputValue].value;
}
