import type { ObjectFieldNode, ValueNode } from 'graphql';
import { GraphQLError, Kind, print } from 'graphql';

import type { Maybe } from '../types/Maybe.js';
import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';

import { hasOwnProperty } from '../utilities/hasOwnProperty.js';
import { inspect } from '../utilities/inspect.js';
import { invariant } from '../utilities/invariant.js';
import type { Path } from '../utilities/Path.js';
import { addPath, pathToArray } from '../utilities/Path.js';

import type { EnumType, TypeRef } from '../type/definition.js';
import { isNonNullRef, printTypeRef } from '../type/definition.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

export type LiteralErrorCB = (
  path: ReadonlyArray<string | number>,
  invalidNode: ValueNode,
  error: GraphQLError,
) => void;

/**
 * Produces the internal value of a document literal given its type reference.
 * Variable references are replaced by their already coerced values.
 *
 * Every invalid element is reported through `onError` with its path within the
 * literal, and `undefined` is returned when anything failed. A variable that
 * has no runtime value yields `undefined` without an error; the caller decides
 * whether a default applies.
 */
export function coerceInputLiteral(
  valueNode: ValueNode,
  type: TypeRef,
  registry: TypeRegistry,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
  onError: LiteralErrorCB,
): unknown {
  let failed = false;
  const coerced = coerceLiteralImpl(
    valueNode,
    type,
    registry,
    variableValues,
    (path, invalidNode, error) => {
      failed = true;
      onError(path, invalidNode, error);
    },
    undefined,
  );
  return failed ? undefined : coerced;
}

function coerceLiteralImpl(
  valueNode: ValueNode,
  type: TypeRef,
  registry: TypeRegistry,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
  onError: LiteralErrorCB,
  path: Path | undefined,
): unknown {
  if (valueNode.kind === Kind.VARIABLE) {
    const variableName = valueNode.name.value;
    if (variableValues == null || !hasOwnProperty(variableValues, variableName)) {
      return undefined;
    }
    const variableValue = variableValues[variableName];
    if (variableValue === null && isNonNullRef(type)) {
      onError(
        pathToArray(path),
        valueNode,
        new GraphQLError(
          `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
        ),
      );
      return;
    }
    // Variables were coerced against their declared types already.
    return variableValue;
  }

  if (isNonNullRef(type)) {
    if (valueNode.kind === Kind.NULL) {
      onError(
        pathToArray(path),
        valueNode,
        new GraphQLError(
          `Expected non-nullable type "${printTypeRef(type)}" not to be null.`,
        ),
      );
      return;
    }
    return coerceLiteralImpl(
      valueNode,
      type.ofType,
      registry,
      variableValues,
      onError,
      path,
    );
  }

  if (valueNode.kind === Kind.NULL) {
    return null;
  }

  if (typeof type !== 'string') {
    const itemType = type.ofType;
    if (valueNode.kind !== Kind.LIST) {
      // Lists accept a non-list value as a list of one.
      return [
        coerceLiteralImpl(
          valueNode,
          itemType,
          registry,
          variableValues,
          onError,
          path,
        ),
      ];
    }

    return valueNode.values.map((itemNode, index) => {
      const itemPath = addPath(path, index, undefined);
      if (isMissingVariable(itemNode, variableValues)) {
        if (isNonNullRef(itemType)) {
          onError(
            pathToArray(itemPath),
            itemNode,
            new GraphQLError(
              `Expected non-nullable type "${printTypeRef(itemType)}" not to be null.`,
            ),
          );
          return undefined;
        }
        return null;
      }
      return coerceLiteralImpl(
        itemNode,
        itemType,
        registry,
        variableValues,
        onError,
        itemPath,
      );
    });
  }

  const namedType = registry.lookup(type);
  invariant(namedType !== undefined, `Unknown type "${type}".`);

  switch (namedType.kind) {
    case 'INPUT_OBJECT': {
      if (valueNode.kind !== Kind.OBJECT) {
        onError(
          pathToArray(path),
          valueNode,
          new GraphQLError(`Expected type "${namedType.name}" to be an object.`),
        );
        return;
      }

      const coercedObj: ObjMap<unknown> = {};
      const fieldNodes: ObjMap<ObjectFieldNode> = Object.create(null);
      for (const fieldNode of valueNode.fields) {
        fieldNodes[fieldNode.name.value] = fieldNode;
      }

      for (const field of Object.values(namedType.fields)) {
        const fieldNode = fieldNodes[field.name];
        if (
          fieldNode === undefined ||
          isMissingVariable(fieldNode.value, variableValues)
        ) {
          if (field.defaultValue !== undefined) {
            coercedObj[field.name] = field.defaultValue;
          } else if (isNonNullRef(field.type)) {
            onError(
              pathToArray(path),
              valueNode,
              new GraphQLError(
                `Field "${field.name}" of required type "${printTypeRef(field.type)}" was not provided.`,
              ),
            );
          }
          continue;
        }
        coercedObj[field.name] = coerceLiteralImpl(
          fieldNode.value,
          field.type,
          registry,
          variableValues,
          onError,
          addPath(path, field.name, namedType.name),
        );
      }

      if (registry.getUnknownInputFieldsPolicy() === 'reject') {
        for (const fieldName of Object.keys(fieldNodes)) {
          if (!hasOwnProperty(namedType.fields, fieldName)) {
            onError(
              pathToArray(path),
              valueNode,
              new GraphQLError(
                `Field "${fieldName}" is not defined by type "${namedType.name}".`,
              ),
            );
          }
        }
      }
      return coercedObj;
    }
    case 'ENUM':
      return coerceEnumLiteral(valueNode, namedType, onError, path);
    case 'SCALAR': {
      let result;
      try {
        result = namedType.parseLiteral(valueNode, variableValues);
      } catch (error) {
        onError(
          pathToArray(path),
          valueNode,
          new GraphQLError(
            `Expected value of type "${namedType.name}", found ${print(valueNode)}; ` +
              (error instanceof Error ? error.message : inspect(error)),
            { originalError: error instanceof Error ? error : undefined },
          ),
        );
        return;
      }
      if (result === undefined) {
        onError(
          pathToArray(path),
          valueNode,
          new GraphQLError(
            `Expected value of type "${namedType.name}", found ${print(valueNode)}.`,
          ),
        );
      }
      return result;
    }
    case 'OBJECT':
    case 'INTERFACE':
    case 'UNION':
      invariant(false, `Unexpected input type: ${namedType.name}`);
  }
}

function coerceEnumLiteral(
  valueNode: ValueNode,
  enumType: EnumType,
  onError: LiteralErrorCB,
  path: Path | undefined,
): unknown {
  if (valueNode.kind !== Kind.ENUM) {
    onError(
      pathToArray(path),
      valueNode,
      new GraphQLError(
        `Enum "${enumType.name}" cannot represent non-enum value: ${print(valueNode)}.`,
      ),
    );
    return;
  }

  const symbol = valueNode.value;
  if (!hasOwnProperty(enumType.values, symbol)) {
    onError(
      pathToArray(path),
      valueNode,
      new GraphQLError(
        `Value "${symbol}" does not exist in "${enumType.name}" enum.`,
      ),
    );
    return;
  }
  return enumType.values[symbol].value;
}

// Returns true if the provided valueNode is a variable which is not defined
// in the set of variables.
function isMissingVariable(
  valueNode: ValueNode,
  variableValues: Maybe<ReadOnlyObjMap<unknown>>,
): boolean {
  return (
    valueNode.kind === Kind.VARIABLE &&
    (variableValues == null ||
      !hasOwnProperty(variableValues, valueNode.name.value))
  );
}
