import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import { isObjectLike } from '../predicates/isObjectLike.js';
import { isPromise } from '../predicates/isPromise.js';

import { inspect } from '../utilities/inspect.js';

import { AbstractResolutionError } from '../error/errors.js';

import type {
  AbstractType,
  ObjectType,
  ResolveInfo,
} from '../type/definition.js';
import { isObjectType } from '../type/definition.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

/**
 * Determines the concrete object type of a value whose declared type is an
 * interface or a union.
 *
 * An explicit `resolveType` on the abstract type is consulted first; the type
 * it names must be a possible type, and must not reject the value through its
 * own `isTypeOf`. Without one, a string `__typename` on the value names the
 * type. Failing that, possible types are tested with `isTypeOf` in declaration
 * order and the first match wins.
 */
export function resolveConcreteType(
  registry: TypeRegistry,
  abstractType: AbstractType,
  value: unknown,
  contextValue: unknown,
  info: ResolveInfo,
): PromiseOrValue<ObjectType> {
  if (abstractType.resolveType !== undefined) {
    const resolved = abstractType.resolveType(
      value,
      contextValue,
      info,
      abstractType,
    );
    if (isPromise(resolved)) {
      return resolved.then((resolvedType) =>
        ensureValidRuntimeType(
          registry,
          abstractType,
          resolvedType,
          value,
          contextValue,
          info,
        ),
      );
    }
    return ensureValidRuntimeType(
      registry,
      abstractType,
      resolved,
      value,
      contextValue,
      info,
    );
  }

  if (isObjectLike(value) && typeof value.__typename === 'string') {
    return ensureValidRuntimeType(
      registry,
      abstractType,
      value.__typename,
      value,
      contextValue,
      info,
    );
  }

  return resolveByIsTypeOf(registry, abstractType, value, contextValue, info);
}

function ensureValidRuntimeType(
  registry: TypeRegistry,
  abstractType: AbstractType,
  runtimeTypeOrName: unknown,
  value: unknown,
  contextValue: unknown,
  info: ResolveInfo,
): PromiseOrValue<ObjectType> {
  if (runtimeTypeOrName == null) {
    throw new AbstractResolutionError(
      `Abstract type "${abstractType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}". Either the "${abstractType.name}" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.`,
    );
  }

  let runtimeTypeName: string;
  if (typeof runtimeTypeOrName === 'string') {
    runtimeTypeName = runtimeTypeOrName;
  } else if (
    isObjectLike(runtimeTypeOrName) &&
    typeof runtimeTypeOrName.name === 'string' &&
    runtimeTypeOrName.kind === 'OBJECT'
  ) {
    runtimeTypeName = runtimeTypeOrName.name;
  } else {
    throw new AbstractResolutionError(
      `Abstract type "${abstractType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}" with ` +
        `value ${inspect(value)}, received "${inspect(runtimeTypeOrName)}".`,
    );
  }

  const runtimeType = registry.lookup(runtimeTypeName);
  if (runtimeType === undefined) {
    throw new AbstractResolutionError(
      `Abstract type "${abstractType.name}" was resolved to a type "${runtimeTypeName}" that does not exist inside the registry.`,
    );
  }

  if (!isObjectType(runtimeType)) {
    throw new AbstractResolutionError(
      `Abstract type "${abstractType.name}" was resolved to a non-object type "${runtimeTypeName}".`,
    );
  }

  if (!registry.isSubType(abstractType, runtimeType)) {
    throw new AbstractResolutionError(
      `Runtime Object type "${runtimeType.name}" is not a possible type for "${abstractType.name}".`,
    );
  }

  if (runtimeType.isTypeOf === undefined) {
    return runtimeType;
  }

  const isTypeOf = runtimeType.isTypeOf(value, contextValue, info);
  if (isPromise(isTypeOf)) {
    return isTypeOf.then((accepted) =>
      agreeWithIsTypeOf(abstractType, runtimeType, accepted, value),
    );
  }
  return agreeWithIsTypeOf(abstractType, runtimeType, isTypeOf, value);
}

function agreeWithIsTypeOf(
  abstractType: AbstractType,
  runtimeType: ObjectType,
  accepted: boolean,
  value: unknown,
): ObjectType {
  if (!accepted) {
    throw new AbstractResolutionError(
      `Abstract type "${abstractType.name}" resolved ${inspect(value)} to "${runtimeType.name}", whose "isTypeOf" rejects it.`,
    );
  }
  return runtimeType;
}

function resolveByIsTypeOf(
  registry: TypeRegistry,
  abstractType: AbstractType,
  value: unknown,
  contextValue: unknown,
  info: ResolveInfo,
): PromiseOrValue<ObjectType> {
  const possibleTypes = registry.getPossibleTypes(abstractType);
  const promisedIsTypeOfResults: Array<Promise<boolean>> = [];
  const asyncCandidates: Array<ObjectType> = [];

  for (const type of possibleTypes) {
    if (type.isTypeOf === undefined) {
      continue;
    }
    const isTypeOfResult = type.isTypeOf(value, contextValue, info);

    if (isPromise(isTypeOfResult)) {
      promisedIsTypeOfResults.push(isTypeOfResult);
      asyncCandidates.push(type);
    } else if (isTypeOfResult && promisedIsTypeOfResults.length === 0) {
      return type;
    } else if (isTypeOfResult) {
      // Later candidates cannot win over a match.
      promisedIsTypeOfResults.push(Promise.resolve(true));
      asyncCandidates.push(type);
      break;
    }
  }

  if (promisedIsTypeOfResults.length > 0) {
    return Promise.all(promisedIsTypeOfResults).then((isTypeOfResults) => {
      const index = isTypeOfResults.findIndex(Boolean);
      if (index === -1) {
        throw noMatchError(abstractType, value, info);
      }
      return asyncCandidates[index];
    });
  }

  throw noMatchError(abstractType, value, info);
}

function noMatchError(
  abstractType: AbstractType,
  value: unknown,
  info: ResolveInfo,
): AbstractResolutionError {
  return new AbstractResolutionError(
    `Abstract type "${abstractType.name}" must resolve to an Object type at runtime for field "${info.parentType.name}.${info.fieldName}". ` +
      `None of the possible types of "${abstractType.name}" accepts the value ${inspect(value)}.`,
  );
}
