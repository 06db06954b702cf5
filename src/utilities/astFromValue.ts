import type { ConstObjectFieldNode, ConstValueNode } from 'graphql';
import { Kind } from 'graphql';

import { isIterableObject } from '../predicates/isIterableObject.js';
import { isObjectLike } from '../predicates/isObjectLike.js';

import type { NamedType, TypeRef } from '../type/definition.js';
import { findEnumValue } from '../type/definition.js';

import { inspect } from './inspect.js';
import { invariant } from './invariant.js';

/**
 * Produces a GraphQL Value AST given an internal value and the reference of
 * the type it belongs to, looking named types up with `lookup`. Used to print
 * default values.
 *
 * Returns `null` when the value cannot be represented, and a `NullValue` node
 * for `null`.
 */
export function astFromValue(
  value: unknown,
  type: TypeRef,
  lookup: (name: string) => NamedType | undefined,
): ConstValueNode | null {
  if (typeof type !== 'string') {
    if (type.kind === 'NON_NULL') {
      const astValue = astFromValue(value, type.ofType, lookup);
      if (astValue?.kind === Kind.NULL) {
        return null;
      }
      return astValue;
    }

    if (value === null) {
      return { kind: Kind.NULL };
    }

    if (value === undefined) {
      return null;
    }

    // Convert iterables to a list literal. A single value is represented as
    // the item it would be coerced from.
    const itemType = type.ofType;
    if (isIterableObject(value)) {
      const valuesNodes = [];
      for (const item of value) {
        const itemNode = astFromValue(item, itemType, lookup);
        if (itemNode != null) {
          valuesNodes.push(itemNode);
        }
      }
      return { kind: Kind.LIST, values: valuesNodes };
    }
    return astFromValue(value, itemType, lookup);
  }

  if (value === null) {
    return { kind: Kind.NULL };
  }

  if (value === undefined) {
    return null;
  }

  const namedType = lookup(type);
  if (namedType === undefined) {
    return null;
  }

  switch (namedType.kind) {
    case 'INPUT_OBJECT': {
      if (!isObjectLike(value)) {
        return null;
      }
      const fieldNodes: Array<ConstObjectFieldNode> = [];
      for (const field of Object.values(namedType.fields)) {
        const fieldValue = astFromValue(value[field.name], field.type, lookup);
        if (fieldValue) {
          fieldNodes.push({
            kind: Kind.OBJECT_FIELD,
            name: { kind: Kind.NAME, value: field.name },
            value: fieldValue,
          });
        }
      }
      return { kind: Kind.OBJECT, fields: fieldNodes };
    }
    case 'ENUM': {
      const enumValue = findEnumValue(namedType, value);
      return enumValue === undefined
        ? null
        : { kind: Kind.ENUM, value: enumValue.name };
    }
    case 'SCALAR': {
      const serialized = namedType.serialize(value);
      if (serialized == null) {
        return null;
      }

      if (typeof serialized === 'boolean') {
        return { kind: Kind.BOOLEAN, value: serialized };
      }

      if (typeof serialized === 'number' && Number.isFinite(serialized)) {
        const stringNum = String(serialized);
        return integerStringRegExp.test(stringNum)
          ? { kind: Kind.INT, value: stringNum }
          : { kind: Kind.FLOAT, value: stringNum };
      }

      if (typeof serialized === 'string') {
        // ID types can use Int literals.
        if (namedType.name === 'ID' && integerStringRegExp.test(serialized)) {
          return { kind: Kind.INT, value: serialized };
        }

        return { kind: Kind.STRING, value: serialized };
      }

      throw new TypeError(`Cannot convert value to AST: ${inspect(serialized)}.`);
    }
    case 'OBJECT':
    case 'INTERFACE':
    case 'UNION':
      invariant(false, `Unexpected output type: ${namedType.name}`);
  }
}

/**
 * IntValue:
 *   - NegativeSign? 0
 *   - NegativeSign? NonZeroDigit ( Digit+ )?
 */
const integerStringRegExp = /^-?(?:0|[1-9][0-9]*)$/;
