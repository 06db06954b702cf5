import { GraphQLError, Kind, print } from 'graphql';

import type { ReadOnlyObjMap } from '../types/ObjMap.js';

import { inspect } from '../utilities/inspect.js';

import type { ScalarType } from './definition.js';
import { scalarType } from './definition.js';

/**
 * Maximum possible Int value as per GraphQL Spec (32-bit signed integer).
 * n.b. This differs from JavaScript's numbers that are IEEE 754 doubles safe up-to 2^53 - 1
 * */
export const GRAPHQL_MAX_INT = 2147483647;

/**
 * Minimum possible Int value as per GraphQL Spec (32-bit signed integer).
 * n.b. This differs from JavaScript's numbers that are IEEE 754 doubles safe starting at -(2^53 - 1)
 * */
export const GRAPHQL_MIN_INT = -2147483648;

function isInt32(value: number): boolean {
  return (
    Number.isInteger(value) &&
    value <= GRAPHQL_MAX_INT &&
    value >= GRAPHQL_MIN_INT
  );
}

export const GraphQLInt: ScalarType<number, number> = scalarType({
  name: 'Int',
  description:
    'The `Int` scalar type represents non-fractional signed whole numeric values. Int can represent values between -(2^31) and 2^31 - 1.',
  serialize(outputValue) {
    let num = outputValue;
    if (typeof num === 'boolean') {
      num = num ? 1 : 0;
    } else if (typeof num === 'string' && num !== '') {
      num = Number(num);
    }

    if (typeof num !== 'number' || !Number.isInteger(num)) {
      throw new GraphQLError(
        `Int cannot represent non-integer value: ${inspect(outputValue)}`,
      );
    }
    if (!isInt32(num)) {
      throw new GraphQLError(
        'Int cannot represent non 32-bit signed integer value: ' +
          inspect(outputValue),
      );
    }
    return num;
  },
  parseValue(inputValue) {
    if (typeof inputValue !== 'number' || !Number.isInteger(inputValue)) {
      throw new GraphQLError(
        `Int cannot represent non-integer value: ${inspect(inputValue)}`,
      );
    }
    if (!isInt32(inputValue)) {
      throw new GraphQLError(
        `Int cannot represent non 32-bit signed integer value: ${inputValue}`,
      );
    }
    return inputValue;
  },
  parseLiteral(valueNode) {
    if (valueNode.kind !== Kind.INT) {
      throw new GraphQLError(
        `Int cannot represent non-integer value: ${print(valueNode)}`,
        { nodes: valueNode },
      );
    }
    const num = parseInt(valueNode.value, 10);
    if (!isInt32(num)) {
      throw new GraphQLError(
        `Int cannot represent non 32-bit signed integer value: ${valueNode.value}`,
        { nodes: valueNode },
      );
    }
    return num;
  },
});

export const GraphQLFloat: ScalarType<number, number> = scalarType({
  name: 'Float',
  description:
    'The `Float` scalar type represents signed double-precision fractional values as specified by [IEEE 754](https://en.wikipedia.org/wiki/IEEE_floating_point).',
  serialize(outputValue) {
    let num = outputValue;
    if (typeof num === 'boolean') {
      num = num ? 1 : 0;
    } else if (typeof num === 'string' && num !== '') {
      num = Number(num);
    }

    if (typeof num !== 'number' || !Number.isFinite(num)) {
      throw new GraphQLError(
        `Float cannot represent non numeric value: ${inspect(outputValue)}`,
      );
    }
    return num;
  },
  parseValue(inputValue) {
    if (typeof inputValue !== 'number' || !Number.isFinite(inputValue)) {
      throw new GraphQLError(
        `Float cannot represent non numeric value: ${inspect(inputValue)}`,
      );
    }
    return inputValue;
  },
  parseLiteral(valueNode) {
    if (valueNode.kind !== Kind.FLOAT && valueNode.kind !== Kind.INT) {
      throw new GraphQLError(
        `Float cannot represent non numeric value: ${print(valueNode)}`,
        { nodes: valueNode },
      );
    }
    return parseFloat(valueNode.value);
  },
});

export const GraphQLString: ScalarType<string, string> = scalarType({
  name: 'String',
  description:
    'The `String` scalar type represents textual data, represented as UTF-8 character sequences. The String type is most often used by GraphQL to represent free-form human-readable text.',
  serialize(outputValue) {
    if (typeof outputValue === 'string') {
      return outputValue;
    }
    if (typeof outputValue === 'boolean') {
      return outputValue ? 'true' : 'false';
    }
    if (typeof outputValue === 'number' && Number.isFinite(outputValue)) {
      return outputValue.toString();
    }
    throw new GraphQLError(
      `String cannot represent value: ${inspect(outputValue)}`,
    );
  },
  parseValue(inputValue) {
    if (typeof inputValue !== 'string') {
      throw new GraphQLError(
        `String cannot represent a non string value: ${inspect(inputValue)}`,
      );
    }
    return inputValue;
  },
  parseLiteral(valueNode) {
    if (valueNode.kind !== Kind.STRING) {
      throw new GraphQLError(
        `String cannot represent a non string value: ${print(valueNode)}`,
        { nodes: valueNode },
      );
    }
    return valueNode.value;
  },
});

export const GraphQLBoolean: ScalarType<boolean, boolean> = scalarType({
  name: 'Boolean',
  description: 'The `Boolean` scalar type represents `true` or `false`.',
  serialize(outputValue) {
    if (typeof outputValue === 'boolean') {
      return outputValue;
    }
    if (typeof outputValue === 'number' && Number.isFinite(outputValue)) {
      return outputValue !== 0;
    }
    throw new GraphQLError(
      `Boolean cannot represent a non boolean value: ${inspect(outputValue)}`,
    );
  },
  parseValue(inputValue) {
    if (typeof inputValue !== 'boolean') {
      throw new GraphQLError(
        `Boolean cannot represent a non boolean value: ${inspect(inputValue)}`,
      );
    }
    return inputValue;
  },
  parseLiteral(valueNode) {
    if (valueNode.kind !== Kind.BOOLEAN) {
      throw new GraphQLError(
        `Boolean cannot represent a non boolean value: ${print(valueNode)}`,
        { nodes: valueNode },
      );
    }
    return valueNode.value;
  },
});

export const GraphQLID: ScalarType<string, string> = scalarType({
  name: 'ID',
  description:
    'The `ID` scalar type represents a unique identifier, often used to refetch an object or as key for a cache. The ID type appears in a JSON response as a String; however, it is not intended to be human-readable. When expected as an input type, any string (such as `"4"`) or integer (such as `4`) input value will be accepted as an ID.',
  serialize(outputValue) {
    if (typeof outputValue === 'string') {
      return outputValue;
    }
    if (typeof outputValue === 'number' && Number.isInteger(outputValue)) {
      return String(outputValue);
    }
    throw new GraphQLError(`ID cannot represent value: ${inspect(outputValue)}`);
  },
  parseValue(inputValue) {
    if (typeof inputValue === 'string') {
      return inputValue;
    }
    if (typeof inputValue === 'number' && Number.isInteger(inputValue)) {
      return inputValue.toString();
    }
    throw new GraphQLError(`ID cannot represent value: ${inspect(inputValue)}`);
  },
  parseLiteral(valueNode) {
    if (valueNode.kind !== Kind.STRING && valueNode.kind !== Kind.INT) {
      throw new GraphQLError(
        'ID cannot represent a non-string and non-integer value: ' +
          print(valueNode),
        { nodes: valueNode },
      );
    }
    return valueNode.value;
  },
});

export const specifiedScalarTypes: ReadonlyArray<ScalarType> = Object.freeze([
  GraphQLString,
  GraphQLInt,
  GraphQLFloat,
  GraphQLBoolean,
  GraphQLID,
]);

const specifiedScalarMap: ReadOnlyObjMap<ScalarType> = Object.fromEntries(
  specifiedScalarTypes.map((type) => [type.name, type]),
);

export function isSpecifiedScalarType(type: { name: string }): boolean {
  return specifiedScalarMap[type.name] === type;
}
