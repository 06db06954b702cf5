import {
  enumType,
  inputObjectType,
  listOf,
  nonNull,
  objectType,
  scalarType,
} from '../type/definition.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { buildTestRegistry } from './buildTestRegistry.js';

/**
 * Input types exercising every coercion path: an input object with a
 * required field, a defaulted field and a list of non-null items, an enum
 * whose internal values differ from its symbols, and a custom scalar.
 */

export const colorEnum = enumType({
  name: 'Color',
  values: {
    RED: { value: '#f00' },
    GREEN: { value: '#0f0' },
  },
});

export const pointInput = inputObjectType({
  name: 'Point',
  fields: {
    x: { type: nonNull('Int') },
    y: { type: 'Int', defaultValue: 0 },
    tags: { type: listOf(nonNull('String')) },
  },
});

export const evenScalar = scalarType({
  name: 'Even',
  serialize: (outputValue) => outputValue,
  parseValue(inputValue) {
    if (typeof inputValue !== 'number') {
      return undefined;
    }
    if (inputValue % 2 !== 0) {
      throw new Error(`${inputValue} is not even`);
    }
    return inputValue;
  },
});

const queryType = objectType({
  name: 'Query',
  fields: {
    plot: {
      type: 'String',
      args: {
        point: { type: 'Point' },
        color: { type: 'Color' },
        even: { type: 'Even' },
      },
    },
    repeat: {
      type: 'String',
      args: {
        times: { type: nonNull('Int') },
        label: { type: 'String', defaultValue: 'x' },
      },
    },
  },
});

function buildInputRegistry(
  unknownInputFields: 'reject' | 'ignore',
): TypeRegistry {
  return buildTestRegistry({
    query: queryType,
    types: [colorEnum, pointInput, evenScalar],
    unknownInputFields,
  });
}

export const inputRegistry: TypeRegistry = buildInputRegistry('reject');

export const lenientInputRegistry: TypeRegistry =
  buildInputRegistry('ignore');
