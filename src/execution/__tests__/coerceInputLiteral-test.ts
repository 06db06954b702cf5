import { expect } from 'chai';
import { parseValue, print } from 'graphql';
import { describe, it } from 'mocha';

import {
  inputRegistry,
  lenientInputRegistry,
} from '../../__testUtils__/inputRegistry.js';

import type { ObjMap } from '../../types/ObjMap.js';

import type { TypeRef } from '../../type/definition.js';
import { listOf, nonNull } from '../../type/definition.js';

import type { TypeRegistry } from '../../registry/TypeRegistry.js';

import { coerceInputLiteral } from '../coerceInputLiteral.js';

interface ReportedError {
  message: string;
  path: ReadonlyArray<string | number>;
}

interface LiteralOutcome {
  value: unknown;
  errors: Array<ReportedError>;
  invalidNodes: Array<string>;
}

function coerceLiteral(
  source: string,
  type: TypeRef,
  variableValues?: ObjMap<unknown>,
  registry: TypeRegistry = inputRegistry,
): LiteralOutcome {
  const errors: Array<ReportedError> = [];
  const invalidNodes: Array<string> = [];
  const value = coerceInputLiteral(
    parseValue(source),
    type,
    registry,
    variableValues,
    (path, invalidNode, error) => {
      errors.push({ message: error.message, path });
      invalidNodes.push(print(invalidNode));
    },
  );
  return { value, errors, invalidNodes };
}

function expectValue(outcome: LiteralOutcome) {
  expect(outcome.errors).to.deep.equal([]);
  return expect(outcome.value);
}

function expectErrors(outcome: LiteralOutcome) {
  expect(outcome.value).to.equal(undefined);
  return expect(outcome.errors);
}

describe('coerceInputLiteral', () => {
  describe('for scalars', () => {
    it('parses valid literals', () => {
      expectValue(coerceLiteral('1', 'Int')).to.equal(1);
      expectValue(coerceLiteral('1.5', 'Float')).to.equal(1.5);
      expectValue(coerceLiteral('"abc"', 'String')).to.equal('abc');
      expectValue(coerceLiteral('true', 'Boolean')).to.equal(true);
      expectValue(coerceLiteral('"4"', 'ID')).to.equal('4');
      expectValue(coerceLiteral('4', 'ID')).to.equal('4');
    });

    it('reports the literal a scalar rejects', () => {
      const outcome = coerceLiteral('"1"', 'Int');

      expectErrors(outcome).to.deep.equal([
        {
          message:
            'Expected value of type "Int", found "1"; Int cannot represent non-integer value: "1"',
          path: [],
        },
      ]);
      expect(outcome.invalidNodes).to.deep.equal(['"1"']);
    });

    it('parses custom scalars through their value parser', () => {
      expectValue(coerceLiteral('4', 'Even')).to.equal(4);
      expectErrors(coerceLiteral('3', 'Even')).to.deep.equal([
        {
          message: 'Expected value of type "Even", found 3; 3 is not even',
          path: [],
        },
      ]);
      expectErrors(coerceLiteral('"x"', 'Even')).to.deep.equal([
        { message: 'Expected value of type "Even", found "x".', path: [] },
      ]);
    });
  });

  describe('for non-null types', () => {
    it('rejects null', () => {
      expectErrors(coerceLiteral('null', nonNull('Int'))).to.deep.equal([
        {
          message: 'Expected non-nullable type "Int!" not to be null.',
          path: [],
        },
      ]);
    });

    it('keeps null for nullable types', () => {
      expectValue(coerceLiteral('null', 'Int')).to.equal(null);
    });
  });

  describe('for enums', () => {
    it('returns the internal value of a symbol', () => {
      expectValue(coerceLiteral('GREEN', 'Color')).to.equal('#0f0');
    });

    it('rejects a string literal', () => {
      expectErrors(coerceLiteral('"RED"', 'Color')).to.deep.equal([
        {
          message: 'Enum "Color" cannot represent non-enum value: "RED".',
          path: [],
        },
      ]);
    });

    it('rejects an unknown symbol', () => {
      expectErrors(coerceLiteral('BLUE', 'Color')).to.deep.equal([
        {
          message: 'Value "BLUE" does not exist in "Color" enum.',
          path: [],
        },
      ]);
    });
  });

  describe('for lists', () => {
    it('coerces each item and wraps single values', () => {
      expectValue(coerceLiteral('[1, 2]', listOf('Int'))).to.deep.equal([
        1, 2,
      ]);
      expectValue(coerceLiteral('4', listOf('Int'))).to.deep.equal([4]);
    });

    it('reports invalid items with their index', () => {
      const outcome = coerceLiteral('[1, "b"]', listOf('Int'));

      expectErrors(outcome).to.deep.equal([
        {
          message:
            'Expected value of type "Int", found "b"; Int cannot represent non-integer value: "b"',
          path: [1],
        },
      ]);
      expect(outcome.invalidNodes).to.deep.equal(['"b"']);
    });
  });

  describe('for input objects', () => {
    it('applies defaults and omits absent nullable fields', () => {
      expectValue(coerceLiteral('{ x: 1 }', 'Point')).to.deep.equal({
        x: 1,
        y: 0,
      });
      expectValue(
        coerceLiteral('{ x: 1, y: 2, tags: ["a"] }', 'Point'),
      ).to.deep.equal({ x: 1, y: 2, tags: ['a'] });
    });

    it('reports a missing required field', () => {
      expectErrors(coerceLiteral('{ y: 2 }', 'Point')).to.deep.equal([
        {
          message: 'Field "x" of required type "Int!" was not provided.',
          path: [],
        },
      ]);
    });

    it('reports nested errors with their path', () => {
      expectErrors(
        coerceLiteral('{ x: 1, tags: ["a", null] }', 'Point'),
      ).to.deep.equal([
        {
          message: 'Expected non-nullable type "String!" not to be null.',
          path: ['tags', 1],
        },
      ]);
    });

    it('reports a literal that is not an object', () => {
      expectErrors(coerceLiteral('1', 'Point')).to.deep.equal([
        { message: 'Expected type "Point" to be an object.', path: [] },
      ]);
    });

    it('rejects undeclared fields unless the registry ignores them', () => {
      expectErrors(coerceLiteral('{ x: 1, z: 3 }', 'Point')).to.deep.equal([
        { message: 'Field "z" is not defined by type "Point".', path: [] },
      ]);
      expectValue(
        coerceLiteral('{ x: 1, z: 3 }', 'Point', {}, lenientInputRegistry),
      ).to.deep.equal({ x: 1, y: 0 });
    });
  });

  describe('with variables', () => {
    it('substitutes the coerced value of a variable', () => {
      expectValue(coerceLiteral('$v', 'Int', { v: 5 })).to.equal(5);
      expectValue(
        coerceLiteral('{ x: $x, tags: $tags }', 'Point', {
          x: 3,
          tags: ['a'],
        }),
      ).to.deep.equal({ x: 3, y: 0, tags: ['a'] });
    });

    it('yields undefined without an error for a missing variable', () => {
      expectValue(coerceLiteral('$v', 'Int', {})).to.equal(undefined);
      expectValue(coerceLiteral('$v', nonNull('Int'))).to.equal(undefined);
    });

    it('rejects a null variable at a non-null position', () => {
      expectErrors(coerceLiteral('$v', nonNull('Int'), { v: null })).to.deep.equal(
        [
          {
            message: 'Expected non-nullable type "Int!" not to be null.',
            path: [],
          },
        ],
      );
    });

    it('turns a missing variable inside a list into null', () => {
      expectValue(
        coerceLiteral('[1, $missing]', listOf('Int'), {}),
      ).to.deep.equal([1, null]);
      expectErrors(
        coerceLiteral('[1, $missing]', listOf(nonNull('Int')), {}),
      ).to.deep.equal([
        {
          message: 'Expected non-nullable type "Int!" not to be null.',
          path: [1],
        },
      ]);
    });

    it('treats a missing variable in an input field as an absent field', () => {
      expectValue(
        coerceLiteral('{ x: 1, y: $missing }', 'Point', {}),
      ).to.deep.equal({ x: 1, y: 0 });
      expectErrors(coerceLiteral('{ x: $missing }', 'Point', {})).to.deep.equal(
        [
          {
            message: 'Field "x" of required type "Int!" was not provided.',
            path: [],
          },
        ],
      );
    });
  });
});
