import { expect } from 'chai';
import { parse } from 'graphql';
import { describe, it } from 'mocha';

import { buildTestRegistry } from '../../__testUtils__/buildTestRegistry.js';
import { expectJSON } from '../../__testUtils__/expectJSON.js';

import type { PromiseOrValue } from '../../types/PromiseOrValue.js';

import { AbstractResolutionError } from '../../error/errors.js';

import type { UnionTypeConfig } from '../../type/definition.js';
import {
  interfaceType,
  objectType,
  unionType,
} from '../../type/definition.js';

import type { TypeRegistry } from '../../registry/TypeRegistry.js';

import { execute } from '../execute.js';

interface PetData {
  name: string;
  barks?: boolean;
  meows?: boolean;
  __typename?: string;
}

interface PetRegistryOptions {
  members?: ReadonlyArray<string>;
  dogIsTypeOf?: (value: PetData) => PromiseOrValue<boolean>;
  catIsTypeOf?: (value: PetData) => PromiseOrValue<boolean>;
  resolveType?: UnionTypeConfig['resolveType'];
}

const barks = (value: PetData) => value.barks === true;
const meows = (value: PetData) => value.meows === true;

function buildPetRegistry(options: PetRegistryOptions): TypeRegistry {
  const dogType = objectType<PetData>({
    name: 'Dog',
    fields: { name: { type: 'String' }, barks: { type: 'Boolean' } },
    isTypeOf: options.dogIsTypeOf,
  });
  const catType = objectType<PetData>({
    name: 'Cat',
    fields: { name: { type: 'String' }, meows: { type: 'Boolean' } },
    isTypeOf: options.catIsTypeOf,
  });
  const petType = unionType({
    name: 'Pet',
    types: options.members ?? ['Dog', 'Cat'],
    resolveType: options.resolveType,
  });
  const query = objectType({
    name: 'Query',
    fields: { pet: { type: 'Pet' } },
  });
  return buildTestRegistry({ query, types: [petType, dogType, catType] });
}

const document = parse(
  '{ pet { __typename ... on Dog { barks } ... on Cat { meows } } }',
);

function executePet(registry: TypeRegistry, pet: PetData) {
  return execute({ registry, document, rootValue: { pet } });
}

describe('resolveConcreteType', () => {
  describe('isTypeOf', () => {
    it('uses the first possible type that accepts the value', () => {
      const registry = buildPetRegistry({
        members: ['Cat', 'Dog'],
        dogIsTypeOf: barks,
        catIsTypeOf: meows,
      });

      expect(
        executePet(registry, { name: 'Odd', barks: true, meows: true }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Cat', meows: true } },
        errors: [],
      });
      expect(executePet(registry, { name: 'Rex', barks: true })).to.deep.equal(
        {
          data: { pet: { __typename: 'Dog', barks: true } },
          errors: [],
        },
      );
    });

    it('waits for asynchronous predicates and keeps declaration order', async () => {
      const registry = buildPetRegistry({
        dogIsTypeOf: (value) => Promise.resolve(barks(value)),
        catIsTypeOf: meows,
      });

      expect(
        await executePet(registry, { name: 'Tom', meows: true }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Cat', meows: true } },
        errors: [],
      });
      expect(
        await executePet(registry, { name: 'Odd', barks: true, meows: true }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Dog', barks: true } },
        errors: [],
      });
    });

    it('reports a value no possible type accepts', () => {
      const registry = buildPetRegistry({
        dogIsTypeOf: barks,
        catIsTypeOf: meows,
      });

      const result = executePet(registry, { name: 'Nemo' });

      expectJSON(result).toDeepEqual({
        data: { pet: null },
        errors: [
          {
            message:
              'Abstract type "Pet" must resolve to an Object type at runtime for field "Query.pet". None of the possible types of "Pet" accepts the value { name: "Nemo" }.',
            locations: [{ line: 1, column: 3 }],
            path: ['pet'],
          },
        ],
      });
    });
  });

  describe('__typename', () => {
    it('uses the type named by the value', () => {
      const registry = buildPetRegistry({});

      expect(
        executePet(registry, { __typename: 'Cat', name: 'Tom', meows: true }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Cat', meows: true } },
        errors: [],
      });
    });

    it('reports a name the registry does not hold', () => {
      const registry = buildPetRegistry({});

      const result = executePet(registry, { __typename: 'Bird', name: 'Tweety' });

      expectJSON(result).toDeepEqual({
        data: { pet: null },
        errors: [
          {
            message:
              'Abstract type "Pet" was resolved to a type "Bird" that does not exist inside the registry.',
            locations: [{ line: 1, column: 3 }],
            path: ['pet'],
          },
        ],
      });
    });
  });

  describe('resolveType', () => {
    it('takes precedence over __typename and isTypeOf', () => {
      const registry = buildPetRegistry({
        dogIsTypeOf: () => true,
        resolveType: () => 'Cat',
      });

      expect(
        executePet(registry, { __typename: 'Dog', name: 'Tom', meows: true }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Cat', meows: true } },
        errors: [],
      });
    });

    it('accepts a promise of a type name', async () => {
      const registry = buildPetRegistry({
        resolveType: () => Promise.resolve('Dog'),
      });

      expect(
        await executePet(registry, { name: 'Rex', barks: false }),
      ).to.deep.equal({
        data: { pet: { __typename: 'Dog', barks: false } },
        errors: [],
      });
    });

    it('reports a null result', () => {
      const registry = buildPetRegistry({ resolveType: () => null });

      const result = executePet(registry, { name: 'Rex' });

      expectJSON(result).toDeepEqual({
        data: { pet: null },
        errors: [
          {
            message:
              'Abstract type "Pet" must resolve to an Object type at runtime for field "Query.pet". Either the "Pet" type should provide a "resolveType" function or each possible type should provide an "isTypeOf" function.',
            locations: [{ line: 1, column: 3 }],
            path: ['pet'],
          },
        ],
      });
    });

    it('reports an object type that is not a possible type', () => {
      const registry = buildPetRegistry({
        members: ['Dog'],
        resolveType: () => 'Cat',
      });

      const result = executePet(registry, { name: 'Tom' });

      expectJSON(result).toDeepEqual({
        data: { pet: null },
        errors: [
          {
            message: 'Runtime Object type "Cat" is not a possible type for "Pet".',
            locations: [{ line: 1, column: 3 }],
            path: ['pet'],
          },
        ],
      });
    });

    it('reports a type whose isTypeOf disagrees', () => {
      const registry = buildPetRegistry({
        catIsTypeOf: meows,
        resolveType: () => 'Cat',
      });

      const result = executePet(registry, { name: 'Rex' });

      expectJSON(result).toDeepEqual({
        data: { pet: null },
        errors: [
          {
            message:
              'Abstract type "Pet" resolved { name: "Rex" } to "Cat", whose "isTypeOf" rejects it.',
            locations: [{ line: 1, column: 3 }],
            path: ['pet'],
          },
        ],
      });
    });

    it('keeps the resolution error as the original error', async () => {
      const registry = buildPetRegistry({ resolveType: () => 'Bird' });

      const result = await executePet(registry, { name: 'Tweety' });

      expect(result.errors[0].originalError).to.be.an.instanceOf(
        AbstractResolutionError,
      );
    });
  });

  it('resolves interface values to their implementations', () => {
    const personType = objectType({
      name: 'Person',
      interfaces: ['Named'],
      fields: { name: { type: 'String' } },
    });
    const namedType = interfaceType({
      name: 'Named',
      fields: { name: { type: 'String' } },
      resolveType: () => personType,
    });
    const query = objectType({
      name: 'Query',
      fields: { named: { type: 'Named' } },
    });
    const registry = buildTestRegistry({
      query,
      types: [namedType, personType],
    });

    const result = execute({
      registry,
      document: parse('{ named { __typename name } }'),
      rootValue: { named: { name: 'Ada' } },
    });

    expect(result).to.deep.equal({
      data: { named: { __typename: 'Person', name: 'Ada' } },
      errors: [],
    });
  });
});
