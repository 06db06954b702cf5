import { expect } from 'chai';
import { describe, it } from 'mocha';

import { SchemaBuildError } from '../../error/errors.js';

import type { NamedType, TypeRef } from '../../type/definition.js';
import {
  enumType,
  inputObjectType,
  interfaceType,
  listOf,
  nonNull,
  objectType,
  unionType,
} from '../../type/definition.js';

import { buildRegistry } from '../buildRegistry.js';

function problemsOf(types: ReadonlyArray<NamedType>): ReadonlyArray<string> {
  const result = buildRegistry({
    query: objectType({ name: 'Query', fields: { ok: { type: 'String' } } }),
    types,
  });
  return result instanceof SchemaBuildError ? result.problems : [];
}

describe('validateRegistry', () => {
  it('accepts well-formed definitions', () => {
    expect(
      problemsOf([
        interfaceType({ name: 'Node', fields: { id: { type: nonNull('ID') } } }),
        objectType({
          name: 'Item',
          interfaces: ['Node'],
          fields: {
            id: { type: nonNull('ID') },
            tags: {
              type: listOf(nonNull('String')),
              args: { first: { type: 'Int', defaultValue: 10 } },
            },
          },
        }),
        unionType({ name: 'Anything', types: ['Item'] }),
        inputObjectType({ name: 'Filter', fields: { q: { type: 'String' } } }),
      ]),
    ).to.deep.equal([]);
  });

  it('rejects invalid names', () => {
    expect(
      problemsOf([
        objectType({
          name: 'Bad-Type',
          fields: { 'bad field': { type: 'String' } },
        }),
        enumType({ name: 'Mood', values: { __HAPPY: {} } }),
      ]),
    ).to.deep.equal([
      'Type "Bad-Type" does not match /^[_a-zA-Z][_a-zA-Z0-9]*$/.',
      'Field "Bad-Type.bad field" does not match /^[_a-zA-Z][_a-zA-Z0-9]*$/.',
      'Enum value "Mood.__HAPPY" must not begin with "__", which is reserved by introspection.',
    ]);
  });

  it('reserves the introspection prefix for the introspection types', () => {
    expect(
      problemsOf([
        objectType({ name: '__Secret', fields: { x: { type: 'String' } } }),
      ]),
    ).to.deep.equal([
      'Type "__Secret" must not begin with "__", which is reserved by introspection.',
    ]);
  });

  it('rejects empty composite types', () => {
    expect(
      problemsOf([
        objectType({ name: 'Nothing', fields: {} }),
        inputObjectType({ name: 'NoInput', fields: {} }),
        unionType({ name: 'NoMembers', types: [] }),
      ]),
    ).to.deep.equal([
      'Type Nothing must define one or more fields.',
      'Input Object type NoInput must define one or more fields.',
      'Union type NoMembers must define one or more member types.',
    ]);
  });

  it('rejects reserved enum values', () => {
    expect(
      problemsOf([enumType({ name: 'Flag', values: { true: {}, ON: {} } })]),
    ).to.deep.equal(['Enum type Flag cannot include value: true.']);
  });

  it('rejects input types in output positions and the reverse', () => {
    expect(
      problemsOf([
        inputObjectType({ name: 'Filter', fields: { q: { type: 'String' } } }),
        objectType({
          name: 'Item',
          fields: {
            filter: { type: 'Filter' },
            find: { type: 'String', args: { by: { type: listOf('Item') } } },
          },
        }),
      ]),
    ).to.deep.equal([
      'The type of Item.filter must be Output Type but got: Filter.',
      'The type of Item.find(by:) must be Input Type but got: [Item].',
    ]);
  });

  it('rejects a deprecated required argument without a default', () => {
    expect(
      problemsOf([
        objectType({
          name: 'Item',
          fields: {
            find: {
              type: 'String',
              args: {
                id: { type: nonNull('ID'), deprecationReason: 'Use key.' },
              },
            },
          },
        }),
      ]),
    ).to.deep.equal(['Required Item.find(id:) cannot be deprecated.']);
  });

  it('rejects a non-null wrapper around a non-null type', () => {
    // nonNull() only wraps nullable references.
    const doubledType: TypeRef = JSON.parse(
      '{ "kind": "NON_NULL", "ofType": { "kind": "NON_NULL", "ofType": "String" } }',
    );

    expect(
      problemsOf([
        objectType({ name: 'Item', fields: { name: { type: doubledType } } }),
      ]),
    ).to.deep.equal([
      'The type of Item.name wraps a Non-Null type in a Non-Null type: String!!.',
    ]);
  });

  it('rejects duplicate and non-object union members', () => {
    expect(
      problemsOf([
        objectType({ name: 'Item', fields: { id: { type: 'ID' } } }),
        enumType({ name: 'Mood', values: { CALM: {} } }),
        unionType({ name: 'Mixed', types: ['Item', 'Item', 'Mood'] }),
      ]),
    ).to.deep.equal([
      'Union type Mixed can only include type Item once.',
      'Union type Mixed can only include Object types, it cannot include Mood.',
    ]);
  });

  it('checks that objects implement their interfaces', () => {
    expect(
      problemsOf([
        interfaceType({
          name: 'Named',
          fields: {
            name: {
              type: nonNull('String'),
              args: { locale: { type: 'String' } },
            },
            nickname: { type: 'String' },
          },
        }),
        objectType({
          name: 'Person',
          interfaces: ['Named'],
          fields: {
            name: {
              type: 'String',
              args: {
                locale: { type: nonNull('String') },
                style: { type: nonNull('String') },
              },
            },
          },
        }),
      ]),
    ).to.deep.equal([
      'Interface field Named.name expects type String! but Person.name is type String.',
      'Interface field argument Named.name(locale:) expects type String but Person.name(locale:) is type String!.',
      'Object field Person.name includes required argument style that is missing from the Interface field Named.name.',
      'Interface field Named.nickname expected but Person does not provide it.',
    ]);
  });

  it('rejects implementing a type that is not an interface', () => {
    expect(
      problemsOf([
        objectType({ name: 'Base', fields: { id: { type: 'ID' } } }),
        objectType({
          name: 'Derived',
          interfaces: ['Base'],
          fields: { id: { type: 'ID' } },
        }),
      ]),
    ).to.deep.equal([
      'Type Derived must only implement Interface types, it cannot implement Base.',
    ]);
  });

  it('accepts a covariant field type on an implementation', () => {
    expect(
      problemsOf([
        interfaceType({
          name: 'Node',
          fields: { related: { type: listOf('Node') } },
        }),
        objectType({
          name: 'Page',
          interfaces: ['Node'],
          fields: { related: { type: nonNull(listOf(nonNull('Page'))) } },
        }),
      ]),
    ).to.deep.equal([]);
  });
});
