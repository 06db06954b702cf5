import { expect } from 'chai';
import { OperationTypeNode } from 'graphql';
import { describe, it } from 'mocha';

import { buildTestRegistry } from '../../__testUtils__/buildTestRegistry.js';

import {
  interfaceType,
  listOf,
  nonNull,
  objectType,
  unionType,
} from '../../type/definition.js';
import { IncludeDirective } from '../../type/directives.js';

const nodeInterface = interfaceType({
  name: 'Node',
  fields: { id: { type: nonNull('ID') } },
});

const bookType = objectType({
  name: 'Book',
  interfaces: ['Node'],
  fields: { id: { type: nonNull('ID') } },
});

const authorType = objectType({
  name: 'Author',
  interfaces: ['Node'],
  fields: { id: { type: nonNull('ID') } },
});

const resultUnion = unionType({
  name: 'SearchResult',
  types: ['Book', 'Author'],
});

const queryType = objectType({
  name: 'Query',
  fields: {
    author: { type: 'Author' },
    node: { type: 'Node' },
    search: { type: listOf('SearchResult') },
  },
});

const mutationType = objectType({
  name: 'Mutation',
  fields: { touch: { type: 'Boolean' } },
});

const registry = buildTestRegistry({
  query: queryType,
  mutation: mutationType,
  types: [nodeInterface, resultUnion, bookType, authorType],
});

describe('TypeRegistry', () => {
  it('returns the same definition on every lookup', () => {
    expect(registry.lookup('Book')).to.equal(bookType);
    expect(registry.lookup('Book')).to.equal(registry.lookup('Book'));
    expect(registry.getType('SearchResult')).to.equal(resultUnion);
  });

  it('does not find names inherited from the object prototype', () => {
    expect(registry.lookup('toString')).to.equal(undefined);
    expect(registry.lookup('constructor')).to.equal(undefined);
  });

  it('throws when getting an unknown type', () => {
    expect(() => registry.getType('Nope')).to.throw('Unknown type "Nope".');
  });

  it('keeps a frozen type map', () => {
    expect(Object.isFrozen(registry.getTypeMap())).to.equal(true);
  });

  it('returns the root types by operation', () => {
    expect(registry.getRootType(OperationTypeNode.QUERY)).to.equal(queryType);
    expect(registry.getMutationType()).to.equal(mutationType);
    expect(registry.getRootType(OperationTypeNode.MUTATION)).to.equal(
      mutationType,
    );
    expect(registry.getSubscriptionType()).to.equal(undefined);
    expect(registry.getRootType(OperationTypeNode.SUBSCRIPTION)).to.equal(
      undefined,
    );
  });

  it('returns the registered directives', () => {
    expect(registry.getDirective('include')).to.equal(IncludeDirective);
    expect(registry.getDirective('defer')).to.equal(undefined);
  });

  it('lists interface implementations in registration order', () => {
    expect(
      registry.getPossibleTypes(nodeInterface).map((type) => type.name),
    ).to.deep.equal(['Author', 'Book']);
  });

  it('lists union members in declaration order', () => {
    expect(
      registry.getPossibleTypes(resultUnion).map((type) => type.name),
    ).to.deep.equal(['Book', 'Author']);
  });

  it('answers subtype checks for abstract types', () => {
    expect(registry.isSubType(nodeInterface, bookType)).to.equal(true);
    expect(registry.isSubType(resultUnion, authorType)).to.equal(true);
    expect(registry.isSubType(nodeInterface, queryType)).to.equal(false);
  });

  it('compares type references covariantly', () => {
    expect(registry.isTypeSubTypeOf('Book', 'Book')).to.equal(true);
    expect(registry.isTypeSubTypeOf('Book', 'Node')).to.equal(true);
    expect(registry.isTypeSubTypeOf('Node', 'Book')).to.equal(false);
    expect(registry.isTypeSubTypeOf(nonNull('Book'), 'Node')).to.equal(true);
    expect(registry.isTypeSubTypeOf('Book', nonNull('Node'))).to.equal(false);
    expect(
      registry.isTypeSubTypeOf(listOf(nonNull('Book')), listOf('Node')),
    ).to.equal(true);
    expect(registry.isTypeSubTypeOf('Book', listOf('Book'))).to.equal(false);
    expect(registry.isTypeSubTypeOf(listOf('Book'), 'Book')).to.equal(false);
  });

  it('resolves references for introspection', () => {
    const listRef = listOf('Book');

    expect(registry.resolveTypeRef('Book')).to.equal(bookType);
    expect(registry.resolveTypeRef(listRef)).to.equal(listRef);
  });
});
