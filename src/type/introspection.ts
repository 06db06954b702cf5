import { DirectiveLocation } from 'graphql';

import type { ObjMap } from '../types/ObjMap.js';

import { printDefaultValue } from '../utilities/printSchema.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import type {
  EnumValue,
  EnumValueConfig,
  Field,
  InputValue,
  IntrospectedType,
  NamedType,
} from './definition.js';
import {
  defineField,
  enumType,
  listOf,
  nonNull,
  objectType,
} from './definition.js';
import type { Directive } from './directives.js';

/**
 * Introspection is answered by ordinary object types over the live registry:
 * `__Schema` resolves against the registry itself, `__Type` against named
 * definitions and wrapper references.
 */

function includeDeprecatedArg(description: string) {
  return {
    includeDeprecated: {
      type: 'Boolean',
      defaultValue: false,
      description,
    },
  };
}

function filterDeprecated<T extends { deprecationReason: string | undefined }>(
  values: ReadonlyArray<T>,
  args: ObjMap<unknown>,
): ReadonlyArray<T> {
  return args.includeDeprecated === true
    ? values
    : values.filter((value) => value.deprecationReason === undefined);
}

export const __Schema = objectType<TypeRegistry>({
  name: '__Schema',
  description:
    'A GraphQL Schema defines the capabilities of a GraphQL server. It exposes all available types and directives on the server, as well as the entry points for query, mutation, and subscription operations.',
  fields: {
    description: {
      type: 'String',
      resolve: (registry) => registry.description,
    },
    types: {
      description: 'A list of all types supported by this server.',
      type: nonNull(listOf(nonNull('__Type'))),
      resolve: (registry) => Object.values(registry.getTypeMap()),
    },
    queryType: {
      description: 'The type that query operations will be rooted at.',
      type: nonNull('__Type'),
      resolve: (registry) => registry.getQueryType(),
    },
    mutationType: {
      description:
        'If this server supports mutation, the type that mutation operations will be rooted at.',
      type: '__Type',
      resolve: (registry) => registry.getMutationType(),
    },
    subscriptionType: {
      description:
        'If this server support subscription, the type that subscription operations will be rooted at.',
      type: '__Type',
      resolve: (registry) => registry.getSubscriptionType(),
    },
    directives: {
      description: 'A list of all directives supported by this server.',
      type: nonNull(listOf(nonNull('__Directive'))),
      resolve: (registry) => registry.getDirectives(),
    },
  },
});

export const __Directive = objectType<Directive>({
  name: '__Directive',
  description:
    "A Directive provides a way to describe alternate runtime execution and type validation behavior in a GraphQL document.\n\nIn some cases, you need to provide options to alter GraphQL's execution behavior in ways field arguments will not suffice, such as conditionally including or skipping a field. Directives provide this by describing additional information to the executor.",
  fields: {
    name: {
      type: nonNull('String'),
      resolve: (directive) => directive.name,
    },
    description: {
      type: 'String',
      resolve: (directive) => directive.description,
    },
    isRepeatable: {
      type: nonNull('Boolean'),
      resolve: (directive) => directive.isRepeatable,
    },
    locations: {
      type: nonNull(listOf(nonNull('__DirectiveLocation'))),
      resolve: (directive) => directive.locations,
    },
    args: {
      type: nonNull(listOf(nonNull('__InputValue'))),
      args: includeDeprecatedArg(
        'Whether deprecated arguments are included.',
      ),
      resolve: (directive, args) =>
        filterDeprecated(Object.values(directive.args), args),
    },
  },
});

const directiveLocationValues: ObjMap<EnumValueConfig> = Object.create(null);
for (const location of Object.values(DirectiveLocation)) {
  directiveLocationValues[location] = { value: location };
}

export const __DirectiveLocation = enumType({
  name: '__DirectiveLocation',
  description:
    'A Directive can be adjacent to many parts of the GraphQL language, a __DirectiveLocation describes one such possible adjacencies.',
  values: directiveLocationValues,
});

export const __Type = objectType<IntrospectedType>({
  name: '__Type',
  description:
    'The fundamental unit of any GraphQL Schema is the type. There are many kinds of types in GraphQL as represented by the `__TypeKind` enum.\n\nDepending on the kind of a type, certain fields describe information about that type. Scalar types provide no information beyond a name, description and optional `specifiedByURL`, while Enum types provide their values. Object and Interface types provide the fields they describe. Abstract types, Union and Interface, provide the Object types possible at runtime. List and NonNull types compose other types.',
  fields: {
    kind: {
      type: nonNull('__TypeKind'),
      resolve: (type) => type.kind,
    },
    name: {
      type: 'String',
      resolve: (type) => ('name' in type ? type.name : null),
    },
    description: {
      type: 'String',
      resolve: (type) => ('description' in type ? type.description : null),
    },
    specifiedByURL: {
      type: 'String',
      resolve: (type) =>
        type.kind === 'SCALAR' ? type.specifiedByURL : null,
    },
    fields: {
      type: listOf(nonNull('__Field')),
      args: includeDeprecatedArg('Whether deprecated fields are included.'),
      resolve: (type, args) =>
        type.kind === 'OBJECT' || type.kind === 'INTERFACE'
          ? filterDeprecated<Field>(Object.values(type.fields), args)
          : null,
    },
    interfaces: {
      type: listOf(nonNull('__Type')),
      resolve(type, _args, _context, { registry }) {
        if (type.kind === 'OBJECT') {
          return type.interfaces.map((name) => registry.getType(name));
        }
        return type.kind === 'INTERFACE' ? [] : null;
      },
    },
    possibleTypes: {
      type: listOf(nonNull('__Type')),
      resolve: (type, _args, _context, { registry }) =>
        type.kind === 'INTERFACE' || type.kind === 'UNION'
          ? registry.getPossibleTypes(type)
          : null,
    },
    enumValues: {
      type: listOf(nonNull('__EnumValue')),
      args: includeDeprecatedArg(
        'Whether deprecated enum values are included.',
      ),
      resolve: (type, args) =>
        type.kind === 'ENUM'
          ? filterDeprecated<EnumValue>(Object.values(type.values), args)
          : null,
    },
    inputFields: {
      type: listOf(nonNull('__InputValue')),
      args: includeDeprecatedArg(
        'Whether deprecated input fields are included.',
      ),
      resolve: (type, args) =>
        type.kind === 'INPUT_OBJECT'
          ? filterDeprecated<InputValue>(Object.values(type.fields), args)
          : null,
    },
    ofType: {
      type: '__Type',
      resolve: (type, _args, _context, { registry }) =>
        type.kind === 'LIST' || type.kind === 'NON_NULL'
          ? registry.resolveTypeRef(type.ofType)
          : null,
    },
  },
});

export const __Field = objectType<Field>({
  name: '__Field',
  description:
    'Object and Interface types are described by a list of Fields, each of which has a name, potentially a list of arguments, and a return type.',
  fields: {
    name: {
      type: nonNull('String'),
      resolve: (field) => field.name,
    },
    description: {
      type: 'String',
      resolve: (field) => field.description,
    },
    args: {
      type: nonNull(listOf(nonNull('__InputValue'))),
      args: includeDeprecatedArg('Whether deprecated arguments are included.'),
      resolve: (field, args) =>
        filterDeprecated(Object.values(field.args), args),
    },
    type: {
      type: nonNull('__Type'),
      resolve: (field, _args, _context, { registry }) =>
        registry.resolveTypeRef(field.type),
    },
    isDeprecated: {
      type: nonNull('Boolean'),
      resolve: (field) => field.deprecationReason !== undefined,
    },
    deprecationReason: {
      type: 'String',
      resolve: (field) => field.deprecationReason,
    },
  },
});

export const __InputValue = objectType<InputValue>({
  name: '__InputValue',
  description:
    'Arguments provided to Fields or Directives and the input fields of an InputObject are represented as Input Values which describe their type and optionally a default value.',
  fields: {
    name: {
      type: nonNull('String'),
      resolve: (inputValue) => inputValue.name,
    },
    description: {
      type: 'String',
      resolve: (inputValue) => inputValue.description,
    },
    type: {
      type: nonNull('__Type'),
      resolve: (inputValue, _args, _context, { registry }) =>
        registry.resolveTypeRef(inputValue.type),
    },
    defaultValue: {
      type: 'String',
      description:
        'A GraphQL-formatted string representing the default value for this input value.',
      resolve: (inputValue, _args, _context, { registry }) =>
        printDefaultValue(inputValue, (name) => registry.lookup(name)),
    },
    isDeprecated: {
      type: nonNull('Boolean'),
      resolve: (inputValue) => inputValue.deprecationReason !== undefined,
    },
    deprecationReason: {
      type: 'String',
      resolve: (inputValue) => inputValue.deprecationReason,
    },
  },
});

export const __EnumValue = objectType<EnumValue>({
  name: '__EnumValue',
  description:
    'One possible value for a given Enum. Enum values are unique values, not a placeholder for a string or numeric value. However an Enum value is returned in a JSON response as a string.',
  fields: {
    name: {
      type: nonNull('String'),
      resolve: (enumValue) => enumValue.name,
    },
    description: {
      type: 'String',
      resolve: (enumValue) => enumValue.description,
    },
    isDeprecated: {
      type: nonNull('Boolean'),
      resolve: (enumValue) => enumValue.deprecationReason !== undefined,
    },
    deprecationReason: {
      type: 'String',
      resolve: (enumValue) => enumValue.deprecationReason,
    },
  },
});

export const __TypeKind = enumType({
  name: '__TypeKind',
  description: 'An enum describing what kind of type a given `__Type` is.',
  values: {
    SCALAR: {
      description: 'Indicates this type is a scalar.',
    },
    OBJECT: {
      description:
        'Indicates this type is an object. `fields` and `interfaces` are valid fields.',
    },
    INTERFACE: {
      description:
        'Indicates this type is an interface. `fields`, `interfaces`, and `possibleTypes` are valid fields.',
    },
    UNION: {
      description:
        'Indicates this type is a union. `possibleTypes` is a valid field.',
    },
    ENUM: {
      description:
        'Indicates this type is an enum. `enumValues` is a valid field.',
    },
    INPUT_OBJECT: {
      description:
        'Indicates this type is an input object. `inputFields` is a valid field.',
    },
    LIST: {
      description: 'Indicates this type is a list. `ofType` is a valid field.',
    },
    NON_NULL: {
      description:
        'Indicates this type is a non-null. `ofType` is a valid field.',
    },
  },
});

export const introspectionTypes: ReadonlyArray<NamedType> = Object.freeze([
  __Schema,
  __Directive,
  __DirectiveLocation,
  __Type,
  __Field,
  __InputValue,
  __EnumValue,
  __TypeKind,
]);

export function isIntrospectionType(type: NamedType): boolean {
  return introspectionTypes.some(({ name }) => type.name === name);
}

/**
 * Meta-fields. `__schema` and `__type` are only available on the query root
 * type; `__typename` on every composite type.
 */
export const SchemaMetaField = defineField<unknown>('__schema', {
  description: 'Access the current type schema of this server.',
  type: nonNull('__Schema'),
  resolve: (_source, _args, _context, { registry }) => registry,
});

export const TypeMetaField = defineField<unknown>('__type', {
  description: 'Request the type information of a single type.',
  type: '__Type',
  args: { name: { type: nonNull('String') } },
  resolve: (_source, { name }, _context, { registry }) =>
    typeof name === 'string' ? registry.lookup(name) : undefined,
});

export const TypeNameMetaField = defineField<unknown>('__typename', {
  description: 'The name of the current Object type at runtime.',
  type: nonNull('String'),
  resolve: (_source, _args, _context, { parentType }) => parentType.name,
});
