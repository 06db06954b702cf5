import type {
  FieldNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
  TypeNode,
  ValueNode,
} from 'graphql';
import { Kind, valueFromASTUntyped } from 'graphql';

import type { Maybe } from '../types/Maybe.js';
import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';
import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import type { Path } from '../utilities/Path.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

/**
 * The closed set of type kinds. The names match the values of the
 * introspection enum `__TypeKind`.
 */
export type TypeKind =
  | 'SCALAR'
  | 'OBJECT'
  | 'INTERFACE'
  | 'UNION'
  | 'ENUM'
  | 'INPUT_OBJECT'
  | 'LIST'
  | 'NON_NULL';

/**
 * Type references
 *
 * A named type is referenced by its name and resolved through the registry.
 * Lists and non-null wrappers are structural and carry their inner reference.
 */
export interface ListTypeRef {
  readonly kind: 'LIST';
  readonly ofType: TypeRef;
}

export interface NonNullTypeRef {
  readonly kind: 'NON_NULL';
  readonly ofType: NullableTypeRef;
}

export type NullableTypeRef = string | ListTypeRef;

export type TypeRef = NullableTypeRef | NonNullTypeRef;

export type WrappingTypeRef = ListTypeRef | NonNullTypeRef;

export function listOf(ofType: TypeRef): ListTypeRef {
  return Object.freeze({ kind: 'LIST', ofType });
}

export function nonNull(ofType: NullableTypeRef): NonNullTypeRef {
  return Object.freeze({ kind: 'NON_NULL', ofType });
}

export function isListRef(ref: TypeRef): ref is ListTypeRef {
  return typeof ref !== 'string' && ref.kind === 'LIST';
}

export function isNonNullRef(ref: TypeRef): ref is NonNullTypeRef {
  return typeof ref !== 'string' && ref.kind === 'NON_NULL';
}

export function getNullableRef(ref: TypeRef): NullableTypeRef {
  return isNonNullRef(ref) ? ref.ofType : ref;
}

export function getNamedTypeName(ref: TypeRef): string {
  let current = ref;
  while (typeof current !== 'string') {
    current = current.ofType;
  }
  return current;
}

/**
 * Renders a reference in SDL notation, e.g. `[Episode!]!`.
 */
export function printTypeRef(ref: TypeRef): string {
  if (typeof ref === 'string') {
    return ref;
  }
  return ref.kind === 'LIST'
    ? `[${printTypeRef(ref.ofType)}]`
    : `${printTypeRef(ref.ofType)}!`;
}

export function typeRefFromAST(typeNode: TypeNode): TypeRef {
  if (typeNode.kind === Kind.NON_NULL_TYPE) {
    const inner = typeNode.type;
    return nonNull(
      inner.kind === Kind.LIST_TYPE
        ? listOf(typeRefFromAST(inner.type))
        : inner.name.value,
    );
  }
  if (typeNode.kind === Kind.LIST_TYPE) {
    return listOf(typeRefFromAST(typeNode.type));
  }
  return typeNode.name.value;
}

export function isEqualTypeRef(refA: TypeRef, refB: TypeRef): boolean {
  if (typeof refA === 'string' || typeof refB === 'string') {
    return refA === refB;
  }
  return refA.kind === refB.kind && isEqualTypeRef(refA.ofType, refB.ofType);
}

/**
 * The information handed to resolvers, `isTypeOf` predicates and type
 * resolvers about the field being executed.
 */
export interface ResolveInfo {
  readonly fieldName: string;
  readonly fieldNodes: ReadonlyArray<FieldNode>;
  readonly returnType: TypeRef;
  readonly parentType: ObjectType;
  readonly path: Path;
  readonly registry: TypeRegistry;
  readonly fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
  readonly rootValue: unknown;
  readonly operation: OperationDefinitionNode;
  readonly variableValues: ReadOnlyObjMap<unknown>;
  readonly signal: AbortSignal | undefined;
}

/**
 * Resolver signatures are declared as methods so that a definition may
 * narrow the source and context it expects.
 */
export interface FieldFunctions<TSource, TContext> {
  resolve?(
    source: TSource,
    args: ObjMap<unknown>,
    context: TContext,
    info: ResolveInfo,
  ): unknown;
  subscribe?(
    source: TSource,
    args: ObjMap<unknown>,
    context: TContext,
    info: ResolveInfo,
  ): unknown;
}

export interface IsTypeOf<TSource, TContext> {
  isTypeOf?(
    value: TSource,
    context: TContext,
    info: ResolveInfo,
  ): PromiseOrValue<boolean>;
}

export interface ResolveType<TContext> {
  resolveType?(
    value: unknown,
    context: TContext,
    info: ResolveInfo,
    abstractType: AbstractType,
  ): PromiseOrValue<Maybe<string | ObjectType>>;
}

/** Arguments and input-object fields. */
export interface InputValue {
  readonly name: string;
  readonly description: string | undefined;
  readonly type: TypeRef;
  readonly defaultValue: unknown;
  readonly deprecationReason: string | undefined;
}

export type Argument = InputValue;
export type InputField = InputValue;

export interface InputValueConfig {
  type: TypeRef;
  description?: string;
  defaultValue?: unknown;
  deprecationReason?: string;
}

export interface Field<TSource = unknown, TContext = unknown>
  extends FieldFunctions<TSource, TContext> {
  readonly name: string;
  readonly description: string | undefined;
  readonly type: TypeRef;
  readonly args: ReadOnlyObjMap<Argument>;
  readonly deprecationReason: string | undefined;
}

export interface FieldConfig<TSource = unknown, TContext = unknown>
  extends FieldFunctions<TSource, TContext> {
  type: TypeRef;
  args?: ObjMap<InputValueConfig>;
  description?: string;
  deprecationReason?: string;
}

/**
 * Named type definitions
 */
export interface ScalarType<TInternal = unknown, TExternal = unknown> {
  readonly kind: 'SCALAR';
  readonly name: string;
  readonly description: string | undefined;
  readonly specifiedByURL: string | undefined;
  serialize(outputValue: unknown): TExternal;
  parseValue(inputValue: unknown): TInternal;
  parseLiteral(
    valueNode: ValueNode,
    variables?: Maybe<ReadOnlyObjMap<unknown>>,
  ): TInternal;
}

export interface ScalarTypeConfig<TInternal, TExternal> {
  name: string;
  description?: string;
  specifiedByURL?: string;
  serialize: (outputValue: unknown) => TExternal;
  parseValue: (inputValue: unknown) => TInternal;
  parseLiteral?: (
    valueNode: ValueNode,
    variables?: Maybe<ReadOnlyObjMap<unknown>>,
  ) => TInternal;
}

export interface EnumValue {
  readonly name: string;
  readonly description: string | undefined;
  readonly value: unknown;
  readonly deprecationReason: string | undefined;
}

export interface EnumValueConfig {
  value?: unknown;
  description?: string;
  deprecationReason?: string;
}

export interface EnumType {
  readonly kind: 'ENUM';
  readonly name: string;
  readonly description: string | undefined;
  readonly values: ReadOnlyObjMap<EnumValue>;
}

export interface EnumTypeConfig {
  name: string;
  description?: string;
  values: ObjMap<EnumValueConfig>;
}

export interface ObjectType<TSource = unknown, TContext = unknown>
  extends IsTypeOf<TSource, TContext> {
  readonly kind: 'OBJECT';
  readonly name: string;
  readonly description: string | undefined;
  readonly fields: ReadOnlyObjMap<Field<TSource, TContext>>;
  readonly interfaces: ReadonlyArray<string>;
}

export interface ObjectTypeConfig<TSource = unknown, TContext = unknown>
  extends IsTypeOf<TSource, TContext> {
  name: string;
  description?: string;
  interfaces?: ReadonlyArray<string>;
  fields: ObjMap<FieldConfig<TSource, TContext>>;
}

export interface InterfaceType<TSource = unknown, TContext = unknown>
  extends ResolveType<TContext> {
  readonly kind: 'INTERFACE';
  readonly name: string;
  readonly description: string | undefined;
  readonly fields: ReadOnlyObjMap<Field<TSource, TContext>>;
}

export interface InterfaceTypeConfig<TSource = unknown, TContext = unknown>
  extends ResolveType<TContext> {
  name: string;
  description?: string;
  fields: ObjMap<FieldConfig<TSource, TContext>>;
}

export interface UnionType<TContext = unknown> extends ResolveType<TContext> {
  readonly kind: 'UNION';
  readonly name: string;
  readonly description: string | undefined;
  readonly types: ReadonlyArray<string>;
}

export interface UnionTypeConfig<TContext = unknown>
  extends ResolveType<TContext> {
  name: string;
  description?: string;
  types: ReadonlyArray<string>;
}

export interface InputObjectType {
  readonly kind: 'INPUT_OBJECT';
  readonly name: string;
  readonly description: string | undefined;
  readonly fields: ReadOnlyObjMap<InputField>;
}

export interface InputObjectTypeConfig {
  name: string;
  description?: string;
  fields: ObjMap<InputValueConfig>;
}

export type NamedType =
  | ScalarType
  | EnumType
  | ObjectType
  | InterfaceType
  | UnionType
  | InputObjectType;

export type CompositeType = ObjectType | InterfaceType | UnionType;
export type AbstractType = InterfaceType | UnionType;
export type LeafType = ScalarType | EnumType;
export type InputNamedType = ScalarType | EnumType | InputObjectType;
export type OutputNamedType = Exclude<NamedType, InputObjectType>;

/**
 * A type as seen through introspection: a named definition, or a wrapper
 * whose inner reference is resolved lazily through the registry.
 */
export type IntrospectedType = NamedType | WrappingTypeRef;

/**
 * Predicates
 */
export function isScalarType(type: IntrospectedType): type is ScalarType {
  return type.kind === 'SCALAR';
}

export function isEnumType(type: IntrospectedType): type is EnumType {
  return type.kind === 'ENUM';
}

export function isObjectType(type: IntrospectedType): type is ObjectType {
  return type.kind === 'OBJECT';
}

export function isInterfaceType(
  type: IntrospectedType,
): type is InterfaceType {
  return type.kind === 'INTERFACE';
}

export function isUnionType(type: IntrospectedType): type is UnionType {
  return type.kind === 'UNION';
}

export function isInputObjectType(
  type: IntrospectedType,
): type is InputObjectType {
  return type.kind === 'INPUT_OBJECT';
}

export function isAbstractType(type: IntrospectedType): type is AbstractType {
  return type.kind === 'INTERFACE' || type.kind === 'UNION';
}

export function isCompositeType(
  type: IntrospectedType,
): type is CompositeType {
  return isObjectType(type) || isAbstractType(type);
}

export function isLeafType(type: IntrospectedType): type is LeafType {
  return type.kind === 'SCALAR' || type.kind === 'ENUM';
}

export function isInputNamedType(
  type: IntrospectedType,
): type is InputNamedType {
  return isLeafType(type) || isInputObjectType(type);
}

export function isOutputNamedType(
  type: IntrospectedType,
): type is OutputNamedType {
  return isLeafType(type) || isCompositeType(type);
}

/**
 * Builders
 *
 * Each builder copies its config, fills in the names of fields, arguments and
 * enum values from their keys and freezes the result.
 */
export function scalarType<TInternal = unknown, TExternal = TInternal>(
  config: ScalarTypeConfig<TInternal, TExternal>,
): ScalarType<TInternal, TExternal> {
  const { parseValue } = config;
  return Object.freeze({
    kind: 'SCALAR',
    name: config.name,
    description: config.description,
    specifiedByURL: config.specifiedByURL,
    serialize: config.serialize,
    parseValue,
    parseLiteral:
      config.parseLiteral ??
      ((valueNode: ValueNode, variables?: Maybe<ReadOnlyObjMap<unknown>>) =>
        parseValue(valueFromASTUntyped(valueNode, variables))),
  });
}

export function enumType(config: EnumTypeConfig): EnumType {
  const values: ObjMap<EnumValue> = Object.create(null);
  for (const [valueName, valueConfig] of Object.entries(config.values)) {
    values[valueName] = Object.freeze({
      name: valueName,
      description: valueConfig.description,
      value: valueConfig.value !== undefined ? valueConfig.value : valueName,
      deprecationReason: valueConfig.deprecationReason,
    });
  }

  return Object.freeze({
    kind: 'ENUM',
    name: config.name,
    description: config.description,
    values: Object.freeze(values),
  });
}

export function objectType<TSource = unknown, TContext = unknown>(
  config: ObjectTypeConfig<TSource, TContext>,
): ObjectType<TSource, TContext> {
  return Object.freeze({
    kind: 'OBJECT',
    name: config.name,
    description: config.description,
    fields: defineFieldMap(config.fields),
    interfaces: Object.freeze([...(config.interfaces ?? [])]),
    isTypeOf: config.isTypeOf,
  });
}

export function interfaceType<TSource = unknown, TContext = unknown>(
  config: InterfaceTypeConfig<TSource, TContext>,
): InterfaceType<TSource, TContext> {
  return Object.freeze({
    kind: 'INTERFACE',
    name: config.name,
    description: config.description,
    fields: defineFieldMap(config.fields),
    resolveType: config.resolveType,
  });
}

export function unionType<TContext = unknown>(
  config: UnionTypeConfig<TContext>,
): UnionType<TContext> {
  return Object.freeze({
    kind: 'UNION',
    name: config.name,
    description: config.description,
    types: Object.freeze([...config.types]),
    resolveType: config.resolveType,
  });
}

export function inputObjectType(
  config: InputObjectTypeConfig,
): InputObjectType {
  return Object.freeze({
    kind: 'INPUT_OBJECT',
    name: config.name,
    description: config.description,
    fields: defineInputValueMap(config.fields),
  });
}

function defineFieldMap<TSource, TContext>(
  fieldMap: ObjMap<FieldConfig<TSource, TContext>>,
): ReadOnlyObjMap<Field<TSource, TContext>> {
  const fields: ObjMap<Field<TSource, TContext>> = Object.create(null);
  for (const [fieldName, fieldConfig] of Object.entries(fieldMap)) {
    fields[fieldName] = defineField(fieldName, fieldConfig);
  }
  return Object.freeze(fields);
}

/**
 * Builds a single field. Object and interface builders use it for every
 * entry of their field map; the introspection meta-fields use it directly.
 */
export function defineField<TSource = unknown, TContext = unknown>(
  name: string,
  config: FieldConfig<TSource, TContext>,
): Field<TSource, TContext> {
  return Object.freeze({
    name,
    description: config.description,
    type: config.type,
    args: defineInputValueMap(config.args ?? {}),
    resolve: config.resolve,
    subscribe: config.subscribe,
    deprecationReason: config.deprecationReason,
  });
}

export function defineInputValueMap(
  inputValueMap: ObjMap<InputValueConfig>,
): ReadOnlyObjMap<InputValue> {
  const inputValues: ObjMap<InputValue> = Object.create(null);
  for (const [name, inputValueConfig] of Object.entries(inputValueMap)) {
    inputValues[name] = Object.freeze({
      name,
      description: inputValueConfig.description,
      type: inputValueConfig.type,
      defaultValue: inputValueConfig.defaultValue,
      deprecationReason: inputValueConfig.deprecationReason,
    });
  }
  return Object.freeze(inputValues);
}

/**
 * Returns the symbol of an enum whose internal value is `internalValue`.
 */
export function findEnumValue(
  type: EnumType,
  internalValue: unknown,
): EnumValue | undefined {
  for (const enumValue of Object.values(type.values)) {
    if (enumValue.value === internalValue) {
      return enumValue;
    }
  }
  return undefined;
}
