/**
 * typegraph-executor executes GraphQL documents against a registry of type
 * definitions built in code.
 *
 * @packageDocumentation
 */
export type { ObjMap, ReadOnlyObjMap } from './types/ObjMap.js';
export type { PromiseOrValue } from './types/PromiseOrValue.js';

export type {
  AbstractType,
  Argument,
  CompositeType,
  EnumType,
  EnumTypeConfig,
  EnumValue,
  EnumValueConfig,
  Field,
  FieldConfig,
  InputField,
  InputNamedType,
  InputObjectType,
  InputObjectTypeConfig,
  InputValue,
  InputValueConfig,
  InterfaceType,
  InterfaceTypeConfig,
  IntrospectedType,
  LeafType,
  ListTypeRef,
  NamedType,
  NonNullTypeRef,
  NullableTypeRef,
  ObjectType,
  ObjectTypeConfig,
  OutputNamedType,
  ResolveInfo,
  ScalarType,
  ScalarTypeConfig,
  TypeKind,
  TypeRef,
  UnionType,
  UnionTypeConfig,
  WrappingTypeRef,
} from './type/definition.js';
export {
  enumType,
  getNamedTypeName,
  getNullableRef,
  inputObjectType,
  interfaceType,
  isAbstractType,
  isCompositeType,
  isEnumType,
  isInputObjectType,
  isInterfaceType,
  isLeafType,
  isListRef,
  isNonNullRef,
  isObjectType,
  isScalarType,
  isUnionType,
  listOf,
  nonNull,
  objectType,
  printTypeRef,
  scalarType,
  typeRefFromAST,
  unionType,
} from './type/definition.js';
export type { Directive, DirectiveConfig } from './type/directives.js';
export {
  directive,
  IncludeDirective,
  SkipDirective,
  specifiedDirectives,
} from './type/directives.js';
export {
  GraphQLBoolean,
  GraphQLFloat,
  GraphQLID,
  GraphQLInt,
  GraphQLString,
  specifiedScalarTypes,
} from './type/scalars.js';
export {
  introspectionTypes,
  isIntrospectionType,
} from './type/introspection.js';

export type { RegistryConfig } from './registry/buildRegistry.js';
export { buildRegistry } from './registry/buildRegistry.js';
export type { UnknownInputFieldsPolicy } from './registry/TypeRegistry.js';
export { TypeRegistry } from './registry/TypeRegistry.js';
export type { TypeVisitor } from './registry/walkTypes.js';
export { walkTypes } from './registry/walkTypes.js';

export type { ExecutionArgs } from './execution/buildExecutionContext.js';
export { coerceInputValue } from './execution/coerceInputValue.js';
export { execute } from './execution/execute.js';
export type { ExecutionResult } from './execution/Executor.js';
export { defaultFieldResolver } from './execution/Executor.js';
export { resolveConcreteType } from './execution/resolveConcreteType.js';
export { subscribe } from './execution/subscribe.js';
export {
  getArgumentValues,
  getDirectiveValues,
  getVariableValues,
} from './execution/values.js';

export {
  AbstractResolutionError,
  ArgumentCoercionErrors,
  CoercionError,
  ExecutionAbortedError,
  FieldNotFoundError,
  MissingVariableError,
  ResolverError,
  SchemaBuildError,
} from './error/errors.js';

export type { Logger } from './utilities/logger.js';
export { createLogger } from './utilities/logger.js';
export type { Path } from './utilities/Path.js';
export { pathToArray } from './utilities/Path.js';
export { printSchema } from './utilities/printSchema.js';
