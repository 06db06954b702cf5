import type { FieldNode } from 'graphql';
import { GraphQLError, locatedError, OperationTypeNode } from 'graphql';

import type { ObjMap } from '../types/ObjMap.js';
import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import { isIterableObject } from '../predicates/isIterableObject.js';
import { isObjectLike } from '../predicates/isObjectLike.js';
import { isPromise } from '../predicates/isPromise.js';

import { hasOwnProperty } from '../utilities/hasOwnProperty.js';
import { inspect } from '../utilities/inspect.js';
import { invariant } from '../utilities/invariant.js';
import type { Path } from '../utilities/Path.js';
import { addPath, pathToArray } from '../utilities/Path.js';
import { PromiseAggregator } from '../utilities/PromiseAggregator.js';
import { promiseReduce } from '../utilities/promiseReduce.js';
import { toError } from '../utilities/toError.js';

import {
  ArgumentCoercionErrors,
  ExecutionAbortedError,
  FieldNotFoundError,
  ResolverError,
} from '../error/errors.js';

import type {
  AbstractType,
  EnumType,
  Field,
  ObjectType,
  ResolveInfo,
  ScalarType,
  TypeRef,
} from '../type/definition.js';
import {
  findEnumValue,
  isListRef,
  isNonNullRef,
} from '../type/definition.js';
import {
  SchemaMetaField,
  TypeMetaField,
  TypeNameMetaField,
} from '../type/introspection.js';

import type { ExecutionContext } from './buildExecutionContext.js';
import type { FieldGroups } from './collectFields.js';
import { collectFields, collectSubfields } from './collectFields.js';
import { resolveConcreteType } from './resolveConcreteType.js';
import { getArgumentValues } from './values.js';

export interface ExecutionResult {
  data: ObjMap<unknown> | null;
  errors: ReadonlyArray<GraphQLError>;
}

/**
 * If a resolve function is not given, then a default resolve behavior is used
 * which takes the property of the source object of the same name as the field
 * and returns it as the result, or if it's a function, returns the result
 * of calling that function while passing along args and context value.
 */
export function defaultFieldResolver(
  source: unknown,
  args: ObjMap<unknown>,
  contextValue: unknown,
  info: ResolveInfo,
): unknown {
  // ensure source is a value for which property access is acceptable.
  if (isObjectLike(source)) {
    const property = source[info.fieldName];
    if (typeof property === 'function') {
      return property.call(source, args, contextValue, info);
    }
    return property;
  }
}

/**
 * Executes one operation against a registry. An instance lives for a single
 * request and collects the field errors raised along the way.
 *
 * Fields are executed as far as possible synchronously; a branch becomes
 * asynchronous only where a resolver, an `isTypeOf` or a `resolveType`
 * returns a promise.
 *
 * @internal
 */
export class Executor {
  exeContext: ExecutionContext;
  errors: Array<GraphQLError>;

  constructor(exeContext: ExecutionContext) {
    this.exeContext = exeContext;
    this.errors = [];
  }

  /**
   * Executes the selected operation against its root type.
   */
  executeOperation(): PromiseOrValue<ExecutionResult> {
    const { registry, operation, rootValue, logger } = this.exeContext;
    const rootType = registry.getRootType(operation.operation);
    if (rootType === undefined) {
      return {
        data: null,
        errors: [
          new GraphQLError(
            `Schema is not configured to execute ${operation.operation} operation.`,
            { nodes: operation },
          ),
        ],
      };
    }

    logger.debug(
      {
        operationType: operation.operation,
        operationName: operation.name?.value,
      },
      'Execution started.',
    );

    let result: PromiseOrValue<ObjMap<unknown>>;
    try {
      const fields = collectFields(
        this.exeContext,
        rootType,
        operation.selectionSet,
      );
      result =
        operation.operation === OperationTypeNode.MUTATION
          ? this.executeFieldsSerially(rootType, rootValue, undefined, fields)
          : this.executeFields(rootType, rootValue, undefined, fields);
    } catch (error) {
      return this.buildResponse(null, error);
    }

    if (isPromise(result)) {
      return result.then(
        (resolved) => this.buildResponse(resolved),
        (error: unknown) => this.buildResponse(null, error),
      );
    }
    return this.buildResponse(result);
  }

  /**
   * Given a completed execution, returns the response. An error that reached
   * the operation root nulls `data`.
   */
  buildResponse(
    data: ObjMap<unknown> | null,
    rootError?: unknown,
  ): ExecutionResult {
    const { signal, partialResults, logger } = this.exeContext;

    if (rootError !== undefined) {
      this.errors.push(
        rootError instanceof GraphQLError
          ? rootError
          : locatedError(toError(rootError), undefined),
      );
    }

    if (signal?.aborted && !partialResults) {
      logger.warn({ reason: inspect(signal.reason) }, 'Execution aborted.');
      return { data: null, errors: [new ExecutionAbortedError(signal.reason)] };
    }

    logger.debug({ errorCount: this.errors.length }, 'Execution finished.');
    return { data, errors: this.errors };
  }

  /**
   * Executes the root fields of a mutation one after the other, in selection
   * order.
   */
  executeFieldsSerially(
    parentType: ObjectType,
    sourceValue: unknown,
    path: Path | undefined,
    fields: FieldGroups,
  ): PromiseOrValue<ObjMap<unknown>> {
    const initialResults: ObjMap<unknown> = Object.create(null);
    return promiseReduce(
      fields,
      (results, [responseName, fieldNodes]) => {
        const fieldPath = addPath(path, responseName, parentType.name);
        const result = this.executeField(
          parentType,
          sourceValue,
          fieldNodes,
          fieldPath,
        );
        if (isPromise(result)) {
          return result.then((resolvedResult) => {
            results[responseName] = resolvedResult;
            return results;
          });
        }
        results[responseName] = result;
        return results;
      },
      initialResults,
    );
  }

  /**
   * Executes sibling fields concurrently.
   *
   * The returned promise settles only after every sibling has settled, so
   * that the errors of the whole branch are recorded before it is nulled.
   */
  executeFields(
    parentType: ObjectType,
    sourceValue: unknown,
    path: Path | undefined,
    fields: FieldGroups,
  ): PromiseOrValue<ObjMap<unknown>> {
    const results: ObjMap<unknown> = Object.create(null);
    const promiseAggregator = new PromiseAggregator();

    for (const [responseName, fieldNodes] of fields) {
      const fieldPath = addPath(path, responseName, parentType.name);
      let result: unknown;
      try {
        result = this.executeField(
          parentType,
          sourceValue,
          fieldNodes,
          fieldPath,
        );
      } catch (error) {
        return this.settleThenThrow(promiseAggregator, error);
      }

      if (isPromise(result)) {
        // Reserve the key so that results keep the selection order.
        results[responseName] = null;
        promiseAggregator.add(
          result.then((resolved) => {
            results[responseName] = resolved;
          }),
        );
      } else {
        results[responseName] = result;
      }
    }

    if (promiseAggregator.isEmpty()) {
      return results;
    }

    return promiseAggregator.resolved().then(
      () => results,
      () => this.throwFirstRejection(promiseAggregator),
    );
  }

  /**
   * Waits for the pending siblings of a failed field, records their failures
   * and throws the error of the failed field on to the parent.
   */
  settleThenThrow(
    promiseAggregator: PromiseAggregator,
    error: unknown,
  ): never | Promise<never> {
    if (promiseAggregator.isEmpty()) {
      throw error;
    }
    const rethrow = (): never => {
      this.recordErrors(promiseAggregator.rejections());
      throw error;
    };
    return promiseAggregator.resolved().then(rethrow, rethrow);
  }

  /**
   * Only the first failure is thrown on to the parent. The failures of the
   * other siblings are recorded.
   */
  throwFirstRejection(promiseAggregator: PromiseAggregator): never {
    const [first, ...rest] = promiseAggregator.rejections();
    this.recordErrors(rest);
    throw first;
  }

  recordErrors(reasons: ReadonlyArray<unknown>): void {
    for (const reason of reasons) {
      this.recordError(
        reason instanceof GraphQLError
          ? reason
          : locatedError(toError(reason), undefined),
      );
    }
  }

  /**
   * Figures out the value that the field returns by calling its resolve
   * function, then calls completeValue to complete promises, serialize
   * scalars, or execute the sub-selection-set for objects.
   */
  executeField(
    parentType: ObjectType,
    source: unknown,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
  ): PromiseOrValue<unknown> {
    const { registry, variableValues, contextValue } = this.exeContext;
    const fieldName = fieldNodes[0].name.value;
    const fieldDef = this.getFieldDef(parentType, fieldName);

    if (fieldDef === undefined) {
      const error = new FieldNotFoundError(
        `Cannot query field "${fieldName}" on type "${parentType.name}".`,
        { nodes: fieldNodes, path: pathToArray(path) },
      );
      this.recordError(error);
      return null;
    }

    const returnType = fieldDef.type;
    const info = this.buildResolveInfo(fieldDef, fieldNodes, parentType, path);

    try {
      this.throwIfAborted(fieldNodes, path);

      // Build a JS object of arguments from the field.arguments AST, using the
      // variables scope to fulfill any variable references.
      const args = getArgumentValues(
        registry,
        fieldDef,
        fieldNodes[0],
        variableValues,
        path,
      );

      const result = this.resolveField(
        fieldDef,
        source,
        args,
        contextValue,
        info,
        fieldNodes,
        path,
      );

      let completed: PromiseOrValue<unknown>;
      if (isPromise(result)) {
        completed = result.then((resolved) =>
          this.completeValue(returnType, fieldNodes, info, path, resolved),
        );
      } else {
        completed = this.completeValue(
          returnType,
          fieldNodes,
          info,
          path,
          result,
        );
      }

      if (isPromise(completed)) {
        // Note: we don't rely on a `catch` method, but we do expect "thenable"
        // to take a second callback for the error case.
        return completed.then(undefined, (rawError: unknown) =>
          this.handleFieldError(rawError, returnType, fieldNodes, path),
        );
      }
      return completed;
    } catch (rawError) {
      return this.handleFieldError(rawError, returnType, fieldNodes, path);
    }
  }

  /**
   * Calls the resolver of a field. Whatever it throws, rejects with or returns
   * as an `Error` becomes a `ResolverError` positioned at the field.
   */
  resolveField(
    fieldDef: Field,
    source: unknown,
    args: ObjMap<unknown>,
    contextValue: unknown,
    info: ResolveInfo,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
  ): PromiseOrValue<unknown> {
    const toResolverError = (rawError: unknown) =>
      new ResolverError(toError(rawError), {
        nodes: fieldNodes,
        path: pathToArray(path),
      });

    let result: unknown;
    try {
      result =
        fieldDef.resolve !== undefined
          ? fieldDef.resolve(source, args, contextValue, info)
          : defaultFieldResolver(source, args, contextValue, info);
    } catch (rawError) {
      throw toResolverError(rawError);
    }

    if (isPromise(result)) {
      return this.raceAbort(result, fieldNodes, path).then(
        (resolved) => {
          if (resolved instanceof Error) {
            throw toResolverError(resolved);
          }
          return resolved;
        },
        (rawError: unknown) => {
          if (rawError instanceof ExecutionAbortedError) {
            throw rawError;
          }
          throw toResolverError(rawError);
        },
      );
    }

    if (result instanceof Error) {
      throw toResolverError(result);
    }
    return result;
  }

  /**
   * A field error is recorded where the field is nullable, and the field is
   * set to null. At a non-null position the error is thrown on to the parent
   * field, which is nulled in turn.
   */
  handleFieldError(
    rawError: unknown,
    returnType: TypeRef,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
  ): null {
    // Argument errors arrive located at their values.
    const [error, ...otherErrors] =
      rawError instanceof ArgumentCoercionErrors
        ? rawError.errors
        : [locatedError(toError(rawError), fieldNodes, pathToArray(path))];

    // If the field type is non-nullable, then it is resolved without any
    // protection from errors, however it still properly locates the error.
    if (isNonNullRef(returnType)) {
      this.recordErrors(otherErrors);
      throw error;
    }

    // Otherwise, error protection is applied, logging the error and resolving
    // a null value for this field if one is encountered.
    this.recordError(error);
    this.recordErrors(otherErrors);
    return null;
  }

  recordError(error: GraphQLError): void {
    this.exeContext.logger.debug(
      { path: error.path, err: error.message },
      'Field error.',
    );
    this.errors.push(error);
  }

  /**
   * If the field type is Non-Null, then this recursively completes the value
   * for the inner type. It throws a field error if that completion returns
   * null.
   *
   * If the field type is a List, then this recursively completes the value
   * for the inner type on each item in the list.
   *
   * If the field type is a Scalar or Enum, ensures the completed value is a
   * legal value of the type by calling the `serialize` method of GraphQL type
   * definition.
   *
   * If the field is an abstract type, determine the runtime type of the value
   * and then complete based on that type
   *
   * Otherwise, the field type expects a sub-selection set, and will complete
   * the value by executing all sub-selections.
   */
  completeValue(
    returnType: TypeRef,
    fieldNodes: ReadonlyArray<FieldNode>,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<unknown> {
    // If result is an Error, throw a located error.
    if (result instanceof Error) {
      throw result;
    }

    // If field type is NonNull, complete for inner type, and throw field error
    // if result is null.
    if (isNonNullRef(returnType)) {
      const completed = this.completeValue(
        returnType.ofType,
        fieldNodes,
        info,
        path,
        result,
      );
      if (completed === null) {
        throw new Error(
          `Cannot return null for non-nullable field ${info.parentType.name}.${info.fieldName}.`,
        );
      }
      return completed;
    }

    // If result value is null or undefined then return null.
    if (result == null) {
      return null;
    }

    // If field type is List, complete each item in the list with the inner type
    if (isListRef(returnType)) {
      return this.completeListValue(
        returnType.ofType,
        fieldNodes,
        info,
        path,
        result,
      );
    }

    const namedType = this.exeContext.registry.getType(returnType);
    switch (namedType.kind) {
      case 'SCALAR':
        return this.completeScalarValue(namedType, result);
      case 'ENUM':
        return this.completeEnumValue(namedType, result);
      case 'INTERFACE':
      case 'UNION':
        return this.completeAbstractValue(
          namedType,
          fieldNodes,
          info,
          path,
          result,
        );
      case 'OBJECT':
        return this.completeObjectValue(
          namedType,
          fieldNodes,
          info,
          path,
          result,
        );
      case 'INPUT_OBJECT':
        invariant(
          false,
          'Cannot complete value of unexpected output type: ' +
            namedType.name,
        );
    }
  }

  /**
   * Complete a list value by completing each item in the list with the
   * inner type. An item that fails is nulled on its own, unless the item
   * type is non-null.
   */
  completeListValue(
    itemType: TypeRef,
    fieldNodes: ReadonlyArray<FieldNode>,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ReadonlyArray<unknown>> {
    if (!isIterableObject(result)) {
      throw new GraphQLError(
        `Expected Iterable, but did not find one for field "${info.parentType.name}.${info.fieldName}".`,
      );
    }

    const promiseAggregator = new PromiseAggregator();
    const completedResults: Array<unknown> = [];
    let index = 0;
    for (const item of result) {
      // No need to modify the info object containing the path,
      // since from here on it is not ever accessed by resolver functions.
      const itemIndex = index++;
      const itemPath = addPath(path, itemIndex, undefined);

      let completedItem: PromiseOrValue<unknown>;
      try {
        if (isPromise(item)) {
          completedItem = item.then((resolved) =>
            this.completeValue(itemType, fieldNodes, info, itemPath, resolved),
          );
        } else {
          completedItem = this.completeValue(
            itemType,
            fieldNodes,
            info,
            itemPath,
            item,
          );
        }
      } catch (rawError) {
        try {
          completedResults.push(
            this.handleFieldError(rawError, itemType, fieldNodes, itemPath),
          );
        } catch (error) {
          return this.settleThenThrow(promiseAggregator, error);
        }
        continue;
      }

      if (isPromise(completedItem)) {
        completedResults.push(null);
        promiseAggregator.add(
          completedItem.then(
            (resolved) => {
              completedResults[itemIndex] = resolved;
            },
            (rawError: unknown) => {
              completedResults[itemIndex] = this.handleFieldError(
                rawError,
                itemType,
                fieldNodes,
                itemPath,
              );
            },
          ),
        );
      } else {
        completedResults.push(completedItem);
      }
    }

    if (promiseAggregator.isEmpty()) {
      return completedResults;
    }

    return promiseAggregator.resolved().then(
      () => completedResults,
      () => this.throwFirstRejection(promiseAggregator),
    );
  }

  /**
   * Complete a Scalar value by serializing to a valid value, returning
   * null if serialization is not possible.
   */
  completeScalarValue(returnType: ScalarType, result: unknown): unknown {
    const serializedResult = returnType.serialize(result);
    if (serializedResult === undefined) {
      throw new Error(
        `Expected \`${returnType.name}.serialize(${inspect(result)})\` to ` +
          `return non-nullable value, returned: ${inspect(serializedResult)}`,
      );
    }
    return serializedResult;
  }

  /**
   * Complete an Enum value by returning the symbol its internal value is
   * mapped to.
   */
  completeEnumValue(returnType: EnumType, result: unknown): string {
    const enumValue = findEnumValue(returnType, result);
    if (enumValue === undefined) {
      throw new GraphQLError(
        `Enum "${returnType.name}" cannot represent value: ${inspect(result)}`,
      );
    }
    return enumValue.name;
  }

  /**
   * Complete a value of an abstract type by determining the runtime object
   * type of that value, then complete the value for that type.
   */
  completeAbstractValue(
    returnType: AbstractType,
    fieldNodes: ReadonlyArray<FieldNode>,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    const { registry, contextValue } = this.exeContext;
    const runtimeType = resolveConcreteType(
      registry,
      returnType,
      result,
      contextValue,
      info,
    );

    if (isPromise(runtimeType)) {
      return runtimeType.then((resolvedRuntimeType) =>
        this.executeSubfields(resolvedRuntimeType, fieldNodes, path, result),
      );
    }

    return this.executeSubfields(runtimeType, fieldNodes, path, result);
  }

  /**
   * Complete an Object value by executing all sub-selections.
   */
  completeObjectValue(
    returnType: ObjectType,
    fieldNodes: ReadonlyArray<FieldNode>,
    info: ResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    // If there is an isTypeOf predicate function, call it with the
    // current result. If isTypeOf returns false, then raise an error rather
    // than continuing execution.
    if (returnType.isTypeOf) {
      const isTypeOf = returnType.isTypeOf(
        result,
        this.exeContext.contextValue,
        info,
      );

      if (isPromise(isTypeOf)) {
        return isTypeOf.then((resolvedIsTypeOf) => {
          if (!resolvedIsTypeOf) {
            throw invalidReturnTypeError(returnType, result, fieldNodes);
          }
          return this.executeSubfields(returnType, fieldNodes, path, result);
        });
      }

      if (!isTypeOf) {
        throw invalidReturnTypeError(returnType, result, fieldNodes);
      }
    }

    return this.executeSubfields(returnType, fieldNodes, path, result);
  }

  executeSubfields(
    returnType: ObjectType,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    const subFieldNodes = collectSubfields(
      this.exeContext,
      returnType,
      fieldNodes,
    );
    return this.executeFields(returnType, result, path, subFieldNodes);
  }

  /**
   * This method looks up the field on the given type definition.
   * It has special casing for the three introspection fields,
   * __schema, __type and __typename. __typename is special because
   * it can always be queried as a field, even in situations where no
   * other fields are allowed, like on a Union. __schema and __type
   * could get automatically added to the query type, but that would
   * require mutating type definitions, which would cause issues.
   */
  getFieldDef(parentType: ObjectType, fieldName: string): Field | undefined {
    const { registry } = this.exeContext;
    if (
      fieldName === SchemaMetaField.name &&
      registry.getQueryType() === parentType
    ) {
      return SchemaMetaField;
    } else if (
      fieldName === TypeMetaField.name &&
      registry.getQueryType() === parentType
    ) {
      return TypeMetaField;
    } else if (fieldName === TypeNameMetaField.name) {
      return TypeNameMetaField;
    }
    return hasOwnProperty(parentType.fields, fieldName)
      ? parentType.fields[fieldName]
      : undefined;
  }

  buildResolveInfo(
    fieldDef: Field,
    fieldNodes: ReadonlyArray<FieldNode>,
    parentType: ObjectType,
    path: Path,
  ): ResolveInfo {
    const {
      registry,
      fragments,
      rootValue,
      operation,
      variableValues,
      signal,
    } = this.exeContext;
    return {
      fieldName: fieldDef.name,
      fieldNodes,
      returnType: fieldDef.type,
      parentType,
      path,
      registry,
      fragments,
      rootValue,
      operation,
      variableValues,
      signal,
    };
  }

  throwIfAborted(fieldNodes: ReadonlyArray<FieldNode>, path: Path): void {
    const { signal } = this.exeContext;
    if (signal?.aborted) {
      throw new ExecutionAbortedError(signal.reason, {
        nodes: fieldNodes,
        path: pathToArray(path),
      });
    }
  }

  /**
   * Settles with the resolver's promise, or rejects with an abort error as
   * soon as the signal fires, whichever comes first.
   */
  raceAbort(
    promise: Promise<unknown>,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
  ): Promise<unknown> {
    const { signal } = this.exeContext;
    if (signal === undefined) {
      return promise;
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        reject(
          new ExecutionAbortedError(signal.reason, {
            nodes: fieldNodes,
            path: pathToArray(path),
          }),
        );
      };
      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
      promise.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        },
      );
    });
  }
}

function invalidReturnTypeError(
  returnType: ObjectType,
  result: unknown,
  fieldNodes: ReadonlyArray<FieldNode>,
): GraphQLError {
  return new GraphQLError(
    `Expected value of type "${returnType.name}" but got: ${inspect(result)}.`,
    { nodes: fieldNodes },
  );
}
