import { GraphQLError, locatedError, OperationTypeNode } from 'graphql';

import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import { isAsyncIterable } from '../predicates/isAsyncIterable.js';
import { isPromise } from '../predicates/isPromise.js';

import { inspect } from '../utilities/inspect.js';
import { addPath, pathToArray } from '../utilities/Path.js';
import { toError } from '../utilities/toError.js';

import { ArgumentCoercionErrors } from '../error/errors.js';

import type {
  ExecutionArgs,
  ExecutionContext,
} from './buildExecutionContext.js';
import { buildExecutionContext } from './buildExecutionContext.js';
import { collectFields } from './collectFields.js';
import type { ExecutionResult } from './Executor.js';
import { defaultFieldResolver, Executor } from './Executor.js';
import { mapAsyncIterable } from './mapAsyncIterable.js';
import { getArgumentValues } from './values.js';

/**
 * Implements a subscription: the root field's `subscribe` function (or its
 * resolver) produces an event stream, and every event is executed as the
 * root value of the operation.
 *
 * Errors raised before the stream exists are returned as a result; errors
 * raised while an event executes are part of that event's result.
 */
export function subscribe(
  args: ExecutionArgs,
): PromiseOrValue<
  ExecutionResult | AsyncGenerator<ExecutionResult, void, unknown>
> {
  // If a valid execution context cannot be created due to incorrect arguments,
  // a "Response" with only errors is returned.
  const exeContext = buildExecutionContext(args);

  // Return early errors if execution context failed.
  if (!('registry' in exeContext)) {
    return { data: null, errors: exeContext };
  }

  const mapSourceToResponse = (payload: unknown) =>
    new Executor({ ...exeContext, rootValue: payload }).executeOperation();

  let resultOrStream: PromiseOrValue<AsyncIterable<unknown>>;
  try {
    resultOrStream = createSourceEventStream(exeContext);
  } catch (error) {
    return { data: null, errors: toGraphQLErrors(error) };
  }

  if (isPromise(resultOrStream)) {
    return resultOrStream.then(
      (resolvedStream) => mapAsyncIterable(resolvedStream, mapSourceToResponse),
      (error: unknown) => ({ data: null, errors: toGraphQLErrors(error) }),
    );
  }

  return mapAsyncIterable(resultOrStream, mapSourceToResponse);
}

function toGraphQLErrors(error: unknown): ReadonlyArray<GraphQLError> {
  if (error instanceof ArgumentCoercionErrors) {
    return error.errors;
  }
  return [
    error instanceof GraphQLError
      ? error
      : locatedError(toError(error), undefined),
  ];
}

function createSourceEventStream(
  exeContext: ExecutionContext,
): PromiseOrValue<AsyncIterable<unknown>> {
  const { registry, operation, variableValues, rootValue, contextValue } =
    exeContext;
  const rootType = registry.getSubscriptionType();
  if (
    rootType === undefined ||
    operation.operation !== OperationTypeNode.SUBSCRIPTION
  ) {
    throw new GraphQLError(
      'Schema is not configured to execute subscription operation.',
      { nodes: operation },
    );
  }

  const rootFields = collectFields(
    exeContext,
    rootType,
    operation.selectionSet,
  );
  const firstRootField = rootFields.entries().next();
  if (firstRootField.done === true) {
    throw new GraphQLError('Subscription operation selects no field.', {
      nodes: operation,
    });
  }

  const [responseName, fieldNodes] = firstRootField.value;
  const executor = new Executor(exeContext);
  const fieldName = fieldNodes[0].name.value;
  const fieldDef = executor.getFieldDef(rootType, fieldName);
  const path = addPath(undefined, responseName, rootType.name);

  if (fieldDef === undefined) {
    throw new GraphQLError(
      `The subscription field "${fieldName}" is not defined.`,
      { nodes: fieldNodes },
    );
  }

  const info = executor.buildResolveInfo(fieldDef, fieldNodes, rootType, path);

  try {
    // Build a JS object of arguments from the field.arguments AST, using the
    // variables scope to fulfill any variable references.
    const args = getArgumentValues(
      registry,
      fieldDef,
      fieldNodes[0],
      variableValues,
      path,
    );

    let result: unknown;
    if (fieldDef.subscribe !== undefined) {
      result = fieldDef.subscribe(rootValue, args, contextValue, info);
    } else if (fieldDef.resolve !== undefined) {
      result = fieldDef.resolve(rootValue, args, contextValue, info);
    } else {
      result = defaultFieldResolver(rootValue, args, contextValue, info);
    }

    if (isPromise(result)) {
      return result
        .then(assertEventStream)
        .then(undefined, (error: unknown) => {
          throw locatedError(toError(error), fieldNodes, pathToArray(path));
        });
    }

    return assertEventStream(result);
  } catch (error) {
    throw locatedError(toError(error), fieldNodes, pathToArray(path));
  }
}

function assertEventStream(result: unknown): AsyncIterable<unknown> {
  if (result instanceof Error) {
    throw result;
  }

  // Assert field returned an event stream, otherwise yield an error.
  if (!isAsyncIterable(result)) {
    throw new GraphQLError(
      'Subscription field must return Async Iterable. ' +
        `Received: ${inspect(result)}.`,
    );
  }

  return result;
}
