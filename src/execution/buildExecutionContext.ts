import type {
  DocumentNode,
  FragmentDefinitionNode,
  OperationDefinitionNode,
} from 'graphql';
import { GraphQLError, Kind } from 'graphql';

import type { Maybe } from '../types/Maybe.js';
import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';

import type { Logger } from '../utilities/logger.js';
import { getDefaultLogger } from '../utilities/logger.js';

import { ExecutionAbortedError } from '../error/errors.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { getVariableValues } from './values.js';

/**
 * Data that must be available at all points during query execution.
 *
 * Namely, the registry, the operation being executed, the fragments by name
 * and the coerced variable values.
 */
export interface ExecutionContext {
  registry: TypeRegistry;
  operation: OperationDefinitionNode;
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
  rootValue: unknown;
  contextValue: unknown;
  variableValues: ReadOnlyObjMap<unknown>;
  signal: AbortSignal | undefined;
  partialResults: boolean;
  logger: Logger;
}

export interface ExecutionArgs {
  registry: TypeRegistry;
  document: DocumentNode;
  operationName?: Maybe<string>;
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<ReadOnlyObjMap<unknown>>;
  /** Aborting stops fields from starting and abandons pending resolvers. */
  signal?: AbortSignal | undefined;
  /**
   * Return the partially completed tree with per-field abort errors instead
   * of a lone abort error when execution is aborted.
   */
  partialResults?: boolean | undefined;
  logger?: Logger | undefined;
}

/**
 * Constructs a ExecutionContext object from the arguments passed to
 * execute, which we will pass throughout the other execution methods.
 *
 * Returns a list of errors if a valid execution context cannot be created.
 */
export function buildExecutionContext(
  args: ExecutionArgs,
): ReadonlyArray<GraphQLError> | ExecutionContext {
  const {
    registry,
    document,
    operationName,
    rootValue,
    contextValue,
    variableValues: rawVariableValues,
    signal,
  } = args;

  if (signal?.aborted) {
    return [new ExecutionAbortedError(signal.reason)];
  }

  let operation: OperationDefinitionNode | undefined;
  const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
  for (const definition of document.definitions) {
    switch (definition.kind) {
      case Kind.OPERATION_DEFINITION:
        if (operationName == null) {
          if (operation !== undefined) {
            return [
              new GraphQLError(
                'Must provide operation name if query contains multiple operations.',
              ),
            ];
          }
          operation = definition;
        } else if (definition.name?.value === operationName) {
          operation = definition;
        }
        break;
      case Kind.FRAGMENT_DEFINITION:
        fragments[definition.name.value] = definition;
        break;
      default:
      // ignore non-executable definitions
    }
  }

  if (!operation) {
    if (operationName != null) {
      return [new GraphQLError(`Unknown operation named "${operationName}".`)];
    }
    return [new GraphQLError('Must provide an operation.')];
  }

  const variableDefinitions = operation.variableDefinitions ?? [];

  const coercedVariableValues = getVariableValues(
    registry,
    variableDefinitions,
    rawVariableValues ?? {},
    { maxErrors: 50 },
  );

  if (coercedVariableValues.errors) {
    return coercedVariableValues.errors;
  }

  return {
    registry,
    operation,
    fragments,
    rootValue,
    contextValue,
    variableValues: coercedVariableValues.coerced,
    signal,
    partialResults: args.partialResults ?? false,
    logger: args.logger ?? getDefaultLogger(),
  };
}
