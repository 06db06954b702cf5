import type {
  ArgumentNode,
  DirectiveNode,
  FieldNode,
  VariableDefinitionNode,
} from 'graphql';
import { GraphQLError, Kind, print } from 'graphql';

import type { Maybe } from '../types/Maybe.js';
import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';

import { hasOwnProperty } from '../utilities/hasOwnProperty.js';
import { inspect } from '../utilities/inspect.js';
import type { Path } from '../utilities/Path.js';
import { pathToArray, printPathArray } from '../utilities/Path.js';

import {
  ArgumentCoercionErrors,
  CoercionError,
  MissingVariableError,
} from '../error/errors.js';

import type { Argument } from '../type/definition.js';
import {
  getNamedTypeName,
  isInputNamedType,
  isNonNullRef,
  printTypeRef,
  typeRefFromAST,
} from '../type/definition.js';
import type { Directive } from '../type/directives.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { coerceInputLiteral } from './coerceInputLiteral.js';
import { coerceInputValue } from './coerceInputValue.js';

export type CoercedVariableValues =
  | { errors: ReadonlyArray<GraphQLError>; coerced?: never }
  | { coerced: ObjMap<unknown>; errors?: never };

/**
 * Prepares an object map of variableValues of the correct type based on the
 * provided variable definitions and arbitrary input. Every problem is
 * collected, up to `maxErrors`.
 *
 * Note: The returned value is a plain Object with a prototype, since it is
 * exposed to user code. Care should be taken to not pull values from the
 * Object prototype.
 */
export function getVariableValues(
  registry: TypeRegistry,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: ReadOnlyObjMap<unknown>,
  options?: { maxErrors?: number },
): CoercedVariableValues {
  const errors: Array<GraphQLError> = [];
  const maxErrors = options?.maxErrors;
  try {
    const coerced = coerceVariableValues(
      registry,
      varDefNodes,
      inputs,
      (error) => {
        if (maxErrors != null && errors.length >= maxErrors) {
          throw new GraphQLError(
            'Too many errors processing variables, error limit reached. Execution aborted.',
          );
        }
        errors.push(error);
      },
    );

    if (errors.length === 0) {
      return { coerced };
    }
  } catch (error) {
    if (!(error instanceof GraphQLError)) {
      throw error;
    }
    errors.push(error);
  }

  return { errors };
}

function coerceVariableValues(
  registry: TypeRegistry,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: ReadOnlyObjMap<unknown>,
  onError: (error: GraphQLError) => void,
): ObjMap<unknown> {
  const coercedValues: ObjMap<unknown> = {};
  for (const varDefNode of varDefNodes) {
    const varName = varDefNode.variable.name.value;
    const varType = typeRefFromAST(varDefNode.type);
    const varTypeStr = printTypeRef(varType);
    const namedType = registry.lookup(getNamedTypeName(varType));
    if (namedType === undefined || !isInputNamedType(namedType)) {
      // Must use input types for variables. This should be caught during
      // validation, however is checked again here for safety.
      onError(
        new CoercionError(
          `Variable "$${varName}" expected value of type "${varTypeStr}" which cannot be used as an input type.`,
          [],
          { nodes: varDefNode.type },
        ),
      );
      continue;
    }

    if (!hasOwnProperty(inputs, varName)) {
      if (varDefNode.defaultValue) {
        const defaultValueNode = varDefNode.defaultValue;
        coercedValues[varName] = coerceInputLiteral(
          defaultValueNode,
          varType,
          registry,
          undefined,
          (path, invalidNode, error) => {
            onError(
              new CoercionError(
                `Variable "$${varName}" has invalid default value ${print(invalidNode)}; ${error.message}`,
                path,
                { nodes: defaultValueNode },
              ),
            );
          },
        );
      } else if (isNonNullRef(varType)) {
        onError(
          new MissingVariableError(
            `Variable "$${varName}" of required type "${varTypeStr}" was not provided.`,
            varName,
            { nodes: varDefNode },
          ),
        );
      }
      continue;
    }

    const value = inputs[varName];
    if (value === null && isNonNullRef(varType)) {
      onError(
        new CoercionError(
          `Variable "$${varName}" of non-null type "${varTypeStr}" must not be null.`,
          [],
          { nodes: varDefNode },
        ),
      );
      continue;
    }

    coercedValues[varName] = coerceInputValue(
      value,
      varType,
      registry,
      (path, invalidValue, error) => {
        let prefix =
          `Variable "$${varName}" got invalid value ` + inspect(invalidValue);
        if (path.length > 0) {
          prefix += ` at "${varName}${printPathArray(path)}"`;
        }
        onError(
          new CoercionError(prefix + '; ' + error.message, path, {
            nodes: varDefNode,
            originalError: error.originalError,
          }),
        );
      },
    );
  }

  return coercedValues;
}

interface ArgumentsHolder {
  readonly name: string;
  readonly args: ReadOnlyObjMap<Argument>;
}

/**
 * Prepares an object map of argument values given a list of argument
 * definitions and list of argument AST nodes.
 *
 * Every argument and every element within it is attempted. A single failure
 * is thrown as its `CoercionError`, several as an `ArgumentCoercionErrors`
 * listing each. `path` positions the errors in the response.
 *
 * Note: The returned value is a plain Object with a prototype, since it is
 * exposed to user code. Care should be taken to not pull values from the
 * Object prototype.
 */
export function getArgumentValues(
  registry: TypeRegistry,
  def: ArgumentsHolder,
  node: FieldNode | DirectiveNode,
  variableValues?: Maybe<ReadOnlyObjMap<unknown>>,
  path?: Path,
): ObjMap<unknown> {
  const coercedValues: ObjMap<unknown> = {};
  const responsePath = path === undefined ? undefined : pathToArray(path);

  const errors: Array<CoercionError> = [];
  const report = (error: CoercionError): void => {
    errors.push(error);
  };

  const argumentNodes: ObjMap<ArgumentNode> = Object.create(null);
  for (const argumentNode of node.arguments ?? []) {
    argumentNodes[argumentNode.name.value] = argumentNode;
  }

  for (const argDef of Object.values(def.args)) {
    const name = argDef.name;
    const argType = argDef.type;
    const argumentNode = argumentNodes[name];

    if (argumentNode === undefined) {
      if (argDef.defaultValue !== undefined) {
        coercedValues[name] = argDef.defaultValue;
      } else if (isNonNullRef(argType)) {
        report(
          new CoercionError(
            `Argument "${name}" of required type "${printTypeRef(argType)}" was not provided.`,
            [],
            { nodes: node, path: responsePath },
          ),
        );
      }
      continue;
    }

    const valueNode = argumentNode.value;
    let isNull = valueNode.kind === Kind.NULL;

    if (valueNode.kind === Kind.VARIABLE) {
      const variableName = valueNode.name.value;
      if (
        variableValues == null ||
        !hasOwnProperty(variableValues, variableName)
      ) {
        if (argDef.defaultValue !== undefined) {
          coercedValues[name] = argDef.defaultValue;
        } else if (isNonNullRef(argType)) {
          report(
            new MissingVariableError(
              `Argument "${name}" of required type "${printTypeRef(argType)}" ` +
                `was provided the variable "$${variableName}" which was not provided a runtime value.`,
              variableName,
              { nodes: valueNode, path: responsePath },
            ),
          );
        }
        continue;
      }
      isNull = variableValues[variableName] == null;
    }

    if (isNull && isNonNullRef(argType)) {
      report(
        new CoercionError(
          `Argument "${name}" of non-null type "${printTypeRef(argType)}" must not be null.`,
          [],
          { nodes: valueNode, path: responsePath },
        ),
      );
      continue;
    }

    const coercedValue = coerceInputLiteral(
      valueNode,
      argType,
      registry,
      variableValues,
      (inputPath, invalidNode, error) => {
        let message =
          `Argument "${name}" got invalid value ` + print(invalidNode);
        if (inputPath.length > 0) {
          message += ` at "${name}${printPathArray(inputPath)}"`;
        }
        report(
          new CoercionError(message + '; ' + error.message, inputPath, {
            nodes: invalidNode,
            path: responsePath,
            originalError: error.originalError,
          }),
        );
      },
    );
    if (coercedValue !== undefined) {
      coercedValues[name] = coercedValue;
    }
  }

  const [firstError, ...otherErrors] = errors;
  if (firstError !== undefined) {
    throw otherErrors.length === 0
      ? firstError
      : new ArgumentCoercionErrors([firstError, ...otherErrors]);
  }
  return coercedValues;
}

/**
 * Prepares an object map of argument values given a directive definition
 * and a AST node which may contain directives. Optionally also accepts a map
 * of variable values.
 *
 * If the directive does not exist on the node, returns undefined.
 */
export function getDirectiveValues(
  registry: TypeRegistry,
  directiveDef: Directive,
  node: { readonly directives?: ReadonlyArray<DirectiveNode> | undefined },
  variableValues?: Maybe<ReadOnlyObjMap<unknown>>,
): undefined | ObjMap<unknown> {
  const directiveNode = node.directives?.find(
    (directive) => directive.name.value === directiveDef.name,
  );

  if (directiveNode) {
    return getArgumentValues(registry, directiveDef, directiveNode, variableValues);
  }
}
