import type {
  FieldNode,
  FragmentDefinitionNode,
  FragmentSpreadNode,
  InlineFragmentNode,
  SelectionSetNode,
} from 'graphql';
import { Kind } from 'graphql';

import type { ReadOnlyObjMap } from '../types/ObjMap.js';

import type { ObjectType } from '../type/definition.js';
import { isAbstractType } from '../type/definition.js';
import { IncludeDirective, SkipDirective } from '../type/directives.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { getDirectiveValues } from './values.js';

/**
 * Selections grouped by response key, in the order the keys first appear.
 */
export type FieldGroups = Map<string, ReadonlyArray<FieldNode>>;

export interface CollectFieldsContext {
  registry: TypeRegistry;
  fragments: ReadOnlyObjMap<FragmentDefinitionNode>;
  variableValues: ReadOnlyObjMap<unknown>;
}

/**
 * Given a selectionSet, collects all of the fields that apply to the runtime
 * object type and groups them by response key. Fragments whose type
 * condition does not match the runtime type are left out, as are selections
 * excluded by `@skip` or `@include`.
 */
export function collectFields(
  context: CollectFieldsContext,
  runtimeType: ObjectType,
  selectionSet: SelectionSetNode,
): FieldGroups {
  const fields = new Map<string, Array<FieldNode>>();
  collectFieldsImpl(context, runtimeType, selectionSet, fields, new Set());
  return fields;
}

/**
 * Given an array of field nodes, collects all of the subfields of the passed
 * in fields, and returns them at the end.
 */
export function collectSubfields(
  context: CollectFieldsContext,
  returnType: ObjectType,
  fieldNodes: ReadonlyArray<FieldNode>,
): FieldGroups {
  const subFieldNodes = new Map<string, Array<FieldNode>>();
  const visitedFragmentNames = new Set<string>();
  for (const node of fieldNodes) {
    if (node.selectionSet) {
      collectFieldsImpl(
        context,
        returnType,
        node.selectionSet,
        subFieldNodes,
        visitedFragmentNames,
      );
    }
  }
  return subFieldNodes;
}

function collectFieldsImpl(
  context: CollectFieldsContext,
  runtimeType: ObjectType,
  selectionSet: SelectionSetNode,
  fields: Map<string, Array<FieldNode>>,
  visitedFragmentNames: Set<string>,
): void {
  for (const selection of selectionSet.selections) {
    switch (selection.kind) {
      case Kind.FIELD: {
        if (!shouldIncludeNode(context, selection)) {
          continue;
        }
        const name = getFieldEntryKey(selection);
        const fieldList = fields.get(name);
        if (fieldList !== undefined) {
          fieldList.push(selection);
        } else {
          fields.set(name, [selection]);
        }
        break;
      }
      case Kind.INLINE_FRAGMENT: {
        if (
          !shouldIncludeNode(context, selection) ||
          !doesFragmentConditionMatch(context, selection, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          context,
          runtimeType,
          selection.selectionSet,
          fields,
          visitedFragmentNames,
        );
        break;
      }
      case Kind.FRAGMENT_SPREAD: {
        const fragName = selection.name.value;
        if (
          visitedFragmentNames.has(fragName) ||
          !shouldIncludeNode(context, selection)
        ) {
          continue;
        }
        visitedFragmentNames.add(fragName);
        const fragment = context.fragments[fragName];
        if (
          fragment === undefined ||
          !doesFragmentConditionMatch(context, fragment, runtimeType)
        ) {
          continue;
        }
        collectFieldsImpl(
          context,
          runtimeType,
          fragment.selectionSet,
          fields,
          visitedFragmentNames,
        );
        break;
      }
    }
  }
}

/**
 * Determines if a field should be included based on the `@include` and `@skip`
 * directives, where `@skip` has higher precedence than `@include`.
 */
function shouldIncludeNode(
  context: CollectFieldsContext,
  node: FragmentSpreadNode | FieldNode | InlineFragmentNode,
): boolean {
  const skip = getDirectiveValues(
    context.registry,
    SkipDirective,
    node,
    context.variableValues,
  );
  if (skip?.if === true) {
    return false;
  }

  const include = getDirectiveValues(
    context.registry,
    IncludeDirective,
    node,
    context.variableValues,
  );
  if (include?.if === false) {
    return false;
  }
  return true;
}

/**
 * Determines if a fragment is applicable to the given type.
 */
function doesFragmentConditionMatch(
  context: CollectFieldsContext,
  fragment: FragmentDefinitionNode | InlineFragmentNode,
  type: ObjectType,
): boolean {
  const typeConditionNode = fragment.typeCondition;
  if (!typeConditionNode) {
    return true;
  }
  const conditionalTypeName = typeConditionNode.name.value;
  if (conditionalTypeName === type.name) {
    return true;
  }
  const conditionalType = context.registry.lookup(conditionalTypeName);
  if (conditionalType !== undefined && isAbstractType(conditionalType)) {
    return context.registry.isSubType(conditionalType, type);
  }
  return false;
}

/**
 * Implements the logic to compute the key of a given field's entry
 */
function getFieldEntryKey(node: FieldNode): string {
  return node.alias ? node.alias.value : node.name.value;
}
