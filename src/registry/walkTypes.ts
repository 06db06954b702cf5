import type { NamedType, TypeRef } from '../type/definition.js';
import { getNamedTypeName } from '../type/definition.js';

export interface TypeVisitor {
  /** Called once for every distinct type reached, in depth-first pre-order. */
  enter?: (type: NamedType) => void;
  /** Called once for every referenced name that `lookup` cannot resolve. */
  onMissing?: (name: string, referrer: string | undefined) => void;
}

/**
 * Returns the references a type holds to other types: field, argument and
 * input-field types, declared interfaces and union members.
 */
export function getChildTypeRefs(type: NamedType): ReadonlyArray<TypeRef> {
  switch (type.kind) {
    case 'OBJECT': {
      const refs: Array<TypeRef> = [];
      for (const field of Object.values(type.fields)) {
        refs.push(field.type);
        for (const arg of Object.values(field.args)) {
          refs.push(arg.type);
        }
      }
      refs.push(...type.interfaces);
      return refs;
    }
    case 'INTERFACE': {
      const refs: Array<TypeRef> = [];
      for (const field of Object.values(type.fields)) {
        refs.push(field.type);
        for (const arg of Object.values(field.args)) {
          refs.push(arg.type);
        }
      }
      return refs;
    }
    case 'UNION':
      return type.types;
    case 'INPUT_OBJECT':
      return Object.values(type.fields).map((field) => field.type);
    case 'SCALAR':
    case 'ENUM':
      return [];
  }
}

/**
 * Walks the type graph depth-first from `roots`. Wrappers are looked through
 * to the named type they hold. A visited set keyed by type name guarantees
 * termination on self-referential and mutually recursive graphs: every
 * distinct type is entered exactly once, whatever its in-degree.
 *
 * Returns the names of the types entered, in visiting order.
 */
export function walkTypes(
  roots: Iterable<string>,
  lookup: (name: string) => NamedType | undefined,
  visitor: TypeVisitor = {},
): ReadonlyArray<string> {
  const visited = new Set<string>();
  const missing = new Set<string>();
  const order: Array<string> = [];

  const stack: Array<{ name: string; referrer: string | undefined }> = [];
  for (const root of [...roots].reverse()) {
    stack.push({ name: root, referrer: undefined });
  }

  let entry;
  while ((entry = stack.pop()) !== undefined) {
    const { name, referrer } = entry;
    if (visited.has(name) || missing.has(name)) {
      continue;
    }

    const type = lookup(name);
    if (type === undefined) {
      missing.add(name);
      visitor.onMissing?.(name, referrer);
      continue;
    }

    visited.add(name);
    order.push(name);
    visitor.enter?.(type);

    const children = getChildTypeRefs(type);
    for (let i = children.length - 1; i >= 0; i--) {
      const childName = getNamedTypeName(children[i]);
      if (!visited.has(childName)) {
        stack.push({ name: childName, referrer: type.name });
      }
    }
  }

  return order;
}
