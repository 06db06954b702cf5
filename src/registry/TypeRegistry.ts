import { OperationTypeNode } from 'graphql';

import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';

import { invariant } from '../utilities/invariant.js';

import type {
  AbstractType,
  IntrospectedType,
  NamedType,
  ObjectType,
  TypeRef,
} from '../type/definition.js';
import {
  isAbstractType,
  isInterfaceType,
  isObjectType,
} from '../type/definition.js';
import type { Directive } from '../type/directives.js';

/**
 * What input-object coercion does with keys the input object type does not
 * declare.
 */
export type UnknownInputFieldsPolicy = 'reject' | 'ignore';

export interface TypeRegistryArgs {
  description: string | undefined;
  typeMap: ReadOnlyObjMap<NamedType>;
  queryType: ObjectType;
  mutationType: ObjectType | undefined;
  subscriptionType: ObjectType | undefined;
  directives: ReadonlyArray<Directive>;
  unknownInputFields: UnknownInputFieldsPolicy;
}

/**
 * The name-indexed table of every type definition reachable from the root
 * operation types. It is the single owner of the definitions; all other
 * references are names resolved here. Instances are created by
 * `buildRegistry` and never change afterwards.
 */
export class TypeRegistry {
  readonly description: string | undefined;
  _typeMap: ReadOnlyObjMap<NamedType>;
  _rootTypes: ReadonlyMap<OperationTypeNode, ObjectType>;
  _queryType: ObjectType;
  _directives: ReadonlyArray<Directive>;
  _unknownInputFields: UnknownInputFieldsPolicy;
  _possibleTypes: ObjMap<ReadonlyArray<ObjectType>>;
  _subTypes: ObjMap<ReadonlySet<string>>;

  constructor(args: TypeRegistryArgs) {
    this.description = args.description;
    this._typeMap = Object.freeze({ ...args.typeMap });
    this._queryType = args.queryType;
    this._directives = args.directives;
    this._unknownInputFields = args.unknownInputFields;

    const rootTypes = new Map<OperationTypeNode, ObjectType>();
    rootTypes.set(OperationTypeNode.QUERY, args.queryType);
    if (args.mutationType) {
      rootTypes.set(OperationTypeNode.MUTATION, args.mutationType);
    }
    if (args.subscriptionType) {
      rootTypes.set(OperationTypeNode.SUBSCRIPTION, args.subscriptionType);
    }
    this._rootTypes = rootTypes;

    this._possibleTypes = Object.create(null);
    this._subTypes = Object.create(null);
    this._collectPossibleTypes();
  }

  _collectPossibleTypes(): void {
    const possibleTypes: ObjMap<Array<ObjectType>> = Object.create(null);

    for (const type of Object.values(this._typeMap)) {
      if (isInterfaceType(type)) {
        possibleTypes[type.name] ??= [];
      } else if (isObjectType(type)) {
        for (const interfaceName of type.interfaces) {
          const implementations = (possibleTypes[interfaceName] ??= []);
          if (!implementations.includes(type)) {
            implementations.push(type);
          }
        }
      }
    }

    for (const type of Object.values(this._typeMap)) {
      if (!isAbstractType(type)) {
        continue;
      }
      if (isInterfaceType(type)) {
        this._possibleTypes[type.name] = possibleTypes[type.name];
      } else {
        const members: Array<ObjectType> = [];
        for (const memberName of type.types) {
          const member = this._typeMap[memberName];
          if (member !== undefined && isObjectType(member)) {
            members.push(member);
          }
        }
        this._possibleTypes[type.name] = members;
      }
      this._subTypes[type.name] = new Set(
        this._possibleTypes[type.name].map((possibleType) => possibleType.name),
      );
    }
  }

  /**
   * Returns the definition registered under `name`, or `undefined` when no
   * such type exists. The same definition object is returned on every call.
   */
  lookup(name: string): NamedType | undefined {
    return Object.prototype.hasOwnProperty.call(this._typeMap, name)
      ? this._typeMap[name]
      : undefined;
  }

  getType(name: string): NamedType {
    const type = this.lookup(name);
    invariant(type !== undefined, `Unknown type "${name}".`);
    return type;
  }

  getTypeMap(): ReadOnlyObjMap<NamedType> {
    return this._typeMap;
  }

  getQueryType(): ObjectType {
    return this._queryType;
  }

  getMutationType(): ObjectType | undefined {
    return this._rootTypes.get(OperationTypeNode.MUTATION);
  }

  getSubscriptionType(): ObjectType | undefined {
    return this._rootTypes.get(OperationTypeNode.SUBSCRIPTION);
  }

  getRootType(operation: OperationTypeNode): ObjectType | undefined {
    return this._rootTypes.get(operation);
  }

  getDirectives(): ReadonlyArray<Directive> {
    return this._directives;
  }

  getDirective(name: string): Directive | undefined {
    return this._directives.find((directive) => directive.name === name);
  }

  getUnknownInputFieldsPolicy(): UnknownInputFieldsPolicy {
    return this._unknownInputFields;
  }

  /**
   * Union members in declaration order, or interface implementations in
   * registration order.
   */
  getPossibleTypes(abstractType: AbstractType): ReadonlyArray<ObjectType> {
    return this._possibleTypes[abstractType.name] ?? [];
  }

  isSubType(abstractType: AbstractType, maybeSubType: ObjectType): boolean {
    return this._subTypes[abstractType.name]?.has(maybeSubType.name) ?? false;
  }

  /**
   * Provided a type and a super type, return true if the first type is
   * either equal or a subset of the second super type (covariant).
   */
  isTypeSubTypeOf(maybeSubType: TypeRef, superType: TypeRef): boolean {
    if (typeof maybeSubType === 'string' && typeof superType === 'string') {
      if (maybeSubType === superType) {
        return true;
      }
      const superNamed = this.lookup(superType);
      const subNamed = this.lookup(maybeSubType);
      return (
        superNamed !== undefined &&
        subNamed !== undefined &&
        isAbstractType(superNamed) &&
        isObjectType(subNamed) &&
        this.isSubType(superNamed, subNamed)
      );
    }

    // If superType is non-null, maybeSubType must also be non-null.
    if (typeof superType !== 'string' && superType.kind === 'NON_NULL') {
      if (typeof maybeSubType !== 'string' && maybeSubType.kind === 'NON_NULL') {
        return this.isTypeSubTypeOf(maybeSubType.ofType, superType.ofType);
      }
      return false;
    }
    if (typeof maybeSubType !== 'string' && maybeSubType.kind === 'NON_NULL') {
      // If superType is nullable, maybeSubType may be non-null or nullable.
      return this.isTypeSubTypeOf(maybeSubType.ofType, superType);
    }

    // If superType type is a list, maybeSubType type must also be a list.
    if (typeof superType !== 'string') {
      if (typeof maybeSubType !== 'string') {
        return this.isTypeSubTypeOf(maybeSubType.ofType, superType.ofType);
      }
      return false;
    }

    // If superType is not a list, maybeSubType must also be not a list.
    return false;
  }

  /**
   * Resolves a reference for introspection: names become their definitions,
   * wrappers are returned as they are.
   */
  resolveTypeRef(ref: TypeRef): IntrospectedType {
    return typeof ref === 'string' ? this.getType(ref) : ref;
  }
}
