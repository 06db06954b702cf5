import type {
  Field,
  InputValue,
  InterfaceType,
  NamedType,
  ObjectType,
  TypeRef,
} from '../type/definition.js';
import {
  isEqualTypeRef,
  isInputNamedType,
  isInterfaceType,
  isNonNullRef,
  isObjectType,
  isOutputNamedType,
  printTypeRef,
} from '../type/definition.js';
import { isIntrospectionType } from '../type/introspection.js';

import type { TypeRegistry } from './TypeRegistry.js';

const NAME_RX = /^[_a-zA-Z][_a-zA-Z0-9]*$/;

/**
 * Checks the integrity of every registered type and returns a description of
 * each problem found. References to types the registry does not hold are
 * reported while the registry is walked and skipped here.
 */
export function validateRegistry(registry: TypeRegistry): Array<string> {
  const context = new ValidationContext(registry);

  for (const type of Object.values(registry.getTypeMap())) {
    if (!isIntrospectionType(type)) {
      validateName(context, type.name, `Type "${type.name}"`);
    }

    switch (type.kind) {
      case 'OBJECT':
        validateFields(context, type);
        validateInterfaces(context, type);
        break;
      case 'INTERFACE':
        validateFields(context, type);
        break;
      case 'UNION':
        validateUnionMembers(context, type.name, type.types);
        break;
      case 'ENUM':
        if (Object.keys(type.values).length === 0) {
          context.report(
            `Enum type ${type.name} must define one or more values.`,
          );
        }
        for (const valueName of Object.keys(type.values)) {
          validateName(
            context,
            valueName,
            `Enum value "${type.name}.${valueName}"`,
          );
          if (['true', 'false', 'null'].includes(valueName)) {
            context.report(
              `Enum type ${type.name} cannot include value: ${valueName}.`,
            );
          }
        }
        break;
      case 'INPUT_OBJECT':
        if (Object.keys(type.fields).length === 0) {
          context.report(
            `Input Object type ${type.name} must define one or more fields.`,
          );
        }
        for (const field of Object.values(type.fields)) {
          validateInputValue(context, `${type.name}.${field.name}`, field);
        }
        break;
      case 'SCALAR':
        break;
    }
  }

  return context.problems;
}

class ValidationContext {
  registry: TypeRegistry;
  problems: Array<string>;

  constructor(registry: TypeRegistry) {
    this.registry = registry;
    this.problems = [];
  }

  report(message: string): void {
    this.problems.push(message);
  }

  /** Returns the named type a reference ends in, if it is registered. */
  namedType(ref: TypeRef): NamedType | undefined {
    let current = ref;
    while (typeof current !== 'string') {
      current = current.ofType;
    }
    return this.registry.lookup(current);
  }
}

function validateName(
  context: ValidationContext,
  name: string,
  subject: string,
): void {
  if (name.startsWith('__')) {
    context.report(
      `${subject} must not begin with "__", which is reserved by introspection.`,
    );
  } else if (!NAME_RX.test(name)) {
    context.report(`${subject} does not match /^[_a-zA-Z][_a-zA-Z0-9]*$/.`);
  }
}

/**
 * A non-null wrapper may only hold a named type or a list.
 */
function validateTypeRef(
  context: ValidationContext,
  coordinate: string,
  ref: TypeRef,
): void {
  if (typeof ref === 'string') {
    return;
  }
  if (isNonNullRef(ref) && isNonNullRef(ref.ofType)) {
    context.report(
      `The type of ${coordinate} wraps a Non-Null type in a Non-Null type: ${printTypeRef(ref)}.`,
    );
    return;
  }
  validateTypeRef(context, coordinate, ref.ofType);
}

function validateFields(
  context: ValidationContext,
  type: ObjectType | InterfaceType,
): void {
  const fields = Object.values(type.fields);
  if (fields.length === 0) {
    context.report(`Type ${type.name} must define one or more fields.`);
  }

  const isIntrospection = isIntrospectionType(type);
  for (const field of fields) {
    const coordinate = `${type.name}.${field.name}`;
    if (!isIntrospection) {
      validateName(context, field.name, `Field "${coordinate}"`);
    }
    validateTypeRef(context, coordinate, field.type);

    const fieldType = context.namedType(field.type);
    if (fieldType !== undefined && !isOutputNamedType(fieldType)) {
      context.report(
        `The type of ${coordinate} must be Output Type but got: ${printTypeRef(field.type)}.`,
      );
    }

    for (const arg of Object.values(field.args)) {
      validateInputValue(context, `${coordinate}(${arg.name}:)`, arg);
    }
  }
}

function validateInputValue(
  context: ValidationContext,
  coordinate: string,
  inputValue: InputValue,
): void {
  validateName(context, inputValue.name, `Input value "${coordinate}"`);
  validateTypeRef(context, coordinate, inputValue.type);

  const inputType = context.namedType(inputValue.type);
  if (inputType !== undefined && !isInputNamedType(inputType)) {
    context.report(
      `The type of ${coordinate} must be Input Type but got: ${printTypeRef(inputValue.type)}.`,
    );
  }

  if (
    isNonNullRef(inputValue.type) &&
    inputValue.deprecationReason !== undefined &&
    inputValue.defaultValue === undefined
  ) {
    context.report(`Required ${coordinate} cannot be deprecated.`);
  }
}

function validateUnionMembers(
  context: ValidationContext,
  unionName: string,
  memberNames: ReadonlyArray<string>,
): void {
  if (memberNames.length === 0) {
    context.report(
      `Union type ${unionName} must define one or more member types.`,
    );
  }

  const included = new Set<string>();
  for (const memberName of memberNames) {
    if (included.has(memberName)) {
      context.report(
        `Union type ${unionName} can only include type ${memberName} once.`,
      );
      continue;
    }
    included.add(memberName);

    const member = context.registry.lookup(memberName);
    if (member !== undefined && !isObjectType(member)) {
      context.report(
        `Union type ${unionName} can only include Object types, it cannot include ${memberName}.`,
      );
    }
  }
}

function validateInterfaces(
  context: ValidationContext,
  type: ObjectType,
): void {
  const implemented = new Set<string>();
  for (const interfaceName of type.interfaces) {
    const iface = context.registry.lookup(interfaceName);
    if (iface === undefined) {
      continue;
    }
    if (!isInterfaceType(iface)) {
      context.report(
        `Type ${type.name} must only implement Interface types, it cannot implement ${interfaceName}.`,
      );
      continue;
    }
    if (implemented.has(interfaceName)) {
      context.report(
        `Type ${type.name} can only implement ${interfaceName} once.`,
      );
      continue;
    }
    implemented.add(interfaceName);

    validateTypeImplementsInterface(context, type, iface);
  }
}

function validateTypeImplementsInterface(
  context: ValidationContext,
  type: ObjectType,
  iface: InterfaceType,
): void {
  const { registry } = context;

  for (const ifaceField of Object.values(iface.fields)) {
    const fieldName = ifaceField.name;
    const typeField: Field | undefined = Object.prototype.hasOwnProperty.call(
      type.fields,
      fieldName,
    )
      ? type.fields[fieldName]
      : undefined;

    // Assert interface field exists on type.
    if (typeField === undefined) {
      context.report(
        `Interface field ${iface.name}.${fieldName} expected but ${type.name} does not provide it.`,
      );
      continue;
    }

    // Assert interface field type is satisfied by type field type, by being
    // a valid subtype. (covariant)
    if (!registry.isTypeSubTypeOf(typeField.type, ifaceField.type)) {
      context.report(
        `Interface field ${iface.name}.${fieldName} expects type ` +
          `${printTypeRef(ifaceField.type)} but ${type.name}.${fieldName} ` +
          `is type ${printTypeRef(typeField.type)}.`,
      );
    }

    // Assert each interface field arg is implemented.
    for (const ifaceArg of Object.values(ifaceField.args)) {
      const argName = ifaceArg.name;
      const typeArg = Object.values(typeField.args).find(
        (arg) => arg.name === argName,
      );

      if (!typeArg) {
        context.report(
          `Interface field argument ${iface.name}.${fieldName}(${argName}:) expected but ${type.name}.${fieldName} does not provide it.`,
        );
        continue;
      }

      // Assert interface field arg type matches object field arg type.
      // (invariant)
      if (!isEqualTypeRef(ifaceArg.type, typeArg.type)) {
        context.report(
          `Interface field argument ${iface.name}.${fieldName}(${argName}:) ` +
            `expects type ${printTypeRef(ifaceArg.type)} but ` +
            `${type.name}.${fieldName}(${argName}:) is type ` +
            `${printTypeRef(typeArg.type)}.`,
        );
      }
    }

    // Assert additional arguments must not be required.
    for (const typeArg of Object.values(typeField.args)) {
      const argName = typeArg.name;
      const ifaceArg = Object.values(ifaceField.args).find(
        (arg) => arg.name === argName,
      );
      if (
        !ifaceArg &&
        isNonNullRef(typeArg.type) &&
        typeArg.defaultValue === undefined
      ) {
        context.report(
          `Object field ${type.name}.${fieldName} includes required argument ${argName} that is missing from the Interface field ${iface.name}.${fieldName}.`,
        );
      }
    }
  }
}
