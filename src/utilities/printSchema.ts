import { print } from 'graphql';

import type { ReadOnlyObjMap } from '../types/ObjMap.js';

import type { InputValue, NamedType } from '../type/definition.js';
import { printTypeRef } from '../type/definition.js';
import { isSpecifiedScalarType } from '../type/scalars.js';

import type { TypeRegistry } from '../registry/TypeRegistry.js';

import { astFromValue } from './astFromValue.js';

type Lookup = (name: string) => NamedType | undefined;

/**
 * Prints the registry in SDL, leaving out the introspection types and the
 * built-in scalars.
 */
export function printSchema(registry: TypeRegistry): string {
  const lookup: Lookup = (name) => registry.lookup(name);
  const types = Object.values(registry.getTypeMap()).filter(
    (type) => !type.name.startsWith('__') && !isSpecifiedScalarType(type),
  );

  return [
    printSchemaDefinition(registry),
    ...types.map((type) => printType(type, lookup)),
  ]
    .filter((printed): printed is string => printed !== undefined)
    .join('\n\n');
}

function printSchemaDefinition(registry: TypeRegistry): string | undefined {
  const queryType = registry.getQueryType();
  const mutationType = registry.getMutationType();
  const subscriptionType = registry.getSubscriptionType();

  if (
    queryType.name === 'Query' &&
    (mutationType === undefined || mutationType.name === 'Mutation') &&
    (subscriptionType === undefined ||
      subscriptionType.name === 'Subscription')
  ) {
    return undefined;
  }

  const operationTypes = [`  query: ${queryType.name}`];
  if (mutationType) {
    operationTypes.push(`  mutation: ${mutationType.name}`);
  }
  if (subscriptionType) {
    operationTypes.push(`  subscription: ${subscriptionType.name}`);
  }
  return `schema {\n${operationTypes.join('\n')}\n}`;
}

/**
 * Prints the structure of a single named type. Two definitions that print
 * the same are considered the same type.
 */
export function printType(type: NamedType, lookup: Lookup): string {
  switch (type.kind) {
    case 'SCALAR':
      return `scalar ${type.name}`;
    case 'ENUM':
      return printBlock(
        `enum ${type.name}`,
        Object.values(type.values).map(
          (value) => value.name + printDeprecated(value.deprecationReason),
        ),
      );
    case 'OBJECT':
    case 'INTERFACE': {
      const keyword = type.kind === 'OBJECT' ? 'type' : 'interface';
      const interfaces =
        type.kind === 'OBJECT' && type.interfaces.length > 0
          ? ` implements ${type.interfaces.join(' & ')}`
          : '';
      return printBlock(
        `${keyword} ${type.name}${interfaces}`,
        Object.values(type.fields).map(
          (field) =>
            field.name +
            printArgs(field.args, lookup) +
            ': ' +
            printTypeRef(field.type) +
            printDeprecated(field.deprecationReason),
        ),
      );
    }
    case 'UNION':
      return type.types.length > 0
        ? `union ${type.name} = ${type.types.join(' | ')}`
        : `union ${type.name}`;
    case 'INPUT_OBJECT':
      return printBlock(
        `input ${type.name}`,
        Object.values(type.fields).map((field) =>
          printInputValue(field, lookup),
        ),
      );
  }
}

function printBlock(head: string, lines: ReadonlyArray<string>): string {
  return lines.length > 0
    ? `${head} {\n${lines.map((line) => `  ${line}`).join('\n')}\n}`
    : head;
}

function printArgs(args: ReadOnlyObjMap<InputValue>, lookup: Lookup): string {
  const printed = Object.values(args).map((arg) =>
    printInputValue(arg, lookup),
  );
  return printed.length > 0 ? `(${printed.join(', ')})` : '';
}

function printInputValue(inputValue: InputValue, lookup: Lookup): string {
  let printed = `${inputValue.name}: ${printTypeRef(inputValue.type)}`;
  const defaultValue = printDefaultValue(inputValue, lookup);
  if (defaultValue !== null) {
    printed += ` = ${defaultValue}`;
  }
  return printed + printDeprecated(inputValue.deprecationReason);
}

/**
 * Prints the default value of an argument or input field as a literal, or
 * returns `null` when it has none.
 */
export function printDefaultValue(
  inputValue: InputValue,
  lookup: Lookup,
): string | null {
  if (inputValue.defaultValue === undefined) {
    return null;
  }
  const ast = astFromValue(inputValue.defaultValue, inputValue.type, lookup);
  return ast ? print(ast) : null;
}

function printDeprecated(reason: string | undefined): string {
  if (reason === undefined) {
    return '';
  }
  return ` @deprecated(reason: ${JSON.stringify(reason)})`;
}
