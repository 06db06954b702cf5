import type { ObjMap } from '../types/ObjMap.js';

import type { Logger } from '../utilities/logger.js';
import { getDefaultLogger } from '../utilities/logger.js';
import { printType } from '../utilities/printSchema.js';

import { SchemaBuildError } from '../error/errors.js';

import type { NamedType, ObjectType } from '../type/definition.js';
import { getNamedTypeName } from '../type/definition.js';
import type { Directive } from '../type/directives.js';
import { specifiedDirectives } from '../type/directives.js';
import { introspectionTypes } from '../type/introspection.js';
import { specifiedScalarTypes } from '../type/scalars.js';

import type { UnknownInputFieldsPolicy } from './TypeRegistry.js';
import { TypeRegistry } from './TypeRegistry.js';
import { validateRegistry } from './validateRegistry.js';
import { walkTypes } from './walkTypes.js';

export interface RegistryConfig {
  query: ObjectType;
  mutation?: ObjectType | undefined;
  subscription?: ObjectType | undefined;
  /**
   * Definitions that are not reachable from the root types by name alone,
   * such as the object types implementing an interface, and every definition
   * a name elsewhere refers to.
   */
  types?: ReadonlyArray<NamedType> | undefined;
  directives?: ReadonlyArray<Directive> | undefined;
  description?: string | undefined;
  unknownInputFields?: UnknownInputFieldsPolicy | undefined;
  logger?: Logger | undefined;
}

/**
 * Collects the definitions reachable from the root operation types into a
 * registry and checks their integrity. Every problem found is returned
 * together in a `SchemaBuildError`; no registry is produced in that case.
 */
export function buildRegistry(
  config: RegistryConfig,
): TypeRegistry | SchemaBuildError {
  const logger = config.logger ?? getDefaultLogger();
  const problems: Array<string> = [];

  const definitions: ObjMap<NamedType> = Object.create(null);
  const define = (type: NamedType): void => {
    const existing = definitions[type.name];
    if (existing === undefined) {
      definitions[type.name] = type;
      return;
    }
    if (existing === type) {
      return;
    }
    const lookup = (name: string) => definitions[name];
    if (printType(existing, lookup) !== printType(type, lookup)) {
      problems.push(
        `Type "${type.name}" is defined more than once with different definitions.`,
      );
    }
  };

  const rootTypes = [config.query, config.mutation, config.subscription];
  for (const rootType of rootTypes) {
    if (rootType !== undefined) {
      define(rootType);
    }
  }
  for (const type of config.types ?? []) {
    define(type);
  }
  for (const type of introspectionTypes) {
    define(type);
  }
  for (const scalar of specifiedScalarTypes) {
    if (definitions[scalar.name] === undefined) {
      definitions[scalar.name] = scalar;
    }
  }

  const directives = config.directives ?? specifiedDirectives;

  const walkRoots: Array<string> = [];
  for (const rootType of rootTypes) {
    if (rootType !== undefined) {
      walkRoots.push(rootType.name);
    }
  }
  for (const type of config.types ?? []) {
    walkRoots.push(type.name);
  }
  for (const type of introspectionTypes) {
    walkRoots.push(type.name);
  }
  for (const directive of directives) {
    for (const arg of Object.values(directive.args)) {
      walkRoots.push(getNamedTypeName(arg.type));
    }
  }
  for (const scalar of specifiedScalarTypes) {
    walkRoots.push(scalar.name);
  }

  const typeMap: ObjMap<NamedType> = Object.create(null);
  walkTypes(walkRoots, (name) => definitions[name], {
    enter(type) {
      typeMap[type.name] = type;
    },
    onMissing(name, referrer) {
      problems.push(
        referrer === undefined
          ? `Unknown type "${name}".`
          : `Unknown type "${name}" referenced by ${referrer}.`,
      );
    },
  });

  const registry = new TypeRegistry({
    description: config.description,
    typeMap,
    queryType: config.query,
    mutationType: config.mutation,
    subscriptionType: config.subscription,
    directives,
    unknownInputFields: config.unknownInputFields ?? 'reject',
  });

  problems.push(...validateRegistry(registry));

  if (problems.length > 0) {
    logger.error({ problems }, 'Type registry could not be built.');
    return new SchemaBuildError(problems);
  }

  logger.debug(
    { types: Object.keys(typeMap).length, directives: directives.length },
    'Type registry built.',
  );
  return registry;
}
