import { SchemaBuildError } from '../error/errors.js';

import type { RegistryConfig } from '../registry/buildRegistry.js';
import { buildRegistry } from '../registry/buildRegistry.js';
import type { TypeRegistry } from '../registry/TypeRegistry.js';

export function buildTestRegistry(config: RegistryConfig): TypeRegistry {
  const registry = buildRegistry(config);
  if (registry instanceof SchemaBuildError) {
    throw registry;
  }
  return registry;
}
