import { DirectiveLocation } from 'graphql';

import type { ObjMap, ReadOnlyObjMap } from '../types/ObjMap.js';

import type { Argument, InputValueConfig } from './definition.js';
import { defineInputValueMap, nonNull } from './definition.js';

export interface Directive {
  readonly name: string;
  readonly description: string | undefined;
  readonly locations: ReadonlyArray<DirectiveLocation>;
  readonly args: ReadOnlyObjMap<Argument>;
  readonly isRepeatable: boolean;
}

export interface DirectiveConfig {
  name: string;
  description?: string;
  locations: ReadonlyArray<DirectiveLocation>;
  args?: ObjMap<InputValueConfig>;
  isRepeatable?: boolean;
}

export function directive(config: DirectiveConfig): Directive {
  return Object.freeze({
    name: config.name,
    description: config.description,
    locations: Object.freeze([...config.locations]),
    args: defineInputValueMap(config.args ?? {}),
    isRepeatable: config.isRepeatable ?? false,
  });
}

/**
 * Used to conditionally include fields or fragments.
 */
export const IncludeDirective: Directive = directive({
  name: 'include',
  description:
    'Directs the executor to include this field or fragment only when the `if` argument is true.',
  locations: [
    DirectiveLocation.FIELD,
    DirectiveLocation.FRAGMENT_SPREAD,
    DirectiveLocation.INLINE_FRAGMENT,
  ],
  args: {
    if: {
      type: nonNull('Boolean'),
      description: 'Included when true.',
    },
  },
});

/**
 * Used to conditionally skip (exclude) fields or fragments.
 */
export const SkipDirective: Directive = directive({
  name: 'skip',
  description:
    'Directs the executor to skip this field or fragment when the `if` argument is true.',
  locations: [
    DirectiveLocation.FIELD,
    DirectiveLocation.FRAGMENT_SPREAD,
    DirectiveLocation.INLINE_FRAGMENT,
  ],
  args: {
    if: {
      type: nonNull('Boolean'),
      description: 'Skipped when true.',
    },
  },
});

export const specifiedDirectives: ReadonlyArray<Directive> = Object.freeze([
  IncludeDirective,
  SkipDirective,
]);
