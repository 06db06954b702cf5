import type { PromiseOrValue } from '../types/PromiseOrValue.js';

import { isPromise } from '../predicates/isPromise.js';

/**
 * Fails the test unless the value was produced synchronously.
 */
export function expectSync<T>(value: PromiseOrValue<T>): T {
  if (isPromise(value)) {
    throw new Error('Expected a synchronous result, received a promise.');
  }
  return value;
}
