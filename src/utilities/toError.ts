import { inspect } from './inspect.js';

/**
 * Sometimes a non-error is thrown, wrap it as an Error instance to ensure a
 * consistent Error interface.
 */
export function toError(thrownValue: unknown): Error {
  return thrownValue instanceof Error
    ? thrownValue
    : new Error(`Unexpected error value: ${inspect(thrownValue)}`);
}
