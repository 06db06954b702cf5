import { isObjectLike } from './isObjectLike.js';

/**
 * Returns true if the value acts like a Promise, i.e. has a "then" function,
 * otherwise returns false.
 */
export function isPromise<T = unknown>(value: unknown): value is Promise<T> {
  return isObjectLike(value) && typeof value.then === 'function';
}
