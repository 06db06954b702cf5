import { Repeater } from '@repeaterjs/repeater';

import type { PromiseOrValue } from '../types/PromiseOrValue.js';

/**
 * Given an AsyncIterable and a callback function, return an AsyncGenerator
 * which produces values mapped via calling the callback function.
 *
 * Returning early from the mapped generator, or a mapper that throws or
 * rejects, closes the source iterator.
 */
export function mapAsyncIterable<T, U>(
  iterable: AsyncIterable<T>,
  fn: (value: T) => PromiseOrValue<U>,
): AsyncGenerator<U, void, unknown> {
  return new Repeater<U, void>(async (push, stop) => {
    const iterator = iterable[Symbol.asyncIterator]();
    let exhausted = false;
    try {
      for (;;) {
        // eslint-disable-next-line no-await-in-loop
        const iteration = await Promise.race([iterator.next(), stop]);
        if (iteration === undefined) {
          break;
        }
        if (iteration.done === true) {
          exhausted = true;
          break;
        }
        // eslint-disable-next-line no-await-in-loop
        await push(fn(iteration.value));
      }
    } finally {
      stop();
      if (!exhausted && typeof iterator.return === 'function') {
        await iterator.return();
      }
    }
  });
}
