/**
 * Tracks the promises of concurrently executing branches. `resolved()`
 * settles only once every added promise has settled, and rejects with the
 * reason of the first rejection, if any. Every rejection reason is kept, in
 * the order the rejections happened.
 *
 * @internal
 */
export class PromiseAggregator {
  _promiseCount: number;
  _signal: Promise<void>;
  _trigger!: () => void;
  _reasons: Array<unknown>;

  constructor() {
    this._promiseCount = 0;
    this._signal = new Promise<void>((resolve) => (this._trigger = resolve));
    this._reasons = [];
  }

  _increment(): void {
    this._promiseCount++;
  }

  _decrement(): void {
    this._promiseCount--;

    if (this._promiseCount === 0) {
      this._trigger();
    }
  }

  add(promise: Promise<unknown>): void {
    this._increment();
    promise.then(
      () => {
        this._decrement();
      },
      (reason: unknown) => {
        this._reasons.push(reason);
        this._decrement();
      },
    );
  }

  isEmpty(): boolean {
    return this._promiseCount === 0;
  }

  rejections(): ReadonlyArray<unknown> {
    return this._reasons;
  }

  resolved(): Promise<void> {
    const signal = this.isEmpty() ? Promise.resolve() : this._signal;
    return signal.then(() => {
      if (this._reasons.length > 0) {
        throw this._reasons[0];
      }
    });
  }
}
