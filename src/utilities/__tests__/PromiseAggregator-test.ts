import { expect } from 'chai';
import { describe, it } from 'mocha';

import { expectPromise } from '../../__testUtils__/expectPromise.js';
import { resolveOnNextTick } from '../../__testUtils__/resolveOnNextTick.js';

import { PromiseAggregator } from '../PromiseAggregator.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolvePromise: (() => void) | undefined;
  const promise = new Promise<void>((resolve) => {
    resolvePromise = () => resolve();
  });
  return { promise, resolve: () => resolvePromise?.() };
}

describe('PromiseAggregator', () => {
  it('resolves immediately when empty', async () => {
    const aggregator = new PromiseAggregator();

    expect(aggregator.isEmpty()).to.equal(true);
    expect(await aggregator.resolved()).to.equal(undefined);
  });

  it('settles once every added promise has settled', async () => {
    const aggregator = new PromiseAggregator();
    const first = deferred();
    const second = deferred();
    aggregator.add(first.promise);
    aggregator.add(second.promise);

    let settled = false;
    const resolved = aggregator.resolved().then(() => {
      settled = true;
    });

    first.resolve();
    await resolveOnNextTick();
    await resolveOnNextTick();
    expect(settled).to.equal(false);
    expect(aggregator.isEmpty()).to.equal(false);

    second.resolve();
    await resolved;
    expect(settled).to.equal(true);
    expect(aggregator.isEmpty()).to.equal(true);
  });

  it('rejects with the reason of the first rejection', async () => {
    const aggregator = new PromiseAggregator();
    aggregator.add(Promise.reject(new Error('first')));
    aggregator.add(Promise.reject(new Error('second')));
    aggregator.add(Promise.resolve());

    await expectPromise(aggregator.resolved()).toRejectWith('first');
  });

  it('keeps every rejection reason in order', async () => {
    const aggregator = new PromiseAggregator();
    const first = new Error('first');
    const second = new Error('second');
    aggregator.add(Promise.reject(first));
    aggregator.add(Promise.resolve());
    aggregator.add(Promise.reject(second));

    await expectPromise(aggregator.resolved()).toRejectWith('first');
    expect(aggregator.rejections()).to.have.ordered.members([first, second]);
  });
});
