import assert from 'node:assert/strict';
import { setTimeout as sleep } from 'node:timers/promises';
import { describe, it } from 'node:test';

import { WorkerPool, mapWithConcurrency } from '../concurrency.js';

describe('mapWithConcurrency', () => {
  it('keeps input order while bounding calls in flight', async () => {
    let inFlight = 0;
    let peak = 0;
    const results = await mapWithConcurrency([30, 5, 20, 1, 10], 2, async (delay, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await sleep(delay);
      inFlight -= 1;
      return index * 10;
    });

    assert.deepEqual(results, [0, 10, 20, 30, 40]);
    assert.equal(peak, 2);
  });

  it('stops starting new items after a failure', async () => {
    const started: number[] = [];
    await assert.rejects(
      mapWithConcurrency([1, 2, 3, 4], 1, async (item) => {
        started.push(item);
        if (item === 2) {
          throw new Error('boom');
        }
        return item;
      }),
      { message: 'boom' },
    );
    assert.deepEqual(started, [1, 2]);
  });
});

describe('WorkerPool', () => {
  it('runs at most `concurrency` tasks and reports idle', async () => {
    const errors: unknown[] = [];
    const pool = new WorkerPool(1, (error) => errors.push(error));
    const order: string[] = [];

    pool.submit(async () => {
      await sleep(5);
      order.push('a');
    });
    pool.submit(async () => {
      order.push('b');
      throw new Error('task failed');
    });

    assert.equal(pool.activeCount, 1);
    assert.equal(pool.queuedCount, 1);

    await pool.onIdle();
    assert.deepEqual(order, ['a', 'b']);
    assert.equal(errors.length, 1);
  });
});
