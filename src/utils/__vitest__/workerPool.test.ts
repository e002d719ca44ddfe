/**
 * Test file for the bounded worker pool
 */
import { describe, it, expect } from 'vitest';
import { runBounded } from '../workerPool.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>(r => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('runBounded', () => {
  it('never runs more than the concurrency limit at once', async () => {
    let active = 0;
    let peak = 0;

    const { results, stopped } = await runBounded(
      [1, 2, 3, 4, 5, 6, 7],
      async item => {
        active++;
        peak = Math.max(peak, active);
        await new Promise(resolve => setTimeout(resolve, 1));
        active--;
        return item * 10;
      },
      { concurrency: 3 }
    );

    expect(peak).toBe(3);
    expect(results).toEqual([10, 20, 30, 40, 50, 60, 70]);
    expect(stopped).toBe(false);
  });

  it('keeps results indexed like the input when completion order differs', async () => {
    const { results } = await runBounded(
      [30, 1, 10],
      async delay => {
        await new Promise(resolve => setTimeout(resolve, delay));
        return `done-${delay}`;
      },
      { concurrency: 3 }
    );

    expect(results).toEqual(['done-30', 'done-1', 'done-10']);
  });

  it('stops issuing items after an abort and lets in-flight work finish', async () => {
    const controller = new AbortController();
    const gate = deferred();
    const started: number[] = [];

    const pending = runBounded(
      [0, 1, 2, 3],
      async index => {
        started.push(index);
        if (index === 0) {
          controller.abort();
          await gate.promise;
        }
        return index;
      },
      { concurrency: 1, signal: controller.signal }
    );
    gate.resolve();
    const { results, stopped } = await pending;

    expect(started).toEqual([0]);
    expect(results).toEqual([0, undefined, undefined, undefined]);
    expect(stopped).toBe(true);
  });

  it('rethrows the first worker error after in-flight items settle', async () => {
    const finished: number[] = [];
    const slow = deferred();

    const pending = runBounded(
      [0, 1, 2, 3],
      async index => {
        if (index === 0) {
          await slow.promise;
          finished.push(index);
          return index;
        }
        if (index === 1) {
          throw new Error('record 1 failed');
        }
        finished.push(index);
        return index;
      },
      { concurrency: 2 }
    );

    await new Promise(resolve => setTimeout(resolve, 5));
    slow.resolve();

    await expect(pending).rejects.toThrow('record 1 failed');
    expect(finished).toEqual([0]);
  });

  it('honours shouldStop', async () => {
    let processed = 0;
    const { results, stopped } = await runBounded(
      ['a', 'b', 'c'],
      async item => {
        processed++;
        return item;
      },
      { concurrency: 1, shouldStop: () => processed >= 2 }
    );

    expect(results).toEqual(['a', 'b', undefined]);
    expect(stopped).toBe(true);
  });

  it('handles an empty list', async () => {
    expect(await runBounded([], async () => 1, { concurrency: 4 })).toEqual({ results: [], stopped: false });
  });
});
