import { describe, expect, it } from 'vitest';

import { runPool } from '../src/pool';
import { sleep } from '../src/util';

describe('runPool', () => {
  it('keeps results in item order', async () => {
    const delays = [20, 0, 10, 5];

    const results = await runPool(delays, 4, async (delay, index) => {
      await sleep(delay);
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30]);
  });

  it('runs at most the given number of workers at once', async () => {
    let active = 0;
    let peak = 0;

    await runPool([1, 2, 3, 4, 5, 6], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await sleep(1);
      active--;
    });

    expect(peak).toBe(2);
  });

  it('starts nothing new after a failure and rethrows it', async () => {
    const started: string[] = [];
    const finished: string[] = [];

    const error = await runPool(['a', 'b', 'c', 'd'], 2, async (item) => {
      started.push(item);
      if (item === 'a') {
        throw new Error('worker a failed');
      }
      await sleep(5);
      finished.push(item);
    }).catch((e: unknown) => e);

    expect(error).toHaveProperty('message', 'worker a failed');
    expect(started).toEqual(['a', 'b']);
    expect(finished).toEqual(['b']);
  });

  it('returns an empty list for no items', async () => {
    expect(await runPool([], 3, async () => 1)).toEqual([]);
  });
});
