import { describe, it, expect } from 'vitest';
import { pLimit } from '../concurrency.js';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('pLimit', () => {
  it('never runs more than `concurrency` thunks at once', async () => {
    const limit = pLimit(2);
    let active = 0;
    let peak = 0;
    const started: number[] = [];

    const results = await Promise.all(
      [1, 2, 3, 4, 5].map((n) =>
        limit(async () => {
          started.push(n);
          active++;
          peak = Math.max(peak, active);
          await tick();
          active--;
          return n * 10;
        })
      )
    );

    expect(results).toEqual([10, 20, 30, 40, 50]);
    expect(peak).toBe(2);
    expect(started).toEqual([1, 2, 3, 4, 5]);
  });

  it('keeps going after a rejected thunk', async () => {
    const limit = pLimit(1);
    const first = limit(async () => {
      throw new Error('first failed');
    });
    const second = limit(async () => 'second');

    await expect(first).rejects.toThrow('first failed');
    await expect(second).resolves.toBe('second');
  });

  it('rejects invalid concurrency', () => {
    expect(() => pLimit(0)).toThrow(TypeError);
    expect(() => pLimit(1.5)).toThrow(TypeError);
  });
});
