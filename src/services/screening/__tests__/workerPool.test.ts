import { describe, it, expect, vi } from 'vitest';
import { PoolCompletion, poolSize, runPool } from '../workerPool';

const tick = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 1));

describe('runPool', () => {
  it('never exceeds the concurrency limit', async () => {
    let inFlight = 0;
    let peak = 0;
    const items = Array.from({ length: 10 }, (_, i) => i);

    await runPool(
      items,
      3,
      async (item) => {
        inFlight++;
        peak = Math.max(peak, inFlight);
        await tick();
        inFlight--;
        return item * 2;
      },
      () => undefined,
    );

    expect(peak).toBe(3);
    expect(inFlight).toBe(0);
  });

  it('hands every completion to the collector with a running count', async () => {
    const settledCounts: number[] = [];
    const values: number[] = [];

    await runPool(
      [1, 2, 3, 4],
      2,
      async (item) => item * 10,
      (completion, settled) => {
        settledCounts.push(settled);
        if (completion.ok) {
          values.push(completion.value);
        }
      },
    );

    expect(settledCounts).toEqual([1, 2, 3, 4]);
    expect(values.sort((a, b) => a - b)).toEqual([10, 20, 30, 40]);
  });

  it('reports task failures instead of rejecting', async () => {
    const completions: PoolCompletion<string, string>[] = [];

    await runPool(
      ['a', 'b', 'c'],
      2,
      async (item) => {
        if (item === 'b') {
          throw new Error('lookup failed');
        }
        return item.toUpperCase();
      },
      (completion) => completions.push(completion),
    );

    const failed = completions.filter((completion) => !completion.ok);
    expect(completions).toHaveLength(3);
    expect(failed).toHaveLength(1);
    expect(failed[0].item).toBe('b');
  });

  it('does nothing for an empty list', async () => {
    const collect = vi.fn();
    await runPool([], 4, async () => 1, collect);
    expect(collect).not.toHaveBeenCalled();
  });
});

describe('poolSize', () => {
  it('is bounded by both the worker cap and the item count', () => {
    expect(poolSize(16, 5)).toBe(5);
    expect(poolSize(16, 100)).toBe(16);
    expect(poolSize(16, 0)).toBe(1);
  });
});
