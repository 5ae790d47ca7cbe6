/**
 * Tests for the bounded concurrent map
 */

import { describe, it, expect } from 'vitest';
import { mapBounded } from './fan-out.js';
import { NotFoundError } from './errors.js';

function delay(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

describe('mapBounded', () => {
  it('should keep input order regardless of completion order', async () => {
    const results = await mapBounded([30, 5, 15, 1], 4, async (ms, index) => {
      await delay(ms);
      return `${index}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('should never run more than the limit at once', async () => {
    let running = 0;
    let peak = 0;

    await mapBounded(Array.from({ length: 10 }, (_, index) => index), 3, async () => {
      running++;
      peak = Math.max(peak, running);
      await delay(2);
      running--;
    });

    expect(peak).toBe(3);
  });

  it('should return an empty list for no items', async () => {
    expect(await mapBounded([], 2, async () => 1)).toEqual([]);
  });

  it('should reject with the first failing task error and stop later batches', async () => {
    const started: number[] = [];

    const run = mapBounded([1, 2, 3, 4], 2, async item => {
      started.push(item);
      if (item >= 2) throw new NotFoundError('Schema', `s${item}`);
      return item;
    });

    await expect(run).rejects.toThrow(new NotFoundError('Schema', 's2'));
    expect(started).toEqual([1, 2]);
  });

  it('should reject invalid limits', async () => {
    await expect(mapBounded([1], 0, async item => item)).rejects.toThrow(RangeError);
    await expect(mapBounded([1], 1.5, async item => item)).rejects.toThrow(
      'Concurrency limit must be a positive integer, got 1.5'
    );
  });
});
