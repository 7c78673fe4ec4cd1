// Collection helper tests

import { describe, it, expect } from 'vitest';
import { chunk, groupBy, mapWithConcurrency } from '../src/utils/collections';

describe('groupBy', () => {
  it('keeps keys in first-seen order and items in input order', () => {
    const groups = groupBy(['b1', 'a1', 'b2', 'c1', 'a2'], (s) => s[0]);

    expect([...groups.keys()]).toEqual(['b', 'a', 'c']);
    expect(groups.get('b')).toEqual(['b1', 'b2']);
    expect(groups.get('a')).toEqual(['a1', 'a2']);
    expect(groups.get('c')).toEqual(['c1']);
  });

  it('returns an empty map for an empty list', () => {
    expect(groupBy([], (x: number) => x).size).toBe(0);
  });
});

describe('chunk', () => {
  it('splits into consecutive chunks with a short final chunk', () => {
    expect(chunk([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('returns no chunks for an empty list', () => {
    expect(chunk([], 100)).toEqual([]);
  });

  it('rejects a non-positive size', () => {
    expect(() => chunk([1], 0)).toThrow('Chunk size must be a positive integer, got 0');
  });
});

describe('mapWithConcurrency', () => {
  it('returns results in input order even when later items finish first', async () => {
    const delays = [30, 5, 15, 1];
    const results = await mapWithConcurrency(delays, 2, async (ms, i) => {
      await new Promise((resolve) => setTimeout(resolve, ms));
      return `${i}:${ms}`;
    });

    expect(results).toEqual(['0:30', '1:5', '2:15', '3:1']);
  });

  it('never runs more than the limit at once', async () => {
    let active = 0;
    let peak = 0;
    await mapWithConcurrency([1, 2, 3, 4, 5], 2, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
    });

    expect(peak).toBe(2);
  });
});
