/**
 * MinHeap Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { MinHeap } from '@/lib/min-heap.js';

function drain(heap: MinHeap<number>): number[] {
  const out: number[] = [];
  for (let next = heap.pop(); next !== undefined; next = heap.pop()) {
    out.push(next);
  }
  return out;
}

describe('MinHeap', () => {
  it('should pop items in ascending order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [5, 1, 4, 2, 3, 1]) {
      heap.push(n);
    }

    expect(heap.size).toBe(6);
    expect(heap.peek()).toBe(1);
    expect(drain(heap)).toEqual([1, 1, 2, 3, 4, 5]);
    expect(heap.size).toBe(0);
  });

  it('should return undefined when empty', () => {
    const heap = new MinHeap<number>((a, b) => a - b);

    expect(heap.peek()).toBeUndefined();
    expect(heap.pop()).toBeUndefined();
  });

  it('should remove matching items and keep heap order', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    for (const n of [6, 3, 8, 1, 4, 7, 2, 5]) {
      heap.push(n);
    }

    expect(heap.removeWhere((n) => n % 2 === 0)).toBe(4);
    expect(drain(heap)).toEqual([1, 3, 5, 7]);
  });

  it('should order by the comparator', () => {
    const heap = new MinHeap<{ at: number; label: string }>(
      (a, b) => a.at - b.at
    );
    heap.push({ at: 30, label: 'late' });
    heap.push({ at: 10, label: 'early' });
    heap.push({ at: 20, label: 'middle' });

    expect(heap.pop()?.label).toBe('early');
    expect(heap.pop()?.label).toBe('middle');
    expect(heap.pop()?.label).toBe('late');
  });

  it('should empty on clear', () => {
    const heap = new MinHeap<number>((a, b) => a - b);
    heap.push(1);
    heap.push(2);
    heap.clear();

    expect(heap.size).toBe(0);
    expect(heap.pop()).toBeUndefined();
  });
});
