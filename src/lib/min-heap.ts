/**
 * Binary min-heap ordered by a comparator
 */

export class MinHeap<T> {
  private readonly items: T[] = [];

  constructor(private readonly compare: (a: T, b: T) => number) {}

  get size(): number {
    return this.items.length;
  }

  peek(): T | undefined {
    return this.items[0];
  }

  push(item: T): void {
    this.items.push(item);
    this.siftUp(this.items.length - 1);
  }

  pop(): T | undefined {
    const top = this.items[0];
    const last = this.items.pop();
    if (top === undefined || last === undefined) {
      return undefined;
    }
    if (this.items.length > 0) {
      this.items[0] = last;
      this.siftDown(0);
    }
    return top;
  }

  /**
   * Remove every item matching `predicate`. Returns how many were removed.
   */
  removeWhere(predicate: (item: T) => boolean): number {
    const kept = this.items.filter((item) => !predicate(item));
    const removed = this.items.length - kept.length;
    if (removed > 0) {
      this.items.length = 0;
      for (const item of kept) {
        this.push(item);
      }
    }
    return removed;
  }

  clear(): void {
    this.items.length = 0;
  }

  private siftUp(index: number): void {
    let child = index;
    while (child > 0) {
      const parent = (child - 1) >> 1;
      if (!this.swapIfLess(child, parent)) {
        return;
      }
      child = parent;
    }
  }

  private siftDown(index: number): void {
    let parent = index;
    for (;;) {
      const left = parent * 2 + 1;
      const right = left + 1;
      let smallest = parent;
      if (this.less(left, smallest)) {
        smallest = left;
      }
      if (this.less(right, smallest)) {
        smallest = right;
      }
      if (smallest === parent) {
        return;
      }
      this.swapIfLess(smallest, parent);
      parent = smallest;
    }
  }

  private less(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined) {
      return false;
    }
    return this.compare(a, b) < 0;
  }

  private swapIfLess(i: number, j: number): boolean {
    const a = this.items[i];
    const b = this.items[j];
    if (a === undefined || b === undefined || this.compare(a, b) >= 0) {
      return false;
    }
    this.items[i] = b;
    this.items[j] = a;
    return true;
  }
}
