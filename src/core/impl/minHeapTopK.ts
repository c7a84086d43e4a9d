import type { Heap, TopKSelector } from "../heap.js";

export class ArrayHeap<T> implements Heap<T> {
  private readonly data: T[] = [];

  constructor(private readonly before: (a: T, b: T) => boolean) {}

  size(): number {
    return this.data.length;
  }

  peek(): T | undefined {
    return this.data[0];
  }

  push(item: T): void {
    this.data.push(item);
    this.siftUp(this.data.length - 1);
  }

  replaceTop(item: T): T | undefined {
    const top = this.data[0];
    if (top === undefined) {
      this.push(item);
      return undefined;
    }
    this.data[0] = item;
    this.siftDown(0);
    return top;
  }

  toArray(): T[] {
    return this.data.slice();
  }

  private siftUp(i: number): void {
    const a = this.data;
    const item = a[i];
    if (item === undefined) return;

    while (i > 0) {
      const p = (i - 1) >> 1;
      const parent = a[p];
      if (parent === undefined || !this.before(item, parent)) break;
      a[i] = parent;
      i = p;
    }
    a[i] = item;
  }

  private siftDown(i: number): void {
    const a = this.data;
    const n = a.length;
    const item = a[i];
    if (item === undefined) return;

    for (;;) {
      let child = i * 2 + 1;
      if (child >= n) break;
      const left = a[child];
      const right = a[child + 1];
      let best = left;
      if (right !== undefined && left !== undefined && this.before(right, left)) {
        child++;
        best = right;
      }
      if (best === undefined || !this.before(best, item)) break;
      a[i] = best;
      i = child;
    }
    a[i] = item;
  }
}

/**
 * Keeps the best K items seen so far in a heap rooted at the worst of them,
 * so each further item costs one comparison unless it displaces the root.
 */
export class MinHeapTopKSelector<T> implements TopKSelector<T> {
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[] {
    if (k <= 0) return [];

    // root = item ordered last by comparator
    const heap = new ArrayHeap<T>((a, b) => comparator(a, b) > 0);

    for (const item of items) {
      if (heap.size() < k) {
        heap.push(item);
        continue;
      }
      const worst = heap.peek();
      if (worst !== undefined && comparator(item, worst) < 0) heap.replaceTop(item);
    }

    return heap.toArray().sort(comparator);
  }
}
