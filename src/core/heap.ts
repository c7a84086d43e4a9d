/**
 * Array-backed binary heap ordered by `before(a, b)`: the root is the item
 * no other item comes before.
 */
export interface Heap<T> {
  size(): number;
  peek(): T | undefined;
  push(item: T): void;
  /** Swaps the root for `item` in one sift; returns the old root. */
  replaceTop(item: T): T | undefined;
  /** Heap contents in storage order. */
  toArray(): T[];
}

export interface TopKSelector<T> {
  /**
   * Returns the first K items of `items` as ordered by `comparator`.
   * Comparator behaves like Array.sort: <0 means a before b.
   */
  topK(items: Iterable<T>, k: number, comparator: (a: T, b: T) => number): T[];
}
