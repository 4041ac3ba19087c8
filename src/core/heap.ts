/**
 * Binary min-heap contract backing the priority queue.
 * The minimum is defined by the heap's order; see Order.
 */
export interface Heap<T> {
  size(): number;
  /** Throws EMPTY_QUEUE when the heap is empty. */
  peek(): T;
  push(item: T): void;
  /** Throws EMPTY_QUEUE when the heap is empty. */
  pop(): T;
  /** Removes one item identical to `item`; throws NOT_FOUND when there is none. */
  remove(item: T): void;
  clear(): void;
  some(predicate: (item: T) => boolean): boolean;
  /** A copy of the items in heap order; changing it leaves the heap alone. */
  toArray(): T[];
}
