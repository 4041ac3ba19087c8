import { inspect } from "node:util";

import { isQueueError } from "../errors.js";
import type { Order } from "../order.js";
import type { Item, QueueOptions, SortingKey } from "../types.js";
import { ArrayHeap } from "./arrayHeap.js";
import { createOrder, sameValueZero } from "./keyOrder.js";
import { intersectSorted, subtractSorted } from "./sortedMerge.js";

/**
 * Mutable priority queue with constant time access to its front value
 * (the smallest by default, the largest with `reverse`).
 *
 * Besides queue operations it behaves as a multiset: membership, inclusion and the
 * usual set algebra respect multiplicity and compare values with SameValueZero.
 * Binary operations produce a new queue configured like the left operand.
 */
export class PriorityQueue<T> implements Iterable<T> {
  private readonly sortingKey?: SortingKey<T>;
  private readonly descending: boolean;
  private readonly order: Order<T>;
  private heap: ArrayHeap<T>;
  /** sorted snapshot of the heap, dropped on every mutation and never mutated itself */
  private sorted?: readonly Item<T>[];

  /** Complexity: O(n) for n initial values. */
  constructor(values: Iterable<T> = [], options?: QueueOptions<T>) {
    this.sortingKey = options?.key;
    this.descending = options?.reverse ?? false;
    this.order = createOrder(this.sortingKey, this.descending);

    const items: Item<T>[] = [];
    for (const value of values) items.push(this.order.wrap(value));
    this.heap = new ArrayHeap(this.order, items);
  }

  get key(): SortingKey<T> | undefined {
    return this.sortingKey;
  }

  get reverse(): boolean {
    return this.descending;
  }

  get length(): number {
    return this.heap.size();
  }

  isEmpty(): boolean {
    return this.heap.size() === 0;
  }

  /** Complexity: O(log n). */
  add(value: T): void {
    this.heap.push(this.order.wrap(value));
    this.sorted = undefined;
  }

  push(value: T): void {
    this.add(value);
  }

  /**
   * Removes one occurrence of `value`.
   * Throws NOT_FOUND when absent. Complexity: O(n).
   */
  remove(value: T): void {
    this.heap.remove(this.order.wrap(value));
    this.sorted = undefined;
  }

  /** Like remove, but an absent value is a no-op. */
  discard(value: T): void {
    try {
      this.remove(value);
    } catch (err) {
      if (!isQueueError(err, "NOT_FOUND")) throw err;
    }
  }

  /** Front value without removing it. Throws EMPTY_QUEUE when empty. */
  peek(): T {
    return this.heap.peek().value;
  }

  /** Removes and returns the front value. Throws EMPTY_QUEUE when empty. */
  pop(): T {
    const item = this.heap.pop();
    this.sorted = undefined;
    return item.value;
  }

  clear(): void {
    this.heap.clear();
    this.sorted = undefined;
  }

  /** Linear scan; priority is the only indexed dimension. */
  contains(value: T): boolean {
    return this.heap.some((item) => sameValueZero(item.value, value));
  }

  /** Values in priority order. Complexity: O(n log n) after a mutation, O(n) otherwise. */
  values(): T[] {
    return this.sortedItems().map((item) => item.value);
  }

  *[Symbol.iterator](): Generator<T> {
    for (const item of this.sortedItems()) yield item.value;
  }

  copy(): PriorityQueue<T> {
    return this.derive(this.heap.toArray());
  }

  toString(): string {
    const keyName = this.sortingKey ? this.sortingKey.name || "anonymous" : "none";
    const parts = this.values().map((value) => inspect(value));
    parts.push(`key=${keyName}`, `reverse=${this.descending}`);
    return `PriorityQueue(${parts.join(", ")})`;
  }

  equals(other: PriorityQueue<T>): boolean {
    return this === other || (this.length === other.length && this.isSubsetOf(other));
  }

  /** `this <= other`: every value here has its own occurrence in `other`. */
  isSubsetOf(other: PriorityQueue<T>): boolean {
    if (this.length > other.length) return false;
    return subtractSorted(this.sortedItems(), this.alignedItems(other), this.order).length === 0;
  }

  isProperSubsetOf(other: PriorityQueue<T>): boolean {
    return this.length < other.length && this.isSubsetOf(other);
  }

  isSupersetOf(other: PriorityQueue<T>): boolean {
    if (this.length < other.length) return false;
    return subtractSorted(this.alignedItems(other), this.sortedItems(), this.order).length === 0;
  }

  isProperSupersetOf(other: PriorityQueue<T>): boolean {
    return this.length > other.length && this.isSupersetOf(other);
  }

  isDisjointFrom(other: PriorityQueue<T>): boolean {
    if (this.isEmpty() || other.isEmpty()) return true;
    return intersectSorted(this.sortedItems(), this.alignedItems(other), this.order).length === 0;
  }

  intersection(other: PriorityQueue<T>): PriorityQueue<T> {
    return this.derive(this.intersectionItems(other));
  }

  union(other: PriorityQueue<T>): PriorityQueue<T> {
    return this.derive(this.unionItems(other));
  }

  difference(other: PriorityQueue<T>): PriorityQueue<T> {
    return this.derive(this.differenceItems(other));
  }

  symmetricDifference(other: PriorityQueue<T>): PriorityQueue<T> {
    return this.derive(this.symmetricDifferenceItems(other));
  }

  intersectionUpdate(other: PriorityQueue<T>): this {
    return this.replace(this.intersectionItems(other));
  }

  unionUpdate(other: PriorityQueue<T>): this {
    return this.replace(this.unionItems(other));
  }

  differenceUpdate(other: PriorityQueue<T>): this {
    return this.replace(this.differenceItems(other));
  }

  symmetricDifferenceUpdate(other: PriorityQueue<T>): this {
    return this.replace(this.symmetricDifferenceItems(other));
  }

  private intersectionItems(other: PriorityQueue<T>): Item<T>[] {
    return intersectSorted(this.sortedItems(), this.alignedItems(other), this.order);
  }

  private unionItems(other: PriorityQueue<T>): Item<T>[] {
    return [...this.heap.toArray(), ...this.rewrap(other)];
  }

  private differenceItems(other: PriorityQueue<T>): Item<T>[] {
    return subtractSorted(this.sortedItems(), this.alignedItems(other), this.order);
  }

  private symmetricDifferenceItems(other: PriorityQueue<T>): Item<T>[] {
    if (other.isEmpty()) return this.heap.toArray();
    if (this.isEmpty()) return this.rewrap(other);

    const mine = this.sortedItems();
    const theirs = this.alignedItems(other);
    return [...subtractSorted(mine, theirs, this.order), ...subtractSorted(theirs, mine, this.order)];
  }

  private sortedItems(): readonly Item<T>[] {
    if (!this.sorted) this.sorted = this.order.sort(this.heap.toArray());
    return this.sorted;
  }

  private sharesKey(other: PriorityQueue<T>): boolean {
    return other.sortingKey === this.sortingKey;
  }

  /** `other`'s items keyed for this queue. Items are immutable, so same-key items are reused as is. */
  private rewrap(other: PriorityQueue<T>): Item<T>[] {
    const items = other.heap.toArray();
    return this.sharesKey(other) ? items : items.map((item) => this.order.wrap(item.value));
  }

  /** `other`'s items sorted by this queue's order. */
  private alignedItems(other: PriorityQueue<T>): readonly Item<T>[] {
    if (!this.sharesKey(other)) return this.order.sort(this.rewrap(other));

    const items = other.sortedItems();
    return other.descending === this.descending ? items : [...items].reverse();
  }

  private derive(items: Item<T>[]): PriorityQueue<T> {
    const result = new PriorityQueue<T>([], { key: this.sortingKey, reverse: this.descending });
    return result.replace(items);
  }

  /** Builds the new heap first, then swaps it in with a single assignment. */
  private replace(items: Item<T>[]): this {
    this.heap = new ArrayHeap(this.order, items);
    this.sorted = undefined;
    return this;
  }
}
