import { inspect } from "node:util";

import { queueError } from "../errors.js";
import type { Heap } from "../heap.js";
import type { Order } from "../order.js";
import type { Item } from "../types.js";

/**
 * Array-backed binary min-heap of queue items.
 *
 * Every sift first walks the comparisons to find where the moving item lands and only then
 * shifts elements, so a comparison that throws leaves the array untouched.
 */
export class ArrayHeap<T> implements Heap<Item<T>> {
  private data: Item<T>[];

  /** Copies `items` and heapifies the copy in O(n). */
  constructor(private readonly order: Order<T>, items: Iterable<Item<T>> = []) {
    this.data = heapify(Array.from(items), order);
  }

  size(): number {
    return this.data.length;
  }

  peek(): Item<T> {
    const top = this.data[0];
    if (top === undefined) throw emptyQueue();
    return top;
  }

  push(item: Item<T>): void {
    const a = this.data;
    const slot = ascend(a, this.order, item, a.length);

    a.push(item);
    let i = a.length - 1;
    while (i > slot) {
      const p = (i - 1) >> 1;
      a[i] = a[p]!;
      i = p;
    }
    a[slot] = item;
  }

  pop(): Item<T> {
    const a = this.data;
    const top = a[0];
    if (top === undefined) throw emptyQueue();

    const last = a[a.length - 1]!;
    const n = a.length - 1;
    const path = descend(a, this.order, last, 0, n);

    a.pop();
    if (n > 0) settle(a, path, 0, last);
    return top;
  }

  remove(item: Item<T>): void {
    const idx = this.data.findIndex((x) => this.order.same(x, item));
    if (idx < 0) {
      throw queueError({ code: "NOT_FOUND", detail: `${inspect(item.value)} is not in priority queue` });
    }

    // heapify a copy; the live array is only replaced once that succeeds
    const rest = this.data.filter((_, i) => i !== idx);
    this.data = heapify(rest, this.order);
  }

  clear(): void {
    this.data = [];
  }

  some(predicate: (item: Item<T>) => boolean): boolean {
    return this.data.some(predicate);
  }

  toArray(): Item<T>[] {
    return Array.from(this.data);
  }
}

/** Reorders `a` in place into heap order and returns it. */
export function heapify<T>(a: Item<T>[], order: Order<T>): Item<T>[] {
  for (let i = (a.length >> 1) - 1; i >= 0; i--) {
    const v = a[i]!;
    settle(a, descend(a, order, v, i, a.length), i, v);
  }
  return a;
}

/** Slot that `item`, placed at index `from`, would rise to. Reads only. */
function ascend<T>(a: Item<T>[], order: Order<T>, item: Item<T>, from: number): number {
  let i = from;
  while (i > 0) {
    const p = (i - 1) >> 1;
    if (!order.less(item, a[p]!)) break;
    i = p;
  }
  return i;
}

/**
 * Children that move up when `item` sinks from index `from` within the first `n` slots.
 * Reads only; the last entry (if any) is where `item` ends up.
 */
function descend<T>(a: Item<T>[], order: Order<T>, item: Item<T>, from: number, n: number): number[] {
  const path: number[] = [];
  let i = from;

  while (true) {
    const l = i * 2 + 1;
    if (l >= n) return path;
    const r = l + 1;
    const c = r < n && order.less(a[r]!, a[l]!) ? r : l;
    if (!order.less(a[c]!, item)) return path;
    path.push(c);
    i = c;
  }
}

function settle<T>(a: Item<T>[], path: number[], from: number, item: Item<T>): void {
  let hole = from;
  for (const c of path) {
    a[hole] = a[c]!;
    hole = c;
  }
  a[hole] = item;
}

function emptyQueue() {
  return queueError({ code: "EMPTY_QUEUE", detail: "priority queue is empty" });
}
