import type { Order } from "../order.js";
import type { Item } from "../types.js";

interface Pairing<T> {
  /** left items that found a partner on the right */
  matched: Item<T>[];
  /** left items left over once every right partner was used */
  unmatched: Item<T>[];
}

/**
 * Multiset intersection of two item sequences sorted by `order`.
 * Emits left items, in order, each paired with a distinct identical right item.
 */
export function intersectSorted<T>(left: readonly Item<T>[], right: readonly Item<T>[], order: Order<T>): Item<T>[] {
  return pairSorted(left, right, order).matched;
}

/** Multiset subtraction: left items with no remaining identical item on the right. */
export function subtractSorted<T>(left: readonly Item<T>[], right: readonly Item<T>[], order: Order<T>): Item<T>[] {
  return pairSorted(left, right, order).unmatched;
}

/**
 * Single merge pass over both sequences.
 *
 * Items only pair within a run of tied keys, and inside a run by value identity, so
 * values that merely share a priority never match each other. Map keys compare with
 * SameValueZero, the same identity as Order.same, so each run is paired in linear time.
 */
function pairSorted<T>(left: readonly Item<T>[], right: readonly Item<T>[], order: Order<T>): Pairing<T> {
  const matched: Item<T>[] = [];
  const unmatched: Item<T>[] = [];

  let i = 0;
  let j = 0;
  while (i < left.length) {
    const lead = left[i]!;
    while (j < right.length && order.less(right[j]!, lead)) j++;

    const leftEnd = runEnd(left, i, lead, order);
    const rightEnd = runEnd(right, j, lead, order);
    const pool = countValues(right, j, rightEnd);

    for (let k = i; k < leftEnd; k++) {
      const item = left[k]!;
      const n = pool.get(item.value) ?? 0;
      if (n > 0) {
        pool.set(item.value, n - 1);
        matched.push(item);
      } else {
        unmatched.push(item);
      }
    }

    i = leftEnd;
    j = rightEnd;
  }

  return { matched, unmatched };
}

function runEnd<T>(items: readonly Item<T>[], start: number, lead: Item<T>, order: Order<T>): number {
  let k = start;
  while (k < items.length && order.compare(items[k]!, lead) === 0) k++;
  return k;
}

/** Occurrences of each value among `items[start..end)`. */
function countValues<T>(items: readonly Item<T>[], start: number, end: number): Map<T, number> {
  const counts = new Map<T, number>();
  for (let k = start; k < end; k++) {
    const value = items[k]!.value;
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}
