import type { Order } from "../../order.js";
import type { Item } from "../../types.js";

/** Runs `fn` and returns what it threw; fails the test when nothing was thrown. */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected function to throw");
}

/** Deterministic small integers (0..9) so that samples overlap and repeat. `seed` must be positive. */
export function sampleValues(seed: number, size: number): number[] {
  let s = seed;
  const out: number[] = [];
  for (let i = 0; i < size; i++) {
    s = (s * 16807) % 2147483647;
    out.push(s % 10);
  }
  return out;
}

export function sortedNumbers(values: Iterable<number>): number[] {
  return Array.from(values).sort((a, b) => a - b);
}

export function isHeapOrdered<T>(items: Item<T>[], order: Order<T>): boolean {
  for (let i = 1; i < items.length; i++) {
    if (order.less(items[i]!, items[(i - 1) >> 1]!)) return false;
  }
  return true;
}
