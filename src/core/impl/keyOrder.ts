import { inspect } from "node:util";

import { queueError } from "../errors.js";
import type { Order, OrderKind } from "../order.js";
import type { Item, SortingKey } from "../types.js";

/**
 * Compares two priority keys with Array.sort semantics.
 *
 * Both keys must be of the same orderable kind (number, string, bigint, boolean,
 * valid Date, or an array of such keys compared element-wise then by length).
 * Anything else throws INCOMPARABLE_KEYS.
 */
export function compareKeys(a: unknown, b: unknown): number {
  if (typeof a === "number" && typeof b === "number") return sign(a < b, a > b);
  if (typeof a === "string" && typeof b === "string") return sign(a < b, a > b);
  if (typeof a === "bigint" && typeof b === "bigint") return sign(a < b, a > b);
  if (typeof a === "boolean" && typeof b === "boolean") return sign(!a && b, a && !b);

  if (a instanceof Date && b instanceof Date) {
    const x = a.getTime();
    const y = b.getTime();
    if (!Number.isNaN(x) && !Number.isNaN(y)) return sign(x < y, x > y);
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    const xs: readonly unknown[] = a;
    const ys: readonly unknown[] = b;
    const n = Math.min(xs.length, ys.length);
    for (let i = 0; i < n; i++) {
      const c = compareKeys(xs[i], ys[i]);
      if (c !== 0) return c;
    }
    return sign(xs.length < ys.length, xs.length > ys.length);
  }

  throw queueError({ code: "INCOMPARABLE_KEYS", detail: `cannot order ${inspect(a)} against ${inspect(b)}` });
}

export function sameValueZero(a: unknown, b: unknown): boolean {
  return a === b || Object.is(a, b);
}

/**
 * Builds the item order for a queue configuration.
 *
 * The comparison direction is picked here, once, so heap operations never branch on it.
 * Reverse mode flips the comparison and leaves stored keys untouched, which lets
 * items be shared between queues that use the same key function.
 */
export function createOrder<T>(key?: SortingKey<T>, reverse = false): Order<T> {
  const kind: OrderKind = key ? (reverse ? "keyedReversed" : "keyed") : reverse ? "reversed" : "natural";

  const toKey: (value: T) => unknown = key ?? ((value) => value);
  const wrap = (value: T): Item<T> => ({ key: toKey(value), value });

  const compare = reverse
    ? (a: Item<T>, b: Item<T>): number => compareKeys(b.key, a.key)
    : (a: Item<T>, b: Item<T>): number => compareKeys(a.key, b.key);

  return {
    kind,
    wrap,
    compare,
    less: (a, b) => compare(a, b) < 0,
    same: (a, b) => sameValueZero(a.value, b.value),
    sort: (items) => Array.from(items).sort(compare),
  };
}

function sign(lt: boolean, gt: boolean): number {
  return lt ? -1 : gt ? 1 : 0;
}
