import type { Item } from "./types.js";

export type OrderKind = "natural" | "reversed" | "keyed" | "keyedReversed";

/**
 * Total order over heap items for one (key, reverse) configuration.
 *
 * Contract notes:
 * - `compare` follows Array.sort semantics: <0 means a comes first
 * - comparing keys that cannot be ordered throws INCOMPARABLE_KEYS
 * - `same` is value identity (SameValueZero), independent of the key
 */
export interface Order<T> {
  readonly kind: OrderKind;

  wrap(value: T): Item<T>;
  compare(a: Item<T>, b: Item<T>): number;
  less(a: Item<T>, b: Item<T>): boolean;
  same(a: Item<T>, b: Item<T>): boolean;

  /** Returns a sorted copy; the input is left as is. */
  sort(items: Iterable<Item<T>>): Item<T>[];
}
