/** Shared core types used by module contracts. */

/** Keys the ordering adapter knows how to compare. Arrays compare lexicographically. */
export type Orderable = number | string | bigint | boolean | Date | readonly Orderable[];

/** Derives the priority of a value. Must be pure: equal values map to equal keys. */
export type SortingKey<T> = (value: T) => Orderable;

export interface QueueOptions<T> {
  /** priority of a value; the value itself is compared when omitted */
  key?: SortingKey<T>;
  /** surface the highest priority first instead of the lowest */
  reverse?: boolean;
}

/** The unit stored in the heap: a value and the priority key derived from it. */
export interface Item<T> {
  /**
   * The value for natural orders, `key(value)` otherwise.
   * Typed loosely because unkeyed values are only checked for orderability when compared.
   */
  readonly key: unknown;
  readonly value: T;
}
