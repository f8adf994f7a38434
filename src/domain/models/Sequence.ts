/**
 * A mutable, length-carrying sequence owned by the caller.
 * Sorters rearrange it in place and never keep a reference to it.
 */
export type Sequence<T> = T[]

/**
 * Element types whose built-in `<` and `>` form a total order.
 */
export type Ordered = number | string | bigint

/**
 * Returns a negative number when `a` sorts before `b`, zero when they are
 * equal and a positive number when `a` sorts after `b`.
 * Must describe a total order over the compared elements.
 */
export type Comparator<T> = (a: T, b: T) => number

export function naturalOrder<T extends Ordered>(a: T, b: T): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
