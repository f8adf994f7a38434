import { Comparator, Sequence } from '../models/Sequence'

/**
 * True when every adjacent pair is in non-decreasing order.
 */
export function isSorted<T>(sequence: Sequence<T>, compare: Comparator<T>): boolean {
  for (let i = 0; i < sequence.length - 1; i++) {
    if (compare(sequence[i], sequence[i + 1]) > 0) {
      return false
    }
  }
  return true
}

/**
 * True when both sequences hold the same multiset of values.
 * Values are matched by identity (SameValueZero), not by a comparator.
 */
export function isPermutationOf<T>(candidate: Sequence<T>, original: Sequence<T>): boolean {
  if (candidate.length !== original.length) {
    return false
  }

  const counts = new Map<T, number>()
  for (const value of original) {
    counts.set(value, (counts.get(value) ?? 0) + 1)
  }

  for (const value of candidate) {
    const remaining = counts.get(value) ?? 0
    if (remaining === 0) {
      return false
    }
    counts.set(value, remaining - 1)
  }

  return true
}
