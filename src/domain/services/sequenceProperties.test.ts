import { describe, it, expect } from 'vitest'
import { isPermutationOf, isSorted } from './sequenceProperties'
import { naturalOrder } from '../models/Sequence'

describe('sequenceProperties', () => {
  describe('isSorted()', () => {
    it('should accept non-decreasing sequences', () => {
      expect(isSorted([1, 1, 4, 5, 14], naturalOrder)).toBe(true)
    })

    it('should reject a single descending pair', () => {
      expect(isSorted([1, 4, 3, 5], naturalOrder)).toBe(false)
    })

    it('should accept empty and single-element sequences', () => {
      const empty: number[] = []

      expect(isSorted(empty, naturalOrder)).toBe(true)
      expect(isSorted([42], naturalOrder)).toBe(true)
    })

    it('should use the given comparator', () => {
      const descending = (a: number, b: number) => b - a

      expect(isSorted([3, 2, 1], descending)).toBe(true)
      expect(isSorted([1, 2, 3], descending)).toBe(false)
    })
  })

  describe('isPermutationOf()', () => {
    it('should accept a reordering with the same duplicates', () => {
      expect(isPermutationOf([1, 2, 2], [2, 1, 2])).toBe(true)
    })

    it('should reject a different duplicate count', () => {
      expect(isPermutationOf([1, 1, 2], [1, 2, 2])).toBe(false)
    })

    it('should reject sequences of different length', () => {
      expect(isPermutationOf([1, 2], [1, 2, 2])).toBe(false)
    })

    it('should reject a changed value', () => {
      expect(isPermutationOf([1, 2, 4], [1, 2, 3])).toBe(false)
    })

    it('should accept two empty sequences', () => {
      const empty: number[] = []

      expect(isPermutationOf(empty, [])).toBe(true)
    })
  })
})
