import { ISortObserver } from '../ports/ISortObserver'
import { SortMetrics } from '../models/SortMetrics'

/**
 * Observer that counts the steps taken by a sorter.
 * One recorder can be reused across sorts by calling reset() in between.
 */
export class SortMetricsRecorder implements ISortObserver {
  private metrics: SortMetrics

  constructor() {
    this.metrics = { comparisons: 0, swaps: 0, shifts: 0, passes: 0 }
  }

  onCompare(_left: number, _right: number): void {
    this.metrics.comparisons++
  }

  onSwap(_i: number, _j: number): void {
    this.metrics.swaps++
  }

  onShift(_from: number, _to: number): void {
    this.metrics.shifts++
  }

  onPassComplete(_pass: number): void {
    this.metrics.passes++
  }

  snapshot(): Readonly<SortMetrics> {
    return Object.freeze({ ...this.metrics })
  }

  reset(): void {
    this.metrics = { comparisons: 0, swaps: 0, shifts: 0, passes: 0 }
  }
}
