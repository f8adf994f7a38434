/**
 * Counters collected while a single sort call runs.
 */
export interface SortMetrics {
    /** Calls made to the comparator */
    comparisons: number;

    /** Pairs of elements exchanged */
    swaps: number;

    /** Single-slot moves made while opening a hole (insertion only) */
    shifts: number;

    /**
     * Outer-loop iterations. One per scan for bubble sort,
     * one per placed position for selection sort,
     * one per inserted element for insertion sort.
     */
    passes: number;
}
