/**
 * Receives the steps a sorter takes, in the order it takes them.
 * Indices refer to positions in the sequence being sorted.
 */
export interface ISortObserver {
    onCompare(left: number, right: number): void;

    onSwap(i: number, j: number): void;

    /** An element moved one slot, from `from` to `to`. */
    onShift(from: number, to: number): void;

    /** @param pass - 1-based number of the outer iteration that just finished */
    onPassComplete(pass: number): void;
}
