import { ISequenceSorter } from '../../ports/ISequenceSorter';
import { ISortObserver } from '../../ports/ISortObserver';
import { Comparator, Sequence } from '../../models/Sequence';
import { SortAlgorithm } from '../../value-objects/SortAlgorithm';
import { swap } from './swap';

/**
 * Bubble sort with early exit.
 *
 * Each pass walks the unsorted range swapping adjacent out-of-order pairs,
 * which leaves the pass's largest element at the end of the range. The range
 * then shrinks by one. A pass without swaps proves the rest is sorted.
 */
export class BubbleSorter implements ISequenceSorter {
    readonly algorithm = SortAlgorithm.BUBBLE;

    constructor(private readonly observer?: ISortObserver) { }

    sort<T>(sequence: Sequence<T>, compare: Comparator<T>): void {
        let end = sequence.length - 1;
        let pass = 0;
        let swapped = true;

        while (swapped && end > 0) {
            swapped = false;

            for (let i = 0; i < end; i++) {
                this.observer?.onCompare(i, i + 1);
                if (compare(sequence[i], sequence[i + 1]) > 0) {
                    swap(sequence, i, i + 1);
                    this.observer?.onSwap(i, i + 1);
                    swapped = true;
                }
            }

            this.observer?.onPassComplete(++pass);
            end--;
        }
    }
}
