import { ISequenceSorter } from '../../ports/ISequenceSorter';
import { ISortObserver } from '../../ports/ISortObserver';
import { Comparator, Sequence } from '../../models/Sequence';
import { SortAlgorithm } from '../../value-objects/SortAlgorithm';
import { swap } from './swap';

/**
 * Selection sort.
 * Always n(n-1)/2 comparisons, at most n-1 swaps. Not stable.
 */
export class SelectionSorter implements ISequenceSorter {
    readonly algorithm = SortAlgorithm.SELECTION;

    constructor(private readonly observer?: ISortObserver) { }

    sort<T>(sequence: Sequence<T>, compare: Comparator<T>): void {
        const length = sequence.length;

        for (let i = 0; i < length - 1; i++) {
            let min = i;

            for (let j = i + 1; j < length; j++) {
                this.observer?.onCompare(j, min);
                // Strict: the first of several equal minimums stays selected
                if (compare(sequence[j], sequence[min]) < 0) {
                    min = j;
                }
            }

            if (min !== i) {
                swap(sequence, i, min);
                this.observer?.onSwap(i, min);
            }

            this.observer?.onPassComplete(i + 1);
        }
    }
}
