import { ISequenceSorter } from '../../ports/ISequenceSorter';
import { ISortObserver } from '../../ports/ISortObserver';
import { Comparator, Sequence } from '../../models/Sequence';
import { SortAlgorithm } from '../../value-objects/SortAlgorithm';

/**
 * Insertion sort.
 *
 * Grows a sorted prefix one element at a time: the next element is lifted
 * out, strictly greater prefix elements shift one slot right, and the
 * element drops into the hole. Equal elements never move past each other,
 * so the sort is stable.
 */
export class InsertionSorter implements ISequenceSorter {
    readonly algorithm = SortAlgorithm.INSERTION;

    constructor(private readonly observer?: ISortObserver) { }

    sort<T>(sequence: Sequence<T>, compare: Comparator<T>): void {
        for (let i = 1; i < sequence.length; i++) {
            const current = sequence[i];
            let j = i - 1;

            while (j >= 0 && this.isGreater(sequence[j], current, j, compare)) {
                sequence[j + 1] = sequence[j];
                this.observer?.onShift(j, j + 1);
                j--;
            }

            sequence[j + 1] = current;
            this.observer?.onPassComplete(i);
        }
    }

    // The element being inserted sits in the hole at index + 1
    private isGreater<T>(candidate: T, current: T, index: number, compare: Comparator<T>): boolean {
        this.observer?.onCompare(index, index + 1);
        return compare(candidate, current) > 0;
    }
}
