import { Comparator, Sequence } from '../models/Sequence';
import { SortAlgorithm } from '../value-objects/SortAlgorithm';

/**
 * In-place comparison sort.
 * Implementations rearrange the caller's sequence into non-decreasing order
 * according to `compare`, without adding, removing or altering elements.
 */
export interface ISequenceSorter {
    readonly algorithm: SortAlgorithm;

    /**
     * Sorts `sequence` in place.
     * Sequences of length 0 or 1 are returned untouched.
     *
     * @param sequence - Sequence to rearrange, owned by the caller
     * @param compare - Total order over the elements
     */
    sort<T>(sequence: Sequence<T>, compare: Comparator<T>): void;
}
