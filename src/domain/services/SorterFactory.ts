import { ISequenceSorter } from '../ports/ISequenceSorter';
import { ISortObserver } from '../ports/ISortObserver';
import { SortAlgorithm } from '../value-objects/SortAlgorithm';
import { BubbleSorter } from './sorters/BubbleSorter';
import { InsertionSorter } from './sorters/InsertionSorter';
import { SelectionSorter } from './sorters/SelectionSorter';

/**
 * Factory for creating sorter instances by algorithm name.
 */
export class SorterFactory {
    /**
     * Creates the sorter for `algorithm`.
     *
     * @param observer - Receives every comparison, swap, shift and pass of the returned sorter
     */
    static create(algorithm: SortAlgorithm, observer?: ISortObserver): ISequenceSorter {
        switch (algorithm) {
            case SortAlgorithm.BUBBLE:
                return new BubbleSorter(observer);
            case SortAlgorithm.SELECTION:
                return new SelectionSorter(observer);
            case SortAlgorithm.INSERTION:
                return new InsertionSorter(observer);
        }
    }
}
