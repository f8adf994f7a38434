import { describe, it, expect } from 'vitest';
import { SorterFactory } from './SorterFactory';
import { SortMetricsRecorder } from './SortMetricsRecorder';
import { BubbleSorter } from './sorters/BubbleSorter';
import { SelectionSorter } from './sorters/SelectionSorter';
import { InsertionSorter } from './sorters/InsertionSorter';
import { SortAlgorithm } from '../value-objects/SortAlgorithm';
import { naturalOrder } from '../models/Sequence';

describe('SorterFactory', () => {
    describe('create()', () => {
        it('should create a BubbleSorter for bubble', () => {
            const sorter = SorterFactory.create(SortAlgorithm.BUBBLE);

            expect(sorter).toBeInstanceOf(BubbleSorter);
            expect(sorter.algorithm).toBe(SortAlgorithm.BUBBLE);
        });

        it('should create a SelectionSorter for selection', () => {
            const sorter = SorterFactory.create(SortAlgorithm.SELECTION);

            expect(sorter).toBeInstanceOf(SelectionSorter);
            expect(sorter.algorithm).toBe(SortAlgorithm.SELECTION);
        });

        it('should create an InsertionSorter for insertion', () => {
            const sorter = SorterFactory.create(SortAlgorithm.INSERTION);

            expect(sorter).toBeInstanceOf(InsertionSorter);
            expect(sorter.algorithm).toBe(SortAlgorithm.INSERTION);
        });

        it('should wire the observer into the created sorter', () => {
            const recorder = new SortMetricsRecorder();
            const sorter = SorterFactory.create(SortAlgorithm.SELECTION, recorder);

            sorter.sort([2, 1], naturalOrder);

            expect(recorder.snapshot()).toEqual({ comparisons: 1, swaps: 1, shifts: 0, passes: 1 });
        });

        it('should return a new instance on every call', () => {
            const first = SorterFactory.create(SortAlgorithm.BUBBLE);
            const second = SorterFactory.create(SortAlgorithm.BUBBLE);

            expect(first).not.toBe(second);
        });
    });
});
