export { SorterFactory } from './SorterFactory';
export { SortMetricsRecorder } from './SortMetricsRecorder';
export { isSorted, isPermutationOf } from './sequenceProperties';
export { BubbleSorter } from './sorters/BubbleSorter';
export { SelectionSorter } from './sorters/SelectionSorter';
export { InsertionSorter } from './sorters/InsertionSorter';
