export { SortAlgorithm, SORT_ALGORITHMS } from './domain/value-objects/SortAlgorithm'
export { naturalOrder } from './domain/models/Sequence'
export type { Comparator, Ordered, Sequence } from './domain/models/Sequence'
export type { SortMetrics } from './domain/models/SortMetrics'
export type { ISequenceSorter } from './domain/ports/ISequenceSorter'
export type { ISortObserver } from './domain/ports/ISortObserver'
export {
  BubbleSorter,
  SelectionSorter,
  InsertionSorter,
  SorterFactory,
  SortMetricsRecorder,
  isSorted,
  isPermutationOf,
} from './domain/services'
export { formatSequence } from './application/presenters/formatSequence'
export { SortSequenceUseCase } from './application/usecases/sortSequenceUseCase'
export type { SortReport } from './application/usecases/sortSequenceUseCase'
export { SAMPLE_SEQUENCE, DEFAULT_SORT_CONFIG, loadSortConfig } from './config'
export type { SortConfig } from './config'
