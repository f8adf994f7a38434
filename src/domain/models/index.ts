export * from './Sequence'
export type { SortMetrics } from './SortMetrics'
