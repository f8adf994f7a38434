/**
 * Identifiers of the available in-place sort algorithms.
 */
export enum SortAlgorithm {
    BUBBLE = 'bubble',
    SELECTION = 'selection',
    INSERTION = 'insertion',
}

export const SORT_ALGORITHMS: readonly SortAlgorithm[] = Object.values(SortAlgorithm);
