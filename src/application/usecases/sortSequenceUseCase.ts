import { Ordered, Sequence, SortMetrics, naturalOrder } from '../../domain/models';
import { SortAlgorithm } from '../../domain/value-objects/SortAlgorithm';
import { SorterFactory, SortMetricsRecorder } from '../../domain/services';
import { formatSequence } from '../presenters/formatSequence';

export interface SortReport {
    algorithm: SortAlgorithm;
    original: string;
    sorted: string;
    metrics: Readonly<SortMetrics>;
}

/**
 * Use case for sorting a sequence in place and describing the run.
 *
 * Flow:
 * 1. Render the sequence as given
 * 2. Sort it in place with the requested algorithm, counting every step
 * 3. Render the result and return both renderings with the counters
 */
export class SortSequenceUseCase {
    execute<T extends Ordered>(sequence: Sequence<T>, algorithm: SortAlgorithm): SortReport {
        const recorder = new SortMetricsRecorder();
        const sorter = SorterFactory.create(algorithm, recorder);

        const original = formatSequence(sequence);
        sorter.sort(sequence, naturalOrder);

        return {
            algorithm: sorter.algorithm,
            original,
            sorted: formatSequence(sequence),
            metrics: recorder.snapshot(),
        };
    }
}
