import { Argument, Command, InvalidArgumentError } from 'commander'
import { APP_VERSION, SAMPLE_SEQUENCE, SortConfig, loadSortConfig } from './config'
import { SortAlgorithm, SORT_ALGORITHMS } from './domain/value-objects/SortAlgorithm'
import { SortReport, SortSequenceUseCase } from './application/usecases/sortSequenceUseCase'

interface CliOptions {
  algorithm: SortAlgorithm
  metrics: boolean
}

const INTEGER_PATTERN = /^[+-]?\d+$/

export const collectInteger = (value: string, previous: number[] = []): number[] => {
  const parsed = Number(value)
  if (!INTEGER_PATTERN.test(value) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError(`"${value}" is not an integer.`)
  }
  // "-0" is stored as plain 0
  return [...previous, parsed === 0 ? 0 : parsed]
}

const parseAlgorithm = (value: string): SortAlgorithm => {
  const algorithm = SORT_ALGORITHMS.find((candidate) => candidate === value)
  if (!algorithm) {
    throw new InvalidArgumentError(`Allowed choices are ${SORT_ALGORITHMS.join(', ')}.`)
  }
  return algorithm
}

export const formatMetrics = ({ algorithm, metrics }: SortReport): string =>
  `${algorithm}: ${metrics.comparisons} comparisons, ${metrics.swaps} swaps, ` +
  `${metrics.shifts} shifts, ${metrics.passes} passes`

function printReport(report: SortReport, showMetrics: boolean): void {
  console.log('Original array')
  console.log(report.original)
  console.log('Sorted array')
  console.log(report.sorted)

  if (showMetrics) {
    console.log(formatMetrics(report))
  }
}

/**
 * Builds the command-line program. Flags fall back to `config`,
 * which itself comes from the environment.
 */
export function createProgram(config: SortConfig): Command {
  return new Command()
    .name('sorting-demos')
    .description('Sort integers in place and print them before and after sorting')
    .version(APP_VERSION)
    .addArgument(
      new Argument('[values...]', 'integers to sort (default: built-in sample)').argParser(collectInteger)
    )
    .option(
      '-a, --algorithm <name>',
      `sort algorithm (${SORT_ALGORITHMS.join(', ')})`,
      parseAlgorithm,
      config.algorithm
    )
    .option('-m, --metrics', 'print comparison, swap, shift and pass counts', config.showMetrics)
    .option('--no-metrics', 'do not print step counts')
    .action((values: number[], options: CliOptions) => {
      // The sample is copied: sorting happens in place
      const sequence = values.length > 0 ? values : [...SAMPLE_SEQUENCE]
      const report = new SortSequenceUseCase().execute(sequence, options.algorithm)
      printReport(report, options.metrics)
    })
}

/**
 * Parses `argv` against the configuration read from `env` and runs the sort.
 */
export async function main(argv: string[], env: NodeJS.ProcessEnv): Promise<void> {
  const program = createProgram(loadSortConfig(env))
  await program.parseAsync(argv)
}

/**
 * Logs a failed run and ends the process with exit code 1.
 */
export function exitOnFailure(run: Promise<void>): Promise<void> {
  return run.catch((err: unknown) => {
    console.error(err)
    process.exit(1)
  })
}
