import { z } from 'zod'
import { SortAlgorithm } from '../domain/value-objects/SortAlgorithm'

/**
 * Sorting configuration for the CLI.
 *
 * Values come from the environment (a .env file is loaded at startup)
 * and can be overridden by command-line flags.
 */
export interface SortConfig {
  algorithm: SortAlgorithm
  showMetrics: boolean
}

/**
 * Sequence sorted when no values are given on the command line.
 * The trailing duplicate of the first value is intentional.
 */
export const SAMPLE_SEQUENCE: readonly number[] = [1, 5, 99, 14, 56, 4, 78, 100, 45, 87, 1]

export const DEFAULT_SORT_CONFIG: Readonly<SortConfig> = {
  algorithm: SortAlgorithm.BUBBLE,
  showMetrics: false,
}

const booleanString = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1')

const SortEnvSchema = z.object({
  SORT_ALGORITHM: z.nativeEnum(SortAlgorithm).optional(),
  SORT_SHOW_METRICS: booleanString.optional(),
})

/**
 * Reads the sorting configuration from environment variables.
 *
 * - SORT_ALGORITHM: bubble | selection | insertion (default: bubble)
 * - SORT_SHOW_METRICS: true | false | 1 | 0 (default: false)
 *
 * Invalid values are reported with a warning and replaced by the defaults.
 */
export function loadSortConfig(env: NodeJS.ProcessEnv): SortConfig {
  const parsed = SortEnvSchema.safeParse(env)

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
    console.warn(`Invalid sort configuration (${problems}), falling back to defaults`)
    return { ...DEFAULT_SORT_CONFIG }
  }

  return {
    algorithm: parsed.data.SORT_ALGORITHM ?? DEFAULT_SORT_CONFIG.algorithm,
    showMetrics: parsed.data.SORT_SHOW_METRICS ?? DEFAULT_SORT_CONFIG.showMetrics,
  }
}
