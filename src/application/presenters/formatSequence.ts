import { Sequence } from '../../domain/models/Sequence'

/**
 * Renders a sequence as its elements separated by single spaces.
 * The line break is left to the caller.
 */
export const formatSequence = <T>(sequence: Sequence<T>): string => {
  return sequence.map((value) => String(value)).join(' ')
}
