import { Sequence } from '../../models/Sequence'

export function swap<T>(sequence: Sequence<T>, i: number, j: number): void {
  const temp = sequence[i]
  sequence[i] = sequence[j]
  sequence[j] = temp
}
