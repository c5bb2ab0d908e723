/**
 * Returns the first index whose value breaks strict ordering, or -1 when the sequence is ordered.
 */
export function firstOrderingViolation(sequence: readonly number[]): number {
  for (let i = 1; i < sequence.length; i++) {
    if (sequence[i] <= sequence[i - 1]) {
      return i;
    }
  }
  return -1;
}
