/** Finite numbers only: rejects NaN, Infinity and non-numbers */
export function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value)
}
