import { DomainError } from './notationErrors'

/**
 * Reduce a signed interval into the canonical range [0, cardinality).
 * Uses the mathematical modulus, so reduce(-3, 12) === 9.
 */
export function reduce(value: number, cardinality: number): number {
  if (!Number.isInteger(cardinality) || cardinality <= 0) {
    throw new DomainError(`Cardinality must be a positive integer, got ${cardinality}`)
  }
  if (!Number.isInteger(value)) {
    throw new DomainError(`Cannot reduce non-integer value ${value}`)
  }

  const remainder = value % cardinality
  // -0 would otherwise leak out of (-12) % 12
  return remainder < 0 ? remainder + cardinality : remainder + 0
}

/**
 * Signed distance from a to b
 */
export function intervalBetween(a: number, b: number): number {
  return b - a
}
