/**
 * A frequency ratio p/q, stored as [numerator, denominator]
 */
export type Ratio = readonly [number, number]

export interface TuningSystem {
  /** Number of distinct pitch classes per period (12 for 12-TET) */
  cardinality: number
  /** Complexity weight for each canonical interval (0..cardinality-1) */
  intervalToComplexity: ReadonlyMap<number, number>
  /** The idealized ratio each canonical interval approximates, when known */
  intervalToRatio: ReadonlyMap<number, Ratio>
  /** Frequency of pitch 0 in Hz */
  referencePitch: number
  /** Frequency ratio spanned by one period (2 = octave) */
  period: number
  /** Frequency ratio of a single step */
  step: number
}
