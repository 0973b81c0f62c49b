import type { Ratio, TuningSystem } from '../domain/types'
import { DomainError } from './notationErrors'
import { reduce } from './pitchClass'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

export const DEFAULT_REFERENCE_PITCH = 440 // A4 in Hz
export const OCTAVE = 2

// 5-limit just intonation, one ratio per 12-TET step
export const JUST_INTONATION_RATIOS: readonly Ratio[] = [
  [1, 1],
  [16, 15],
  [9, 8],
  [6, 5],
  [5, 4],
  [4, 3],
  [45, 32],
  [3, 2],
  [8, 5],
  [5, 3],
  [16, 9],
  [15, 8],
]

// ─────────────────────────────────────────────────────────────────────────────
// Ratio Helpers
// ─────────────────────────────────────────────────────────────────────────────

function gcd(a: number, b: number): number {
  return b === 0 ? a : gcd(b, a % b)
}

/**
 * Bring a ratio to lowest terms (e.g. [10, 8] -> [5, 4])
 */
export function simplifyRatio([numerator, denominator]: Ratio): Ratio {
  if (!Number.isInteger(numerator) || !Number.isInteger(denominator) || numerator <= 0 || denominator <= 0) {
    throw new DomainError(`Ratio terms must be positive integers, got ${numerator}/${denominator}`)
  }
  const divisor = gcd(numerator, denominator)
  return [numerator / divisor, denominator / divisor]
}

/**
 * Tenney height log2(p * q) of a ratio in lowest terms.
 * 1/1 -> 0, 3/2 -> log2(6), 5/4 -> log2(20).
 */
export function ratioComplexity(ratio: Ratio): number {
  const [numerator, denominator] = simplifyRatio(ratio)
  return Math.log2(numerator * denominator)
}

// ─────────────────────────────────────────────────────────────────────────────
// Builders
// ─────────────────────────────────────────────────────────────────────────────

export interface TuningSystemOptions {
  referencePitch?: number
  period?: number
  /** Frequency ratio of one step; defaults to period^(1/cardinality) */
  step?: number
}

function assertCardinality(cardinality: number): void {
  if (!Number.isInteger(cardinality) || cardinality <= 0) {
    throw new DomainError(`Cardinality must be a positive integer, got ${cardinality}`)
  }
}

function assertGreaterThanOne(value: number, option: string): void {
  if (!Number.isFinite(value) || value <= 1) {
    throw new DomainError(`Tuning option ${option} must be a finite number greater than 1, got ${value}`)
  }
}

function resolveShape(
  cardinality: number,
  options: TuningSystemOptions
): { referencePitch: number; period: number; step: number } {
  assertCardinality(cardinality)
  const referencePitch = options.referencePitch ?? DEFAULT_REFERENCE_PITCH
  if (!Number.isFinite(referencePitch) || referencePitch <= 0) {
    throw new DomainError(`Tuning option referencePitch must be a finite positive number, got ${referencePitch}`)
  }
  const period = options.period ?? OCTAVE
  assertGreaterThanOne(period, 'period')
  const step = options.step ?? Math.pow(period, 1 / cardinality)
  assertGreaterThanOne(step, 'step')

  return { referencePitch, period, step }
}

/**
 * Read-only view over a private copy of a map. Shared tuning systems hand
 * these out so their tables cannot be changed at runtime.
 */
class FrozenMap<K, V> implements ReadonlyMap<K, V> {
  private readonly entriesByKey: Map<K, V>

  constructor(source: Map<K, V>) {
    this.entriesByKey = new Map(source)
    Object.freeze(this)
  }

  get size(): number {
    return this.entriesByKey.size
  }

  get(key: K): V | undefined {
    return this.entriesByKey.get(key)
  }

  has(key: K): boolean {
    return this.entriesByKey.has(key)
  }

  forEach(callback: (value: V, key: K, map: ReadonlyMap<K, V>) => void, thisArg?: unknown): void {
    this.entriesByKey.forEach((value, key) => callback.call(thisArg, value, key, this))
  }

  entries() {
    return this.entriesByKey.entries()
  }

  keys() {
    return this.entriesByKey.keys()
  }

  values() {
    return this.entriesByKey.values()
  }

  [Symbol.iterator]() {
    return this.entriesByKey[Symbol.iterator]()
  }
}

function freezeSystem(
  system: Omit<TuningSystem, 'intervalToComplexity' | 'intervalToRatio'> & {
    intervalToComplexity: Map<number, number>
    intervalToRatio: Map<number, Ratio>
  }
): TuningSystem {
  return Object.freeze({
    ...system,
    intervalToComplexity: new FrozenMap(system.intervalToComplexity),
    intervalToRatio: new FrozenMap(system.intervalToRatio),
  })
}

/**
 * Build a tuning system that approximates a set of idealized ratios.
 *
 * Each ratio lands on the nearest step (reduced into the period) and weighs its
 * Tenney height there. When two ratios land on the same step the simpler one wins.
 * Steps no ratio lands on have no weight, so complexity lookups on them fail.
 */
export function createTuningSystem(
  ratios: readonly Ratio[],
  cardinality: number,
  options: TuningSystemOptions = {}
): TuningSystem {
  const { referencePitch, period, step } = resolveShape(cardinality, options)

  const intervalToRatio = new Map<number, Ratio>()
  const intervalToComplexity = new Map<number, number>()

  for (const rawRatio of ratios) {
    const ratio = simplifyRatio(rawRatio)
    const interval = reduce(Math.round(Math.log(ratio[0] / ratio[1]) / Math.log(step)), cardinality)
    const complexity = ratioComplexity(ratio)

    const existing = intervalToComplexity.get(interval)
    if (existing !== undefined) {
      console.warn(
        `[TuningSystem] Ratio ${ratio[0]}/${ratio[1]} collides with another ratio on step ${interval}; keeping the simpler one`
      )
      if (existing <= complexity) continue
    }

    intervalToRatio.set(interval, ratio)
    intervalToComplexity.set(interval, complexity)
  }

  return freezeSystem({
    cardinality,
    intervalToComplexity,
    intervalToRatio,
    referencePitch,
    period,
    step,
  })
}

/**
 * Build a tuning system straight from a weight table, bypassing ratio math.
 * A weight array is indexed by interval; a record may leave intervals out.
 */
export function createWeightedTuningSystem(
  cardinality: number,
  weights: Readonly<Record<number, number>>,
  options: TuningSystemOptions = {}
): TuningSystem {
  const { referencePitch, period, step } = resolveShape(cardinality, options)

  const intervalToComplexity = new Map<number, number>()
  for (const key of Object.keys(weights)) {
    const interval = Number(key)
    if (!Number.isInteger(interval) || interval < 0 || interval >= cardinality) {
      throw new DomainError(`Weight key ${key} is outside [0, ${cardinality})`)
    }
    intervalToComplexity.set(interval, weights[interval])
  }

  return freezeSystem({
    cardinality,
    intervalToComplexity,
    intervalToRatio: new Map(),
    referencePitch,
    period,
    step,
  })
}

/**
 * Shared 12-tone system approximating 5-limit just intonation at A440.
 */
export const DEFAULT_TUNING_SYSTEM: TuningSystem = createTuningSystem(JUST_INTONATION_RATIOS, 12, {
  referencePitch: DEFAULT_REFERENCE_PITCH,
  period: OCTAVE,
  step: Math.pow(2, 1 / 12),
})

// ─────────────────────────────────────────────────────────────────────────────
// Queries
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Frequency in Hz of a pitch, counted in steps from the reference pitch
 */
export function noteFrequency(system: TuningSystem, pitch: number): number {
  return system.referencePitch * Math.pow(system.step, pitch)
}
