import { Chord, Interval, Note } from 'tonal'
import type { IntervalTally, NoteCollection, NoteCollectionOptions, RootedIntervalCollection, TuningSystem } from '../domain/types'
import jazzChordTypes from '../data/jazzChordTypes.json'
import { ChordSymbolError } from './notationErrors'
import { computeComplexity } from './intervallicComplexity'
import { createRootedIntervalCollection } from './noteCollection'
import { DEFAULT_TUNING_SYSTEM } from './tuningSystem'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

/** Chord types common in jazz harmony, written without a tonic ("maj7", "m7b5") */
export const JAZZ_CHORD_SYMBOLS: readonly string[] = jazzChordTypes

// Interval names only make sense for the 12-tone chromatic scale
const CHROMATIC_CARDINALITY = 12

// ─────────────────────────────────────────────────────────────────────────────
// Chord Symbols
// ─────────────────────────────────────────────────────────────────────────────

export interface ChordSymbolOptions extends NoteCollectionOptions {
  /** When set, the root is the MIDI number of the tonic in this octave */
  octave?: number
}

function resolveRoot(symbol: string, tonic: string | null, octave: number | undefined): number {
  if (!tonic) return 0

  const root = octave === undefined ? Note.chroma(tonic) : Note.midi(`${tonic}${octave}`)
  if (typeof root !== 'number' || !Number.isInteger(root)) {
    throw new ChordSymbolError(symbol)
  }
  return root
}

/**
 * Build a rooted interval collection from a chord symbol, e.g.
 * "Cmaj7" -> 0 | {0, 4, 7, 11}, "Eb7b9" -> 3 | {0, 4, 7, 10, 13}.
 * Symbols without a tonic ("m7") are rooted at 0.
 */
export function rootedCollectionFromChordSymbol(
  symbol: string,
  options: ChordSymbolOptions = {}
): RootedIntervalCollection {
  const chord = Chord.get(symbol)
  if (chord.empty) {
    throw new ChordSymbolError(symbol)
  }

  const intervals = chord.intervals.map((name) => {
    const semitones = Interval.semitones(name)
    if (typeof semitones !== 'number' || !Number.isInteger(semitones)) {
      throw new ChordSymbolError(symbol)
    }
    return semitones
  })

  const { octave, ...collectionOptions } = options
  return createRootedIntervalCollection(resolveRoot(symbol, chord.tonic, octave), intervals, collectionOptions)
}

/**
 * One rooted collection per jazz chord type, all on the same tonic
 */
export function buildJazzCollections(tonic = 'C', options: ChordSymbolOptions = {}): RootedIntervalCollection[] {
  return JAZZ_CHORD_SYMBOLS.map((type) => rootedCollectionFromChordSymbol(`${tonic}${type}`, options))
}

// ─────────────────────────────────────────────────────────────────────────────
// Ranking & Description
// ─────────────────────────────────────────────────────────────────────────────

export interface RankedCollection<T extends NoteCollection = NoteCollection> {
  collection: T
  complexity: number
}

/**
 * Sort collections from least to most intervallically complex.
 * Equal scores keep their input order.
 */
export function rankByIntervallicComplexity<T extends NoteCollection>(
  collections: readonly T[]
): RankedCollection<T>[] {
  return collections
    .map((collection) => ({ collection, complexity: computeComplexity(collection) }))
    .sort((a, b) => a.complexity - b.complexity)
}

export interface IntervalDescription {
  interval: number
  /** Interval name such as "3M" in 12-tone systems, the number otherwise */
  name: string
  occurrence: number
}

export function describeIntervalTally(
  tally: IntervalTally,
  tuningSystem: TuningSystem = DEFAULT_TUNING_SYSTEM
): IntervalDescription[] {
  const chromatic = tuningSystem.cardinality === CHROMATIC_CARDINALITY

  return [...tally]
    .sort(([a], [b]) => a - b)
    .map(([interval, occurrence]) => ({
      interval,
      name: chromatic ? Interval.fromSemitones(interval) : String(interval),
      occurrence,
    }))
}
