import type { TuningSystem } from './tuning'

export type NoteCollectionKind = 'explicit' | 'rooted' | 'doubleRooted'

/**
 * Anything that resolves to a set of absolute pitches in a tuning system.
 */
export interface NoteSource {
  kind: NoteCollectionKind
  notes: ReadonlySet<number>
  /** Seconds; 0 means indefinite */
  duration: number
  tuningSystem: TuningSystem
}

export interface ExplicitNoteCollection extends NoteSource {
  kind: 'explicit'
}

export interface RootedIntervalCollection extends NoteSource {
  kind: 'rooted'
  root: number
  /** Signed intervals above the root, unreduced */
  intervalCollection: ReadonlySet<number>
}

/**
 * Intervals measured above one note of another rooted collection
 * rather than above an absolute root.
 */
export interface DoubleRootedIntervalCollection extends NoteSource {
  kind: 'doubleRooted'
  anchor: RootedIntervalCollection
  /** Member of anchor.intervalCollection the intervals are measured from */
  anchorInterval: number
  intervalCollection: ReadonlySet<number>
}

export type NoteCollection =
  | ExplicitNoteCollection
  | RootedIntervalCollection
  | DoubleRootedIntervalCollection

export interface NoteCollectionOptions {
  duration?: number
  tuningSystem?: TuningSystem
}

/**
 * Canonical interval -> number of times it occurs between pairs of intervals
 */
export type IntervalTally = ReadonlyMap<number, number>
