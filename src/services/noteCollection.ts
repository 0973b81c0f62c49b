import type {
  DoubleRootedIntervalCollection,
  ExplicitNoteCollection,
  NoteCollection,
  NoteCollectionOptions,
  RootedIntervalCollection,
  TuningSystem,
} from '../domain/types'
import { DomainError, UnsupportedOperationError } from './notationErrors'
import { DEFAULT_TUNING_SYSTEM } from './tuningSystem'

// ─────────────────────────────────────────────────────────────────────────────
// Note Collections: explicit, rooted and double-rooted pitch sets
// ─────────────────────────────────────────────────────────────────────────────

function assertIntegers(values: Iterable<number>, label: string): void {
  for (const value of values) {
    if (!Number.isInteger(value)) {
      throw new DomainError(`${label} must be an integer, got ${value}`)
    }
  }
}

function resolveOptions(
  options: NoteCollectionOptions,
  fallbackSystem: TuningSystem = DEFAULT_TUNING_SYSTEM
): { duration: number; tuningSystem: TuningSystem } {
  const duration = options.duration ?? 0
  if (!Number.isFinite(duration) || duration < 0) {
    throw new DomainError(`Duration must be a finite non-negative number, got ${duration}`)
  }
  return { duration, tuningSystem: options.tuningSystem ?? fallbackSystem }
}

function sortedValues(values: Iterable<number>): number[] {
  return [...values].sort((a, b) => a - b)
}

function formatSet(values: Iterable<number>): string {
  return `{${sortedValues(values).join(', ')}}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Construction
// ─────────────────────────────────────────────────────────────────────────────

export function createNoteCollection(
  notes: Iterable<number>,
  options: NoteCollectionOptions = {}
): ExplicitNoteCollection {
  const noteSet = new Set(notes)
  assertIntegers(noteSet, 'Note')

  const collection: ExplicitNoteCollection = {
    kind: 'explicit',
    notes: noteSet,
    ...resolveOptions(options),
  }
  return Object.freeze(collection)
}

/**
 * Notes defined by a root and the intervals above it, e.g.
 * generateNotes(5, [0, 4, 7, 11]) -> {5, 9, 12, 16}
 */
export function generateNotes(root: number, intervalCollection: Iterable<number>): Set<number> {
  const notes = new Set<number>()
  for (const interval of intervalCollection) {
    notes.add(root + interval)
  }
  return notes
}

/**
 * Build a rooted interval collection. Root and intervals are stored as given
 * (unreduced, possibly negative); the absolute notes are derived once here.
 */
export function createRootedIntervalCollection(
  root: number,
  intervalCollection: Iterable<number>,
  options: NoteCollectionOptions = {}
): RootedIntervalCollection {
  const intervals = new Set(intervalCollection)
  assertIntegers([root], 'Root')
  assertIntegers(intervals, 'Interval')

  const collection: RootedIntervalCollection = {
    kind: 'rooted',
    root,
    intervalCollection: intervals,
    notes: generateNotes(root, intervals),
    ...resolveOptions(options),
  }
  return Object.freeze(collection)
}

/**
 * Build a collection whose intervals sit above one note of another rooted
 * collection. The anchor interval must belong to the anchor's intervals.
 * Without an explicit tuning system the anchor's is used.
 */
export function createDoubleRootedIntervalCollection(
  anchor: RootedIntervalCollection,
  anchorInterval: number,
  intervalCollection: Iterable<number>,
  options: NoteCollectionOptions = {}
): DoubleRootedIntervalCollection {
  if (!anchor.intervalCollection.has(anchorInterval)) {
    throw new DomainError(
      `Anchor interval ${anchorInterval} is not part of ${noteCollectionToString(anchor)}`
    )
  }
  const intervals = new Set(intervalCollection)
  assertIntegers(intervals, 'Interval')

  const collection: DoubleRootedIntervalCollection = {
    kind: 'doubleRooted',
    anchor,
    anchorInterval,
    intervalCollection: intervals,
    notes: generateNotes(anchor.root + anchorInterval, intervals),
    ...resolveOptions(options, anchor.tuningSystem),
  }
  return Object.freeze(collection)
}

/**
 * Flatten a double-rooted collection into the equivalent rooted one
 */
export function toRootedIntervalCollection(
  collection: DoubleRootedIntervalCollection
): RootedIntervalCollection {
  return createRootedIntervalCollection(
    collection.anchor.root + collection.anchorInterval,
    collection.intervalCollection,
    { duration: collection.duration, tuningSystem: collection.tuningSystem }
  )
}

// ─────────────────────────────────────────────────────────────────────────────
// Comparison & Rendering
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Two collections are equal when they hold the same notes; kind, duration
 * and tuning system are ignored.
 */
export function noteCollectionsEqual(a: NoteCollection, b: NoteCollection): boolean {
  if (a.notes.size !== b.notes.size) return false
  for (const note of a.notes) {
    if (!b.notes.has(note)) return false
  }
  return true
}

export function noteCollectionToString(collection: NoteCollection): string {
  switch (collection.kind) {
    case 'explicit':
      return formatSet(collection.notes)
    case 'rooted':
      return `${collection.root} | ${formatSet(collection.intervalCollection)}`
    case 'doubleRooted':
      return `${noteCollectionToString(collection.anchor)} -> ${collection.anchorInterval} | ${formatSet(
        collection.intervalCollection
      )}`
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Not Yet Supported
// ─────────────────────────────────────────────────────────────────────────────

export function generateWaveFunction(_collection: NoteCollection): never {
  throw new UnsupportedOperationError('generateWaveFunction')
}

export function computeDiatonicDistance(_a: NoteCollection, _b: NoteCollection): never {
  throw new UnsupportedOperationError('computeDiatonicDistance')
}
