import type { IntervalTally, NoteCollection, RootedIntervalCollection } from '../domain/types'
import { LookupError } from './notationErrors'
import { createRootedIntervalCollection, toRootedIntervalCollection } from './noteCollection'
import { intervalBetween, reduce } from './pitchClass'
import { DEFAULT_TUNING_SYSTEM } from './tuningSystem'

// ─────────────────────────────────────────────────────────────────────────────
// Intervallic Complexity
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Count every canonical interval formed between two members of the collection.
 *
 * For {0, 4, 7, 11} the pairs give 4, 7, 11 (from 0), 3 (4 -> 7),
 * 7 (4 -> 11) and 4 (7 -> 11), so the tally is {4: 2, 7: 2, 11: 1, 3: 1}.
 * The tally is keyed by the reduced interval only.
 */
export function generateIntervalToOccurrence(collection: RootedIntervalCollection): IntervalTally {
  const { cardinality } = collection.tuningSystem
  const sortedIntervals = [...collection.intervalCollection].sort((a, b) => a - b)
  const tally = new Map<number, number>()

  for (let i = 0; i < sortedIntervals.length; i++) {
    for (let j = i + 1; j < sortedIntervals.length; j++) {
      const fundamental = reduce(intervalBetween(sortedIntervals[i], sortedIntervals[j]), cardinality)
      tally.set(fundamental, (tally.get(fundamental) ?? 0) + 1)
    }
  }

  return tally
}

/**
 * Sum of weight * occurrences over the interval tally, with weights taken
 * from the collection's tuning system. Collections with fewer than two
 * intervals score 0.
 */
export function computeIntervallicComplexity(collection: RootedIntervalCollection): number {
  const { tuningSystem } = collection
  let complexity = 0

  for (const [interval, occurrence] of generateIntervalToOccurrence(collection)) {
    const weight = tuningSystem.intervalToComplexity.get(interval)
    if (weight === undefined) {
      throw new LookupError(interval, tuningSystem.cardinality)
    }
    complexity += weight * occurrence
  }

  return complexity
}

/**
 * Reduce the root and every interval into [0, cardinality).
 *
 * 13 | {-3, 1, 2, 24} -> 1 | {0, 1, 2, 9} in a 12-note system. The result
 * uses the default tuning system when it has the same cardinality as the
 * source, and keeps the source system otherwise.
 */
export function getFundamentalRepresentation(collection: RootedIntervalCollection): RootedIntervalCollection {
  const { cardinality } = collection.tuningSystem
  const fundamentalIntervals = [...collection.intervalCollection].map((interval) => reduce(interval, cardinality))
  const tuningSystem =
    cardinality === DEFAULT_TUNING_SYSTEM.cardinality ? DEFAULT_TUNING_SYSTEM : collection.tuningSystem

  return createRootedIntervalCollection(reduce(collection.root, cardinality), fundamentalIntervals, { tuningSystem })
}

/**
 * Complexity of any note collection. Explicit collections are measured as
 * intervals above their lowest note.
 */
export function computeComplexity(collection: NoteCollection): number {
  switch (collection.kind) {
    case 'rooted':
      return computeIntervallicComplexity(collection)
    case 'doubleRooted':
      return computeIntervallicComplexity(toRootedIntervalCollection(collection))
    case 'explicit': {
      if (collection.notes.size === 0) return 0
      const lowest = Math.min(...collection.notes)
      const intervals = [...collection.notes].map((note) => note - lowest)
      return computeIntervallicComplexity(
        createRootedIntervalCollection(lowest, intervals, {
          duration: collection.duration,
          tuningSystem: collection.tuningSystem,
        })
      )
    }
  }
}
