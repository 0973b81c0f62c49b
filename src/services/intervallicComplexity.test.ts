import { describe, it, expect } from 'vitest'
import {
  computeComplexity,
  computeIntervallicComplexity,
  generateIntervalToOccurrence,
  getFundamentalRepresentation,
} from './intervallicComplexity'
import {
  createDoubleRootedIntervalCollection,
  createNoteCollection,
  createRootedIntervalCollection,
} from './noteCollection'
import { LookupError } from './notationErrors'
import { DEFAULT_TUNING_SYSTEM, createWeightedTuningSystem } from './tuningSystem'

describe('intervallicComplexity', () => {
  // Every interval weighs 1, so complexity counts pairs
  const unitSystem = createWeightedTuningSystem(12, new Array<number>(12).fill(1))

  describe('generateIntervalToOccurrence', () => {
    it('tallies every pairwise interval of a major seventh shape', () => {
      const collection = createRootedIntervalCollection(0, [0, 4, 7, 11])
      expect(generateIntervalToOccurrence(collection)).toEqual(
        new Map([
          [4, 2],
          [7, 2],
          [11, 1],
          [3, 1],
        ])
      )
    })

    it('is empty for fewer than two intervals', () => {
      expect(generateIntervalToOccurrence(createRootedIntervalCollection(0, [])).size).toBe(0)
      expect(generateIntervalToOccurrence(createRootedIntervalCollection(0, [7])).size).toBe(0)
    })

    it('keys the tally by the reduced interval', () => {
      // 0 -> 16 spans more than an octave
      expect(generateIntervalToOccurrence(createRootedIntervalCollection(0, [0, 16]))).toEqual(new Map([[4, 1]]))
      // 4 and 16 are an octave apart
      expect(generateIntervalToOccurrence(createRootedIntervalCollection(0, [4, 16]))).toEqual(new Map([[0, 1]]))
    })

    it('handles negative intervals', () => {
      expect(generateIntervalToOccurrence(createRootedIntervalCollection(0, [0, -5]))).toEqual(new Map([[5, 1]]))
    })

    it('reduces against the collection tuning system', () => {
      const heptatonic = createWeightedTuningSystem(7, [0, 1, 2, 3, 4, 5, 6])
      const triad = createRootedIntervalCollection(0, [0, 2, 4], { tuningSystem: heptatonic })
      expect(generateIntervalToOccurrence(triad)).toEqual(
        new Map([
          [2, 2],
          [4, 1],
        ])
      )
    })
  })

  describe('computeIntervallicComplexity', () => {
    it('counts six pairs for four intervals of unit weight', () => {
      const collection = createRootedIntervalCollection(0, [0, 4, 7, 11], { tuningSystem: unitSystem })
      expect(computeIntervallicComplexity(collection)).toBe(6)
    })

    it('does not depend on the order intervals are supplied in', () => {
      const ascending = createRootedIntervalCollection(0, [0, 4, 7, 11])
      const descending = createRootedIntervalCollection(0, [11, 7, 4, 0])
      expect(computeIntervallicComplexity(ascending)).toBe(computeIntervallicComplexity(descending))
    })

    it('is 0 for fewer than two intervals', () => {
      expect(computeIntervallicComplexity(createRootedIntervalCollection(3, []))).toBe(0)
      expect(computeIntervallicComplexity(createRootedIntervalCollection(3, [4]))).toBe(0)
    })

    it('weighs intervals with the default just intonation table', () => {
      const collection = createRootedIntervalCollection(0, [0, 4, 7, 11])
      // 4 -> 5/4, 7 -> 3/2, 11 -> 15/8, 3 -> 6/5
      const expected = 2 * Math.log2(20) + 2 * Math.log2(6) + Math.log2(120) + Math.log2(30)
      expect(collection.tuningSystem).toBe(DEFAULT_TUNING_SYSTEM)
      expect(computeIntervallicComplexity(collection)).toBeCloseTo(expected, 10)
    })

    it('multiplies weights by occurrence', () => {
      const weighted = createWeightedTuningSystem(7, [0, 1, 2, 3, 4, 5, 6])
      const triad = createRootedIntervalCollection(0, [0, 2, 4], { tuningSystem: weighted })
      expect(computeIntervallicComplexity(triad)).toBe(8)
    })

    it('passes negative weights through', () => {
      const system = createWeightedTuningSystem(12, { 4: -2 })
      expect(computeIntervallicComplexity(createRootedIntervalCollection(0, [0, 4], { tuningSystem: system }))).toBe(
        -2
      )
    })

    it('throws a LookupError when the weight table misses an interval', () => {
      const system = createWeightedTuningSystem(12, { 0: 1, 4: 1 })
      const collection = createRootedIntervalCollection(0, [0, 7], { tuningSystem: system })
      expect(() => computeIntervallicComplexity(collection)).toThrow(LookupError)
      expect(() => computeIntervallicComplexity(collection)).toThrow(
        'No complexity weight for interval 7 in a 12-note system'
      )
    })

    it('reports the missing interval on the LookupError', () => {
      const system = createWeightedTuningSystem(12, { 0: 1, 4: 1 })
      const collection = createRootedIntervalCollection(0, [0, 4, 7], { tuningSystem: system })

      let caught: unknown
      try {
        computeIntervallicComplexity(collection)
      } catch (error) {
        caught = error
      }

      expect(caught).toBeInstanceOf(LookupError)
      expect(caught instanceof LookupError ? caught.interval : undefined).toBe(7)
    })
  })

  describe('getFundamentalRepresentation', () => {
    it('reduces the root and every interval', () => {
      const fundamental = getFundamentalRepresentation(createRootedIntervalCollection(13, [-3, 1, 2, 24]))
      expect(fundamental.root).toBe(1)
      expect(fundamental.intervalCollection).toEqual(new Set([0, 1, 2, 9]))
    })

    it('is idempotent', () => {
      const once = getFundamentalRepresentation(createRootedIntervalCollection(-7, [-13, 5, 30]))
      const twice = getFundamentalRepresentation(once)
      expect(twice.root).toBe(once.root)
      expect(twice.intervalCollection).toEqual(once.intervalCollection)
    })

    it('maps octave-shifted collections to the same representation', () => {
      const close = getFundamentalRepresentation(createRootedIntervalCollection(2, [0, 4, 7]))
      const spread = getFundamentalRepresentation(createRootedIntervalCollection(26, [12, -8, 31]))
      expect(spread.root).toBe(close.root)
      expect(spread.intervalCollection).toEqual(close.intervalCollection)
    })

    it('returns 12-tone collections on the default tuning system', () => {
      const fundamental = getFundamentalRepresentation(
        createRootedIntervalCollection(14, [13], { tuningSystem: unitSystem, duration: 4 })
      )
      expect(fundamental.root).toBe(2)
      expect(fundamental.intervalCollection).toEqual(new Set([1]))
      expect(fundamental.tuningSystem).toBe(DEFAULT_TUNING_SYSTEM)
      expect(fundamental.duration).toBe(0)
    })

    it('keeps the source system when its cardinality differs from the default', () => {
      const heptatonic = createWeightedTuningSystem(7, [0, 1, 2, 3, 4, 5, 6])
      const fundamental = getFundamentalRepresentation(
        createRootedIntervalCollection(9, [8], { tuningSystem: heptatonic })
      )
      expect(fundamental.root).toBe(2)
      expect(fundamental.intervalCollection).toEqual(new Set([1]))
      expect(fundamental.tuningSystem).toBe(heptatonic)
    })

    it('is idempotent in systems larger than 12 tones', () => {
      const nineteenTone = createWeightedTuningSystem(19, new Array<number>(19).fill(1))
      const once = getFundamentalRepresentation(
        createRootedIntervalCollection(34, [20, -2], { tuningSystem: nineteenTone })
      )
      const twice = getFundamentalRepresentation(once)

      expect(once.root).toBe(15)
      expect(once.intervalCollection).toEqual(new Set([1, 17]))
      expect(once.tuningSystem).toBe(nineteenTone)
      expect(twice.root).toBe(15)
      expect(twice.intervalCollection).toEqual(once.intervalCollection)
    })
  })

  describe('computeComplexity', () => {
    it('measures explicit collections above their lowest note', () => {
      const collection = createNoteCollection([71, 60, 67, 64], { tuningSystem: unitSystem })
      expect(computeComplexity(collection)).toBe(6)
    })

    it('is 0 for an empty explicit collection', () => {
      expect(computeComplexity(createNoteCollection([]))).toBe(0)
    })

    it('measures double-rooted collections through their rooted equivalent', () => {
      const anchor = createRootedIntervalCollection(0, [0, 4, 7], { tuningSystem: unitSystem })
      const collection = createDoubleRootedIntervalCollection(anchor, 4, [0, 3, 7], { tuningSystem: unitSystem })
      expect(computeComplexity(collection)).toBe(3)
    })

    it('weighs double-rooted collections in the anchor tuning system by default', () => {
      // Weight k for interval k, so the score shows which cardinality reduced the pairs
      const nineteenTone = createWeightedTuningSystem(
        19,
        Array.from({ length: 19 }, (_, interval) => interval)
      )
      const anchor = createRootedIntervalCollection(0, [0, 6, 11], { tuningSystem: nineteenTone })
      const collection = createDoubleRootedIntervalCollection(anchor, 6, [0, 13])

      expect(collection.tuningSystem).toBe(nineteenTone)
      expect(computeComplexity(collection)).toBe(13)
    })

    it('matches computeIntervallicComplexity for rooted collections', () => {
      const collection = createRootedIntervalCollection(5, [0, 3, 7])
      expect(computeComplexity(collection)).toBe(computeIntervallicComplexity(collection))
    })
  })
})
