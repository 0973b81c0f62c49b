export type * from './domain/types'

export { reduce, intervalBetween } from './services/pitchClass'

export {
  DEFAULT_REFERENCE_PITCH,
  DEFAULT_TUNING_SYSTEM,
  JUST_INTONATION_RATIOS,
  OCTAVE,
  createTuningSystem,
  createWeightedTuningSystem,
  noteFrequency,
  ratioComplexity,
  simplifyRatio,
  type TuningSystemOptions,
} from './services/tuningSystem'

export {
  computeDiatonicDistance,
  createDoubleRootedIntervalCollection,
  createNoteCollection,
  createRootedIntervalCollection,
  generateNotes,
  generateWaveFunction,
  noteCollectionToString,
  noteCollectionsEqual,
  toRootedIntervalCollection,
} from './services/noteCollection'

export {
  computeComplexity,
  computeIntervallicComplexity,
  generateIntervalToOccurrence,
  getFundamentalRepresentation,
} from './services/intervallicComplexity'

export {
  STANDARD_GUITAR_TUNING,
  convertGridShorthandToPositions,
  generateGridCollectionsFromShorthand,
  gridCollectionToNoteCollection,
} from './services/gridShorthand'

export {
  JAZZ_CHORD_SYMBOLS,
  buildJazzCollections,
  describeIntervalTally,
  rankByIntervallicComplexity,
  rootedCollectionFromChordSymbol,
  type ChordSymbolOptions,
  type IntervalDescription,
  type RankedCollection,
} from './services/chordLibrary'

export {
  ChordSymbolError,
  DomainError,
  LookupError,
  ShorthandParseError,
  UnsupportedOperationError,
} from './services/notationErrors'
