export type { Ratio, TuningSystem } from './tuning'

export type {
  NoteCollectionKind,
  NoteSource,
  ExplicitNoteCollection,
  RootedIntervalCollection,
  DoubleRootedIntervalCollection,
  NoteCollection,
  NoteCollectionOptions,
  IntervalTally,
} from './notation'

export type { GridPosition, ModularGridNoteCollection } from './grid'
