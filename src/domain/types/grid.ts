export interface GridPosition {
  /** Zero-based string (row) index */
  stringIndex: number
  fret: number
}

export interface ModularGridNoteCollection {
  kind: 'modularGrid'
  /** Sorted by stringIndex, at most one position per string */
  positions: readonly GridPosition[]
}
