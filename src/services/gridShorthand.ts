import type { ExplicitNoteCollection, GridPosition, ModularGridNoteCollection, NoteCollectionOptions } from '../domain/types'
import { DomainError, ShorthandParseError } from './notationErrors'
import { createNoteCollection } from './noteCollection'

// ─────────────────────────────────────────────────────────────────────────────
// Constants
// ─────────────────────────────────────────────────────────────────────────────

const MUTED_MARKER = 'X'

// Bracketed or quoted groups first, then bare runs of non-whitespace
const GROUP_PATTERN = /\[[^\]]*\]|\([^)]*\)|"[^"]*"|<[^>]*>|\S+/g

const GROUP_DELIMITERS: Record<string, string> = {
  '[': ']',
  '(': ')',
  '"': '"',
  '<': '>',
}

// Open strings E2 A2 D3 G3 B3 E4 as MIDI numbers, lowest string first
export const STANDARD_GUITAR_TUNING: readonly number[] = [40, 45, 50, 55, 59, 64]

// ─────────────────────────────────────────────────────────────────────────────
// Parsing
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Turn one chord shape "X 5 X 5 5 5" into grid positions.
 * Each token is a fret on the string at its index; X marks a string not played.
 */
export function convertGridShorthandToPositions(shorthand: string): GridPosition[] {
  const positions: GridPosition[] = []
  const tokens = shorthand.split(/\s+/).filter((token) => token.length > 0)

  tokens.forEach((token, stringIndex) => {
    if (token === MUTED_MARKER) return
    if (!/^[+-]?\d+$/.test(token)) {
      throw new ShorthandParseError(token)
    }
    positions.push({ stringIndex, fret: parseInt(token, 10) })
  })

  return positions
}

function stripDelimiters(group: string): string {
  const closing = GROUP_DELIMITERS[group[0]]
  if (closing !== undefined && group.length >= 2 && group.endsWith(closing)) {
    return group.slice(1, -1)
  }
  return group
}

/**
 * Split shorthand text into chord shapes and parse each one, e.g.
 *
 *   "(X 5 X 5 5 5) (X X 5 7 6 7) (X 3 5 4 5 X)"
 *
 * Shapes may be wrapped in (), [], <> or "", or written as a single bare token.
 */
export function generateGridCollectionsFromShorthand(shorthand: string): ModularGridNoteCollection[] {
  const groups = shorthand.match(GROUP_PATTERN) ?? []

  return groups.map((group): ModularGridNoteCollection => ({
    kind: 'modularGrid',
    positions: convertGridShorthandToPositions(stripDelimiters(group)),
  }))
}

// ─────────────────────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Resolve grid positions to absolute pitches using the open-string pitch
 * of each string.
 */
export function gridCollectionToNoteCollection(
  grid: ModularGridNoteCollection,
  stringTuning: readonly number[] = STANDARD_GUITAR_TUNING,
  options: NoteCollectionOptions = {}
): ExplicitNoteCollection {
  const notes = grid.positions.map(({ stringIndex, fret }) => {
    const openString = stringTuning[stringIndex]
    if (openString === undefined) {
      throw new DomainError(`No tuning for string ${stringIndex} (tuning has ${stringTuning.length} strings)`)
    }
    return openString + fret
  })

  return createNoteCollection(notes, options)
}
