// ─────────────────────────────────────────────────────────────────────────────
// Notation Errors: every failure raised by the notation services
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A value outside the domain an operation accepts (cardinality <= 0,
 * non-integer pitch, negative duration, ...).
 */
export class DomainError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DomainError'
  }
}

/**
 * The tuning system has no complexity weight for a canonical interval.
 */
export class LookupError extends Error {
  readonly interval: number

  constructor(interval: number, cardinality: number) {
    super(`No complexity weight for interval ${interval} in a ${cardinality}-note system`)
    this.name = 'LookupError'
    this.interval = interval
  }
}

export class UnsupportedOperationError extends Error {
  readonly operation: string

  constructor(operation: string) {
    super(`${operation} is not supported yet`)
    this.name = 'UnsupportedOperationError'
    this.operation = operation
  }
}

export class ShorthandParseError extends Error {
  readonly token: string

  constructor(token: string) {
    super(`Invalid fret "${token}": expected an integer or X`)
    this.name = 'ShorthandParseError'
    this.token = token
  }
}

export class ChordSymbolError extends Error {
  readonly symbol: string

  constructor(symbol: string) {
    super(`Unknown chord symbol "${symbol}"`)
    this.name = 'ChordSymbolError'
    this.symbol = symbol
  }
}
