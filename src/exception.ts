export type SymbolTableErrorCode =
  | 'EMPTY_TABLE'
  | 'NOT_FOUND'
  | 'OUT_OF_RANGE'
  | 'INVARIANT_VIOLATION'

/** Low severity, e.g. min() of an empty table or a floor() with no match */
class SymbolTableError extends Error {
  code: SymbolTableErrorCode
  /** @internal */
  constructor(code: SymbolTableErrorCode, message: string, cause?: unknown) {
    super(message, {cause})
    this.name = 'SymbolTableError'
    this.code = code
  }
}

/** High severity. The tree is corrupt; this is a bug, not a usage error. */
class InvariantError extends SymbolTableError {
  /** @internal */
  name = 'InvariantError'
  /** @internal */
  constructor(message: string, cause?: unknown) {
    super('INVARIANT_VIOLATION', message, cause)
  }
}

export {SymbolTableError, InvariantError}
