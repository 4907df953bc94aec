/**
 * Registry error kinds.
 *
 * Every failure is synchronous and aborts the whole operation; nothing is
 * retried internally.
 */
export type RegistryErrorCode =
  | 'NOT_FOUND'
  | 'OUT_OF_RANGE'
  | 'ALREADY_EXISTS'
  | 'OWNER_MISMATCH'
  | 'INVALID_RECIPIENT'
  | 'TRANSFER_REJECTED'
  | 'NOT_AUTHORIZED'
  | 'INVALID_ARGUMENT'
  | 'SUPPLY_EXHAUSTED'
  | 'ALREADY_FINALIZED'
  | 'REENTRANT_CALL'

export class RegistryError extends Error {
  readonly code: RegistryErrorCode

  constructor(code: RegistryErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'RegistryError'
    this.code = code
  }
}

/**
 * Check whether an unknown error is a RegistryError, optionally of a given kind.
 */
export function isRegistryError(error: unknown, code?: RegistryErrorCode): error is RegistryError {
  if (!(error instanceof RegistryError)) return false
  return code === undefined || error.code === code
}
