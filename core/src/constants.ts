/**
 * Registry Constants
 *
 * Sentinels and defaults shared by the registry, the lifecycle and the
 * collection facade.
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { LoggingConfig } from './logging.js'

// ---------------------------------------------------------------------------
// Identity Constants
// ---------------------------------------------------------------------------

/**
 * The null identity.
 *
 * Used as `from` on mint and `to` on burn. It is never a valid owner,
 * recipient or operator.
 */
export const NULL_IDENTITY: PubKeyHex = '00'.repeat(33)

/** Compressed public key in hex: 02 or 03 prefix followed by a 32-byte x coordinate */
export const IDENTITY_PATTERN = /^0[23][0-9a-fA-F]{64}$/

// ---------------------------------------------------------------------------
// Receiver Constants
// ---------------------------------------------------------------------------

/**
 * Acknowledgement a programmable recipient must return from
 * `onTokenReceived` for a safe transfer to commit.
 */
export const TOKEN_RECEIVED_ACK = 'extensible-nft:token-received'

// ---------------------------------------------------------------------------
// Validation Constants
// ---------------------------------------------------------------------------

/** Largest accepted token identifier */
export const MAX_TOKEN_ID = Number.MAX_SAFE_INTEGER

/** Largest accepted target supply for a single extension */
export const MAX_TARGET_SUPPLY = Number.MAX_SAFE_INTEGER

// ---------------------------------------------------------------------------
// Collection Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_COLLECTION_NAME = 'Extensible Collection'

export const DEFAULT_COLLECTION_SYMBOL = 'XNFT'

export const DEFAULT_BASE_URI = ''

export const DEFAULT_LOGGING_CONFIG: LoggingConfig = {
  enabled: true,
  level: 'warn',
  prefix: '[extensible-nft]'
}
