/**
 * Validation helpers for identities, token ids and supplies
 */

import type { PubKeyHex } from '@bsv/sdk'
import { IDENTITY_PATTERN, MAX_TARGET_SUPPLY, MAX_TOKEN_ID, NULL_IDENTITY } from './constants.js'
import { RegistryError } from './errors.js'
import type { TokenId } from './types.js'

/**
 * Check if a string is a well-formed identity (compressed public key hex).
 * The null identity is not.
 */
export function isValidIdentity(identity: string): boolean {
  return IDENTITY_PATTERN.test(identity)
}

export function isNullIdentity(identity: string): boolean {
  return identity === NULL_IDENTITY
}

/**
 * Assert that an identity is well-formed.
 *
 * @param identity - The identity to check
 * @param role - What the identity is used as, for the error message
 * @param allowNull - Whether the null identity is acceptable here
 * @throws RegistryError INVALID_ARGUMENT if the identity is malformed
 */
export function assertIdentity(identity: PubKeyHex, role: string, allowNull = false): void {
  if (allowNull && isNullIdentity(identity)) return
  if (!isValidIdentity(identity)) {
    throw new RegistryError('INVALID_ARGUMENT', `Invalid ${role} identity: ${identity}`)
  }
}

/**
 * Assert that a value is a usable token identifier.
 *
 * @throws RegistryError INVALID_ARGUMENT for negative, fractional or unsafe values
 */
export function assertTokenId(tokenId: TokenId): void {
  if (!Number.isSafeInteger(tokenId) || tokenId < 0 || tokenId > MAX_TOKEN_ID) {
    throw new RegistryError('INVALID_ARGUMENT', `Invalid token id: ${tokenId}`)
  }
}

export function assertTargetSupply(targetSupply: number): void {
  if (!Number.isSafeInteger(targetSupply) || targetSupply < 0 || targetSupply > MAX_TARGET_SUPPLY) {
    throw new RegistryError('INVALID_ARGUMENT', `Invalid target supply: ${targetSupply}`)
  }
}

/**
 * Assert that a list of token ids has no malformed entries and no duplicates.
 */
export function assertDistinctTokenIds(tokenIds: readonly TokenId[]): void {
  const seen = new Set<TokenId>()
  for (const tokenId of tokenIds) {
    assertTokenId(tokenId)
    if (seen.has(tokenId)) {
      throw new RegistryError('ALREADY_EXISTS', `Token ${tokenId} listed twice`)
    }
    seen.add(tokenId)
  }
}

/**
 * Shorten an identity for log lines
 */
export function shortIdentity(identity: PubKeyHex): string {
  return identity.length > 16 ? `${identity.slice(0, 8)}…${identity.slice(-6)}` : identity
}
