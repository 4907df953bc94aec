/**
 * TokenLifecycle - mint, burn, transfer and finalize.
 *
 * Composes the extension registry, the holder index and the event log.
 * Each operation checks its preconditions, runs the pre-mutation hook,
 * then applies its effects through the journal so that the caller can
 * roll the whole operation back.
 */

import type { PubKeyHex } from '@bsv/sdk'
import type { Approvals } from './Approvals.js'
import { NULL_IDENTITY } from './constants.js'
import { RegistryError } from './errors.js'
import type { EventLog } from './EventLog.js'
import type { ExtensionRegistry } from './ExtensionRegistry.js'
import type { Journal } from './Journal.js'
import type { HolderIndex } from './structures/HolderIndex.js'
import type { TokenMetadata } from './TokenMetadata.js'
import type { ExtensionId, TokenId, TransferHook } from './types.js'
import { assertIdentity, assertTokenId, isNullIdentity } from './utils.js'

export class TokenLifecycle {
  constructor(
    private readonly registry: ExtensionRegistry,
    private readonly holders: HolderIndex,
    private readonly approvals: Approvals,
    private readonly metadata: TokenMetadata,
    private readonly eventLog: EventLog,
    private readonly hook: TransferHook
  ) {}

  /**
   * Create a token owned by `to` inside its assigned extension.
   *
   * @throws RegistryError INVALID_RECIPIENT if `to` is the null identity
   * @throws RegistryError ALREADY_EXISTS if the token exists
   * @throws RegistryError NOT_FOUND if the token id has no extension assignment
   * @throws RegistryError SUPPLY_EXHAUSTED if the extension is full or finalized
   */
  mint(to: PubKeyHex, tokenId: TokenId, journal: Journal): ExtensionId {
    if (isNullIdentity(to)) {
      throw new RegistryError('INVALID_RECIPIENT', 'Cannot mint to the null identity')
    }
    assertIdentity(to, 'recipient')
    assertTokenId(tokenId)
    if (this.registry.exists(tokenId)) {
      throw new RegistryError('ALREADY_EXISTS', `Token ${tokenId} already exists`)
    }
    const extensionId = this.registry.extensionByToken(tokenId)
    if (extensionId === undefined) {
      throw new RegistryError('NOT_FOUND', `Token ${tokenId} is not assigned to an extension`)
    }
    if (this.registry.remainingSupply(extensionId) === 0) {
      throw new RegistryError('SUPPLY_EXHAUSTED', `Extension ${extensionId} has no remaining supply`)
    }

    this.hook.beforeTokenTransfer(NULL_IDENTITY, to, tokenId, 'mint')

    this.registry.insertToken(tokenId, to, journal)
    this.holders.add(to, tokenId, journal)
    this.eventLog.append({ type: 'Transfer', from: NULL_IDENTITY, to, tokenId, extensionId }, journal)
    return extensionId
  }

  /**
   * Destroy a token, clearing its approval and URI suffix.
   *
   * @returns The owner the token was burned from
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  burn(tokenId: TokenId, journal: Journal): PubKeyHex {
    assertTokenId(tokenId)
    const owner = this.registry.ownerOf(tokenId)

    this.hook.beforeTokenTransfer(owner, NULL_IDENTITY, tokenId, 'burn')

    this.approvals.clear(tokenId, journal)
    this.metadata.clear(tokenId, journal)
    this.holders.remove(owner, tokenId, journal)
    const extensionId = this.registry.removeToken(tokenId, journal)
    this.eventLog.append({ type: 'Transfer', from: owner, to: NULL_IDENTITY, tokenId, extensionId }, journal)
    return owner
  }

  /**
   * Move a token from `from` to `to`. Its extension and its position in
   * the extension are unchanged.
   *
   * @throws RegistryError NOT_FOUND if the token does not exist
   * @throws RegistryError OWNER_MISMATCH if `from` is not the current owner
   * @throws RegistryError INVALID_RECIPIENT if `to` is the null identity
   */
  transfer(from: PubKeyHex, to: PubKeyHex, tokenId: TokenId, journal: Journal): ExtensionId {
    assertTokenId(tokenId)
    const owner = this.registry.ownerOf(tokenId)
    if (owner !== from) {
      throw new RegistryError('OWNER_MISMATCH', `Token ${tokenId} is not owned by ${from}`)
    }
    if (isNullIdentity(to)) {
      throw new RegistryError('INVALID_RECIPIENT', 'Cannot transfer to the null identity')
    }
    assertIdentity(to, 'recipient')

    this.hook.beforeTokenTransfer(from, to, tokenId, 'transfer')

    this.approvals.clear(tokenId, journal)
    this.holders.remove(from, tokenId, journal)
    this.holders.add(to, tokenId, journal)
    const extensionId = this.registry.setOwner(tokenId, to, journal)
    this.eventLog.append({ type: 'Transfer', from, to, tokenId, extensionId }, journal)
    return extensionId
  }

  /**
   * Seal an extension at its realized supply.
   *
   * @returns The realized supply
   * @throws RegistryError OUT_OF_RANGE for an unknown extension
   * @throws RegistryError ALREADY_FINALIZED if the extension is already sealed
   */
  finalizeDistribution(extensionId: ExtensionId, journal: Journal): number {
    if (this.registry.isFinalized(extensionId)) {
      throw new RegistryError('ALREADY_FINALIZED', `Extension ${extensionId} is already finalized`)
    }

    this.hook.beforeTokenTransfer(NULL_IDENTITY, NULL_IDENTITY, extensionId, 'finalize')

    const realizedSupply = this.registry.finalizeDistribution(extensionId, journal)
    this.eventLog.append({ type: 'DistributionFinalized', extensionId, realizedSupply }, journal)
    return realizedSupply
  }
}
