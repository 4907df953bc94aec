/**
 * ExtensionRegistry - the partitioned token space.
 *
 * Holds the ordered list of supply extensions, each with its own
 * EnumerableMap of live tokens to owners, and the immutable token to
 * extension assignment made at provisioning time. Global enumeration
 * visits extensions in ascending order and, inside each one, follows that
 * extension's own enumeration order.
 */

import type { PubKeyHex } from '@bsv/sdk'
import { RegistryError } from './errors.js'
import type { Journal } from './Journal.js'
import { noopLogger, type Logger } from './logging.js'
import { EnumerableMap } from './structures/EnumerableMap.js'
import type { ExtensionId, ExtensionInfo, TokenId } from './types.js'
import { assertDistinctTokenIds, assertTargetSupply, assertTokenId } from './utils.js'

interface Extension {
  readonly id: ExtensionId
  targetSupply: number
  finalized: boolean
  readonly tokens: EnumerableMap<TokenId, PubKeyHex>
}

export class ExtensionRegistry {
  private readonly extensions: Extension[] = []
  private readonly assignments = new Map<TokenId, ExtensionId>()
  private liveSupply = 0
  private finalizedTotal = 0

  constructor(private readonly log: Logger = noopLogger) {}

  // ---------------------------------------------------------------------------
  // Provisioning
  // ---------------------------------------------------------------------------

  /**
   * Append a new extension and assign token ids to it.
   *
   * @param targetSupply - Upper bound on live tokens in the extension
   * @param tokenIds - Token ids assigned to the new extension
   * @returns The new extension's id
   * @throws RegistryError ALREADY_EXISTS if a token id is already assigned
   */
  createExtension(targetSupply: number, tokenIds: readonly TokenId[], journal: Journal): ExtensionId {
    assertTargetSupply(targetSupply)
    this.assertAssignable(tokenIds)

    const id = this.extensions.length
    this.extensions.push({
      id,
      targetSupply,
      finalized: false,
      tokens: new EnumerableMap<TokenId, PubKeyHex>()
    })
    journal.record(() => {
      this.extensions.pop()
    })
    this.recordAssignments(id, tokenIds, journal)

    this.log.info(`Created extension ${id} with target supply ${targetSupply} and ${tokenIds.length} assigned tokens`)
    return id
  }

  /**
   * Assign further token ids to an existing extension.
   */
  assignTokens(extensionId: ExtensionId, tokenIds: readonly TokenId[], journal: Journal): void {
    const extension = this.extension(extensionId)
    if (extension.finalized) {
      throw new RegistryError('ALREADY_FINALIZED', `Extension ${extensionId} is finalized`)
    }
    this.assertAssignable(tokenIds)
    this.recordAssignments(extensionId, tokenIds, journal)
    this.log.debug(`Assigned ${tokenIds.length} tokens to extension ${extensionId}`)
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  extensionCount(): number {
    return this.extensions.length
  }

  /**
   * Target supply of an extension (the realized count once finalized).
   *
   * @throws RegistryError OUT_OF_RANGE if the extension does not exist
   */
  supplyOfExtension(extensionId: ExtensionId): number {
    return this.extension(extensionId).targetSupply
  }

  /** Number of live tokens in an extension */
  realizedSupplyOfExtension(extensionId: ExtensionId): number {
    return this.extension(extensionId).tokens.length()
  }

  /**
   * How many more tokens may be minted into an extension
   */
  remainingSupply(extensionId: ExtensionId): number {
    const extension = this.extension(extensionId)
    if (extension.finalized) return 0
    return Math.max(extension.targetSupply - extension.tokens.length(), 0)
  }

  isFinalized(extensionId: ExtensionId): boolean {
    return this.extension(extensionId).finalized
  }

  getExtension(extensionId: ExtensionId): ExtensionInfo {
    const extension = this.extension(extensionId)
    return {
      id: extension.id,
      targetSupply: extension.targetSupply,
      realizedSupply: extension.tokens.length(),
      finalized: extension.finalized
    }
  }

  /**
   * The extension a token id was assigned to, or undefined for ids never
   * provisioned. Says nothing about whether the token currently exists.
   */
  extensionByToken(tokenId: TokenId): ExtensionId | undefined {
    return this.assignments.get(tokenId)
  }

  /**
   * @throws RegistryError OUT_OF_RANGE for an unknown extension or an index past its live count
   */
  tokenByExtensionAndIndex(extensionId: ExtensionId, index: number): TokenId {
    return this.extension(extensionId).tokens.at(index)[0]
  }

  /** Number of live tokens across all extensions */
  totalSupply(): number {
    return this.liveSupply
  }

  /** Sum of the realized counts snapshotted by finalizeDistribution */
  finalizedSupply(): number {
    return this.finalizedTotal
  }

  /**
   * Resolve a global index into a token id.
   *
   * Buckets by each extension's live count, so the result is a bijection
   * from [0, totalSupply()) onto the live tokens whether or not the
   * extensions have been finalized.
   *
   * @throws RegistryError OUT_OF_RANGE if globalIndex >= totalSupply()
   */
  tokenByIndex(globalIndex: number): TokenId {
    if (!Number.isInteger(globalIndex) || globalIndex < 0 || globalIndex >= this.liveSupply) {
      throw new RegistryError(
        'OUT_OF_RANGE',
        `Global index ${globalIndex} out of range for total supply ${this.liveSupply}`
      )
    }

    let remaining = globalIndex
    for (const extension of this.extensions) {
      const count = extension.tokens.length()
      if (remaining < count) {
        return extension.tokens.at(remaining)[0]
      }
      remaining -= count
    }
    throw new RegistryError('OUT_OF_RANGE', `Global index ${globalIndex} did not resolve to a token`)
  }

  exists(tokenId: TokenId): boolean {
    const extensionId = this.assignments.get(tokenId)
    if (extensionId === undefined) return false
    return this.extensions[extensionId].tokens.contains(tokenId)
  }

  /**
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  ownerOf(tokenId: TokenId): PubKeyHex {
    const owner = this.tryOwnerOf(tokenId)
    if (owner === undefined) {
      throw new RegistryError('NOT_FOUND', `Token ${tokenId} does not exist`)
    }
    return owner
  }

  tryOwnerOf(tokenId: TokenId): PubKeyHex | undefined {
    const extensionId = this.assignments.get(tokenId)
    if (extensionId === undefined) return undefined
    return this.extensions[extensionId].tokens.tryGet(tokenId)
  }

  /**
   * Position of a live token inside its extension's enumeration.
   *
   * @throws RegistryError NOT_FOUND if the token does not exist
   */
  positionOf(tokenId: TokenId): number {
    const extensionId = this.assignments.get(tokenId)
    const position = extensionId === undefined ? -1 : this.extensions[extensionId].tokens.indexOf(tokenId)
    if (position === -1) {
      throw new RegistryError('NOT_FOUND', `Token ${tokenId} does not exist`)
    }
    return position
  }

  // ---------------------------------------------------------------------------
  // Mutations (called by TokenLifecycle after its checks)
  // ---------------------------------------------------------------------------

  /**
   * Add a token to its assigned extension with the given owner.
   */
  insertToken(tokenId: TokenId, owner: PubKeyHex, journal: Journal): ExtensionId {
    const extension = this.assignedExtension(tokenId)
    if (!extension.tokens.set(tokenId, owner)) {
      throw new RegistryError('ALREADY_EXISTS', `Token ${tokenId} already exists`)
    }
    this.liveSupply += 1
    journal.record(() => {
      extension.tokens.remove(tokenId)
      this.liveSupply -= 1
    })
    return extension.id
  }

  /**
   * Remove a live token from its extension.
   */
  removeToken(tokenId: TokenId, journal: Journal): ExtensionId {
    const extension = this.assignedExtension(tokenId)
    const position = extension.tokens.indexOf(tokenId)
    const owner = extension.tokens.get(tokenId)

    extension.tokens.remove(tokenId)
    this.liveSupply -= 1
    journal.record(() => {
      extension.tokens.restore(tokenId, owner, position)
      this.liveSupply += 1
    })
    return extension.id
  }

  /**
   * Change a live token's owner without moving it in its extension.
   */
  setOwner(tokenId: TokenId, owner: PubKeyHex, journal: Journal): ExtensionId {
    const extension = this.assignedExtension(tokenId)
    const previous = extension.tokens.get(tokenId)

    extension.tokens.set(tokenId, owner)
    journal.record(() => {
      extension.tokens.set(tokenId, previous)
    })
    return extension.id
  }

  /**
   * Seal an extension: its realized live count replaces the pledged target
   * supply and is added to the finalized total.
   *
   * @returns The realized supply
   * @throws RegistryError ALREADY_FINALIZED on a second call for the same extension
   */
  finalizeDistribution(extensionId: ExtensionId, journal: Journal): number {
    const extension = this.extension(extensionId)
    if (extension.finalized) {
      throw new RegistryError('ALREADY_FINALIZED', `Extension ${extensionId} is already finalized`)
    }

    const pledged = extension.targetSupply
    const realized = extension.tokens.length()
    extension.targetSupply = realized
    extension.finalized = true
    this.finalizedTotal += realized
    journal.record(() => {
      extension.targetSupply = pledged
      extension.finalized = false
      this.finalizedTotal -= realized
    })

    this.log.info(`Finalized extension ${extensionId}: ${realized} of ${pledged} pledged`)
    return realized
  }

  // ---------------------------------------------------------------------------
  // Private Methods
  // ---------------------------------------------------------------------------

  private extension(extensionId: ExtensionId): Extension {
    if (!Number.isInteger(extensionId) || extensionId < 0 || extensionId >= this.extensions.length) {
      throw new RegistryError(
        'OUT_OF_RANGE',
        `Extension ${extensionId} out of range for ${this.extensions.length} extensions`
      )
    }
    return this.extensions[extensionId]
  }

  private assignedExtension(tokenId: TokenId): Extension {
    assertTokenId(tokenId)
    const extensionId = this.assignments.get(tokenId)
    if (extensionId === undefined) {
      throw new RegistryError('NOT_FOUND', `Token ${tokenId} is not assigned to an extension`)
    }
    return this.extensions[extensionId]
  }

  private assertAssignable(tokenIds: readonly TokenId[]): void {
    assertDistinctTokenIds(tokenIds)
    for (const tokenId of tokenIds) {
      const existing = this.assignments.get(tokenId)
      if (existing !== undefined) {
        throw new RegistryError('ALREADY_EXISTS', `Token ${tokenId} is already assigned to extension ${existing}`)
      }
    }
  }

  private recordAssignments(extensionId: ExtensionId, tokenIds: readonly TokenId[], journal: Journal): void {
    const assigned = [...tokenIds]
    for (const tokenId of assigned) {
      this.assignments.set(tokenId, extensionId)
    }
    journal.record(() => {
      for (const tokenId of assigned) {
        this.assignments.delete(tokenId)
      }
    })
  }
}
