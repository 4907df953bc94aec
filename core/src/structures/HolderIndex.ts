import type { PubKeyHex } from '@bsv/sdk'
import { RegistryError } from '../errors.js'
import type { Journal } from '../Journal.js'
import type { TokenId } from '../types.js'
import { EnumerableSet } from './EnumerableSet.js'

/**
 * HolderIndex - which tokens each identity holds.
 *
 * One EnumerableSet per holder, created on the first token and dropped
 * when it becomes empty. Mutations record their inverse in the journal.
 */
export class HolderIndex {
  private readonly holdings = new Map<PubKeyHex, EnumerableSet<TokenId>>()

  balanceOf(owner: PubKeyHex): number {
    return this.holdings.get(owner)?.length() ?? 0
  }

  contains(owner: PubKeyHex, tokenId: TokenId): boolean {
    return this.holdings.get(owner)?.contains(tokenId) ?? false
  }

  /**
   * @throws RegistryError OUT_OF_RANGE unless 0 <= index < balanceOf(owner)
   */
  tokenOfOwnerByIndex(owner: PubKeyHex, index: number): TokenId {
    const tokens = this.holdings.get(owner)
    if (tokens === undefined) {
      throw new RegistryError('OUT_OF_RANGE', `Index ${index} out of range for a holder with no tokens`)
    }
    return tokens.at(index)
  }

  tokensOf(owner: PubKeyHex): TokenId[] {
    return this.holdings.get(owner)?.values() ?? []
  }

  /** Number of identities currently holding at least one token */
  holderCount(): number {
    return this.holdings.size
  }

  add(owner: PubKeyHex, tokenId: TokenId, journal: Journal): void {
    let tokens = this.holdings.get(owner)
    if (tokens === undefined) {
      tokens = new EnumerableSet<TokenId>()
      this.holdings.set(owner, tokens)
    }
    if (!tokens.add(tokenId)) {
      throw new RegistryError('ALREADY_EXISTS', `Token ${tokenId} already held by ${owner}`)
    }
    journal.record(() => this.detach(owner, tokenId))
  }

  remove(owner: PubKeyHex, tokenId: TokenId, journal: Journal): void {
    const tokens = this.holdings.get(owner)
    const position = tokens?.indexOf(tokenId) ?? -1
    if (tokens === undefined || position === -1) {
      throw new RegistryError('NOT_FOUND', `Token ${tokenId} not held by ${owner}`)
    }
    this.detach(owner, tokenId)
    journal.record(() => this.reattach(owner, tokenId, position))
  }

  private detach(owner: PubKeyHex, tokenId: TokenId): void {
    const tokens = this.holdings.get(owner)
    if (tokens === undefined) return
    tokens.remove(tokenId)
    if (tokens.length() === 0) {
      this.holdings.delete(owner)
    }
  }

  private reattach(owner: PubKeyHex, tokenId: TokenId, position: number): void {
    let tokens = this.holdings.get(owner)
    if (tokens === undefined) {
      tokens = new EnumerableSet<TokenId>()
      this.holdings.set(owner, tokens)
    }
    tokens.restore(tokenId, position)
  }
}
