import type { Journal } from './Journal.js'
import type { TokenId } from './types.js'

/**
 * Token URIs: a collection-wide base URI plus an optional per-token suffix.
 *
 * Without a suffix the token id is appended to the base URI; with an empty
 * base URI and no suffix the URI is the empty string.
 */
export class TokenMetadata {
  private readonly suffixes = new Map<TokenId, string>()

  constructor(private baseURI: string) {}

  getBaseURI(): string {
    return this.baseURI
  }

  setBaseURI(baseURI: string): void {
    this.baseURI = baseURI
  }

  tokenURI(tokenId: TokenId): string {
    const suffix = this.suffixes.get(tokenId)
    if (suffix !== undefined) {
      return `${this.baseURI}${suffix}`
    }
    return this.baseURI === '' ? '' : `${this.baseURI}${tokenId}`
  }

  setSuffix(tokenId: TokenId, suffix: string, journal: Journal): void {
    const previous = this.suffixes.get(tokenId)
    this.suffixes.set(tokenId, suffix)
    journal.record(() => this.put(tokenId, previous))
  }

  clear(tokenId: TokenId, journal: Journal): void {
    const previous = this.suffixes.get(tokenId)
    if (previous === undefined) return
    this.suffixes.delete(tokenId)
    journal.record(() => this.put(tokenId, previous))
  }

  private put(tokenId: TokenId, suffix: string | undefined): void {
    if (suffix === undefined) {
      this.suffixes.delete(tokenId)
    } else {
      this.suffixes.set(tokenId, suffix)
    }
  }
}
