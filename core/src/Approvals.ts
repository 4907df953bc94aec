import type { PubKeyHex } from '@bsv/sdk'
import type { Journal } from './Journal.js'
import type { TokenId } from './types.js'

/**
 * Per-token approvals and per-owner operators.
 */
export class Approvals {
  private readonly tokenApprovals = new Map<TokenId, PubKeyHex>()
  private readonly operators = new Map<PubKeyHex, Set<PubKeyHex>>()

  getApproved(tokenId: TokenId): PubKeyHex | undefined {
    return this.tokenApprovals.get(tokenId)
  }

  isApprovedForAll(owner: PubKeyHex, operator: PubKeyHex): boolean {
    return this.operators.get(owner)?.has(operator) ?? false
  }

  approve(tokenId: TokenId, approved: PubKeyHex, journal: Journal): void {
    const previous = this.tokenApprovals.get(tokenId)
    this.tokenApprovals.set(tokenId, approved)
    journal.record(() => this.put(tokenId, previous))
  }

  clear(tokenId: TokenId, journal: Journal): void {
    const previous = this.tokenApprovals.get(tokenId)
    if (previous === undefined) return
    this.tokenApprovals.delete(tokenId)
    journal.record(() => this.put(tokenId, previous))
  }

  setApprovalForAll(owner: PubKeyHex, operator: PubKeyHex, approved: boolean, journal: Journal): void {
    const wasApproved = this.isApprovedForAll(owner, operator)
    if (wasApproved === approved) return
    this.toggleOperator(owner, operator, approved)
    journal.record(() => this.toggleOperator(owner, operator, wasApproved))
  }

  private put(tokenId: TokenId, approved: PubKeyHex | undefined): void {
    if (approved === undefined) {
      this.tokenApprovals.delete(tokenId)
    } else {
      this.tokenApprovals.set(tokenId, approved)
    }
  }

  private toggleOperator(owner: PubKeyHex, operator: PubKeyHex, approved: boolean): void {
    let granted = this.operators.get(owner)
    if (approved) {
      if (granted === undefined) {
        granted = new Set<PubKeyHex>()
        this.operators.set(owner, granted)
      }
      granted.add(operator)
      return
    }
    granted?.delete(operator)
    if (granted !== undefined && granted.size === 0) {
      this.operators.delete(owner)
    }
  }
}
