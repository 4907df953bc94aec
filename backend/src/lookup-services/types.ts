import type { PubKeyHex } from '@bsv/sdk'

/**
 * Query parameters for holding lookups
 */
export interface HoldingQuery {
  tokenId?: number
  ownerKey?: PubKeyHex
  extensionId?: number
  limit?: number
  skip?: number
  sortOrder?: 'asc' | 'desc'
}

/**
 * A question addressed to a lookup service
 */
export interface LookupQuestion {
  service: string
  query: unknown
}

/**
 * A record stored in the holdings database: one per live token
 */
export interface HoldingRecord {
  tokenId: number
  extensionId: number
  ownerKey: PubKeyHex
  createdAt: Date
  updatedAt: Date
}

/**
 * Filters accepted by the storage manager
 */
export interface HoldingFilters {
  ownerKey?: PubKeyHex
  extensionId?: number
}

/**
 * Persistence operations the lookup service relies on
 */
export interface HoldingStore {
  storeRecord: (tokenId: number, extensionId: number, ownerKey: PubKeyHex) => Promise<void>
  updateOwner: (tokenId: number, ownerKey: PubKeyHex) => Promise<void>
  deleteRecord: (tokenId: number) => Promise<void>
  findWithFilters: (filters: HoldingFilters, limit?: number, skip?: number, sortOrder?: 'asc' | 'desc') => Promise<HoldingRecord[]>
  findAllRecords: (limit?: number, skip?: number, sortOrder?: 'asc' | 'desc') => Promise<HoldingRecord[]>
  findByTokenId: (tokenId: number) => Promise<HoldingRecord | null>
}
