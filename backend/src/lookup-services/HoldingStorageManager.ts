import { Collection, Db, Filter } from 'mongodb'
import { PubKeyHex } from '@bsv/sdk'
import { HoldingFilters, HoldingRecord, HoldingStore } from './types.js'

/**
 * Storage manager for the holdings lookup using MongoDB.
 */
export class HoldingStorageManager implements HoldingStore {
  private readonly records: Collection<HoldingRecord>

  /**
   * @param db A connected MongoDB database handle.
   */
  constructor (db: Db) {
    this.records = db.collection<HoldingRecord>('holdingRecords')

    // One record per live token
    this.records
      .createIndex({ tokenId: 1 }, { unique: true })
      .catch(console.error)

    this.records
      .createIndex({ ownerKey: 1 })
      .catch(console.error)

    this.records
      .createIndex({ extensionId: 1, tokenId: 1 })
      .catch(console.error)
  }

  /**
   * Insert a record for a newly minted token.
   */
  async storeRecord (
    tokenId: number,
    extensionId: number,
    ownerKey: PubKeyHex
  ): Promise<void> {
    const now = new Date()
    const record: HoldingRecord = {
      tokenId,
      extensionId,
      ownerKey,
      createdAt: now,
      updatedAt: now
    }
    await this.records.insertOne(record)
  }

  /**
   * Record a new owner for a token.
   */
  async updateOwner (tokenId: number, ownerKey: PubKeyHex): Promise<void> {
    await this.records.updateOne(
      { tokenId },
      { $set: { ownerKey, updatedAt: new Date() } }
    )
  }

  /**
   * Remove the record of a burned token.
   */
  async deleteRecord (tokenId: number): Promise<void> {
    await this.records.deleteOne({ tokenId })
  }

  /**
   * Find records with dynamic filter combinations.
   */
  async findWithFilters (
    filters: HoldingFilters,
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'asc'
  ): Promise<HoldingRecord[]> {
    const query: Filter<HoldingRecord> = {}

    if (filters.ownerKey !== undefined) {
      query.ownerKey = filters.ownerKey
    }

    if (filters.extensionId !== undefined) {
      query.extensionId = filters.extensionId
    }

    return await this.findRecordWithQuery(query, limit, skip, sortOrder)
  }

  /**
   * Fetch all holding records without filtering, with pagination and sorting.
   */
  async findAllRecords (
    limit: number = 50,
    skip: number = 0,
    sortOrder: 'asc' | 'desc' = 'asc'
  ): Promise<HoldingRecord[]> {
    return await this.findRecordWithQuery({}, limit, skip, sortOrder)
  }

  async findByTokenId (tokenId: number): Promise<HoldingRecord | null> {
    return await this.records.findOne({ tokenId })
  }

  private async findRecordWithQuery (
    query: Filter<HoldingRecord>,
    limit: number,
    skip: number,
    sortOrder: 'asc' | 'desc'
  ): Promise<HoldingRecord[]> {
    const sortDirection = sortOrder === 'desc' ? -1 : 1

    return await this.records
      .find(query)
      .sort({ tokenId: sortDirection })
      .skip(skip)
      .limit(limit)
      .toArray()
  }
}
