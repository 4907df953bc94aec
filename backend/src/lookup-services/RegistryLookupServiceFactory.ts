import { HoldingStorageManager } from './HoldingStorageManager.js'
import { isNullIdentity, isValidIdentity, RegistryEvent, RegistryEventSource } from '@extensible-nft/core'
import { Db } from 'mongodb'
import { HoldingQuery, HoldingRecord, HoldingStore, LookupQuestion } from './types.js'
import docs from '../docs/RegistryLookupDocs.js'

/**
 * Implements a lookup service for extensible collection holdings
 * @public
 */
class RegistryLookupService {
  static readonly SERVICE_ID = 'ls_extensible_nft'

  private cursor = 0
  private queue: Promise<unknown> = Promise.resolve()

  constructor (public storageManager: HoldingStore) { }

  /**
   * Sequence number of the next event this service expects
   */
  get nextSequence (): number {
    return this.cursor
  }

  /**
   * Apply one committed registry event to the holdings store.
   *
   * Events are applied one at a time in the order they arrive. An event
   * already applied is skipped; one past the next expected sequence is
   * rejected, since the events before it would never be indexed.
   */
  async eventCommitted (event: RegistryEvent): Promise<void> {
    await this.enqueue(async () => await this.apply(event))
  }

  /**
   * Ingest every event the source committed since the last sync.
   *
   * @returns The number of events applied
   */
  async sync (source: RegistryEventSource): Promise<number> {
    return await this.enqueue(async () => {
      const pending = source.events(this.cursor)
      for (const event of pending) {
        await this.apply(event)
      }
      return pending.length
    })
  }

  async lookup (question: LookupQuestion): Promise<HoldingRecord[]> {
    if (question.query === undefined || question.query === null) {
      throw new Error('A valid query must be provided')
    }
    if (question.service !== RegistryLookupService.SERVICE_ID) {
      throw new Error('Lookup service not supported')
    }

    const query = question.query
    if (!isHoldingQuery(query)) {
      throw new Error('Malformed holdings query')
    }

    if (query.tokenId !== undefined) {
      const record = await this.storageManager.findByTokenId(query.tokenId)
      return record === null ? [] : [record]
    }

    const hasFilters = query.ownerKey !== undefined || query.extensionId !== undefined

    if (hasFilters) {
      return await this.storageManager.findWithFilters(
        {
          ownerKey: query.ownerKey,
          extensionId: query.extensionId
        },
        query.limit,
        query.skip,
        query.sortOrder
      )
    }

    return await this.storageManager.findAllRecords(
      query.limit,
      query.skip,
      query.sortOrder
    )
  }

  async getDocumentation (): Promise<string> {
    return docs
  }

  async getMetaData (): Promise<{
    name: string
    shortDescription: string
    iconURL?: string
    version?: string
    informationURL?: string
  }> {
    return {
      name: 'Extensible NFT Holdings Lookup',
      shortDescription: 'Find live tokens by owner key, extension or token id.'
    }
  }

  private async enqueue<T> (task: () => Promise<T>): Promise<T> {
    const result = this.queue.then(task)
    // A failed task has already reached its own caller
    this.queue = result.then(() => undefined, () => undefined)
    return await result
  }

  private async apply (event: RegistryEvent): Promise<void> {
    if (event.sequence < this.cursor) {
      return
    }
    if (event.sequence > this.cursor) {
      throw new Error(`Expected registry event #${this.cursor} but received #${event.sequence}`)
    }

    try {
      if (event.type === 'Transfer') {
        if (isNullIdentity(event.from)) {
          await this.storageManager.storeRecord(event.tokenId, event.extensionId, event.to)
        } else if (isNullIdentity(event.to)) {
          await this.storageManager.deleteRecord(event.tokenId)
        } else {
          await this.storageManager.updateOwner(event.tokenId, event.to)
        }
      }
    } catch (error) {
      console.error(`Error processing registry event #${event.sequence}:`, error)
      throw error
    }

    this.cursor = event.sequence + 1
  }
}

const isOptionalCount = (value: unknown): boolean =>
  value === undefined || (typeof value === 'number' && Number.isInteger(value) && value >= 0)

function isHoldingQuery (value: unknown): value is HoldingQuery {
  if (typeof value !== 'object' || value === null) return false
  const query: Record<string, unknown> = { ...value }

  if (query.ownerKey !== undefined && (typeof query.ownerKey !== 'string' || !isValidIdentity(query.ownerKey))) {
    return false
  }
  if (query.sortOrder !== undefined && query.sortOrder !== 'asc' && query.sortOrder !== 'desc') {
    return false
  }
  return isOptionalCount(query.tokenId) &&
    isOptionalCount(query.extensionId) &&
    isOptionalCount(query.skip) &&
    isOptionalCount(query.limit)
}

// Factory function
export default (db: Db): RegistryLookupService => {
  return new RegistryLookupService(new HoldingStorageManager(db))
}

export { RegistryLookupService }
