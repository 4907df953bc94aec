/**
 * Shared fixtures for the registry tests.
 */

import type { ExtensibleCollection } from '../ExtensibleCollection.js'

export const ALICE = '02' + 'a'.repeat(64)
export const BOB = '03' + 'b'.repeat(64)
export const CAROL = '02' + 'c'.repeat(64)
export const DAVE = '03' + 'd'.repeat(64)

/**
 * Run fn and return what it threw, or undefined if it returned normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn()
  } catch (error) {
    return error
  }
  return undefined
}

/**
 * Assert the global invariants of a collection:
 * - totalSupply equals the sum of realized extension supplies
 * - every live token sits in exactly one extension and one holder set
 * - tokenByIndex is a bijection onto the live tokens
 */
export function expectConsistent(collection: ExtensibleCollection, holders: string[]): void {
  let realized = 0
  const seen = new Set<number>()
  for (let extensionId = 0; extensionId < collection.extensionCount(); extensionId++) {
    const info = collection.getExtension(extensionId)
    realized += info.realizedSupply
    for (let index = 0; index < info.realizedSupply; index++) {
      const tokenId = collection.tokenByExtensionAndIndex(extensionId, index)
      expect(seen.has(tokenId)).toBe(false)
      seen.add(tokenId)
      expect(collection.extensionByToken(tokenId)).toBe(extensionId)
      expect(collection.positionOf(tokenId)).toBe(index)
    }
  }
  expect(collection.totalSupply()).toBe(realized)

  const byIndex = new Set<number>()
  for (let index = 0; index < collection.totalSupply(); index++) {
    byIndex.add(collection.tokenByIndex(index))
  }
  expect(byIndex).toEqual(seen)

  let held = 0
  for (const holder of holders) {
    const balance = collection.balanceOf(holder)
    held += balance
    for (let index = 0; index < balance; index++) {
      const tokenId = collection.tokenOfOwnerByIndex(holder, index)
      expect(collection.ownerOf(tokenId)).toBe(holder)
    }
  }
  expect(held).toBe(realized)
}
