import { RegistryError } from '../errors.js'

/**
 * EnumerableMap - keyed storage with O(1) positional access.
 *
 * Entries live in a dense array; a side index maps each key to its slot.
 * Insertion appends. Removal moves the last entry into the vacated slot,
 * so enumeration order is NOT stable across removals: only completeness
 * and uniqueness are guaranteed.
 *
 * @example
 * ```typescript
 * const owners = new EnumerableMap<number, string>()
 * owners.set(7, alice)
 * owners.set(9, bob)
 * owners.at(1) // [9, bob]
 * owners.remove(7)
 * owners.at(0) // [9, bob]
 * ```
 */
export class EnumerableMap<K, V> {
  private readonly entries: Array<[K, V]> = []
  private readonly positions = new Map<K, number>()

  /**
   * Insert a key, or update its value in place if present.
   *
   * @returns true if the key was inserted, false if it was updated
   */
  set(key: K, value: V): boolean {
    const position = this.positions.get(key)
    if (position !== undefined) {
      this.entries[position] = [key, value]
      return false
    }
    this.positions.set(key, this.entries.length)
    this.entries.push([key, value])
    return true
  }

  /**
   * @throws RegistryError NOT_FOUND if the key is absent
   */
  get(key: K): V {
    const position = this.positions.get(key)
    if (position === undefined) {
      throw new RegistryError('NOT_FOUND', `Key ${String(key)} not found`)
    }
    return this.entries[position][1]
  }

  tryGet(key: K): V | undefined {
    const position = this.positions.get(key)
    return position === undefined ? undefined : this.entries[position][1]
  }

  /**
   * Remove a key. No-op if absent. O(1), disturbs order.
   *
   * @returns true if the key was present
   */
  remove(key: K): boolean {
    const position = this.positions.get(key)
    if (position === undefined) return false

    const lastIndex = this.entries.length - 1
    if (position !== lastIndex) {
      const last = this.entries[lastIndex]
      this.entries[position] = last
      this.positions.set(last[0], position)
    }
    this.entries.pop()
    this.positions.delete(key)
    return true
  }

  contains(key: K): boolean {
    return this.positions.has(key)
  }

  length(): number {
    return this.entries.length
  }

  /**
   * Entry at a position.
   *
   * @throws RegistryError OUT_OF_RANGE unless 0 <= position < length()
   */
  at(position: number): [K, V] {
    if (!Number.isInteger(position) || position < 0 || position >= this.entries.length) {
      throw new RegistryError(
        'OUT_OF_RANGE',
        `Position ${position} out of range for length ${this.entries.length}`
      )
    }
    const [key, value] = this.entries[position]
    return [key, value]
  }

  /**
   * Current position of a key, or -1 if absent
   */
  indexOf(key: K): number {
    return this.positions.get(key) ?? -1
  }

  keys(): K[] {
    return this.entries.map(([key]) => key)
  }

  /**
   * Put a removed entry back at the position it was removed from.
   *
   * Applied right after remove(key), this is its exact inverse: the entry
   * that filled the gap goes back to the tail.
   *
   * @throws RegistryError ALREADY_EXISTS if the key is present
   * @throws RegistryError OUT_OF_RANGE unless 0 <= position <= length()
   */
  restore(key: K, value: V, position: number): void {
    if (this.positions.has(key)) {
      throw new RegistryError('ALREADY_EXISTS', `Key ${String(key)} already present`)
    }
    const tail = this.entries.length
    if (!Number.isInteger(position) || position < 0 || position > tail) {
      throw new RegistryError('OUT_OF_RANGE', `Cannot restore at ${position} for length ${tail}`)
    }

    this.entries.push([key, value])
    this.positions.set(key, tail)
    if (position === tail) return

    const displaced = this.entries[position]
    this.entries[position] = [key, value]
    this.entries[tail] = displaced
    this.positions.set(key, position)
    this.positions.set(displaced[0], tail)
  }
}
