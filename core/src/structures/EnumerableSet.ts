import { EnumerableMap } from './EnumerableMap.js'

/**
 * EnumerableSet - an EnumerableMap without values.
 *
 * Same contract: O(1) add, remove, contains and positional access;
 * removal swaps the last member into the gap.
 */
export class EnumerableSet<T> {
  private readonly members = new EnumerableMap<T, true>()

  /** @returns true if the value was not already a member */
  add(value: T): boolean {
    if (this.members.contains(value)) return false
    return this.members.set(value, true)
  }

  /** @returns true if the value was a member */
  remove(value: T): boolean {
    return this.members.remove(value)
  }

  contains(value: T): boolean {
    return this.members.contains(value)
  }

  length(): number {
    return this.members.length()
  }

  /**
   * @throws RegistryError OUT_OF_RANGE unless 0 <= position < length()
   */
  at(position: number): T {
    return this.members.at(position)[0]
  }

  indexOf(value: T): number {
    return this.members.indexOf(value)
  }

  values(): T[] {
    return this.members.keys()
  }

  /** Exact inverse of remove(value) when given the position it had */
  restore(value: T, position: number): void {
    this.members.restore(value, true, position)
  }
}
