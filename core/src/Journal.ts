/**
 * Journal - all-or-nothing writes
 *
 * Every state change made during a public write records its exact
 * inverse here. If the write fails at any point, the inverses run in
 * reverse order and the registry is left as it was before the call.
 */

export type Inverse = () => void

export class Journal {
  private readonly inverses: Inverse[] = []

  /**
   * Record the inverse of a change that has just been applied.
   */
  record(inverse: Inverse): void {
    this.inverses.push(inverse)
  }

  /** Number of changes recorded so far */
  get size(): number {
    return this.inverses.length
  }

  /**
   * Undo every recorded change, newest first. The journal is empty afterwards.
   */
  rollback(): void {
    let inverse = this.inverses.pop()
    while (inverse !== undefined) {
      inverse()
      inverse = this.inverses.pop()
    }
  }
}
