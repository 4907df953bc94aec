import type { Journal } from './Journal.js'
import { noopLogger, type Logger } from './logging.js'
import type {
  RegistryEvent,
  RegistryEventListener,
  RegistryEventPayload,
  RegistryEventSource
} from './types.js'

/**
 * EventLog - append-only record of Transfer, Approval, ApprovalForAll and
 * DistributionFinalized events.
 *
 * Sequence numbers start at 0 and equal the entry's position. Entries are
 * frozen when appended. Entries appended by a write that later rolls back
 * are removed again; listeners only ever see committed entries, via
 * publish(), and always in sequence order.
 */
export class EventLog implements RegistryEventSource {
  private readonly entries: RegistryEvent[] = []
  private readonly listeners = new Set<RegistryEventListener>()
  private delivered = 0
  private delivering = false

  constructor(private readonly log: Logger = noopLogger) {}

  /** Sequence number the next appended event will get */
  get nextSequence(): number {
    return this.entries.length
  }

  append(payload: RegistryEventPayload, journal: Journal): RegistryEvent {
    const event: RegistryEvent = Object.freeze({ ...payload, sequence: this.entries.length })
    this.entries.push(event)
    journal.record(() => {
      this.entries.length = event.sequence
    })
    return event
  }

  /**
   * Committed events with a sequence number >= sinceSequence
   */
  events(sinceSequence = 0): readonly RegistryEvent[] {
    return this.entries.slice(Math.max(sinceSequence, 0))
  }

  /**
   * @returns A function that removes the listener
   */
  subscribe(listener: RegistryEventListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  /**
   * Deliver every committed event not yet delivered to the listeners.
   *
   * A write made by a listener publishes while delivery is in progress;
   * its events are queued behind the ones still being delivered. A failing
   * listener is logged and does not stop delivery to the others.
   */
  publish(): void {
    if (this.delivering) return
    this.delivering = true
    try {
      while (this.delivered < this.entries.length) {
        const event = this.entries[this.delivered]
        this.delivered += 1
        for (const listener of this.listeners) {
          try {
            listener(event)
          } catch (error) {
            this.log.error(`Listener failed on ${event.type} #${event.sequence}:`, error)
          }
        }
      }
    } finally {
      this.delivering = false
    }
  }
}
