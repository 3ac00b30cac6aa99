import { EventRecorder } from '../recorder';

import type { EventInput, RecordedEvent } from '../recorder';

/** configuration options for in-memory event recording */
export interface MemoryEventRecorderOptions {
  /** maximum number of events kept, the oldest being dropped first */
  maxEvents?: number;
  /** clock used to timestamp events */
  now?: () => number;
}

/**
 * in-memory event recorder
 * keeps events in insertion order without persistence
 */
export class MemoryEventRecorder extends EventRecorder {
  readonly #events: RecordedEvent[] = [];
  readonly #listeners = new Set<(event: RecordedEvent) => void>();
  readonly #maxEvents?: number;
  readonly #now: () => number;
  #nextId = 0;

  /**
   * creates a new recorder with optional configuration
   * @param options recorder configuration options
   */
  constructor(options?: MemoryEventRecorderOptions) {
    super();

    this.#maxEvents = options?.maxEvents;
    this.#now = options?.now ?? Date.now;
  }

  /** number of events currently kept */
  public get size(): number {
    return this.#events.length;
  }

  public record(input: EventInput): RecordedEvent {
    const event: RecordedEvent = {
      id: this.#nextId++,
      occurredAt: this.#now(),
      ...input,
    };

    this.#events.push(event);

    if (this.#maxEvents !== undefined && this.#events.length > this.#maxEvents) {
      this.#events.splice(0, this.#events.length - this.#maxEvents);
    }

    for (const listener of this.#listeners) {
      listener(event);
    }

    return event;
  }

  public query(sinceId = -1): RecordedEvent[] {
    return this.#events.filter(({ id }) => id > sinceId);
  }

  public subscribe(listener: (event: RecordedEvent) => void): () => void {
    this.#listeners.add(listener);

    return () => {
      this.#listeners.delete(listener);
    };
  }

  public reset(): void {
    this.#events.length = 0;
  }
}
