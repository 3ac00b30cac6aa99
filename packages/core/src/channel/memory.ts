import { TransportClosedError } from '../error';

import type { JsonRpcMessage } from '@duplexmcp/protocol';

import type { Channel } from './channel';

const CLOSED = Symbol('closed');

type Slot = JsonRpcMessage | typeof CLOSED;

/** unbounded fifo queue whose readers wait for the next slot */
class SlotQueue {
  readonly #slots: Slot[] = [];
  readonly #waiters: Array<(slot: Slot) => void> = [];

  /** hands the slot to the oldest waiting reader, or buffers it */
  public put(slot: Slot): void {
    const waiter = this.#waiters.shift();

    if (waiter) {
      waiter(slot);
    } else {
      this.#slots.push(slot);
    }
  }

  /** takes the oldest buffered slot, waiting for one when the queue is empty */
  public async take(): Promise<Slot> {
    const slot = this.#slots.shift();

    if (slot !== undefined) {
      return slot;
    }

    return new Promise<Slot>((resolve) => this.#waiters.push(resolve));
  }
}

/**
 * one end of an in-process channel pair
 *
 * messages are structurally cloned on send so that neither peer can observe
 * later mutations made by the other.
 */
export class MemoryChannel implements Channel {
  readonly #incoming: SlotQueue;
  readonly #outgoing: SlotQueue;
  #closed = false;
  #halted = false;
  #drained = false;

  /**
   * @param incoming queue this end reads from
   * @param outgoing queue this end writes to
   */
  constructor(incoming: SlotQueue, outgoing: SlotQueue) {
    this.#incoming = incoming;
    this.#outgoing = outgoing;
  }

  /** whether this end can no longer send */
  public get closed(): boolean {
    return this.#closed;
  }

  public async send(message: JsonRpcMessage): Promise<void> {
    if (this.#closed) {
      throw new TransportClosedError('channel is closed for sending');
    }

    this.#outgoing.put(structuredClone(message));
  }

  public async receive(): Promise<unknown> {
    if (this.#drained) {
      throw new TransportClosedError('channel is closed for receiving');
    }

    const slot = await this.#incoming.take();

    if (slot === CLOSED) {
      this.#drained = true;

      throw new TransportClosedError('channel is closed for receiving');
    }

    return slot;
  }

  public async close(): Promise<void> {
    if (!this.#closed) {
      this.#closed = true;
      this.#outgoing.put(CLOSED);
    }
  }

  public async halt(): Promise<void> {
    if (!this.#halted) {
      this.#halted = true;
      this.#incoming.put(CLOSED);
    }
  }
}

/**
 * creates two connected in-memory channel ends
 * @returns the client and server ends, each reading what the other sends
 */
export function createChannelPair(): {
  client: MemoryChannel;
  server: MemoryChannel;
} {
  const toServer = new SlotQueue();
  const toClient = new SlotQueue();

  return {
    client: new MemoryChannel(toClient, toServer),
    server: new MemoryChannel(toServer, toClient),
  };
}
