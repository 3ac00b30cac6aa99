import { createDeferred } from '#deferred';
import { TransportClosedError } from '#error';

import type { JsonRpcMessage } from '@duplexmcp/protocol';

import type { Channel } from '#channel/channel';
import type { Deferred } from '#deferred';

/** a channel fed by the test with arbitrary, possibly malformed, values */
export class ScriptedChannel implements Channel {
  /** every message the engine has written */
  public readonly sent: JsonRpcMessage[] = [];
  readonly #inbox: unknown[] = [];
  readonly #readers: Array<Deferred<unknown>> = [];
  #ended = false;

  /** queues a raw value for the next receive */
  public push(raw: unknown): void {
    const reader = this.#readers.shift();

    if (reader) {
      reader.resolve(raw);
    } else {
      this.#inbox.push(raw);
    }
  }

  public async send(message: JsonRpcMessage): Promise<void> {
    this.sent.push(message);
  }

  public async receive(): Promise<unknown> {
    if (this.#inbox.length > 0) {
      return this.#inbox.shift();
    }

    if (this.#ended) {
      throw new TransportClosedError();
    }

    const reader = createDeferred<unknown>();
    this.#readers.push(reader);

    return reader.promise;
  }

  public async close(): Promise<void> {
    this.#ended = true;
  }

  public async halt(): Promise<void> {
    this.#ended = true;

    for (const reader of this.#readers.splice(0)) {
      reader.reject(new TransportClosedError());
    }
  }
}
