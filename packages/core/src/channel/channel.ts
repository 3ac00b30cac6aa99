import type { JsonRpcMessage } from '@duplexmcp/protocol';

/**
 * duplex, order-preserving conduit between two peers
 *
 * messages are structured values; how they are encoded on a wire, if at all,
 * is up to the implementation.
 */
export interface Channel {
  /**
   * delivers a message to the peer
   * @throws {TransportClosedError} once this side has been closed
   */
  send(message: JsonRpcMessage): Promise<void>;
  /**
   * waits for the next message from the peer
   * @returns the raw message, still to be validated by the receiver
   * @throws {TransportClosedError} once the peer closed or this side halted
   */
  receive(): Promise<unknown>;
  /** makes the peer's reader observe closure, after any message already sent */
  close(): Promise<void>;
  /** makes this side's reader observe closure */
  halt(): Promise<void>;
}
