import {
  JsonRpcError,
  MCP_ERROR_CODES,
  validateJsonRpcMessage,
} from '@duplexmcp/protocol';

import { createDeferred } from '../deferred';
import {
  jsonifyError,
  toJsonRpcErrorData,
  TransportClosedError,
} from '../error';
import { generateChannelId } from '../id';
import { withLogContext } from '../logging';

import {
  classifyMessage,
  createNotificationMessage,
  createResponseMessage,
} from './message';
import { RequestManager } from './request-manager';

import type {
  JsonRpcMessage,
  JsonRpcNotificationData,
  JsonRpcRequestData,
  JsonRpcResultData,
  RequestId,
} from '@duplexmcp/protocol';

import type { Channel } from '../channel/channel';
import type { Deferred } from '../deferred';
import type { Log } from '../logging';
import type { EventRecorder, PeerRole } from '../recorder/recorder';

import type { ClassifiedMessage } from './message';
import type {
  EngineState,
  HandlerOutcome,
  NotificationHandler,
  ProtocolEngineOptions,
  ReplyListener,
  RequestHandler,
  ResultVerifier,
} from './types';

/**
 * one peer's end of a protocol connection
 *
 * the engine is role agnostic: it correlates outbound requests with their
 * responses by id, dispatches inbound requests and notifications to the
 * handlers registered for their method, and answers ping by itself.
 */
export class ProtocolEngine {
  readonly #role: PeerRole;
  readonly #log?: Log;
  readonly #recorder?: EventRecorder;
  readonly #requestManager = new RequestManager();
  readonly #requestHandlers = new Map<string, RequestHandler>();
  readonly #notificationHandlers = new Map<string, NotificationHandler>();
  readonly #replyListeners = new Map<string, ReplyListener>();
  /** inbound requests being handled, keyed by the requester's id */
  readonly #activeRequests = new Map<RequestId, AbortController>();
  readonly #closed: Deferred<void> = createDeferred<void>();
  #state: EngineState = 'unconnected';
  #channel: Channel | null = null;
  #channelId: string | null = null;

  /**
   * creates an engine that is yet to be connected to a channel
   * @param options engine configuration
   */
  constructor(options: ProtocolEngineOptions) {
    this.#role = options.role;
    this.#recorder = options.recorder;
    this.#log = withLogContext(options.log, {
      role: options.role,
      ...(options.name !== undefined && { name: options.name }),
    });
  }

  /** the side of the connection this engine plays */
  public get role(): PeerRole {
    return this.#role;
  }

  /** current lifecycle state */
  public get state(): EngineState {
    return this.#state;
  }

  /** identifier of the connected channel, null before connecting */
  public get channelId(): string | null {
    return this.#channelId;
  }

  /** id the next outbound request will carry */
  public get nextRequestId(): number {
    return this.#requestManager.nextId;
  }

  /** number of outbound requests still waiting for a response */
  public get pendingCount(): number {
    return this.#requestManager.pendingCount;
  }

  /** settles once the engine has reached the closed state */
  public get closed(): Promise<void> {
    return this.#closed.promise;
  }

  /**
   * attaches the engine to a channel and starts the receive loop
   * @param channel channel to read from and write to
   * @throws {Error} if the engine has been connected before
   */
  public connect(channel: Channel): void {
    if (this.#state !== 'unconnected') {
      throw new Error(`Cannot connect an engine in the ${this.#state} state`);
    }

    this.#channel = channel;
    this.#channelId = generateChannelId();
    this.#state = 'negotiating';
    this.#log?.('debug', 'engine connected', { channel: this.#channelId });

    void this.#receiveLoop(channel);
  }

  /** marks the handshake as complete */
  public markReady(): void {
    if (this.#state === 'negotiating') {
      this.#state = 'ready';
      this.#log?.('debug', 'engine ready');
    }
  }

  /**
   * installs the handler answering inbound requests for a method
   * @param method request method
   * @param handler handler producing the outcome sent back
   */
  public registerRequestHandler(method: string, handler: RequestHandler): void {
    this.#requestHandlers.set(method, handler);
  }

  /**
   * installs a listener told about every response written for a method
   * @param method request method
   * @param listener invoked with the outcome once it has been delivered
   */
  public registerReplyListener(method: string, listener: ReplyListener): void {
    this.#replyListeners.set(method, listener);
  }

  /**
   * installs the handler for inbound notifications of a method
   * @param method notification method
   * @param handler handler invoked with the notification parameters
   */
  public registerNotificationHandler(
    method: `notifications/${string}`,
    handler: NotificationHandler,
  ): void {
    this.#notificationHandlers.set(method, handler);
  }

  /**
   * sends a request and waits for the correlated response
   * @param method request method
   * @param params optional request parameters
   * @returns the result sent by the peer
   * @throws {JsonRpcError} if the peer answers with an error
   * @throws {TransportClosedError} if the engine closes before the response arrives
   */
  public async sendRequest(
    method: string,
    params?: JsonRpcRequestData,
  ): Promise<JsonRpcResultData>;
  /**
   * sends a request and checks the correlated response
   * @param method request method
   * @param params optional request parameters
   * @param verify narrows the result, throwing when it is malformed
   * @returns the verified result sent by the peer
   */
  public async sendRequest<R extends JsonRpcResultData>(
    method: string,
    params: JsonRpcRequestData | undefined,
    verify: ResultVerifier<R>,
  ): Promise<R>;
  public async sendRequest<R extends JsonRpcResultData>(
    method: string,
    params?: JsonRpcRequestData,
    verify?: ResultVerifier<R>,
  ): Promise<R | JsonRpcResultData> {
    this.#assertConnected(method);

    const { id, message, promise } = this.#requestManager.createRequest(
      method,
      params,
    );

    this.#log?.('debug', 'sending a request', { id, method });

    try {
      await this.#write(message);
    } catch (exception) {
      this.#requestManager.rejectRequest(
        id,
        exception instanceof Error ? exception : new Error(String(exception)),
      );
    }

    const result = await promise;

    return verify ? verify(result) : result;
  }

  /**
   * sends a notification without waiting for anything in return
   * @param method notification method
   * @param params optional notification parameters
   * @throws {TransportClosedError} if the engine is not connected
   */
  public async sendNotification(
    method: `notifications/${string}`,
    params?: JsonRpcNotificationData,
  ): Promise<void> {
    this.#assertConnected(method);

    this.#log?.('debug', 'sending a notification', { method });

    await this.#write(createNotificationMessage(method, params));
  }

  /**
   * closes the engine, failing every request still waiting for a response
   * @param reason optional reason sent along the farewell notification
   */
  public async close(reason?: string): Promise<void> {
    const channel = this.#channel;

    if (!channel) {
      this.#terminate('closed before connecting');

      return;
    }

    if (this.#state !== 'closed') {
      try {
        await this.#write(
          createNotificationMessage(
            'notifications/shutdown',
            reason !== undefined ? { reason } : undefined,
          ),
        );
      } catch (exception) {
        this.#log?.('debug', 'farewell notification not delivered', {
          error: jsonifyError(exception),
        });
      }

      this.#terminate(reason ?? 'closed locally');
    }

    await channel.close();
    await channel.halt();
  }

  /**
   * throws when no message can be written
   * @param method method about to be sent, for the error message
   */
  #assertConnected(method: string): void {
    if (!this.#channel || this.#state === 'unconnected') {
      throw new TransportClosedError(
        `Cannot send ${method}: engine is not connected`,
      );
    }

    if (this.#state === 'closed') {
      throw new TransportClosedError(`Cannot send ${method}: engine is closed`);
    }
  }

  /**
   * records and writes a message onto the channel
   * @param message message to send
   */
  async #write(message: JsonRpcMessage): Promise<void> {
    const channel = this.#channel;

    if (!channel) {
      throw new TransportClosedError('engine is not connected');
    }

    this.#record('outbound', message);
    await channel.send(message);
  }

  /**
   * passes a message to the recorder, if any
   * @param direction whether the message was received or sent
   * @param payload the message itself
   */
  #record(direction: 'inbound' | 'outbound', payload: JsonRpcMessage): void {
    this.#recorder?.record({
      role: this.#role,
      direction,
      channel: this.#channelId,
      payload,
    });
  }

  /**
   * reads messages until the channel closes or the peer says farewell
   * @param channel channel to read from
   */
  async #receiveLoop(channel: Channel): Promise<void> {
    let reason = 'channel closed';

    for (;;) {
      let raw: unknown;

      try {
        raw = await channel.receive();
      } catch (exception) {
        if (!(exception instanceof TransportClosedError)) {
          this.#log?.('error', 'failed to receive a message', {
            error: jsonifyError(exception),
          });
        }

        break;
      }

      let message: JsonRpcMessage;

      try {
        message = validateJsonRpcMessage(raw);
      } catch (exception) {
        this.#log?.('warn', 'dropping a malformed message', {
          error: jsonifyError(exception),
        });

        continue;
      }

      this.#record('inbound', message);

      const classified = classifyMessage(message);

      if (
        classified.kind === 'notification' &&
        classified.method === 'notifications/shutdown'
      ) {
        reason = 'peer shut down';

        break;
      }

      this.#dispatch(classified);
    }

    this.#terminate(reason);
  }

  /**
   * routes a classified inbound message to its destination
   * @param message the message tagged with its kind
   */
  #dispatch(message: ClassifiedMessage): void {
    switch (message.kind) {
      case 'result':
        this.#log?.('debug', 'request completed', {
          id: message.id,
          duration: this.#requestManager.getRequestDuration(message.id),
        });

        if (!this.#requestManager.resolveRequest(message.id, message.result)) {
          this.#log?.('warn', 'dropping a response to an unknown request', {
            id: message.id,
          });
        }

        break;
      case 'error':
        this.#log?.('debug', 'request failed', {
          ...(message.id !== undefined && { id: message.id }),
          error: message.error,
        });

        if (
          message.id === undefined ||
          !this.#requestManager.rejectRequest(
            message.id,
            new JsonRpcError(message.error),
          )
        ) {
          this.#log?.('warn', 'dropping an error for an unknown request', {
            error: message.error,
          });
        }

        break;
      case 'request':
        void this.#handleRequest(message.id, message.method, message.params);

        break;
      case 'notification':
        void this.#handleNotification(message.method, message.params);

        break;
    }
  }

  /**
   * answers an inbound request through its registered handler
   * @param id id assigned by the requester
   * @param method requested method
   * @param params request parameters
   */
  async #handleRequest(
    id: RequestId,
    method: string,
    params?: JsonRpcRequestData,
  ): Promise<void> {
    if (this.#activeRequests.has(id)) {
      this.#log?.('warn', 'rejecting a duplicate request id', { id, method });

      return this.#reply(id, {
        error: {
          code: MCP_ERROR_CODES.INVALID_REQUEST,
          message: `Request ${id} is already being handled`,
        },
      });
    }

    if (method === 'ping') {
      return this.#reply(id, { result: {} });
    }

    const handler = this.#requestHandlers.get(method);

    if (!handler) {
      this.#log?.('debug', 'no handler for request', { id, method });

      return this.#reply(id, {
        error: {
          code: MCP_ERROR_CODES.METHOD_NOT_FOUND,
          message: `Method not found: ${method}`,
        },
      });
    }

    const controller = new AbortController();
    this.#activeRequests.set(id, controller);

    let outcome: HandlerOutcome;

    try {
      outcome = await handler(params, {
        id,
        method,
        signal: controller.signal,
      });
    } catch (exception) {
      this.#log?.('error', 'request handler failed', {
        id,
        method,
        error: jsonifyError(exception),
      });

      outcome = { error: toJsonRpcErrorData(exception) };
    } finally {
      this.#activeRequests.delete(id);
    }

    if (controller.signal.aborted) {
      this.#log?.('debug', 'suppressing the response to a cancelled request', {
        id,
        method,
      });

      return;
    }

    if (!(await this.#deliver(id, outcome))) {
      return;
    }

    try {
      this.#replyListeners.get(method)?.(outcome);
    } catch (exception) {
      this.#log?.('error', 'reply listener failed', {
        id,
        method,
        error: jsonifyError(exception),
      });
    }
  }

  /**
   * runs the handler registered for an inbound notification
   * @param method notification method
   * @param params notification parameters
   */
  async #handleNotification(
    method: string,
    params?: JsonRpcNotificationData,
  ): Promise<void> {
    if (method === 'notifications/cancelled') {
      this.#cancelInboundRequest(params);
    }

    const handler = this.#notificationHandlers.get(method);

    if (!handler) {
      if (method !== 'notifications/cancelled') {
        this.#log?.('debug', 'dropping an unhandled notification', { method });
      }

      return;
    }

    try {
      await handler(params);
    } catch (exception) {
      this.#log?.('error', 'notification handler failed', {
        method,
        error: jsonifyError(exception),
      });
    }
  }

  /**
   * aborts the inbound request named by a cancellation notification
   * @param params cancellation parameters
   */
  #cancelInboundRequest(params?: JsonRpcNotificationData): void {
    const requestId = params?.requestId;

    if (typeof requestId !== 'string' && typeof requestId !== 'number') {
      this.#log?.('warn', 'ignoring a cancellation without a request id');

      return;
    }

    const controller = this.#activeRequests.get(requestId);

    this.#log?.('debug', 'request cancelled by the peer', {
      id: requestId,
      active: controller !== undefined,
    });

    controller?.abort();
  }

  /**
   * writes the response to an inbound request
   * @param id id of the request being answered
   * @param outcome result or error for it
   */
  async #reply(id: RequestId, outcome: HandlerOutcome): Promise<void> {
    await this.#deliver(id, outcome);
  }

  /**
   * writes the response of an inbound request, logging a failed write
   * @param id id assigned by the requester
   * @param outcome result or error for it
   * @returns true once the response is on the channel
   */
  async #deliver(id: RequestId, outcome: HandlerOutcome): Promise<boolean> {
    try {
      await this.#write(createResponseMessage(id, outcome));

      return true;
    } catch (exception) {
      this.#log?.('warn', 'response not delivered', {
        id,
        error: jsonifyError(exception),
      });

      return false;
    }
  }

  /**
   * moves the engine to the closed state, once
   * @param reason why the engine closed
   */
  #terminate(reason: string): void {
    if (this.#state === 'closed') {
      return;
    }

    this.#state = 'closed';

    const failed = this.#requestManager.rejectAll(
      new TransportClosedError(`Connection closed: ${reason}`),
    );

    for (const controller of this.#activeRequests.values()) {
      controller.abort();
    }
    this.#activeRequests.clear();

    this.#log?.('info', 'engine closed', { reason, failedRequests: failed });
    this.#closed.resolve();
  }
}
