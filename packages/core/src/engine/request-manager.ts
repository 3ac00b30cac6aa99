import { JSONRPC_VERSION } from '@duplexmcp/protocol';

import { createDeferred } from '../deferred';

import type {
  JsonRpcRequestData,
  JsonRpcRequestEnvelope,
  JsonRpcResultData,
  RequestId,
} from '@duplexmcp/protocol';

/** represents a pending json-rpc request with its metadata */
export interface PendingRequest {
  /** timestamp when the request was initiated */
  startsAt: number;
  /** core request information (id and method) */
  request: Pick<JsonRpcRequestEnvelope, 'id' | 'method'>;
  /** promise that settles when the correlated response arrives */
  promise: Promise<JsonRpcResultData>;
  /** function to resolve the request promise */
  resolve: (value: JsonRpcResultData) => void;
  /** function to reject the request promise */
  reject: (reason: Error) => void;
}

/** allocates request ids and tracks requests awaiting a response */
export class RequestManager {
  #nextId = 1;
  #pendingRequests = new Map<RequestId, PendingRequest>();

  /** id the next created request will carry */
  public get nextId(): number {
    return this.#nextId;
  }

  /** gets the count of pending requests */
  public get pendingCount(): number {
    return this.#pendingRequests.size;
  }

  /**
   * creates a new request with a unique, strictly increasing id
   * @param method the json-rpc method name
   * @param params optional request parameters
   * @returns object containing request id, message envelope, and promise
   */
  public createRequest(
    method: string,
    params?: JsonRpcRequestData,
  ): {
    id: number;
    message: JsonRpcRequestEnvelope;
    promise: Promise<JsonRpcResultData>;
  } {
    const id = this.#nextId++;
    const message: JsonRpcRequestEnvelope = {
      jsonrpc: JSONRPC_VERSION,
      id,
      method,
      ...(params !== undefined && { params }),
    };

    const { resolve, reject, promise } = createDeferred<JsonRpcResultData>();
    this.#pendingRequests.set(id, {
      startsAt: Date.now(),
      request: { id, method },
      resolve,
      reject,
      promise,
    });

    return { id, message, promise };
  }

  /**
   * resolves a pending request with result
   * @param id unique identifier of the request
   * @param result result data to resolve with
   * @returns true if request was found and resolved, false otherwise
   */
  public resolveRequest(id: RequestId, result: JsonRpcResultData): boolean {
    const pending = this.#pendingRequests.get(id);
    if (!pending) {
      return false;
    }

    this.#pendingRequests.delete(id);
    pending.resolve(result);

    return true;
  }

  /**
   * rejects a pending request with error
   * @param id unique identifier of the request
   * @param reason error or rejection reason
   * @returns true if request was found and rejected, false otherwise
   */
  public rejectRequest(id: RequestId, reason: Error): boolean {
    const pending = this.#pendingRequests.get(id);
    if (!pending) {
      return false;
    }

    this.#pendingRequests.delete(id);
    pending.reject(reason);

    return true;
  }

  /**
   * rejects every pending request
   * @param reason error each waiter observes
   * @returns number of requests rejected
   */
  public rejectAll(reason: Error): number {
    const pending = [...this.#pendingRequests.values()];
    this.#pendingRequests.clear();

    for (const { reject } of pending) {
      reject(reason);
    }

    return pending.length;
  }

  /**
   * gets metadata for a pending request
   * @param id unique identifier of the request
   * @returns pending request metadata or undefined if not found
   */
  public getRequest(id: RequestId): PendingRequest | undefined {
    return this.#pendingRequests.get(id);
  }

  /**
   * gets the duration of a pending request in milliseconds
   * @param id unique identifier of the request
   * @returns duration in milliseconds or undefined if request not found
   */
  public getRequestDuration(id: RequestId): number | undefined {
    const pending = this.#pendingRequests.get(id);

    return pending ? Date.now() - pending.startsAt : undefined;
  }
}
