import { JSONRPC_VERSION } from '@duplexmcp/protocol';

import type {
  JsonRpcErrorData,
  JsonRpcErrorEnvelope,
  JsonRpcMessage,
  JsonRpcNotificationData,
  JsonRpcNotificationEnvelope,
  JsonRpcRequestData,
  JsonRpcResponseEnvelope,
  JsonRpcResultData,
  RequestId,
} from '@duplexmcp/protocol';

import type { HandlerOutcome } from './types';

/** an inbound message sorted by what the receive loop must do with it */
export type ClassifiedMessage =
  | {
      kind: 'request';
      id: RequestId;
      method: string;
      params?: JsonRpcRequestData;
    }
  | { kind: 'notification'; method: string; params?: JsonRpcNotificationData }
  | { kind: 'result'; id: RequestId; result: JsonRpcResultData }
  | { kind: 'error'; id?: RequestId; error: JsonRpcErrorData };

/**
 * sorts a validated envelope into request, notification, result or error
 * @param message validated json-rpc message
 * @returns the message tagged with its kind
 */
export function classifyMessage(message: JsonRpcMessage): ClassifiedMessage {
  const { id, method, params, result, error } = message;

  if (error !== undefined) {
    return { kind: 'error', error, ...(id !== undefined && { id }) };
  }

  if (id !== undefined && result !== undefined) {
    return { kind: 'result', id, result };
  }

  if (id !== undefined && method !== undefined) {
    return { kind: 'request', id, method, ...(params && { params }) };
  }

  return {
    kind: 'notification',
    method: method ?? '',
    ...(params && { params }),
  };
}

/**
 * builds the response envelope for a handler outcome
 * @param id id of the request being answered
 * @param outcome result or error produced for it
 * @returns the envelope to send back
 */
export function createResponseMessage(
  id: RequestId,
  outcome: HandlerOutcome,
): JsonRpcResponseEnvelope | JsonRpcErrorEnvelope {
  return outcome.error
    ? { jsonrpc: JSONRPC_VERSION, id, error: outcome.error }
    : { jsonrpc: JSONRPC_VERSION, id, result: outcome.result };
}

/**
 * builds a notification envelope, leaving params out when there are none
 * @param method notification method
 * @param params optional parameters
 * @returns the envelope to send
 */
export function createNotificationMessage(
  method: `notifications/${string}`,
  params?: JsonRpcNotificationData,
): JsonRpcNotificationEnvelope {
  return {
    jsonrpc: JSONRPC_VERSION,
    method,
    ...(params !== undefined && { params }),
  };
}
