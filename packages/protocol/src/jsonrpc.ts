import type { SchemaObject } from 'ajv';

import type { RequestId } from '#primitives';
import type { JsonifibleObject, JsonifibleValue } from '#json';

/** any valid JSON-RPC object that can be taken off a channel, or put onto one */
export type JsonRpcMessage =
  | JsonRpcRequestEnvelope
  | JsonRpcNotificationEnvelope
  | JsonRpcResponseEnvelope
  | JsonRpcErrorEnvelope;

/** latest protocol version supported by this implementation */
export const LATEST_PROTOCOL_VERSION = '2025-06-18';

/** JSON-RPC version identifier */
export const JSONRPC_VERSION = '2.0';

/** parameters shared by requests and notifications, with optional meta fields */
export type JsonRpcParams = {
  /** free-form metadata that is never interpreted by the engine */
  _meta?: JsonifibleObject;
  [key: string]: JsonifibleValue;
};

/** JSON-RPC request parameters */
export type JsonRpcRequestData = JsonRpcParams;

/** JSON-RPC notification parameters */
export type JsonRpcNotificationData = JsonRpcParams;

/** JSON-RPC result data with optional meta fields */
export type JsonRpcResultData = {
  /** free-form metadata that is never interpreted by the engine */
  _meta?: JsonifibleObject;
  [key: string]: JsonifibleValue;
};

/** base interface for all JSON-RPC messages */
export interface JsonRpcEnvelope extends JsonifibleObject {
  jsonrpc: typeof JSONRPC_VERSION;
}

/** a request that expects a response */
export interface JsonRpcRequestEnvelope extends JsonRpcEnvelope {
  id: RequestId;
  method: string;
  params?: JsonRpcRequestData;
  result?: never;
  error?: never;
}

/** a notification which does not expect a response */
export interface JsonRpcNotificationEnvelope extends JsonRpcEnvelope {
  id?: never;
  method: `notifications/${string}`;
  params?: JsonRpcNotificationData;
  result?: never;
  error?: never;
}

/** a successful (non-error) response to a request */
export interface JsonRpcResponseEnvelope<
  T extends JsonRpcResultData = JsonRpcResultData,
> extends JsonRpcEnvelope {
  id: RequestId;
  method?: never;
  params?: never;
  error?: never;
  result: T;
}

/** a response to a request that indicates an error occurred */
export interface JsonRpcErrorEnvelope extends JsonRpcEnvelope {
  id?: RequestId;
  method?: never;
  params?: never;
  error: JsonRpcErrorData;
  result?: never;
}

/** error data structure for JSON-RPC error responses */
export interface JsonRpcErrorData extends JsonifibleObject {
  /**
   * the error type that occurred.
   */
  code: number;
  /**
   * a short description of the error, limited to a concise single sentence.
   */
  message: string;
  /**
   * additional information about the error, defined by the sender.
   */
  data?: JsonifibleValue;
}

/** JSON-RPC error class, raised when a peer answers with an error object */
export class JsonRpcError extends Error {
  /**
   * the error type that occurred.
   */
  public readonly code: number;
  /**
   * additional information about the error, defined by the sender.
   */
  public readonly data?: JsonifibleValue;

  /**
   * creates a new JSON-RPC error with the specified code, message, and optional data
   * @param error error data containing code, message, and optional data
   */
  constructor(error: JsonRpcErrorData) {
    const { message, code, data } = error;

    super(message);

    this.name = 'JsonRpcError';
    this.code = code;
    this.data = data;
  }

  /**
   * converts the error back into its wire representation
   * @returns error data suitable for an error envelope
   */
  public toJSON(): JsonRpcErrorData {
    return {
      code: this.code,
      message: this.message,
      ...(this.data !== undefined && { data: this.data }),
    };
  }
}

const requestIdSchema = {
  oneOf: [{ type: 'string' }, { type: 'integer' }],
} satisfies SchemaObject;

/** JSON-RPC request message schema for validation */
export const jsonRpcRequestMessageSchema = {
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    id: requestIdSchema,
    method: { type: 'string' },
    params: { type: 'object' },
  },
  required: ['jsonrpc', 'id', 'method'],
  additionalProperties: false,
} satisfies SchemaObject;

/** JSON-RPC response message schema for validation */
export const jsonRpcResponseMessageSchema = {
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    id: requestIdSchema,
    result: { type: 'object' },
  },
  required: ['jsonrpc', 'id', 'result'],
  additionalProperties: false,
} satisfies SchemaObject;

/** JSON-RPC notification message schema for validation */
export const jsonRpcNotificationMessageSchema = {
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    method: { type: 'string', pattern: '^notifications/' },
    params: { type: 'object' },
  },
  required: ['jsonrpc', 'method'],
  additionalProperties: false,
} satisfies SchemaObject;

/** JSON-RPC error message schema for validation */
export const jsonRpcErrorMessageSchema = {
  type: 'object',
  properties: {
    jsonrpc: { type: 'string', const: '2.0' },
    id: requestIdSchema,
    error: {
      type: 'object',
      properties: { code: { type: 'integer' }, message: { type: 'string' } },
      required: ['code', 'message'],
    },
  },
  required: ['jsonrpc', 'error'],
  additionalProperties: false,
} satisfies SchemaObject;
