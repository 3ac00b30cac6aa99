import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * workspace root declared by the client
 * @see https://modelcontextprotocol.io/specification/2025-06-18/client/roots
 */
export type Root = {
  name?: string;
  uri: string;
};

export interface ListRootsRequest extends JsonRpcRequestData {
  method: 'roots/list';
  params?: {};
}

/** the complete root set, replacing any previously fetched one */
export interface ListRootsResult extends JsonRpcResultData {
  roots: Root[];
}
