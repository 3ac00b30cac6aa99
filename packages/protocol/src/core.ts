import type {
  ClientCapabilities,
  Implementation,
  RequestId,
  ServerCapabilities,
} from '#primitives';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * first request of every connection, sent by the initiator
 * @see https://modelcontextprotocol.io/specification/2025-06-18/basic/lifecycle
 */
export interface InitializeRequest extends JsonRpcRequestData {
  method: 'initialize';
  params: {
    /** capabilities the client supports */
    capabilities: ClientCapabilities;
    /** information about the client implementation */
    clientInfo: Implementation;
    /** protocol version the client wants to speak */
    protocolVersion: string;
  };
}

/** server answer to an initialize request */
export interface InitializeResult extends JsonRpcResultData {
  /** capabilities the server supports */
  capabilities: ServerCapabilities;
  /** hints for the client on how to use this server */
  instructions?: string;
  /** negotiated protocol version */
  protocolVersion: string;
  /** information about the server implementation */
  serverInfo: Implementation;
}

/** liveness check, answered with an empty result by either peer */
export interface PingRequest extends JsonRpcRequestData {
  method: 'ping';
  params?: {};
}

/** outcome of one completed negotiation, never mutated once produced */
export type HandshakeResult = Readonly<{
  /** negotiated protocol version */
  protocolVersion: string;
  /** id of the initialize request that produced this result */
  requestId: RequestId;
  /** capabilities declared by the client */
  clientCapabilities: ClientCapabilities;
  /** capabilities declared by the server */
  serverCapabilities: ServerCapabilities;
  /** information about the client implementation */
  clientInfo: Implementation;
  /** information about the server implementation */
  serverInfo: Implementation;
  /** human-readable usage instructions from the server */
  instructions?: string;
}>;
