import type { Cursor, JsonSchema } from '#primitives';
import type { ContentBlock } from '#content';
import type { JsonifibleValue } from '#json';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * definition of a tool the server can execute
 * @see https://modelcontextprotocol.io/specification/2025-06-18/server/tools
 */
export type Tool = {
  /** unique name of the tool */
  name: string;
  /** human-readable display name */
  title?: string;
  /** what the tool does */
  description: string;
  /** schema of the arguments the tool accepts */
  inputSchema: JsonSchema;
  /** behavioural hints for the client */
  annotations?: ToolAnnotations;
};

/** behavioural hints about a tool, never to be trusted blindly */
export type ToolAnnotations = {
  destructiveHint?: boolean;
  idempotentHint?: boolean;
  openWorldHint?: boolean;
  readOnlyHint?: boolean;
  title?: string;
};

export interface ListToolsRequest extends JsonRpcRequestData {
  method: 'tools/list';
  params?: {
    cursor?: Cursor;
  };
}

export interface ListToolsResult extends JsonRpcResultData {
  nextCursor?: Cursor;
  tools: Tool[];
}

export interface CallToolRequest extends JsonRpcRequestData {
  method: 'tools/call';
  params: {
    arguments?: Record<string, JsonifibleValue>;
    name: string;
  };
}

/** outcome of a tool call, where a failed execution is flagged rather than raised */
export interface CallToolResult extends JsonRpcResultData {
  content: ContentBlock[];
  isError: boolean;
  structuredContent?: Record<string, JsonifibleValue>;
}
