import type { Cursor, Role } from '#primitives';
import type { ContentBlock } from '#content';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * definition of a prompt template the server can render
 * @see https://modelcontextprotocol.io/specification/2025-06-18/server/prompts
 */
export type Prompt = {
  arguments?: PromptArgument[];
  description?: string;
  name: string;
  title?: string;
};

/** argument accepted by a prompt, always carrying its required flag */
export type PromptArgument = {
  description?: string;
  name: string;
  required: boolean;
  title?: string;
  /** free-form type hint such as "string" */
  type?: string;
};

export type PromptMessage = {
  content: ContentBlock;
  role: Role;
};

export interface ListPromptsRequest extends JsonRpcRequestData {
  method: 'prompts/list';
  params?: {
    cursor?: Cursor;
  };
}

export interface ListPromptsResult extends JsonRpcResultData {
  nextCursor?: Cursor;
  prompts: Prompt[];
}

export interface GetPromptRequest extends JsonRpcRequestData {
  method: 'prompts/get';
  params: {
    arguments?: Record<string, string>;
    name: string;
  };
}

export interface GetPromptResult extends JsonRpcResultData {
  description?: string;
  messages: PromptMessage[];
}
