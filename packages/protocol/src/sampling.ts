import type { Role } from '#primitives';
import type {
  AudioContent,
  ImageContent,
  SamplingMessage,
  TextContent,
} from '#content';
import type { JsonifibleObject } from '#json';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * generation delegation, sent by the server toward the client
 * @see https://modelcontextprotocol.io/specification/2025-06-18/client/sampling
 */

/** hint used to select a model */
export type ModelHint = {
  name?: string;
};

/** server preferences for model selection, each priority between 0 and 1 */
export type ModelPreferences = {
  costPriority?: number;
  hints?: ModelHint[];
  intelligencePriority?: number;
  speedPriority?: number;
};

export interface CreateMessageRequest extends JsonRpcRequestData {
  method: 'sampling/createMessage';
  params: {
    includeContext?: 'allServers' | 'none' | 'thisServer';
    maxTokens?: number;
    messages: SamplingMessage[];
    metadata?: JsonifibleObject;
    modelPreferences?: ModelPreferences;
    stopSequences?: string[];
    systemPrompt?: string;
    temperature?: number;
  };
}

export interface CreateMessageResult extends JsonRpcResultData {
  content: TextContent | ImageContent | AudioContent;
  model?: string;
  role: Role;
  stopReason?: string;
}
