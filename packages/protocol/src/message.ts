import type { InitializeRequest, InitializeResult, PingRequest } from '#core';
import type { ElicitRequest, ElicitResult } from '#elicitation';
import type { SetLevelRequest } from '#logging';
import type {
  CancelledNotification,
  InitializedNotification,
  LoggingMessageNotification,
  ProgressNotification,
  PromptListChangedNotification,
  ResourceListChangedNotification,
  ResourceUpdatedNotification,
  RootsListChangedNotification,
  ShutdownNotification,
  ToolListChangedNotification,
} from '#notifications';
import type {
  GetPromptRequest,
  GetPromptResult,
  ListPromptsRequest,
  ListPromptsResult,
} from '#prompts';
import type {
  ListResourcesRequest,
  ListResourcesResult,
  ListResourceTemplatesRequest,
  ListResourceTemplatesResult,
  ReadResourceRequest,
  ReadResourceResult,
  SubscribeRequest,
  UnsubscribeRequest,
} from '#resources';
import type { ListRootsRequest, ListRootsResult } from '#roots';
import type { CreateMessageRequest, CreateMessageResult } from '#sampling';
import type {
  CallToolRequest,
  CallToolResult,
  ListToolsRequest,
  ListToolsResult,
} from '#tools';

/** result of requests that carry no data back */
export type EmptyResult = Record<string, never>;

/** requests the client sends toward the server */
export type McpClientRequest =
  | InitializeRequest
  | PingRequest
  | CallToolRequest
  | ListToolsRequest
  | ListResourcesRequest
  | ListResourceTemplatesRequest
  | ReadResourceRequest
  | SubscribeRequest
  | UnsubscribeRequest
  | ListPromptsRequest
  | GetPromptRequest
  | SetLevelRequest;

/** requests the server sends toward the client */
export type McpServerRequest =
  | CreateMessageRequest
  | ListRootsRequest
  | ElicitRequest
  | PingRequest;

export type McpRequest = McpClientRequest | McpServerRequest;

/* eslint-disable @typescript-eslint/naming-convention */
/** result type of every client-to-server request, keyed by method */
export interface McpServerReplyMap {
  'initialize': InitializeResult;
  'ping': EmptyResult;
  'tools/call': CallToolResult;
  'tools/list': ListToolsResult;
  'resources/list': ListResourcesResult;
  'resources/templates/list': ListResourceTemplatesResult;
  'resources/read': ReadResourceResult;
  'resources/subscribe': EmptyResult;
  'resources/unsubscribe': EmptyResult;
  'prompts/list': ListPromptsResult;
  'prompts/get': GetPromptResult;
  'logging/setLevel': EmptyResult;
}

/** result type of every server-to-client request, keyed by method */
export interface McpClientReplyMap {
  'sampling/createMessage': CreateMessageResult;
  'elicitation/create': ElicitResult;
  'roots/list': ListRootsResult;
  'ping': EmptyResult;
}
/* eslint-enable @typescript-eslint/naming-convention */

export type McpServerReply = McpServerReplyMap[keyof McpServerReplyMap];

export type McpClientReply = McpClientReplyMap[keyof McpClientReplyMap];

export type McpReply = McpServerReply | McpClientReply;

/** notifications either peer may send */
export type McpBidirectionalNotification =
  | CancelledNotification
  | ProgressNotification
  | ShutdownNotification;

/** notifications the server sends toward the client */
export type McpServerNotification =
  | ResourceListChangedNotification
  | ResourceUpdatedNotification
  | PromptListChangedNotification
  | ToolListChangedNotification
  | LoggingMessageNotification
  | McpBidirectionalNotification;

/** notifications the client sends toward the server */
export type McpClientNotification =
  | InitializedNotification
  | RootsListChangedNotification
  | McpBidirectionalNotification;

export type McpNotification = McpServerNotification | McpClientNotification;

/** list-changed notification methods, broadcast without any payload */
export type ListChangedMethod = Extract<
  McpServerNotification['method'],
  `notifications/${string}/list_changed`
>;
