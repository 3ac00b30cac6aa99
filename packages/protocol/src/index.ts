export { isJsonifibleObject } from '#json';
export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';

export { SUPPORTED_PROTOCOL_VERSIONS } from '#constants';

export {
  JSONRPC_VERSION,
  JsonRpcError,
  LATEST_PROTOCOL_VERSION,
} from '#jsonrpc';
export type {
  JsonRpcErrorData,
  JsonRpcErrorEnvelope,
  JsonRpcMessage,
  JsonRpcNotificationData,
  JsonRpcNotificationEnvelope,
  JsonRpcParams,
  JsonRpcRequestData,
  JsonRpcRequestEnvelope,
  JsonRpcResponseEnvelope,
  JsonRpcResultData,
} from '#jsonrpc';

export { negotiateProtocolVersion } from '#negotiate-version';

export { MCP_ERROR_CODES } from '#primitives';
export type {
  Annotations,
  Capability,
  ClientCapabilities,
  Cursor,
  Implementation,
  JsonSchema,
  McpErrorCode,
  McpLogLevel,
  PrimitiveSchemaDefinition,
  ProgressToken,
  RequestId,
  Role,
  ServerCapabilities,
} from '#primitives';

export type {
  HandshakeResult,
  InitializeRequest,
  InitializeResult,
  PingRequest,
} from '#core';

export type {
  EmptyResult,
  ListChangedMethod,
  McpBidirectionalNotification,
  McpClientNotification,
  McpClientReply,
  McpClientReplyMap,
  McpClientRequest,
  McpNotification,
  McpReply,
  McpRequest,
  McpServerNotification,
  McpServerReply,
  McpServerReplyMap,
  McpServerRequest,
} from '#message';

export type {
  AudioContent,
  ContentBlock,
  EmbeddedResource,
  ImageContent,
  ResourceLink,
  SamplingMessage,
  TextContent,
} from '#content';

export type {
  BlobResourceContents,
  ListResourcesRequest,
  ListResourcesResult,
  ListResourceTemplatesRequest,
  ListResourceTemplatesResult,
  ReadResourceRequest,
  ReadResourceResult,
  Resource,
  ResourceTemplate,
  SubscribeRequest,
  TextResourceContents,
  UnsubscribeRequest,
} from '#resources';

export type {
  GetPromptRequest,
  GetPromptResult,
  ListPromptsRequest,
  ListPromptsResult,
  Prompt,
  PromptArgument,
  PromptMessage,
} from '#prompts';

export type {
  CallToolRequest,
  CallToolResult,
  ListToolsRequest,
  ListToolsResult,
  Tool,
  ToolAnnotations,
} from '#tools';

export type {
  CreateMessageRequest,
  CreateMessageResult,
  ModelHint,
  ModelPreferences,
} from '#sampling';

export type { ListRootsRequest, ListRootsResult, Root } from '#roots';

export {
  MCP_LOG_LEVELS,
  isLogLevelEnabled,
  isMcpLogLevel,
  normalizeMcpLogLevel,
} from '#logging';
export type { SetLevelRequest } from '#logging';

export type { ElicitContent, ElicitRequest, ElicitResult } from '#elicitation';

export type {
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

export {
  createMessageValidator,
  createValidators,
  validateJsonRpcMessage,
  validators,
} from '#validations';
export type {
  MessageValidator,
  NotificationParamsValidator,
  RequestParamsValidator,
  ResultValidator,
  Validators,
} from '#validations';
