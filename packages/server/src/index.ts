export { McpServer } from '#server';
export type { McpServerOptions } from '#server';

export { ServerTool } from '#tool';
export type { ToolHandler } from '#tool';

export { describePrompt, findMissingArguments } from '#prompt';
export type { PromptRenderer, ServerPrompt } from '#prompt';

export { describeResource, readResourceContents } from '#resource';
export type { ResourcePatch, ServerResource } from '#resource';

export { ServerState } from '#state';
export type { ServerStateOptions } from '#state';

export {
  createCapabilities,
  hasPromptsCapability,
  hasResourcesCapability,
  hasToolsCapability,
} from '#capability';
export type { CapabilityParams } from '#capability';

export { createGenerationFallback, foldElicitation } from '#delegation';

export {
  bindRequestHandler,
  resolveHandlers,
  serverMethods,
} from '#handlers/handler-registry';

export {
  DEFAULT_LOG_LEVEL,
  GENERATION_FALLBACK_PREFIX,
} from '#constants/defaults';

export type {
  HandlerContext,
  InvocationContext,
  ServerMethod,
  ServerRequestHandler,
  ServerRequestHandlers,
  ServerRequestParams,
} from '#types/handler';
