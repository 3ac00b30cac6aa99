export { McpClient } from '#client';
export { ExternalError } from '#errors';
export {
  createElicitationHandler,
  createRootsHandler,
  createSamplingHandler,
  registerNotificationHooks,
} from '#handler';
export { RootManager } from '#roots';
export { createSamplingErrorResult, HttpGenerationProvider } from '#sampling';
export {
  DEFAULT_GENERATION_BASE_URL,
  DEFAULT_GENERATION_MAX_TOKENS,
  DEFAULT_GENERATION_MODEL,
  DEFAULT_GENERATION_PATH,
  DEFAULT_GENERATION_TEMPERATURE,
  DEFAULT_GENERATION_TIMEOUT_MS,
  SAMPLING_ERROR_PREFIX,
} from '#constants/defaults';

export type { McpClientOptions } from '#client';
export type { NotificationHooks } from '#handler';
export type {
  GenerationProvider,
  HttpGenerationProviderOptions,
} from '#sampling';
export type {
  ElicitationCallback,
  ListType,
  OnListChange,
  OnListChangeParams,
  OnLogMessage,
  OnLogMessageParams,
  OnResourceChange,
  OnResourceChangeParams,
  OnRootsRequest,
} from '#types';
