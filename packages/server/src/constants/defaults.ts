import type { McpLogLevel } from '@duplexmcp/protocol';

/** minimum level of emitted log messages until the client sets one */
export const DEFAULT_LOG_LEVEL: McpLogLevel = 'info';

/** label opening the text of a generation that could not be delegated */
export const GENERATION_FALLBACK_PREFIX = '[generation unavailable]';
