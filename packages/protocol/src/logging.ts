import type { McpLogLevel } from '#primitives';
import type { JsonRpcRequestData } from '#jsonrpc';

/** protocol log levels from least to most severe */
export const MCP_LOG_LEVELS = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
  'alert',
  'emergency',
] as const satisfies readonly McpLogLevel[];

const LEVEL_ALIASES: Record<string, McpLogLevel> = {
  warn: 'warning',
  err: 'error',
  crit: 'critical',
  fatal: 'emergency',
};

/** sets the minimum level of log messages the server emits */
export interface SetLevelRequest extends JsonRpcRequestData {
  method: 'logging/setLevel';
  params: {
    level: McpLogLevel;
  };
}

/**
 * checks whether a string is one of the protocol log levels
 * @param level candidate level name
 * @returns true when the name is a protocol log level
 */
export function isMcpLogLevel(level: string): level is McpLogLevel {
  return MCP_LOG_LEVELS.some((known) => known === level);
}

/**
 * normalizes a free-form level name into a protocol log level
 * @param level level name in any case, possibly a common alias such as "warn"
 * @returns the protocol level, or undefined when the name is not recognised
 */
export function normalizeMcpLogLevel(level: string): McpLogLevel | undefined {
  const name = level.trim().toLowerCase();

  return isMcpLogLevel(name) ? name : LEVEL_ALIASES[name];
}

/**
 * tells whether a message at the given level passes the threshold
 * @param level level of the message
 * @param threshold minimum level that may be emitted
 * @returns true when the message must be emitted
 */
export function isLogLevelEnabled(
  level: McpLogLevel,
  threshold: McpLogLevel,
): boolean {
  return MCP_LOG_LEVELS.indexOf(level) >= MCP_LOG_LEVELS.indexOf(threshold);
}
