import type { JsonifibleObject, McpLogLevel } from '@duplexmcp/protocol';

/** logging levels in order of severity from lowest to highest */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal';

/** formats log messages */
export type Log = (
  level: LogLevel,
  message: string,
  meta?: JsonifibleObject,
) => void;

/**
 * maps a protocol log level to the internal log level
 * @param level protocol log level to map
 * @returns corresponding internal log level
 */
export function mapMcpLogLevel(level: McpLogLevel): LogLevel {
  switch (level) {
    case 'emergency':
      return 'fatal';
    case 'alert':
    case 'critical':
    case 'error':
      return 'error';
    case 'warning':
      return 'warn';
    case 'notice':
    case 'info':
      return 'info';
    case 'debug':
    default:
      return 'debug';
  }
}

/**
 * binds fixed metadata to every entry written through a log function
 * @param log the underlying log function, if any
 * @param context metadata merged under the entry's own metadata
 * @returns a log function, or undefined when there is nothing to write to
 */
export function withLogContext(
  log: Log | undefined,
  context: JsonifibleObject,
): Log | undefined {
  if (!log) {
    return undefined;
  }

  return (level, message, meta) => log(level, message, { ...context, ...meta });
}
