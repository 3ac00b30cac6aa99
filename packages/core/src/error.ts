import { JsonRpcError, MCP_ERROR_CODES } from '@duplexmcp/protocol';

import type {
  JsonifibleObject,
  JsonRpcErrorData,
  JsonifibleValue,
} from '@duplexmcp/protocol';

/** raised when a channel, or the engine owning it, can no longer carry messages */
export class TransportClosedError extends Error {
  constructor(message = 'transport closed') {
    super(message);

    this.name = 'TransportClosedError';
  }
}

/**
 * converts an exception raised by a request handler into wire error data
 * @param exception any value that was thrown
 * @returns the error's own data for a JsonRpcError, INTERNAL_HANDLER_ERROR otherwise
 */
export function toJsonRpcErrorData(exception: unknown): JsonRpcErrorData {
  if (exception instanceof JsonRpcError) {
    return exception.toJSON();
  }

  return {
    code: MCP_ERROR_CODES.INTERNAL_HANDLER_ERROR,
    message: exception instanceof Error ? exception.message : String(exception),
  };
}

/**
 * converts any error caught in a try-catch block to a json-compatible format
 * @param error any value that was thrown/caught
 * @returns a json-serializable representation of the error
 */
export function jsonifyError(error: unknown): JsonifibleObject {
  const type = typeof error;

  switch (typeof error) {
    case 'object':
      if (error instanceof Error) {
        return {
          type: 'Error',
          name: error.name,
          message: error.message,
          stack: error.stack,
          ...(error instanceof JsonRpcError && { code: error.code }),
          ...('cause' in error &&
            error.cause !== undefined && { cause: jsonifyError(error.cause) }),
        };
      } else if (error === null) {
        return { type: 'null', value: error };
      } else {
        const serialized: JsonifibleValue = JSON.parse(
          JSON.stringify(error, getCircularReplacer()),
        );

        return {
          type: Array.isArray(error) ? 'array' : 'object',
          value: serialized,
        };
      }
    case 'boolean':
    case 'number':
    case 'string':
    case 'undefined':
      return { type, value: error };
    case 'function':
      return { type, name: error.name || 'anonymous' };
    case 'bigint':
      return { type, value: String(error) };
    case 'symbol':
      return { type, description: error.description };
    default:
      return { type: 'unknown' };
  }
}

/**
 * creates a replacer function that handles circular references
 * @returns function that replaces circular references for json.stringify
 */
function getCircularReplacer(): (key: string, value: unknown) => unknown {
  const seen = new WeakSet();

  return (_key: string, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }

    return value;
  };
}
