import { JsonRpcError, MCP_ERROR_CODES } from '@duplexmcp/protocol';

import { findMissingArguments } from '#prompt';

import type { GetPromptRequest, GetPromptResult } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to render a specific prompt
 *
 * a failing renderer is not caught here: it surfaces as an internal handler error.
 * @param params request parameters
 * @param params.name name of the prompt to render
 * @param params.arguments optional string arguments
 * @param context request context
 * @returns the rendered prompt messages
 * @throws {JsonRpcError} INVALID_PARAMS when the prompt is unknown or misses a required argument
 */
export async function handleGetPrompt(
  { name, arguments: args = {} }: GetPromptRequest['params'],
  { state, server, signal }: HandlerContext,
): Promise<GetPromptResult> {
  const prompt = state.requirePrompt(name);
  const missing = findMissingArguments(prompt, args);

  if (missing.length > 0) {
    throw new JsonRpcError({
      code: MCP_ERROR_CODES.INVALID_PARAMS,
      message: `Missing required arguments for prompt ${name}: ${missing.join(', ')}`,
    });
  }

  return prompt.render(args, { server, signal });
}
