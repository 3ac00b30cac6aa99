import { jsonifyError } from '@duplexmcp/core';

import type { CallToolRequest, CallToolResult } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to invoke a specific tool
 *
 * a failing tool is reported in the result with isError set, never as a
 * protocol error.
 * @param params request parameters for tool invocation
 * @param context request context
 * @returns tool execution result with content and error status
 * @throws {JsonRpcError} UNKNOWN_TOOL when no tool has the name
 */
export async function handleCallTool(
  params: CallToolRequest['params'],
  { state, server, signal, log }: HandlerContext,
): Promise<CallToolResult> {
  const tool = state.requireTool(params.name);

  try {
    const content = await tool.execute(params.arguments ?? {}, {
      server,
      signal,
    });

    return { content, isError: false };
  } catch (exception) {
    log?.('warn', 'tool execution failed', {
      tool: params.name,
      error: jsonifyError(exception),
    });

    const reason =
      exception instanceof Error ? exception.message : String(exception);

    return {
      content: [{ type: 'text', text: `Tool ${params.name} failed: ${reason}` }],
      isError: true,
    };
  }
}
