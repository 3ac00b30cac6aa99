import type { ListToolsRequest, ListToolsResult } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to list available tools
 * @param _params request parameters including optional cursor
 * @param context request context
 * @returns every registered tool in registration order
 */
export async function handleListTools(
  _params: ListToolsRequest['params'],
  { state }: HandlerContext,
): Promise<ListToolsResult> {
  return { tools: [...state.tools.values()].map((tool) => tool.toSpec()) };
}
