import { describePrompt } from '#prompt';

import type { ListPromptsRequest, ListPromptsResult } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to list available prompts
 * @param _params request parameters including optional cursor
 * @param context request context
 * @returns every registered prompt without its renderer
 */
export async function handleListPrompts(
  _params: ListPromptsRequest['params'],
  { state }: HandlerContext,
): Promise<ListPromptsResult> {
  return { prompts: [...state.prompts.values()].map(describePrompt) };
}
