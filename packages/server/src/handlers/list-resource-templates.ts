import type {
  ListResourceTemplatesRequest,
  ListResourceTemplatesResult,
} from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to list resource templates
 * @param _params request parameters including optional cursor
 * @param context request context
 * @returns every registered resource template
 */
export async function handleListResourceTemplates(
  _params: ListResourceTemplatesRequest['params'],
  { state }: HandlerContext,
): Promise<ListResourceTemplatesResult> {
  return { resourceTemplates: [...state.resourceTemplates.values()] };
}
