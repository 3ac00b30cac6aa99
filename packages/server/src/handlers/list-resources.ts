import { describeResource } from '#resource';

import type {
  ListResourcesRequest,
  ListResourcesResult,
} from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to list available resources
 * @param _params request parameters including optional cursor
 * @param context request context
 * @returns descriptors of every registered resource
 */
export async function handleListResources(
  _params: ListResourcesRequest['params'],
  { state }: HandlerContext,
): Promise<ListResourcesResult> {
  return { resources: [...state.resources.values()].map(describeResource) };
}
