import type { EmptyResult, UnsubscribeRequest } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to unsubscribe from resource updates
 * @param params request parameters containing resource uri
 * @param params.uri resource uri to unsubscribe from
 * @param context request context
 * @returns empty acknowledgement response
 * @throws {JsonRpcError} RESOURCE_NOT_FOUND when the uri is not registered
 */
export async function handleUnsubscribe(
  { uri }: UnsubscribeRequest['params'],
  { state }: HandlerContext,
): Promise<EmptyResult> {
  state.requireResource(uri);
  state.subscriptions.delete(uri);

  return {};
}
