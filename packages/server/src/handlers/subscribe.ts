import type { EmptyResult, SubscribeRequest } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to subscribe to resource updates
 * @param params request parameters containing resource uri
 * @param params.uri resource uri to subscribe to
 * @param context request context
 * @returns empty acknowledgement response
 * @throws {JsonRpcError} RESOURCE_NOT_FOUND when the uri is not registered
 */
export async function handleSubscribe(
  { uri }: SubscribeRequest['params'],
  { state, log }: HandlerContext,
): Promise<EmptyResult> {
  state.requireResource(uri);
  state.subscriptions.add(uri);

  log?.('debug', 'resource subscribed', { uri });

  return {};
}
