import { readResourceContents } from '#resource';

import type {
  ReadResourceRequest,
  ReadResourceResult,
} from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to read resource contents
 * @param params request parameters
 * @param params.uri resource uri to read
 * @param context request context
 * @returns the current content of the resource
 * @throws {JsonRpcError} RESOURCE_NOT_FOUND when the uri is not registered
 */
export async function handleReadResource(
  { uri }: ReadResourceRequest['params'],
  { state }: HandlerContext,
): Promise<ReadResourceResult> {
  return { contents: [readResourceContents(state.requireResource(uri))] };
}
