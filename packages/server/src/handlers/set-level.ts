import type { EmptyResult, SetLevelRequest } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles requests to change the minimum level of emitted log messages
 * @param params request parameters, the level being checked against the known levels
 * @param params.level new threshold
 * @param context request context
 * @returns empty acknowledgement response
 */
export async function handleSetLevel(
  { level }: SetLevelRequest['params'],
  { state, log }: HandlerContext,
): Promise<EmptyResult> {
  state.logLevel = level;

  log?.('debug', 'log level changed', { level });

  return {};
}
