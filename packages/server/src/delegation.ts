import { GENERATION_FALLBACK_PREFIX } from '#constants/defaults';

import type {
  CreateMessageResult,
  ElicitContent,
  ElicitResult,
} from '@duplexmcp/protocol';

/**
 * builds the synthetic generation used when delegation fails
 * @param exception why the delegation failed
 * @returns a clearly labelled assistant message with an error stop reason
 */
export function createGenerationFallback(
  exception: unknown,
): CreateMessageResult {
  const reason =
    exception instanceof Error ? exception.message : String(exception);

  return {
    role: 'assistant',
    content: { type: 'text', text: `${GENERATION_FALLBACK_PREFIX} ${reason}` },
    stopReason: 'error',
  };
}

/**
 * merges the answer to an elicitation into the caller's defaults
 *
 * only an accepted answer contributes values; declining or cancelling keeps
 * the defaults untouched.
 * @param result answer of the client
 * @param defaults values used for every field the user did not provide
 * @returns the values to proceed with
 */
export function foldElicitation(
  result: ElicitResult,
  defaults: ElicitContent,
): ElicitContent {
  if (result.action !== 'accept') {
    return { ...defaults };
  }

  return { ...defaults, ...result.content };
}
