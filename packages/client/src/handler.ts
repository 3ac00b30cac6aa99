import { jsonifyError, mapMcpLogLevel } from '@duplexmcp/core';
import { validators } from '@duplexmcp/protocol';

import { createSamplingErrorResult } from '#sampling';

import type { Log, ProtocolEngine, RequestHandler } from '@duplexmcp/core';
import type { ListChangedMethod, Root } from '@duplexmcp/protocol';

import type { GenerationProvider } from '#sampling';
import type {
  ElicitationCallback,
  ListType,
  OnListChange,
  OnLogMessage,
  OnResourceChange,
  OnRootsRequest,
} from '#types';

/** hooks notified of what the server announces */
export interface NotificationHooks {
  /** callback for list change notifications */
  onListChange?: OnListChange;
  /** callback for resource updated notifications */
  onResourceChange?: OnResourceChange;
  /** callback for log message notifications */
  onLogMessage?: OnLogMessage;
  /** receives the server's log messages and the client's own entries */
  log?: Log;
}

const listChanges: ReadonlyArray<[ListChangedMethod, ListType]> = [
  ['notifications/tools/list_changed', 'tools'],
  ['notifications/resources/list_changed', 'resources'],
  ['notifications/prompts/list_changed', 'prompts'],
];

/**
 * creates the handler answering sampling/createMessage through a provider
 *
 * a failing provider yields an error-flavoured generation rather than an
 * error response.
 * @param provider provider running the generations
 * @param log optional logger
 * @returns engine request handler
 */
export function createSamplingHandler(
  provider: GenerationProvider,
  log?: Log,
): RequestHandler {
  const verify = validators.requests['sampling/createMessage'];

  return async (params) => {
    const request = verify(params ?? {});

    try {
      return { result: await provider.createMessage(request) };
    } catch (exception) {
      log?.('warn', 'generation provider failed', {
        error: jsonifyError(exception),
      });

      return { result: createSamplingErrorResult(exception, provider.model) };
    }
  };
}

/**
 * creates the handler answering elicitation/create through a callback
 * @param callback obtains the answer of the user
 * @returns engine request handler
 */
export function createElicitationHandler(
  callback: ElicitationCallback,
): RequestHandler {
  const verify = validators.requests['elicitation/create'];

  return async (params) => ({ result: await callback(verify(params ?? {})) });
}

/**
 * creates the handler answering roots/list with the whole current root set
 * @param getRoots reads the current root set
 * @param onRootsRequest optional hook told about every enumeration
 * @returns engine request handler
 */
export function createRootsHandler(
  getRoots: () => Root[],
  onRootsRequest?: OnRootsRequest,
): RequestHandler {
  return async () => {
    const roots = getRoots();

    await onRootsRequest?.(roots);

    return { result: { roots } };
  };
}

/**
 * installs the handlers of every notification the server may send
 * @param engine client engine
 * @param hooks callbacks to notify
 */
export function registerNotificationHooks(
  engine: ProtocolEngine,
  hooks: NotificationHooks,
): void {
  const { onListChange, onResourceChange, onLogMessage, log } = hooks;

  for (const [method, changeType] of listChanges) {
    engine.registerNotificationHandler(method, async () => {
      log?.('debug', 'server list changed', { changeType });

      await onListChange?.({ changeType });
    });
  }

  engine.registerNotificationHandler(
    'notifications/resources/updated',
    async (params) => {
      const { uri, title } =
        validators.notifications['notifications/resources/updated'](params);

      log?.('debug', 'resource updated', { uri });

      await onResourceChange?.({ uri, ...(title !== undefined && { title }) });
    },
  );

  engine.registerNotificationHandler('notifications/message', async (params) => {
    const { level, data, logger } =
      validators.notifications['notifications/message'](params);

    log?.(
      mapMcpLogLevel(level),
      typeof data === 'string' ? data : 'server log message',
      {
        ...(logger !== undefined && { logger }),
        ...(typeof data !== 'string' && { data }),
      },
    );

    await onLogMessage?.({
      level,
      data,
      ...(logger !== undefined && { logger }),
    });
  });
}
