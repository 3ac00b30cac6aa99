import { validators } from '@duplexmcp/protocol';

import { handleCallTool } from './call-tool';
import { handleGetPrompt } from './get-prompt';
import { handleInitialize } from './initialize';
import { handleListPrompts } from './list-prompts';
import { handleListResources } from './list-resources';
import { handleListResourceTemplates } from './list-resource-templates';
import { handleListTools } from './list-tools';
import { handleReadResource } from './read-resource';
import { handleSetLevel } from './set-level';
import { handleSubscribe } from './subscribe';
import { handleUnsubscribe } from './unsubscribe';

import type { RequestContext, RequestHandler } from '@duplexmcp/core';
import type { MessageValidator } from '@duplexmcp/protocol';

import type {
  HandlerContext,
  ServerMethod,
  ServerRequestHandler,
  ServerRequestHandlers,
  ServerRequestParams,
} from '#types/handler';

/** every method answered through a handler, in the order they are registered */
export const serverMethods: readonly ServerMethod[] = [
  'initialize',
  'tools/list',
  'tools/call',
  'resources/list',
  'resources/templates/list',
  'resources/read',
  'resources/subscribe',
  'resources/unsubscribe',
  'prompts/list',
  'prompts/get',
  'logging/setLevel',
];

const paramValidators: {
  [M in ServerMethod]: MessageValidator<ServerRequestParams[M]>;
} = validators.requests;

/**
 * resolves server handler functions with optional overrides
 * @param handlers optional partial handler implementations to override defaults
 * @returns complete server handler object with all required methods
 */
export function resolveHandlers(
  handlers: Partial<ServerRequestHandlers> = {},
): ServerRequestHandlers {
  return {
    'initialize': handlers.initialize ?? handleInitialize,
    'tools/list': handlers['tools/list'] ?? handleListTools,
    'tools/call': handlers['tools/call'] ?? handleCallTool,
    'resources/list': handlers['resources/list'] ?? handleListResources,
    'resources/templates/list':
      handlers['resources/templates/list'] ?? handleListResourceTemplates,
    'resources/read': handlers['resources/read'] ?? handleReadResource,
    'resources/subscribe': handlers['resources/subscribe'] ?? handleSubscribe,
    'resources/unsubscribe':
      handlers['resources/unsubscribe'] ?? handleUnsubscribe,
    'prompts/list': handlers['prompts/list'] ?? handleListPrompts,
    'prompts/get': handlers['prompts/get'] ?? handleGetPrompt,
    'logging/setLevel': handlers['logging/setLevel'] ?? handleSetLevel,
  };
}

/**
 * adapts a typed server handler to the engine's request handler contract
 *
 * parameters are validated first, failing with INVALID_PARAMS.
 * @param method method the handler answers
 * @param handle typed handler
 * @param createContext builds the handler context for one request
 * @returns an engine request handler
 */
export function bindRequestHandler<M extends ServerMethod>(
  method: M,
  handle: ServerRequestHandler<M>,
  createContext: (context: RequestContext) => HandlerContext,
): RequestHandler {
  const verify = paramValidators[method];

  return async (params, context) => {
    const result = await handle(verify(params ?? {}), createContext(context));

    return { result };
  };
}
