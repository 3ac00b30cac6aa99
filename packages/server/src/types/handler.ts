import type { Log } from '@duplexmcp/core';
import type {
  McpServerReplyMap,
  RequestId,
  RequestParamsValidator,
} from '@duplexmcp/protocol';

import type { McpServer } from '#server';
import type { ServerState } from '#state';

/** request methods the server answers through a handler, ping being built in */
export type ServerMethod = Exclude<keyof McpServerReplyMap, 'ping'>;

/** validated parameters of each server method */
export type ServerRequestParams = {
  [M in ServerMethod]: ReturnType<RequestParamsValidator[M]>;
};

/** what a tool or prompt handler can reach while it runs */
export interface InvocationContext {
  /** the server running the handler, for resource updates and delegation */
  server: McpServer;
  /** aborted when the client cancels the request */
  signal: AbortSignal;
}

/** request context passed to every server method handler */
export interface HandlerContext extends InvocationContext {
  /** id the client assigned to the request */
  id: RequestId;
  /** registries and connection state of the server */
  state: ServerState;
  /** logs handler operations */
  log?: Log;
}

/** answers one server method with its typed result */
export type ServerRequestHandler<M extends ServerMethod> = (
  params: ServerRequestParams[M],
  context: HandlerContext,
) => Promise<McpServerReplyMap[M]>;

/** server-side handler for every client request method */
export type ServerRequestHandlers = {
  [M in ServerMethod]: ServerRequestHandler<M>;
};
