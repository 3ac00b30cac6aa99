import type {
  JsonRpcErrorData,
  JsonRpcNotificationData,
  JsonRpcRequestData,
  JsonRpcResultData,
  RequestId,
} from '@duplexmcp/protocol';

import type { Log } from '../logging';
import type { EventRecorder, PeerRole } from '../recorder/recorder';

/** lifecycle of an engine, where closed is terminal */
export type EngineState = 'unconnected' | 'negotiating' | 'ready' | 'closed';

/** explicit outcome of a request handler, sent back to the requester as is */
export type HandlerOutcome<R extends JsonRpcResultData = JsonRpcResultData> =
  | { result: R; error?: never }
  | { result?: never; error: JsonRpcErrorData };

/** information about the inbound request being handled */
export interface RequestContext {
  /** id the requester assigned */
  id: RequestId;
  /** method being handled */
  method: string;
  /** aborted when the requester cancels or the engine closes */
  signal: AbortSignal;
}

/** handles one inbound request, always asynchronously */
export type RequestHandler = (
  params: JsonRpcRequestData | undefined,
  context: RequestContext,
) => Promise<HandlerOutcome>;

/** handles one inbound notification, always asynchronously */
export type NotificationHandler = (
  params: JsonRpcNotificationData | undefined,
) => Promise<void>;

/** observes the outcome of an inbound request after its response was written */
export type ReplyListener = (outcome: HandlerOutcome) => void;

/** checks and narrows a result received for an outbound request */
export type ResultVerifier<R extends JsonRpcResultData> = (
  result: JsonRpcResultData,
) => R;

/** configuration of a protocol engine */
export interface ProtocolEngineOptions {
  /** the side of the connection this engine plays */
  role: PeerRole;
  /** name used in log entries */
  name?: string;
  /** optional logger */
  log?: Log;
  /** optional store receiving every inbound and outbound message */
  recorder?: EventRecorder;
}
