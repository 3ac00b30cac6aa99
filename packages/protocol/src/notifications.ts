import type { McpLogLevel, ProgressToken, RequestId } from '#primitives';
import type { JsonifibleValue } from '#json';

/**
 * notifications exchanged by the peers, none of which expects a reply
 * @see https://modelcontextprotocol.io/specification/2025-06-18/basic/utilities
 */

/** sent by the client once it has processed the initialize result */
export interface InitializedNotification {
  method: 'notifications/initialized';
  params?: {};
}

/** farewell sent by either peer before releasing the channel */
export interface ShutdownNotification {
  method: 'notifications/shutdown';
  params?: {
    reason?: string;
  };
}

/** asks the receiver to abandon an in-flight request */
export interface CancelledNotification {
  method: 'notifications/cancelled';
  params: {
    reason?: string;
    requestId: RequestId;
  };
}

export interface ProgressNotification {
  method: 'notifications/progress';
  params: {
    message?: string;
    progress: number;
    progressToken: ProgressToken;
    total?: number;
  };
}

export interface ResourceListChangedNotification {
  method: 'notifications/resources/list_changed';
  params?: {};
}

/** sent only for uris the client subscribed to */
export interface ResourceUpdatedNotification {
  method: 'notifications/resources/updated';
  params: {
    title?: string;
    uri: string;
  };
}

export interface PromptListChangedNotification {
  method: 'notifications/prompts/list_changed';
  params?: {};
}

export interface ToolListChangedNotification {
  method: 'notifications/tools/list_changed';
  params?: {};
}

export interface RootsListChangedNotification {
  method: 'notifications/roots/list_changed';
  params?: {};
}

export interface LoggingMessageNotification {
  method: 'notifications/message';
  params: {
    data: JsonifibleValue;
    level: McpLogLevel;
    logger?: string;
  };
}
