export type { Log, LogLevel } from '#logging';
export type { Channel } from '#channel/channel';
export type { Deferred } from '#deferred';
export type { ClassifiedMessage } from '#engine/message';
export type { PendingRequest } from '#engine/request-manager';
export type {
  EngineState,
  HandlerOutcome,
  NotificationHandler,
  ProtocolEngineOptions,
  RequestContext,
  ReplyListener,
  RequestHandler,
  ResultVerifier,
} from '#engine/types';
export type {
  EventInput,
  PeerRole,
  RecordedEvent,
} from '#recorder/recorder';
export type { MemoryEventRecorderOptions } from '#recorder/adapters/memory';

export { jsonifyError, toJsonRpcErrorData, TransportClosedError } from '#error';
export { mapMcpLogLevel, withLogContext } from '#logging';
export { createDeferred } from '#deferred';
export { createChannelPair, MemoryChannel } from '#channel/memory';
export { ProtocolEngine } from '#engine/engine';
export {
  classifyMessage,
  createNotificationMessage,
  createResponseMessage,
} from '#engine/message';
export { RequestManager } from '#engine/request-manager';
export { EventRecorder } from '#recorder/recorder';
export { MemoryEventRecorder } from '#recorder/adapters/memory';
export { generateChannelId } from '#id';
