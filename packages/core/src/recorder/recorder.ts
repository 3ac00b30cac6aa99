import type { JsonRpcMessage } from '@duplexmcp/protocol';

/** which side of the connection an engine plays */
export type PeerRole = 'client' | 'server';

/** an observed message, as stored by a recorder */
export interface RecordedEvent {
  /** monotonically increasing id assigned by the recorder */
  id: number;
  /** epoch milliseconds at which the event was recorded */
  occurredAt: number;
  /** role of the engine that observed the message */
  role: PeerRole;
  /** whether the message was received or sent by that engine */
  direction: 'inbound' | 'outbound';
  /** identifier of the connection the message travelled on */
  channel: string | null;
  /** the message itself */
  payload: JsonRpcMessage;
}

/** the part of an event supplied by the code recording it */
export type EventInput = Omit<RecordedEvent, 'id' | 'occurredAt'>;

/** storage of observed protocol traffic, owned by whoever creates it */
export abstract class EventRecorder {
  /**
   * stores an event
   * @param event the event without its id and timestamp
   * @returns the stored event
   */
  public abstract record(event: EventInput): RecordedEvent;
  /**
   * retrieves events recorded after the given id
   * @param sinceId id of the last event already seen, -1 for all of them
   * @returns events with an id strictly greater than sinceId, oldest first
   */
  public abstract query(sinceId?: number): RecordedEvent[];
  /**
   * subscribes to newly recorded events
   * @param listener callback invoked for each recorded event
   * @returns unsubscribe function
   */
  public abstract subscribe(
    listener: (event: RecordedEvent) => void,
  ): () => void;
  /** forgets every stored event */
  public abstract reset(): void;
}
