import type {
  ElicitRequest,
  ElicitResult,
  JsonifibleValue,
  McpLogLevel,
  Root,
} from '@duplexmcp/protocol';

/** registry whose content the server announced as changed */
export type ListType = 'prompts' | 'tools' | 'resources';

/** answers an elicitation request on behalf of the user */
export type ElicitationCallback = (
  request: ElicitRequest['params'],
) => Promise<ElicitResult>;

// NOTIFICATION HOOK TYPES //

/** parameters for onListChange hook - combines all list_changed notifications */
export interface OnListChangeParams {
  /** type of list that changed */
  changeType: ListType;
}

/** callback for list change notifications (tools, resources, prompts) */
export type OnListChange = (params: OnListChangeParams) => Promise<void>;

/** parameters for onResourceChange hook */
export interface OnResourceChangeParams {
  /** uri of the resource that was updated */
  uri: string;
  /** title of the resource, when the server sent one */
  title?: string;
}

/** callback for resource updated notifications */
export type OnResourceChange = (params: OnResourceChangeParams) => Promise<void>;

/** parameters for onLogMessage hook */
export interface OnLogMessageParams {
  /** severity level of the log message */
  level: McpLogLevel;
  /** the actual log data */
  data: JsonifibleValue;
  /** name of the component that generated this log */
  logger?: string;
}

/** callback for log message notifications */
export type OnLogMessage = (params: OnLogMessageParams) => Promise<void>;

/** callback invoked with the roots handed to a server asking for them */
export type OnRootsRequest = (roots: Root[]) => Promise<void>;
