import type { JsonifibleObject, JsonifibleValue, JsonPrimitive } from '#json';

/**
 * common types and primitives shared across protocol methods
 * @see https://modelcontextprotocol.io/specification/2025-06-18/basic
 */

/** json-schema-shaped description of an object argument map */
export type JsonSchema = {
  /** always an object for tool inputs */
  type: 'object';
  /** schema of each named property */
  properties?: Record<string, JsonifibleObject>;
  /** names of the properties that must be present */
  required?: string[];
  [keyword: string]: JsonifibleValue;
};

/** unique identifier for json-rpc requests and responses */
export type RequestId = string | number;
/** opaque token that associates progress notifications with their originating request */
export type ProgressToken = string | number;
/** opaque pagination token for continuing paginated requests */
export type Cursor = string;
/** participant role in conversations and message exchanges */
export type Role = 'user' | 'assistant';
/** severity levels for log messages following rfc 5424 syslog standards */
export type McpLogLevel =
  | 'emergency'
  | 'alert'
  | 'critical'
  | 'error'
  | 'warning'
  | 'notice'
  | 'info'
  | 'debug';

/** information about a peer implementation (client or server) */
export type Implementation = {
  /** programmatic identifier for the implementation */
  name: string;
  /** version string of the implementation */
  version: string;
  /** human-readable display name for ui contexts */
  title?: string;
  /** free-form metadata describing the peer */
  metadata?: JsonifibleObject;
};

/** metadata hints for peers about how to handle content and data */
export type Annotations = {
  /** intended recipients of this content (user, assistant, or both) */
  audience?: Role[];
  /** iso 8601 timestamp when the content was last modified */
  lastModified?: string;
  /** importance level from 0 (least) to 1 (most important) */
  priority?: number;
};

/** features supported by the initiating peer */
export type ClientCapabilities = {
  /** support for requesting additional user input */
  elicitation?: JsonifibleObject;
  /** non-standard capabilities specific to this client */
  experimental?: Record<string, JsonifibleObject>;
  /** workspace root enumeration */
  roots?: {
    /** whether client sends notifications when its root set changes */
    listChanged?: boolean;
  };
  /** support for delegated generation requests */
  sampling?: JsonifibleObject;
};

/** features provided by the responding peer */
export type ServerCapabilities = {
  /** non-standard capabilities specific to this server */
  experimental?: Record<string, JsonifibleObject>;
  /** support for sending log messages to the client */
  logging?: JsonifibleObject;
  /** prompt template capabilities */
  prompts?: {
    /** whether server sends notifications when prompt list changes */
    listChanged?: boolean;
  };
  /** resource access capabilities */
  resources?: {
    /** whether server sends notifications when resource list changes */
    listChanged?: boolean;
    /** whether server supports resource update subscriptions */
    subscribe?: boolean;
  };
  /** tool execution capabilities */
  tools?: {
    /** whether server sends notifications when tool list changes */
    listChanged?: boolean;
  };
};

/** schema definition for primitive value types without nesting */
export type PrimitiveSchemaDefinition = {
  /** default value when no value is provided */
  default?: JsonPrimitive;
  /** human-readable description of this field */
  description?: string;
  /** allowed string values for enumeration types */
  enum?: string[];
  /** maximum allowed value for numeric types */
  maximum?: number;
  /** minimum allowed value for numeric types */
  minimum?: number;
  /** human-readable display name */
  title?: string;
  /** primitive data type of this field */
  type: 'string' | 'number' | 'integer' | 'boolean';
};

/** error codes used on the wire */
export const MCP_ERROR_CODES = {
  /** invalid json was received */
  PARSE_ERROR: -32700,
  /** invalid request object */
  INVALID_REQUEST: -32600,
  /** method does not exist */
  METHOD_NOT_FOUND: -32601,
  /** invalid method parameters */
  INVALID_PARAMS: -32602,
  /** internal json-rpc error */
  INTERNAL_ERROR: -32603,
  /** requested resource uri is not registered */
  RESOURCE_NOT_FOUND: -32001,
  /** requested tool name is not registered */
  UNKNOWN_TOOL: -32002,
  /** the requested protocol version cannot be spoken */
  UNSUPPORTED_PROTOCOL_VERSION: -32003,
  /** a registered handler raised an exception */
  INTERNAL_HANDLER_ERROR: -32099,
} as const;

/** any of the known error codes */
export type McpErrorCode =
  (typeof MCP_ERROR_CODES)[keyof typeof MCP_ERROR_CODES];

/** capabilities declared by both peers */
export interface Capability {
  client: ClientCapabilities;
  server: ServerCapabilities;
}
