import type { Annotations, Cursor } from '#primitives';
import type { JsonRpcRequestData, JsonRpcResultData } from '#jsonrpc';

/**
 * descriptor of a resource the server exposes
 * @see https://modelcontextprotocol.io/specification/2025-06-18/server/resources
 */
export type Resource = {
  /** unique uri of the resource */
  uri: string;
  /** programmatic name */
  name: string;
  /** human-readable display name */
  title?: string;
  description?: string;
  mimeType?: string;
  annotations?: Annotations;
  /** size of the raw content in bytes, when known */
  size?: number;
};

/** parameterised family of resources, listed but never read directly */
export type ResourceTemplate = {
  annotations?: Annotations;
  description?: string;
  mimeType?: string;
  name: string;
  title?: string;
  /** rfc 6570 uri template */
  uriTemplate: string;
};

export type TextResourceContents = {
  mimeType?: string;
  text: string;
  uri: string;
};

export type BlobResourceContents = {
  /** base64 encoded bytes */
  blob: string;
  mimeType?: string;
  uri: string;
};

export interface ListResourcesRequest extends JsonRpcRequestData {
  method: 'resources/list';
  params?: {
    cursor?: Cursor;
  };
}

export interface ListResourcesResult extends JsonRpcResultData {
  nextCursor?: Cursor;
  resources: Resource[];
}

export interface ListResourceTemplatesRequest extends JsonRpcRequestData {
  method: 'resources/templates/list';
  params?: {
    cursor?: Cursor;
  };
}

export interface ListResourceTemplatesResult extends JsonRpcResultData {
  nextCursor?: Cursor;
  resourceTemplates: ResourceTemplate[];
}

export interface ReadResourceRequest extends JsonRpcRequestData {
  method: 'resources/read';
  params: {
    uri: string;
  };
}

export interface ReadResourceResult extends JsonRpcResultData {
  contents: Array<TextResourceContents | BlobResourceContents>;
}

export interface SubscribeRequest extends JsonRpcRequestData {
  method: 'resources/subscribe';
  params: {
    uri: string;
  };
}

export interface UnsubscribeRequest extends JsonRpcRequestData {
  method: 'resources/unsubscribe';
  params: {
    uri: string;
  };
}
