import type { Annotations, Role } from '#primitives';
import type { BlobResourceContents, TextResourceContents } from '#resources';

/** plain text content */
export type TextContent = {
  annotations?: Annotations;
  text: string;
  type: 'text';
};

/** base64 encoded image content */
export type ImageContent = {
  annotations?: Annotations;
  data: string;
  mimeType: string;
  type: 'image';
};

/** base64 encoded audio content */
export type AudioContent = {
  annotations?: Annotations;
  data: string;
  mimeType: string;
  type: 'audio';
};

/** pointer to a resource the receiver may read later */
export type ResourceLink = {
  annotations?: Annotations;
  description?: string;
  mimeType?: string;
  name: string;
  size?: number;
  title?: string;
  type: 'resource_link';
  uri: string;
};

/** resource contents inlined into a message */
export type EmbeddedResource = {
  annotations?: Annotations;
  resource: TextResourceContents | BlobResourceContents;
  type: 'resource';
};

/** any content carried by tool results and prompt messages */
export type ContentBlock =
  | AudioContent
  | EmbeddedResource
  | ImageContent
  | ResourceLink
  | TextContent;

/** role-tagged message exchanged with a language model */
export type SamplingMessage = {
  content: TextContent | ImageContent | AudioContent;
  role: Role;
};
