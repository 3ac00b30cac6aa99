import type {
  BlobResourceContents,
  Resource,
  TextResourceContents,
} from '@duplexmcp/protocol';

/** a registered resource, its descriptor together with its current payload */
export type ServerResource = Resource & {
  /** textual payload */
  text?: string;
  /** base64 encoded binary payload */
  blob?: string;
};

/** fields of a registered resource that may be changed in place */
export type ResourcePatch = Partial<Omit<ServerResource, 'uri'>>;

/**
 * changes a registered resource in place
 *
 * a new text payload replaces a blob and the reverse, so reads always serve
 * the payload given last.
 * @param resource registered resource
 * @param patch fields to change
 * @returns the same resource, updated
 */
export function patchResource(
  resource: ServerResource,
  patch: ResourcePatch,
): ServerResource {
  if (patch.text !== undefined) {
    delete resource.blob;
  }

  if (patch.blob !== undefined) {
    delete resource.text;
  }

  return Object.assign(resource, patch);
}

/**
 * strips the payload off a registered resource
 * @param resource registered resource
 * @returns the descriptor announced by resources/list
 */
export function describeResource(resource: ServerResource): Resource {
  const { text, blob, ...descriptor } = resource;

  return descriptor;
}

/**
 * produces the contents returned by resources/read
 *
 * a resource carrying neither text nor blob is read as its description.
 * @param resource registered resource
 * @returns the single content entry of the resource
 */
export function readResourceContents(
  resource: ServerResource,
): TextResourceContents | BlobResourceContents {
  const { uri, mimeType, text, blob, description } = resource;
  const base = { uri, ...(mimeType !== undefined && { mimeType }) };

  if (text !== undefined) {
    return { ...base, text };
  }

  if (blob !== undefined) {
    return { ...base, blob };
  }

  return { ...base, text: description ?? '' };
}
