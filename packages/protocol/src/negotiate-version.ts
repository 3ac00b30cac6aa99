import { JsonRpcError } from '#jsonrpc';
import { MCP_ERROR_CODES } from '#primitives';

/**
 * negotiates the protocol version requested by a client
 * @param requestedVersion client's requested protocol version
 * @param supportedVersions array of supported protocol versions in preferred order
 * @returns the requested version when it is supported
 * @throws {JsonRpcError} with UNSUPPORTED_PROTOCOL_VERSION when the version cannot be spoken
 */
export function negotiateProtocolVersion<T extends readonly string[]>(
  requestedVersion: string,
  supportedVersions: T,
): T[number] {
  if (supportedVersions.length === 0) {
    throw new Error('supportedVersions array cannot be empty');
  }

  const negotiated = supportedVersions.find(
    (version): version is T[number] => version === requestedVersion,
  );

  if (negotiated === undefined) {
    throw new JsonRpcError({
      code: MCP_ERROR_CODES.UNSUPPORTED_PROTOCOL_VERSION,
      message: `Unsupported protocol version: ${requestedVersion}`,
      data: { requested: requestedVersion, supported: [...supportedVersions] },
    });
  }

  return negotiated;
}
