import { negotiateProtocolVersion } from '@duplexmcp/protocol';

import type { InitializeRequest, InitializeResult } from '@duplexmcp/protocol';

import type { HandlerContext } from '#types/handler';

/**
 * handles the initialization request
 *
 * the handshake is kept pending until the client confirms it with
 * notifications/initialized.
 * @param params initialization parameters from the client
 * @param context request context
 * @returns server capabilities and protocol information
 * @throws {JsonRpcError} UNSUPPORTED_PROTOCOL_VERSION when the version cannot be spoken
 */
export async function handleInitialize(
  params: InitializeRequest['params'],
  { id, state, log }: HandlerContext,
): Promise<InitializeResult> {
  const protocolVersion = negotiateProtocolVersion(
    params.protocolVersion,
    state.protocolVersions,
  );
  const capabilities = state.capabilities;
  const instructions =
    state.instructions !== undefined
      ? { instructions: state.instructions }
      : {};

  state.pendingHandshake = Object.freeze({
    protocolVersion,
    requestId: id,
    clientCapabilities: params.capabilities,
    serverCapabilities: capabilities,
    clientInfo: params.clientInfo,
    serverInfo: state.serverInfo,
    ...instructions,
  });

  log?.('info', 'client initialized', {
    protocolVersion,
    client: params.clientInfo.name,
  });

  return {
    protocolVersion,
    capabilities,
    serverInfo: state.serverInfo,
    ...instructions,
  };
}
