import { SUPPORTED_PROTOCOL_VERSIONS } from '@duplexmcp/protocol';
import { describe, expect, it } from 'vitest';

import { handleInitialize } from '#handlers/initialize';
import { ServerState } from '#state';

import {
  clientInfo,
  createContext,
  createState,
  initializeParams,
  serverInfo,
} from '../fixtures';

describe('fn:handleInitialize', () => {
  it('should answer with the server capabilities, info and instructions', async () => {
    const result = await handleInitialize(initializeParams, createContext());

    expect(result).toEqual({
      protocolVersion: '2025-06-18',
      capabilities: {
        logging: {},
        prompts: { listChanged: true },
        resources: { listChanged: true, subscribe: true },
        tools: { listChanged: true },
      },
      serverInfo,
      instructions: 'demo',
    });
  });

  it('should keep a frozen handshake until the client confirms it', async () => {
    const state = createState();

    const result = await handleInitialize(initializeParams, createContext(state));

    expect(state.handshake).toBeNull();
    expect(state.pendingHandshake).toEqual({
      protocolVersion: '2025-06-18',
      requestId: 1,
      clientCapabilities: { sampling: {}, roots: { listChanged: true } },
      serverCapabilities: result.capabilities,
      clientInfo,
      serverInfo,
      instructions: 'demo',
    });
    expect(Object.isFrozen(state.pendingHandshake)).toBe(true);

    const pending = state.pendingHandshake;

    expect(state.confirmHandshake()).toBe(pending);
    expect(state.handshake).toBe(pending);
    expect(state.pendingHandshake).toBeNull();
  });

  it('should confirm nothing before initialize is answered', () => {
    const state = createState();

    expect(state.confirmHandshake()).toBeNull();
    expect(state.handshake).toBeNull();
  });

  it('should echo an older supported version', async () => {
    const result = await handleInitialize(
      { ...initializeParams, protocolVersion: '2024-11-05' },
      createContext(),
    );

    expect(result.protocolVersion).toBe('2024-11-05');
  });

  it('should refuse an unsupported version', async () => {
    const state = createState();

    await expect(
      handleInitialize(
        { ...initializeParams, protocolVersion: '1999-01-01' },
        createContext(state),
      ),
    ).rejects.toMatchObject({
      code: -32003,
      message: 'Unsupported protocol version: 1999-01-01',
    });
    expect(state.pendingHandshake).toBeNull();
    expect(state.handshake).toBeNull();
  });

  it('should leave instructions out when there are none', async () => {
    const state = new ServerState({
      serverInfo,
      protocolVersions: SUPPORTED_PROTOCOL_VERSIONS,
      logLevel: 'info',
    });

    const result = await handleInitialize(initializeParams, createContext(state));

    expect(result).toEqual({
      protocolVersion: '2025-06-18',
      capabilities: { logging: {} },
      serverInfo,
    });
    expect(result).not.toHaveProperty('instructions');
  });
});
