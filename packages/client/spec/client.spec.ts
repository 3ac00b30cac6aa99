import { JsonRpcError } from '@duplexmcp/protocol';
import { afterEach, describe, expect, it, vi } from 'vitest';

import { McpClient } from '#client';

import { clientInfo, createPeers, createServer, serverInfo } from './fixtures';

import type { Log } from '@duplexmcp/core';
import type { CreateMessageResult } from '@duplexmcp/protocol';
import type { McpServer } from '@duplexmcp/server';

import type { McpClientOptions } from '#client';
import type { OnLogMessage, OnResourceChange } from '#types';

// CONSTANTS //

const generation: CreateMessageResult = {
  role: 'assistant',
  content: { type: 'text', text: '42' },
  model: 'fake-model',
  stopReason: 'endTurn',
};

// HELPERS //

const opened: Array<McpClient | McpServer> = [];

afterEach(async () => {
  await Promise.all(opened.splice(0).map(async (peer) => peer.close()));
});

/**
 * connects a fresh client to a fresh server
 * @param options options of the client beyond its info
 * @param server server to connect to
 * @returns both peers and the serving promise
 */
const connect = async (
  options: Partial<McpClientOptions> = {},
  server?: McpServer,
) => {
  const peers = createPeers(options, server);

  opened.push(peers.client, peers.server);

  const handshake = await peers.client.connect(peers.channel);

  return { ...peers, handshake };
};

// TEST SUITES //

describe('cl:McpClient', () => {
  describe('gt:capabilities', () => {
    it('should only declare roots without any callback', () => {
      const client = new McpClient({ clientInfo });

      expect(client.capabilities).toEqual({ roots: { listChanged: true } });
      expect(Object.isFrozen(client.capabilities)).toBe(true);
    });

    it('should declare what the configured callbacks can answer', () => {
      const client = new McpClient({
        clientInfo,
        generationProvider: { createMessage: async () => generation },
        onElicitation: async () => ({ action: 'cancel' }),
      });

      expect(client.capabilities).toEqual({
        elicitation: {},
        roots: { listChanged: true },
        sampling: {},
      });
    });

    it('should prefer explicit capabilities', () => {
      const client = new McpClient({ clientInfo, capabilities: {} });

      expect(client.capabilities).toEqual({});
    });
  });

  describe('mt:connect', () => {
    it('should complete the handshake on both sides', async () => {
      const { client, server, handshake } = await connect();

      expect(handshake).toEqual({
        protocolVersion: '2025-06-18',
        requestId: 1,
        clientCapabilities: { roots: { listChanged: true } },
        serverCapabilities: expect.objectContaining({ logging: {} }),
        clientInfo,
        serverInfo,
        instructions: 'demo',
      });
      expect(Object.isFrozen(handshake)).toBe(true);
      expect(client.handshake).toBe(handshake);
      expect(client.status).toBe('ready');

      await client.ping();

      expect(server.handshake).toMatchObject({
        requestId: 1,
        clientInfo,
        clientCapabilities: { roots: { listChanged: true } },
      });
    });

    it('should request an older protocol version when asked to', async () => {
      const { handshake } = await connect({ protocolVersion: '2024-11-05' });

      expect(handshake.protocolVersion).toBe('2024-11-05');
    });

    it('should refuse to connect twice', async () => {
      const { client } = await connect();
      const other = createPeers();

      opened.push(other.server);

      await expect(client.connect(other.channel)).rejects.toThrow(
        'The client is already connected',
      );
    });

    it('should close the connection when the server refuses the version', async () => {
      const log = vi.fn<Log>();
      const { client, serving, channel } = createPeers(
        { log },
        createServer({ protocolVersions: ['2024-11-05'] }),
      );

      const connecting = client.connect(channel);

      await expect(connecting).rejects.toBeInstanceOf(JsonRpcError);
      await expect(connecting).rejects.toMatchObject({ code: -32003 });
      await serving;

      expect(client.status).toBe('closed');
      expect(client.handshake).toBeNull();
      expect(log).toHaveBeenCalledWith(
        'error',
        'handshake failed',
        expect.objectContaining({ error: expect.anything() }),
      );
    });

    it('should refuse a server answering with an unsupported version', async () => {
      const server = createServer({
        handlers: {
          initialize: async () => ({
            protocolVersion: '1999-01-01',
            capabilities: {},
            serverInfo,
          }),
        },
      });
      const { client, serving, channel } = createPeers({}, server);

      await expect(client.connect(channel)).rejects.toThrow(
        'Unsupported protocol version: 1999-01-01',
      );
      await serving;

      expect(client.status).toBe('closed');
    });

    it('should reconnect once the previous connection closed', async () => {
      const { client } = await connect();

      await client.close();

      const { channel } = createPeers();
      const handshake = await client.connect(channel);

      expect(handshake.requestId).toBe(1);
      expect(client.status).toBe('ready');
    });
  });

  describe('mt:close', () => {
    it('should end the connection on both sides', async () => {
      const { client, server, serving } = await connect();

      await client.close();
      await serving;

      expect(client.status).toBe('closed');
      expect(server.status).toBe('closed');
    });

    it('should refuse requests once closed', async () => {
      const { client } = await connect();

      await client.close();

      await expect(client.ping()).rejects.toThrow(
        'Cannot send ping: engine is closed',
      );
    });

    it('should refuse requests before connecting', async () => {
      const client = new McpClient({ clientInfo });

      expect(client.status).toBe('unconnected');
      await expect(client.listTools()).rejects.toThrow(
        'The client is not connected',
      );
    });
  });

  describe('mt:callTool', () => {
    it('should return the result of the tool', async () => {
      const { client } = await connect();

      await expect(client.callTool('echo', { message: 'hi' })).resolves.toEqual({
        content: [{ type: 'text', text: 'ECHO: hi' }],
        isError: false,
      });
    });

    it('should report a tool failure as a flagged result', async () => {
      const { client } = await connect();

      await expect(client.callTool('echo')).resolves.toMatchObject({
        isError: true,
      });
    });

    it('should reject an unknown tool', async () => {
      const { client } = await connect();

      await expect(client.callTool('missing')).rejects.toMatchObject({
        code: -32002,
      });
    });
  });

  describe('mt:listTools', () => {
    it('should list the tools of the server', async () => {
      const { client } = await connect();

      const tools = await client.listTools();

      expect(tools.map(({ name }) => name)).toEqual(['echo']);
    });
  });

  describe('mt:readResource', () => {
    it('should read the current content of a resource', async () => {
      const { client } = await connect();

      await expect(client.readResource('memory:///notes')).resolves.toEqual({
        contents: [
          { uri: 'memory:///notes', mimeType: 'text/plain', text: 'first draft' },
        ],
      });
    });

    it('should reject an unknown resource', async () => {
      const { client } = await connect();

      await expect(
        client.readResource('memory:///missing'),
      ).rejects.toMatchObject({ code: -32001 });
    });
  });

  describe('mt:listResources', () => {
    it('should list resources and templates', async () => {
      const { client } = await connect();

      const resources = await client.listResources();
      const templates = await client.listResourceTemplates();

      expect(resources.map(({ uri }) => uri)).toEqual(['memory:///notes']);
      expect(templates).toEqual([
        { uriTemplate: 'memory:///{name}', name: 'memory' },
      ]);
    });
  });

  describe('mt:getPrompt', () => {
    it('should render a prompt of the server', async () => {
      const { client } = await connect();

      await expect(
        client.getPrompt('greet', { name: 'Ada' }),
      ).resolves.toMatchObject({
        messages: [{ role: 'user', content: { type: 'text', text: 'Hello, Ada!' } }],
      });
      await expect(client.listPrompts()).resolves.toMatchObject([
        { name: 'greet' },
      ]);
    });
  });

  describe('mt:subscribeResource', () => {
    it('should only hear about subscribed resources', async () => {
      const onResourceChange = vi.fn<OnResourceChange>(async () => undefined);
      const { client, server } = await connect({ onResourceChange });

      await expect(server.notifyResourceUpdated('memory:///notes')).resolves.toBe(
        false,
      );

      await client.subscribeResource('memory:///notes');
      await server.updateResource('memory:///notes', { text: 'second draft' });
      await client.ping();

      expect(onResourceChange.mock.calls).toEqual([
        [{ uri: 'memory:///notes', title: 'Notes' }],
      ]);
      await expect(client.readResource('memory:///notes')).resolves.toMatchObject({
        contents: [{ text: 'second draft' }],
      });

      await client.unsubscribeResource('memory:///notes');

      await expect(server.notifyResourceUpdated('memory:///notes')).resolves.toBe(
        false,
      );
    });
  });

  describe('mt:setLogLevel', () => {
    it('should only receive messages at or above the threshold', async () => {
      const onLogMessage = vi.fn<OnLogMessage>(async () => undefined);
      const { client, server } = await connect({ onLogMessage });

      await client.setLogLevel('warning');

      await expect(server.sendLogMessage('info', 'chatty')).resolves.toBe(false);
      await expect(server.sendLogMessage('error', 'boom', 'db')).resolves.toBe(
        true,
      );
      await client.ping();

      expect(onLogMessage.mock.calls).toEqual([
        [{ level: 'error', data: 'boom', logger: 'db' }],
      ]);
    });
  });

  describe('sampling', () => {
    it('should run the generations the server delegates', async () => {
      const createMessage = vi.fn(async () => generation);
      const { server } = await connect({
        generationProvider: { createMessage },
      });

      await expect(
        server.createMessage({
          messages: [
            { role: 'user', content: { type: 'text', text: 'six times seven?' } },
          ],
          maxTokens: 8,
        }),
      ).resolves.toEqual(generation);
      expect(createMessage).toHaveBeenCalledTimes(1);
    });

    it('should leave sampling unanswered without a provider', async () => {
      const { server } = await connect();

      await expect(
        server.delegateGeneration({ messages: [] }),
      ).resolves.toEqual({
        role: 'assistant',
        content: {
          type: 'text',
          text: '[generation unavailable] Method not found: sampling/createMessage',
        },
        stopReason: 'error',
      });
    });
  });

  describe('elicitation', () => {
    it('should answer with what the callback collected', async () => {
      const { server } = await connect({
        onElicitation: async () => ({
          action: 'accept',
          content: { name: 'Ada' },
        }),
      });

      await expect(
        server.elicit({ message: 'Who?' }, { name: 'anonymous', age: 30 }),
      ).resolves.toEqual({ name: 'Ada', age: 30 });
    });
  });

  describe('mt:setRoots', () => {
    it('should serve the roots and announce their changes', async () => {
      const log = vi.fn<Log>();
      const { client, server } = await connect(
        { roots: [{ uri: 'file:///work', name: 'work' }] },
        createServer({ log }),
      );

      await expect(server.listRoots()).resolves.toEqual([
        { uri: 'file:///work', name: 'work' },
      ]);

      await client.setRoots([{ uri: 'file:///play' }]);
      await client.ping();

      expect(log).toHaveBeenCalledWith('debug', 'client roots changed');
      await expect(server.listRoots()).resolves.toEqual([
        { uri: 'file:///play' },
      ]);
      expect(client.roots).toEqual([{ uri: 'file:///play' }]);
    });

    it('should keep roots changed before connecting', async () => {
      const client = new McpClient({ clientInfo });

      await expect(
        client.addRoot({ uri: 'file:///work', name: 'work' }),
      ).resolves.toBe(true);
      await expect(client.removeRoot('file:///elsewhere')).resolves.toBe(false);

      expect(client.roots).toEqual([{ uri: 'file:///work', name: 'work' }]);
    });
  });
});
