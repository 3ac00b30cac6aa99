import { createChannelPair } from '@duplexmcp/core';
import { McpServer, ServerTool } from '@duplexmcp/server';

import { McpClient } from '#client';

import type { MemoryChannel } from '@duplexmcp/core';
import type { McpServerOptions } from '@duplexmcp/server';

import type { McpClientOptions } from '#client';

export const clientInfo = { name: 'test-client', version: '1.0.0' };

export const serverInfo = { name: 'test-server', version: '1.0.0' };

export const createEchoTool = (): ServerTool =>
  new ServerTool({
    name: 'echo',
    description: 'Echoes a message back',
    inputSchema: {
      type: 'object',
      properties: { message: { type: 'string' } },
      required: ['message'],
    },
    handler: async ({ message }) => [
      { type: 'text', text: `ECHO: ${String(message)}` },
    ],
  });

export const createServer = (
  options: Partial<McpServerOptions> = {},
): McpServer =>
  new McpServer({
    serverInfo,
    instructions: 'demo',
    tools: [createEchoTool()],
    resources: [
      {
        uri: 'memory:///notes',
        name: 'notes',
        title: 'Notes',
        mimeType: 'text/plain',
        text: 'first draft',
      },
    ],
    resourceTemplates: [{ uriTemplate: 'memory:///{name}', name: 'memory' }],
    prompts: [
      {
        name: 'greet',
        arguments: [{ name: 'name', required: true }],
        render: async ({ name }) => ({
          messages: [
            { role: 'user', content: { type: 'text', text: `Hello, ${name}!` } },
          ],
        }),
      },
    ],
    ...options,
  });

/**
 * wires a client and a server through an in-memory channel pair
 * @param clientOptions options of the client beyond its info
 * @param server server to serve
 * @returns both peers, the client end of the channel and the serving promise
 */
export const createPeers = (
  clientOptions: Partial<McpClientOptions> = {},
  server: McpServer = createServer(),
): {
  client: McpClient;
  server: McpServer;
  serving: Promise<void>;
  channel: MemoryChannel;
} => {
  const { client: channel, server: serverEnd } = createChannelPair();
  const client = new McpClient({ clientInfo, ...clientOptions });
  const serving = server.serve(serverEnd);

  return { client, server, serving, channel };
};
