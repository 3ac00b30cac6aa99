import { createChannelPair, ProtocolEngine } from '@duplexmcp/core';
import { SUPPORTED_PROTOCOL_VERSIONS } from '@duplexmcp/protocol';

import { McpServer } from '#server';
import { ServerState } from '#state';
import { ServerTool } from '#tool';

import type { McpServerOptions } from '#server';
import type { ServerPrompt } from '#prompt';
import type { ServerResource } from '#resource';
import type { HandlerContext } from '#types/handler';

export const serverInfo = { name: 'test-server', version: '1.0.0' };

export const clientInfo = { name: 'test-client', version: '1.0.0' };

export const initializeParams = {
  protocolVersion: '2025-06-18',
  capabilities: { sampling: {}, roots: { listChanged: true } },
  clientInfo,
};

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

export const createFailingTool = (): ServerTool =>
  new ServerTool({
    name: 'explode',
    description: 'Always fails',
    inputSchema: { type: 'object' },
    handler: async () => {
      throw new Error('disk full');
    },
  });

export const createResources = (): ServerResource[] => [
  {
    uri: 'memory:///notes',
    name: 'notes',
    title: 'Notes',
    mimeType: 'text/plain',
    text: 'first draft',
  },
  {
    uri: 'memory:///about',
    name: 'about',
    description: 'About this server',
  },
  {
    uri: 'memory:///logo',
    name: 'logo',
    mimeType: 'image/png',
    blob: 'aGVsbG8=',
  },
];

export const createGreetPrompt = (): ServerPrompt => ({
  name: 'greet',
  description: 'Greets someone',
  arguments: [{ name: 'name', required: true }],
  render: async ({ name }) => ({
    messages: [{ role: 'user', content: { type: 'text', text: `Hello, ${name}!` } }],
  }),
});

export const createBrokenPrompt = (): ServerPrompt => ({
  name: 'broken',
  render: async () => {
    throw new Error('template missing');
  },
});

export const createState = (): ServerState =>
  new ServerState({
    serverInfo,
    instructions: 'demo',
    protocolVersions: SUPPORTED_PROTOCOL_VERSIONS,
    logLevel: 'info',
    tools: [createEchoTool(), createFailingTool()],
    resources: createResources(),
    resourceTemplates: [{ uriTemplate: 'memory:///{name}', name: 'memory' }],
    prompts: [createGreetPrompt(), createBrokenPrompt()],
  });

export const createContext = (
  state: ServerState = createState(),
): HandlerContext => ({
  id: 1,
  signal: new AbortController().signal,
  state,
  server: new McpServer({ serverInfo }),
});

export const createServer = (
  options: Partial<McpServerOptions> = {},
): McpServer =>
  new McpServer({
    serverInfo,
    instructions: 'demo',
    tools: [createEchoTool(), createFailingTool()],
    resources: createResources(),
    prompts: [createGreetPrompt(), createBrokenPrompt()],
    ...options,
  });

/**
 * serves a server over an in-memory channel, driven by a bare client engine
 * @param server server to serve
 * @returns the client engine and the promise settling when serving ends
 */
export const servePeer = (
  server: McpServer,
): { peer: ProtocolEngine; serving: Promise<void> } => {
  const { client, server: serverEnd } = createChannelPair();
  const serving = server.serve(serverEnd);
  const peer = new ProtocolEngine({ role: 'client' });
  peer.connect(client);

  return { peer, serving };
};
