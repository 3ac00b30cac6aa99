import { jsonifyError, ProtocolEngine, TransportClosedError } from '@duplexmcp/core';
import {
  LATEST_PROTOCOL_VERSION,
  negotiateProtocolVersion,
  SUPPORTED_PROTOCOL_VERSIONS,
  validators,
} from '@duplexmcp/protocol';

import {
  createElicitationHandler,
  createRootsHandler,
  createSamplingHandler,
  registerNotificationHooks,
} from '#handler';
import { RootManager } from '#roots';

import type { Channel, EngineState, EventRecorder, Log } from '@duplexmcp/core';
import type {
  CallToolResult,
  ClientCapabilities,
  GetPromptResult,
  HandshakeResult,
  Implementation,
  JsonifibleObject,
  McpLogLevel,
  Prompt,
  ReadResourceResult,
  Resource,
  ResourceTemplate,
  Root,
  Tool,
} from '@duplexmcp/protocol';

import type { GenerationProvider } from '#sampling';
import type {
  ElicitationCallback,
  OnListChange,
  OnLogMessage,
  OnResourceChange,
  OnRootsRequest,
} from '#types';

/** configuration options for initializing an mcp client */
export interface McpClientOptions {
  /** client application information sent during the handshake */
  clientInfo: Implementation;
  /** capabilities declared instead of the ones derived from the callbacks */
  capabilities?: ClientCapabilities;
  /** protocol version requested from the server (default: latest) */
  protocolVersion?: string;
  /** root directories exposed to the server */
  roots?: Root[];
  /** runs the generations the server delegates */
  generationProvider?: GenerationProvider;
  /** handles elicitation requests from the server */
  onElicitation?: ElicitationCallback;
  /** callback for resource updated notifications */
  onResourceChange?: OnResourceChange;
  /** callback for list change notifications (tools, resources, prompts) */
  onListChange?: OnListChange;
  /** callback for log message notifications */
  onLogMessage?: OnLogMessage;
  /** callback invoked whenever the server enumerates the roots */
  onRootsRequest?: OnRootsRequest;
  /** logs client operations */
  log?: Log;
  /** receives every message exchanged with the server */
  recorder?: EventRecorder;
}

/** initiator side of a connection: negotiates, then calls into one server */
export class McpClient {
  #options: McpClientOptions;
  #capabilities: ClientCapabilities;
  #rootManager: RootManager;
  #log?: Log;
  #engine: ProtocolEngine | null = null;
  #handshake: HandshakeResult | null = null;

  /**
   * creates a new mcp client instance
   * @param options configuration options for the client
   */
  constructor(options: McpClientOptions) {
    this.#options = options;
    this.#log = options.log;
    this.#capabilities = Object.freeze(
      options.capabilities ?? {
        ...(options.onElicitation && { elicitation: {} }),
        roots: { listChanged: true },
        ...(options.generationProvider && { sampling: {} }),
      },
    );
    this.#rootManager = new RootManager(options.roots ?? [], async () =>
      this.#announceRoots(),
    );
  }

  /** capabilities declared to the server */
  public get capabilities(): ClientCapabilities {
    return this.#capabilities;
  }

  /** outcome of the handshake, null until connected */
  public get handshake(): HandshakeResult | null {
    return this.#handshake;
  }

  /** lifecycle state of the current connection */
  public get status(): EngineState {
    return this.#engine?.state ?? 'unconnected';
  }

  /** roots currently declared to the server */
  public get roots(): Root[] {
    return this.#rootManager.getRoots();
  }

  /**
   * connects to a server and performs the initialization handshake
   *
   * the initialized notification is sent before the connection counts as
   * ready; a failed handshake closes the connection.
   * @param channel channel connected to the server
   * @returns the outcome of the handshake
   * @throws {JsonRpcError} if the server refuses the handshake or answers with a malformed result
   */
  public async connect(channel: Channel): Promise<HandshakeResult> {
    if (this.#engine && this.#engine.state !== 'closed') {
      throw new Error('The client is already connected');
    }

    const { clientInfo } = this.#options;
    const engine = this.#createEngine();

    this.#engine = engine;
    this.#handshake = null;
    engine.connect(channel);

    try {
      const params = validators.requests.initialize({
        protocolVersion: this.#options.protocolVersion ?? LATEST_PROTOCOL_VERSION,
        capabilities: this.#capabilities,
        clientInfo,
      });
      const requestId = engine.nextRequestId;
      const result = await engine.sendRequest(
        'initialize',
        params,
        validators.results.initialize,
      );
      const protocolVersion = negotiateProtocolVersion(
        result.protocolVersion,
        SUPPORTED_PROTOCOL_VERSIONS,
      );

      const handshake: HandshakeResult = Object.freeze({
        protocolVersion,
        requestId,
        clientCapabilities: this.#capabilities,
        serverCapabilities: result.capabilities,
        clientInfo,
        serverInfo: result.serverInfo,
        ...(result.instructions !== undefined && {
          instructions: result.instructions,
        }),
      });

      await engine.sendNotification('notifications/initialized');
      engine.markReady();
      this.#handshake = handshake;

      this.#log?.('info', 'connected to server', {
        protocolVersion,
        server: result.serverInfo.name,
      });

      return handshake;
    } catch (exception) {
      this.#log?.('error', 'handshake failed', {
        error: jsonifyError(exception),
      });

      await engine.close('handshake failed');

      throw exception;
    }
  }

  /**
   * closes the connection, failing requests still waiting for the server
   * @param reason optional reason sent to the server
   */
  public async close(reason?: string): Promise<void> {
    await this.#engine?.close(reason);
  }

  /**
   * lists the tools of the server
   * @returns tools in registration order
   */
  public async listTools(): Promise<Tool[]> {
    const { tools } = await this.#requireEngine().sendRequest(
      'tools/list',
      undefined,
      validators.results['tools/list'],
    );

    return tools;
  }

  /**
   * calls a tool of the server
   * @param name name of the tool
   * @param args optional arguments passed to the tool
   * @returns the tool result, isError being set when the tool failed
   * @throws {JsonRpcError} UNKNOWN_TOOL if the server has no such tool
   */
  public async callTool(
    name: string,
    args?: JsonifibleObject,
  ): Promise<CallToolResult> {
    return this.#requireEngine().sendRequest(
      'tools/call',
      { name, ...(args !== undefined && { arguments: args }) },
      validators.results['tools/call'],
    );
  }

  /**
   * lists the resources of the server
   * @returns resource descriptors
   */
  public async listResources(): Promise<Resource[]> {
    const { resources } = await this.#requireEngine().sendRequest(
      'resources/list',
      undefined,
      validators.results['resources/list'],
    );

    return resources;
  }

  /**
   * reads the current content of a resource
   * @param uri uri of the resource
   * @returns the resource contents
   * @throws {JsonRpcError} RESOURCE_NOT_FOUND if the server has no such resource
   */
  public async readResource(uri: string): Promise<ReadResourceResult> {
    return this.#requireEngine().sendRequest(
      'resources/read',
      { uri },
      validators.results['resources/read'],
    );
  }

  /**
   * lists the resource templates of the server
   * @returns resource templates
   */
  public async listResourceTemplates(): Promise<ResourceTemplate[]> {
    const { resourceTemplates } = await this.#requireEngine().sendRequest(
      'resources/templates/list',
      undefined,
      validators.results['resources/templates/list'],
    );

    return resourceTemplates;
  }

  /**
   * asks to be notified whenever a resource changes
   * @param uri uri of the resource
   */
  public async subscribeResource(uri: string): Promise<void> {
    await this.#requireEngine().sendRequest(
      'resources/subscribe',
      { uri },
      validators.results['resources/subscribe'],
    );
  }

  /**
   * stops the notifications of a resource
   * @param uri uri of the resource
   */
  public async unsubscribeResource(uri: string): Promise<void> {
    await this.#requireEngine().sendRequest(
      'resources/unsubscribe',
      { uri },
      validators.results['resources/unsubscribe'],
    );
  }

  /**
   * lists the prompts of the server
   * @returns prompt definitions
   */
  public async listPrompts(): Promise<Prompt[]> {
    const { prompts } = await this.#requireEngine().sendRequest(
      'prompts/list',
      undefined,
      validators.results['prompts/list'],
    );

    return prompts;
  }

  /**
   * renders a prompt of the server
   * @param name name of the prompt
   * @param args string arguments of the prompt
   * @returns the rendered messages
   */
  public async getPrompt(
    name: string,
    args?: Record<string, string>,
  ): Promise<GetPromptResult> {
    return this.#requireEngine().sendRequest(
      'prompts/get',
      { name, ...(args !== undefined && { arguments: args }) },
      validators.results['prompts/get'],
    );
  }

  /**
   * sets the minimum level of the log messages the server emits
   * @param level new threshold
   */
  public async setLogLevel(level: McpLogLevel): Promise<void> {
    await this.#requireEngine().sendRequest(
      'logging/setLevel',
      { level },
      validators.results['logging/setLevel'],
    );
  }

  /** checks that the server is responsive */
  public async ping(): Promise<void> {
    await this.#requireEngine().sendRequest(
      'ping',
      undefined,
      validators.results.ping,
    );
  }

  /**
   * replaces the whole root set, announcing the change to the server
   * @param roots the new root set
   */
  public async setRoots(roots: Root[]): Promise<void> {
    await this.#rootManager.setRoots(roots);
  }

  /**
   * adds a root, announcing the change to the server
   * @param root the root to add
   * @returns true if the root was added, false if it already exists
   */
  public async addRoot(root: Root): Promise<boolean> {
    return this.#rootManager.addRoot(root);
  }

  /**
   * removes a root by uri, announcing the change to the server
   * @param uri the uri of the root to remove
   * @returns true if the root was removed, false if not found
   */
  public async removeRoot(uri: string): Promise<boolean> {
    return this.#rootManager.removeRoot(uri);
  }

  /**
   * creates the engine of a new connection with every handler installed
   * @returns an unconnected engine
   */
  #createEngine(): ProtocolEngine {
    const {
      clientInfo,
      generationProvider,
      onElicitation,
      onListChange,
      onLogMessage,
      onResourceChange,
      onRootsRequest,
      recorder,
    } = this.#options;
    const log = this.#log;

    const engine = new ProtocolEngine({
      role: 'client',
      name: clientInfo.name,
      log,
      recorder,
    });

    // without a provider or callback, the server receives method not found
    if (generationProvider) {
      engine.registerRequestHandler(
        'sampling/createMessage',
        createSamplingHandler(generationProvider, log),
      );
    }

    if (onElicitation) {
      engine.registerRequestHandler(
        'elicitation/create',
        createElicitationHandler(onElicitation),
      );
    }

    engine.registerRequestHandler(
      'roots/list',
      createRootsHandler(() => this.#rootManager.getRoots(), onRootsRequest),
    );

    registerNotificationHooks(engine, {
      onListChange,
      onLogMessage,
      onResourceChange,
      log,
    });

    return engine;
  }

  /** tells a connected server that the root set changed */
  async #announceRoots(): Promise<void> {
    const engine = this.#engine;

    if (engine?.state !== 'ready') {
      return;
    }

    await engine.sendNotification('notifications/roots/list_changed');
  }

  /**
   * returns the engine of the current connection
   * @returns connected engine
   * @throws {TransportClosedError} if the client is not connected
   */
  #requireEngine(): ProtocolEngine {
    if (!this.#engine) {
      throw new TransportClosedError('The client is not connected');
    }

    return this.#engine;
  }
}
