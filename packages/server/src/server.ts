import { jsonifyError, ProtocolEngine, TransportClosedError } from '@duplexmcp/core';
import {
  isLogLevelEnabled,
  normalizeMcpLogLevel,
  SUPPORTED_PROTOCOL_VERSIONS,
  validators,
} from '@duplexmcp/protocol';

import { DEFAULT_LOG_LEVEL } from '#constants/defaults';
import { createGenerationFallback, foldElicitation } from '#delegation';
import {
  bindRequestHandler,
  resolveHandlers,
  serverMethods,
} from '#handlers/handler-registry';
import { patchResource } from '#resource';
import { ServerState } from '#state';

import type {
  Channel,
  EngineState,
  EventRecorder,
  Log,
  RequestHandler,
} from '@duplexmcp/core';
import type {
  CreateMessageRequest,
  CreateMessageResult,
  ElicitContent,
  ElicitRequest,
  HandshakeResult,
  Implementation,
  JsonifibleValue,
  ListChangedMethod,
  McpLogLevel,
  ResourceTemplate,
  Root,
  ServerCapabilities,
} from '@duplexmcp/protocol';

import type { ServerPrompt } from '#prompt';
import type { ResourcePatch, ServerResource } from '#resource';
import type { ServerTool } from '#tool';
import type { ServerMethod, ServerRequestHandlers } from '#types/handler';

/** configuration options for initializing an mcp server instance */
export interface McpServerOptions {
  /** server application information including name and version */
  serverInfo: Implementation;
  /** optional usage instructions for the server */
  instructions?: string;
  /** initial set of tools */
  tools?: ServerTool[];
  /** initial set of resources */
  resources?: ServerResource[];
  /** initial set of resource templates */
  resourceTemplates?: ResourceTemplate[];
  /** initial set of prompts */
  prompts?: ServerPrompt[];
  /** capabilities announced instead of the ones derived from the registries */
  capabilities?: ServerCapabilities;
  /** protocol versions accepted from clients (default: every supported version) */
  protocolVersions?: readonly string[];
  /** minimum level of emitted log messages until the client sets one (default: info) */
  logLevel?: McpLogLevel;
  /** replaces the built-in handling of request methods */
  handlers?: Partial<ServerRequestHandlers>;
  /** logs server operations */
  log?: Log;
  /** receives every message exchanged with the client */
  recorder?: EventRecorder;
}

/** responder side of a connection: serves registries and delegates work to the client */
export class McpServer {
  #state: ServerState;
  #handlers: ServerRequestHandlers;
  #logLevel: McpLogLevel;
  #log?: Log;
  #recorder?: EventRecorder;
  #engine: ProtocolEngine | null = null;

  /**
   * creates a new mcp server instance with the specified configuration
   * @param options configuration options for the mcp server
   */
  constructor(options: McpServerOptions) {
    this.#logLevel = options.logLevel ?? DEFAULT_LOG_LEVEL;
    this.#log = options.log;
    this.#recorder = options.recorder;
    this.#handlers = resolveHandlers(options.handlers);
    this.#state = new ServerState({
      serverInfo: options.serverInfo,
      instructions: options.instructions,
      capabilities: options.capabilities,
      protocolVersions: options.protocolVersions ?? SUPPORTED_PROTOCOL_VERSIONS,
      logLevel: this.#logLevel,
      tools: options.tools,
      resources: options.resources,
      resourceTemplates: options.resourceTemplates,
      prompts: options.prompts,
    });
  }

  /** capabilities announced to a client initializing now */
  public get capabilities(): ServerCapabilities {
    return this.#state.capabilities;
  }

  /** outcome of the handshake with the connected client, null before it */
  public get handshake(): HandshakeResult | null {
    return this.#state.handshake;
  }

  /** current minimum level of emitted log messages */
  public get logLevel(): McpLogLevel {
    return this.#state.logLevel;
  }

  /** uris the connected client subscribed to */
  public get subscriptions(): ReadonlySet<string> {
    return this.#state.subscriptions;
  }

  /** lifecycle state of the current connection */
  public get status(): EngineState {
    return this.#engine?.state ?? 'unconnected';
  }

  /**
   * serves one client over a channel
   * @param channel channel connected to the client
   * @returns promise settling once the connection has closed
   * @throws {Error} if a connection is still being served
   */
  public async serve(channel: Channel): Promise<void> {
    if (this.#engine && this.#engine.state !== 'closed') {
      throw new Error('The server is already serving a connection');
    }

    const engine = new ProtocolEngine({
      role: 'server',
      name: this.#state.serverInfo.name,
      log: this.#log,
      recorder: this.#recorder,
    });

    for (const method of serverMethods) {
      engine.registerRequestHandler(method, this.#bind(method));
    }

    // serving starts once the initialize result is on the wire
    engine.registerReplyListener('initialize', (outcome) => {
      if (outcome.result) {
        engine.markReady();
      }
    });
    engine.registerNotificationHandler(
      'notifications/initialized',
      async () => {
        engine.markReady();

        const handshake = this.#state.confirmHandshake();

        this.#log?.('debug', 'handshake confirmed', {
          confirmed: handshake !== null,
        });
      },
    );
    engine.registerNotificationHandler(
      'notifications/roots/list_changed',
      async () => this.#log?.('debug', 'client roots changed'),
    );

    this.#state.resetConnection(this.#logLevel);
    this.#engine = engine;
    engine.connect(channel);

    void engine.closed.then(() => {
      // a departed client keeps no subscriptions
      if (this.#engine === engine) {
        this.#state.subscriptions.clear();
      }
    });

    return engine.closed;
  }

  /**
   * closes the current connection, failing requests still waiting for the client
   * @param reason optional reason sent to the client
   */
  public async close(reason?: string): Promise<void> {
    await this.#engine?.close(reason);
  }

  /**
   * adds or replaces a tool, announcing the change to the client
   * @param tool tool to register under its name
   */
  public async registerTool(tool: ServerTool): Promise<void> {
    this.#state.tools.set(tool.name, tool);

    await this.#broadcast('notifications/tools/list_changed');
  }

  /**
   * removes a tool, announcing the change to the client
   * @param name name of the tool
   * @returns true if a tool was removed
   */
  public async dropTool(name: string): Promise<boolean> {
    const dropped = this.#state.tools.delete(name);

    if (dropped) {
      await this.#broadcast('notifications/tools/list_changed');
    }

    return dropped;
  }

  /**
   * adds or replaces a resource, announcing the change to the client
   * @param resource resource to register under its uri
   */
  public async registerResource(resource: ServerResource): Promise<void> {
    this.#state.resources.set(resource.uri, resource);

    await this.#broadcast('notifications/resources/list_changed');
  }

  /**
   * removes a resource and its subscription, announcing the change to the client
   * @param uri uri of the resource
   * @returns true if a resource was removed
   */
  public async dropResource(uri: string): Promise<boolean> {
    const dropped = this.#state.resources.delete(uri);

    if (dropped) {
      this.#state.subscriptions.delete(uri);
      await this.#broadcast('notifications/resources/list_changed');
    }

    return dropped;
  }

  /**
   * adds or replaces a resource template, announcing the change to the client
   * @param template template to register under its uri template
   */
  public async registerResourceTemplate(
    template: ResourceTemplate,
  ): Promise<void> {
    this.#state.resourceTemplates.set(template.uriTemplate, template);

    await this.#broadcast('notifications/resources/list_changed');
  }

  /**
   * adds or replaces a prompt, announcing the change to the client
   * @param prompt prompt to register under its name
   */
  public async registerPrompt(prompt: ServerPrompt): Promise<void> {
    this.#state.prompts.set(prompt.name, prompt);

    await this.#broadcast('notifications/prompts/list_changed');
  }

  /**
   * removes a prompt, announcing the change to the client
   * @param name name of the prompt
   * @returns true if a prompt was removed
   */
  public async dropPrompt(name: string): Promise<boolean> {
    const dropped = this.#state.prompts.delete(name);

    if (dropped) {
      await this.#broadcast('notifications/prompts/list_changed');
    }

    return dropped;
  }

  /**
   * changes a resource in place, then notifies a subscribed client
   * @param uri uri of the resource
   * @param patch fields to overwrite
   * @returns the updated resource
   * @throws {JsonRpcError} RESOURCE_NOT_FOUND when the uri is not registered
   */
  public async updateResource(
    uri: string,
    patch: ResourcePatch,
  ): Promise<ServerResource> {
    const resource = patchResource(this.#state.requireResource(uri), patch);

    await this.notifyResourceUpdated(uri);

    return resource;
  }

  /**
   * sends resources/updated for a uri, only when the client subscribed to it
   * @param uri uri of the changed resource
   * @returns true if the notification was sent
   */
  public async notifyResourceUpdated(uri: string): Promise<boolean> {
    if (!this.#state.subscriptions.has(uri)) {
      this.#log?.('debug', 'skipping update of an unsubscribed resource', {
        uri,
      });

      return false;
    }

    const engine = this.#requireEngine();

    if (engine.state === 'closed') {
      return false;
    }

    const title = this.#state.resources.get(uri)?.title;

    await engine.sendNotification(
      'notifications/resources/updated',
      { uri, ...(title !== undefined && { title }) },
    );

    return true;
  }

  /**
   * emits a log message to the client when it passes the current threshold
   * @param level level name, common aliases such as "warn" being accepted
   * @param data payload of the message
   * @param logger optional name of the emitting component
   * @returns true if the message was sent
   * @throws {Error} if the level name is not recognised
   */
  public async sendLogMessage(
    level: string,
    data: JsonifibleValue,
    logger?: string,
  ): Promise<boolean> {
    const normalized = normalizeMcpLogLevel(level);

    if (!normalized) {
      throw new Error(`Unknown log level: ${level}`);
    }

    if (!isLogLevelEnabled(normalized, this.#state.logLevel)) {
      return false;
    }

    await this.#requireEngine().sendNotification('notifications/message', {
      level: normalized,
      data,
      ...(logger !== undefined && { logger }),
    });

    return true;
  }

  /**
   * asks the client to run a generation
   * @param params generation request
   * @returns the generation produced by the client
   * @throws {JsonRpcError} if the client cannot generate
   */
  public async createMessage(
    params: CreateMessageRequest['params'],
  ): Promise<CreateMessageResult> {
    return this.#requireEngine().sendRequest(
      'sampling/createMessage',
      params,
      validators.results['sampling/createMessage'],
    );
  }

  /**
   * asks the client to run a generation, falling back to a labelled placeholder
   * @param params generation request
   * @returns the generation produced by the client or the placeholder
   */
  public async delegateGeneration(
    params: CreateMessageRequest['params'],
  ): Promise<CreateMessageResult> {
    try {
      return await this.createMessage(params);
    } catch (exception) {
      this.#log?.('warn', 'generation delegation failed', {
        error: jsonifyError(exception),
      });

      return createGenerationFallback(exception);
    }
  }

  /**
   * asks the client to collect values from the user
   * @param params message and expected fields
   * @param defaults values kept for every field the user does not provide
   * @returns defaults overlaid with the accepted values
   */
  public async elicit(
    params: ElicitRequest['params'],
    defaults: ElicitContent = {},
  ): Promise<ElicitContent> {
    const result = await this.#requireEngine().sendRequest(
      'elicitation/create',
      params,
      validators.results['elicitation/create'],
    );

    this.#log?.('debug', 'elicitation answered', { action: result.action });

    return foldElicitation(result, defaults);
  }

  /**
   * fetches the whole root set of the client
   * @returns roots currently declared by the client
   */
  public async listRoots(): Promise<Root[]> {
    const { roots } = await this.#requireEngine().sendRequest(
      'roots/list',
      undefined,
      validators.results['roots/list'],
    );

    return roots;
  }

  /** checks that the client is responsive */
  public async ping(): Promise<void> {
    await this.#requireEngine().sendRequest(
      'ping',
      undefined,
      validators.results.ping,
    );
  }

  /**
   * binds the handler of a method to this server
   * @param method method to bind
   * @returns engine request handler
   */
  #bind<M extends ServerMethod>(method: M): RequestHandler {
    return bindRequestHandler(method, this.#handlers[method], ({ id, signal }) => ({
      id,
      signal,
      server: this,
      state: this.#state,
      log: this.#log,
    }));
  }

  /**
   * returns the engine of the current connection
   * @returns connected engine
   * @throws {TransportClosedError} if no connection is being served
   */
  #requireEngine(): ProtocolEngine {
    if (!this.#engine) {
      throw new TransportClosedError('The server is not serving a connection');
    }

    return this.#engine;
  }

  /**
   * announces a registry change to the connected client, if any
   * @param method list-changed notification to send
   */
  async #broadcast(method: ListChangedMethod): Promise<void> {
    const engine = this.#engine;

    if (!engine || engine.state === 'closed') {
      return;
    }

    await engine.sendNotification(method);
  }
}
