import { JsonRpcError, MCP_ERROR_CODES } from '@duplexmcp/protocol';

import { createCapabilities } from '#capability';

import type {
  HandshakeResult,
  Implementation,
  McpLogLevel,
  ResourceTemplate,
  ServerCapabilities,
} from '@duplexmcp/protocol';

import type { ServerPrompt } from '#prompt';
import type { ServerResource } from '#resource';
import type { ServerTool } from '#tool';

/** initial content of a server state */
export interface ServerStateOptions {
  serverInfo: Implementation;
  instructions?: string;
  /** capabilities announced instead of the ones derived from the registries */
  capabilities?: ServerCapabilities;
  protocolVersions: readonly string[];
  logLevel: McpLogLevel;
  tools?: ServerTool[];
  resources?: ServerResource[];
  resourceTemplates?: ResourceTemplate[];
  prompts?: ServerPrompt[];
}

/**
 * registries and per-connection state of a server
 *
 * registries are keyed by tool name, resource uri, template uri template and
 * prompt name; maps keep registration order for the list methods.
 */
export class ServerState {
  public readonly tools = new Map<string, ServerTool>();
  public readonly resources = new Map<string, ServerResource>();
  public readonly resourceTemplates = new Map<string, ResourceTemplate>();
  public readonly prompts = new Map<string, ServerPrompt>();
  /** uris the connected client subscribed to */
  public readonly subscriptions = new Set<string>();
  public readonly serverInfo: Implementation;
  public readonly instructions?: string;
  public readonly protocolVersions: readonly string[];
  /** minimum level of emitted log messages */
  public logLevel: McpLogLevel;
  /** outcome of the handshake, published once the client confirmed it */
  public handshake: HandshakeResult | null = null;
  /** handshake answered but not yet confirmed by notifications/initialized */
  public pendingHandshake: HandshakeResult | null = null;
  readonly #capabilities?: ServerCapabilities;

  constructor(options: ServerStateOptions) {
    this.serverInfo = options.serverInfo;
    this.instructions = options.instructions;
    this.protocolVersions = options.protocolVersions;
    this.logLevel = options.logLevel;
    this.#capabilities = options.capabilities
      ? Object.freeze({ ...options.capabilities })
      : undefined;

    for (const tool of options.tools ?? []) {
      this.tools.set(tool.name, tool);
    }
    for (const resource of options.resources ?? []) {
      this.resources.set(resource.uri, resource);
    }
    for (const template of options.resourceTemplates ?? []) {
      this.resourceTemplates.set(template.uriTemplate, template);
    }
    for (const prompt of options.prompts ?? []) {
      this.prompts.set(prompt.name, prompt);
    }
  }

  /** capabilities announced to a client initializing now */
  public get capabilities(): ServerCapabilities {
    return this.#capabilities ?? createCapabilities(this);
  }

  /**
   * looks a tool up by name
   * @param name tool name
   * @returns the registered tool
   * @throws {JsonRpcError} UNKNOWN_TOOL when no tool has the name
   */
  public requireTool(name: string): ServerTool {
    const tool = this.tools.get(name);

    if (!tool) {
      throw new JsonRpcError({
        code: MCP_ERROR_CODES.UNKNOWN_TOOL,
        message: `Unknown tool: ${name}`,
        data: { name },
      });
    }

    return tool;
  }

  /**
   * looks a resource up by uri
   * @param uri resource uri
   * @returns the registered resource
   * @throws {JsonRpcError} RESOURCE_NOT_FOUND when no resource has the uri
   */
  public requireResource(uri: string): ServerResource {
    const resource = this.resources.get(uri);

    if (!resource) {
      throw new JsonRpcError({
        code: MCP_ERROR_CODES.RESOURCE_NOT_FOUND,
        message: `Resource not found: ${uri}`,
        data: { uri },
      });
    }

    return resource;
  }

  /**
   * looks a prompt up by name
   * @param name prompt name
   * @returns the registered prompt
   * @throws {JsonRpcError} INVALID_PARAMS when no prompt has the name
   */
  public requirePrompt(name: string): ServerPrompt {
    const prompt = this.prompts.get(name);

    if (!prompt) {
      throw new JsonRpcError({
        code: MCP_ERROR_CODES.INVALID_PARAMS,
        message: `Unknown prompt: ${name}`,
        data: { name },
      });
    }

    return prompt;
  }

  /**
   * publishes the answered handshake once the client confirmed it
   * @returns the published handshake, null when initialize was never answered
   */
  public confirmHandshake(): HandshakeResult | null {
    if (this.pendingHandshake) {
      this.handshake = this.pendingHandshake;
      this.pendingHandshake = null;
    }

    return this.handshake;
  }

  /**
   * forgets everything learnt from the previous client
   * @param logLevel threshold to restore
   */
  public resetConnection(logLevel: McpLogLevel): void {
    this.subscriptions.clear();
    this.handshake = null;
    this.pendingHandshake = null;
    this.logLevel = logLevel;
  }
}
