import type { ServerCapabilities } from '@duplexmcp/protocol';

/** registries whose content decides the advertised capabilities */
export interface CapabilityParams {
  tools: ReadonlyMap<string, unknown>;
  resources: ReadonlyMap<string, unknown>;
  resourceTemplates: ReadonlyMap<string, unknown>;
  prompts: ReadonlyMap<string, unknown>;
}

/**
 * creates server capabilities from the registries in use
 * @param params the server registries
 * @returns frozen server capabilities, absent blocks left out
 */
export function createCapabilities(
  params: CapabilityParams,
): ServerCapabilities {
  return Object.freeze({
    logging: {},
    ...(hasPromptsCapability(params) && { prompts: { listChanged: true } }),
    ...(hasResourcesCapability(params) && {
      resources: { listChanged: true, subscribe: true },
    }),
    ...(hasToolsCapability(params) && { tools: { listChanged: true } }),
  });
}

/**
 * determines if server has prompts capability
 * @param params the server registries
 * @returns true if prompts are available
 */
export function hasPromptsCapability(params: CapabilityParams): boolean {
  return params.prompts.size > 0;
}

/**
 * determines if server has resources capability
 * @param params the server registries
 * @returns true if resources or resource templates are available
 */
export function hasResourcesCapability(params: CapabilityParams): boolean {
  return params.resources.size > 0 || params.resourceTemplates.size > 0;
}

/**
 * determines if server has tools capability
 * @param params the server registries
 * @returns true if tools are available
 */
export function hasToolsCapability(params: CapabilityParams): boolean {
  return params.tools.size > 0;
}
