/**
 * Tool registration and exports
 */

import type { ILogger, ToolCapability } from '@loopwright/agent-contracts';
import type { HumanQuery } from '@loopwright/human-query';
import { ToolRegistry } from '../registry.js';
import type { Tool } from '../types.js';
import { createAskHumanTool } from './interaction.js';

export interface DefaultToolsOptions {
  /** Enables ask_human when present */
  humanQuery?: HumanQuery;
}

/**
 * Built-in tools that can be enabled with the given options
 */
export function createDefaultTools(options: DefaultToolsOptions = {}): Tool[] {
  const tools: Tool[] = [];
  if (options.humanQuery) {
    tools.push(createAskHumanTool(options.humanQuery));
  }
  return tools;
}

/**
 * Registry with the built-in tools over an optional host capability
 */
export function createToolRegistry(
  options: DefaultToolsOptions & { fallback?: ToolCapability; logger?: ILogger } = {},
): ToolRegistry {
  const registry = new ToolRegistry({ fallback: options.fallback, logger: options.logger });
  for (const tool of createDefaultTools(options)) {
    registry.register(tool);
  }
  return registry;
}

export { createAskHumanTool } from './interaction.js';
export { toolError, ToolError } from './tool-error.js';
