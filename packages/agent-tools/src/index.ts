/**
 * @module @loopwright/agent-tools
 * Tool registry and built-in tools for the agent loop.
 */

export { ToolRegistry, type ToolRegistryOptions } from './registry.js';
export type { Tool, ToolExecutor } from './types.js';
export { ASK_HUMAN_CONFIG } from './config.js';
export {
  createDefaultTools,
  createToolRegistry,
  createAskHumanTool,
  toolError,
  ToolError,
  type DefaultToolsOptions,
} from './tools/index.js';
