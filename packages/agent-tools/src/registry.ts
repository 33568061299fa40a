/**
 * Tool registry for managing available tools
 *
 * Local tools shadow same-named tools of the fallback capability.
 */

import type { ILogger, ToolCapability, ToolInfo } from '@loopwright/agent-contracts';
import type { Tool } from './types.js';

export interface ToolRegistryOptions {
  /** Host capability consulted for tools not registered locally */
  fallback?: ToolCapability;
  logger?: ILogger;
}

export class ToolRegistry implements ToolCapability {
  private tools = new Map<string, Tool>();

  constructor(private readonly options: ToolRegistryOptions = {}) {}

  /**
   * Register a tool
   */
  register(tool: Tool): void {
    if (this.tools.has(tool.definition.name)) {
      this.options.logger?.warn('Replacing registered tool', { tool: tool.definition.name });
    }
    this.tools.set(tool.definition.name, tool);
  }

  /**
   * Get tool by name
   */
  get(name: string): Tool | undefined {
    return this.tools.get(name);
  }

  /**
   * Sorted names of the locally registered tools
   */
  getToolNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }

  /**
   * Local tools in registration order, then fallback tools not shadowed by them
   */
  listTools(): readonly ToolInfo[] {
    const local = Array.from(this.tools.values()).map((tool) => tool.definition);
    const fallback = (this.options.fallback?.listTools() ?? []).filter((info) => !this.tools.has(info.name));
    return [...local, ...fallback];
  }

  /**
   * Execute a tool
   */
  async invoke(toolName: string, input: Record<string, unknown>): Promise<unknown> {
    const tool = this.tools.get(toolName);
    if (tool) {
      return tool.executor(input);
    }
    if (this.options.fallback) {
      return this.options.fallback.invoke(toolName, input);
    }
    throw new Error(`Unknown tool: ${toolName}`);
  }
}
