/**
 * ToolDispatcher: runs one turn's tool calls against a ToolCapability.
 *
 * Calls run concurrently. Each is wrapped on its own, so a failing call
 * becomes `{ callId, toolName, error }` and never cancels its siblings.
 * Results come back in call order.
 */

import type { ILogger, ToolCall, ToolCapability, ToolResult } from '@loopwright/agent-contracts';
import { toErrorMessage } from '../errors.js';
import { extractToolResultText } from './tool-result-text.js';

export class ToolDispatcher {
  constructor(
    private readonly capability: ToolCapability,
    private readonly logger?: ILogger,
  ) {}

  async dispatch(toolCalls: readonly ToolCall[]): Promise<ToolResult[]> {
    if (toolCalls.length === 0) {
      return [];
    }

    this.logger?.info(`🔧 Executing ${toolCalls.length} tool call(s)`, {
      tools: toolCalls.map((call) => call.name),
    });

    return Promise.all(toolCalls.map((call) => this.invokeOne(call)));
  }

  private async invokeOne(call: ToolCall): Promise<ToolResult> {
    this.logger?.debug(`🎯 Invoking tool: ${call.name}`, { callId: call.id, input: call.input });
    try {
      const raw = await this.capability.invoke(call.name, call.input);
      const result = extractToolResultText(raw);
      this.logger?.debug(`✅ Tool ${call.name} returned`, { callId: call.id, length: result.length });
      return { callId: call.id, toolName: call.name, result };
    } catch (error) {
      const message = toErrorMessage(error);
      this.logger?.warn(`❌ Tool ${call.name} failed`, { callId: call.id, error: message });
      return { callId: call.id, toolName: call.name, error: message };
    }
  }
}
