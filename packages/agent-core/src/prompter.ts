/**
 * Single-shot prompting: one request, optional tool execution, no loop.
 *
 * Unlike runAgent these helpers throw AgentRunError on failure.
 */

import type {
  ChatMessage,
  ILogger,
  ModelHandle,
  ModelTransport,
  ToolCall,
  ToolCapability,
  ToolResult,
} from '@loopwright/agent-contracts';
import { AgentRunError, isAgentRunError, toErrorMessage } from './errors.js';
import { collectResponse } from './execution/response-collector.js';
import { ToolDispatcher } from './execution/tool-dispatcher.js';
import { createLogger } from './logger.js';
import { selectTools } from './tools/tool-selection.js';

export interface PromptRequest {
  modelId: string;
  messages: ChatMessage[];
  systemPrompt?: string;
  /** Tools the model may call; none when omitted */
  toolIds?: readonly string[];
}

export interface PromptResult {
  text: string;
  toolCalls: ToolCall[];
  /** Names of the tools that were executed, in call order */
  toolsUsed: string[];
  toolResults: ToolResult[];
}

export interface PrompterDeps {
  transport: ModelTransport;
  tools: ToolCapability;
  logger?: ILogger;
}

export class Prompter {
  private readonly logger: ILogger;
  private readonly dispatcher: ToolDispatcher;

  constructor(private readonly deps: PrompterDeps) {
    this.logger = deps.logger ?? createLogger({ name: 'prompter' });
    this.dispatcher = new ToolDispatcher(deps.tools, this.logger);
  }

  /**
   * Send a prompt, execute any tool calls, and return both.
   */
  async promptWithTools(request: PromptRequest): Promise<PromptResult> {
    const handle = await this.resolve(request.modelId);
    const options = selectTools(this.deps.tools.listTools(), request.toolIds ?? [], this.logger);

    let collected: { text: string; toolCalls: ToolCall[] };
    try {
      const stream = await this.deps.transport.sendRequest(handle, {
        systemPrompt: request.systemPrompt,
        messages: request.messages,
        options,
      });
      collected = await collectResponse(stream);
    } catch (error) {
      throw new AgentRunError('TRANSPORT_ERROR', toErrorMessage(error), { cause: error });
    }

    if (collected.toolCalls.length === 0) {
      return { ...collected, toolsUsed: [], toolResults: [] };
    }

    this.logger.info(`🔧 Found ${collected.toolCalls.length} tool call(s) to execute`);
    const toolResults = await this.dispatcher.dispatch(collected.toolCalls);
    return {
      ...collected,
      toolsUsed: collected.toolCalls.map((call) => call.name),
      toolResults,
    };
  }

  /**
   * Ask one question under explicit system instructions.
   */
  askWithSystem(
    modelId: string,
    systemPrompt: string,
    question: string,
    toolIds?: readonly string[],
  ): Promise<PromptResult> {
    return this.promptWithTools({
      modelId,
      systemPrompt,
      messages: [{ role: 'user', content: question }],
      toolIds,
    });
  }

  /**
   * Append a user message to an existing exchange and send it.
   */
  continueConversation(
    modelId: string,
    messages: readonly ChatMessage[],
    newMessage: string,
    toolIds?: readonly string[],
  ): Promise<PromptResult> {
    return this.promptWithTools({
      modelId,
      messages: [...messages, { role: 'user', content: newMessage }],
      toolIds,
    });
  }

  private async resolve(modelId: string): Promise<ModelHandle> {
    let handle: ModelHandle | null;
    try {
      handle = await this.deps.transport.resolveModel(modelId);
    } catch (error) {
      if (isAgentRunError(error)) {throw error;}
      throw new AgentRunError('TRANSPORT_ERROR', toErrorMessage(error), { cause: error });
    }
    if (!handle) {
      throw new AgentRunError('MODEL_NOT_FOUND', `Model not found: ${modelId}`, { details: { modelId } });
    }
    return handle;
  }
}
