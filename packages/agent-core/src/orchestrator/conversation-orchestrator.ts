/**
 * ConversationOrchestrator: drives one goal-directed conversation.
 *
 * Loop state is (history, turn, lastResult). Each iteration:
 *   1. report "Turn n/max"
 *   2. turn > maxTurns → stop with max-turns-reached, no model call
 *   3. build messages, call the model, collect the reply
 *   4. append the assistant entry
 *   5. dispatch tool calls, append their results
 *   6. classify; continue with turn + 1 or return
 *
 * A transport failure ends the run (no retry) with a `transport-error` result.
 * A model that cannot be resolved ends it before turn 1 with
 * `model-not-found-error`. Neither is thrown.
 */

import type {
  AgentRunResult,
  ConversationHistory,
  ILogger,
  ModelHandle,
  ModelTransport,
  ProgressCallback,
  ToolCapability,
  ToolRequestOptions,
  TurnResult,
} from '@loopwright/agent-contracts';
import { AgentRunOptionsSchema, type AgentRunOptionsInput } from '@loopwright/agent-contracts';
import { OutcomeClassifier, type IOutcomeClassifier } from '@loopwright/outcome-classifier';
import { ProgressReporter, type ProgressEventCallback } from '@loopwright/progress-reporter';
import { AgentRunError, toErrorMessage } from '../errors.js';
import { collectResponse } from '../execution/response-collector.js';
import { buildMessages } from '../execution/message-builder.js';
import { ToolDispatcher } from '../execution/tool-dispatcher.js';
import { appendAssistantEntry, appendToolResults, countAssistantTurns } from '../history/conversation-history.js';
import { createLogger } from '../logger.js';
import { buildAgenticSystemPrompt } from '../prompt/agentic-system-prompt.js';
import { selectTools } from '../tools/tool-selection.js';

export interface AgentDeps {
  transport: ModelTransport;
  tools: ToolCapability;
  logger?: ILogger;
  classifier?: IOutcomeClassifier;
  /** Receives typed progress events */
  onEvent?: ProgressEventCallback;
}

export interface RunAgentOptions extends AgentRunOptionsInput {
  /** Receives "Turn n/max" lines; defaults to logging them */
  progressCallback?: ProgressCallback;
}

interface TurnContext {
  handle: ModelHandle;
  goal: string;
  systemPrompt: string;
  toolOptions: ToolRequestOptions;
}

export class ConversationOrchestrator {
  private readonly logger: ILogger;
  private readonly classifier: IOutcomeClassifier;
  private readonly dispatcher: ToolDispatcher;

  constructor(private readonly deps: AgentDeps) {
    this.logger = deps.logger ?? createLogger({ name: 'agent' });
    this.classifier = deps.classifier ?? new OutcomeClassifier();
    this.dispatcher = new ToolDispatcher(deps.tools, this.logger);
  }

  async run(options: RunAgentOptions): Promise<AgentRunResult> {
    const { progressCallback, ...rest } = options;
    const parsed = AgentRunOptionsSchema.safeParse(rest);
    if (!parsed.success) {
      throw AgentRunError.invalidOptions(parsed.error);
    }
    const { goal, modelId, toolIds, maxTurns } = parsed.data;
    const progress = progressCallback ?? ((step: string) => this.logger.info(`Progress: ${step}`));
    const reporter = new ProgressReporter(this.logger, this.deps.onEvent);

    const toolOptions = selectTools(this.deps.tools.listTools(), toolIds, this.logger);

    let handle: ModelHandle | null;
    try {
      handle = await this.deps.transport.resolveModel(modelId);
    } catch (error) {
      const errorMessage = toErrorMessage(error);
      reporter.failed('transport-error', errorMessage);
      return { error: true, reason: 'transport-error', errorMessage, history: [], finalResponse: null };
    }

    if (!handle) {
      const errorMessage = `Model not found: ${modelId}`;
      reporter.failed('model-not-found-error', errorMessage);
      return { error: true, reason: 'model-not-found-error', errorMessage, history: [], finalResponse: null };
    }

    reporter.start({ goal, modelId, maxTurns, toolNames: toolOptions.tools.map((t) => t.name) });

    const context: TurnContext = {
      handle,
      goal,
      systemPrompt: parsed.data.systemPrompt ?? buildAgenticSystemPrompt(toolOptions.tools),
      toolOptions,
    };

    let history: ConversationHistory = [];
    let turn = 1;
    let lastResult: TurnResult | null = null;

    for (;;) {
      progress(`Turn ${turn}/${maxTurns}`);

      if (turn > maxTurns) {
        reporter.complete('max-turns-reached', countAssistantTurns(history));
        return { reason: 'max-turns-reached', history, finalResponse: lastResult };
      }
      reporter.turnStarted(turn, maxTurns);

      let result: TurnResult;
      try {
        result = await this.executeTurn(context, history, turn);
      } catch (error) {
        const errorMessage = toErrorMessage(error);
        reporter.failed('transport-error', errorMessage);
        return { error: true, reason: 'transport-error', errorMessage, history, finalResponse: lastResult };
      }

      if (result.text) {
        this.logger.info('🤖 AI Agent says', { turn, text: result.text });
      }
      history = appendAssistantEntry(history, result.text, result.toolCalls, turn);

      if (result.toolCalls.length > 0) {
        const toolResults = await this.dispatcher.dispatch(result.toolCalls);
        reporter.toolsDispatched(turn, toolResults);
        history = appendToolResults(history, toolResults, turn);
      }

      // The classifier gets the zero-based index of the finished turn, so the
      // last budgeted turn can still end as task-complete.
      const outcome = this.classifier.classify({
        turn: turn - 1,
        maxTurns,
        toolCalls: result.toolCalls,
        text: result.text,
      });
      reporter.turnCompleted(turn, outcome);

      if (!outcome.continue) {
        reporter.complete(outcome.reason, countAssistantTurns(history));
        return { reason: outcome.reason, history, finalResponse: result };
      }

      turn += 1;
      lastResult = result;
    }
  }

  private async executeTurn(context: TurnContext, history: ConversationHistory, turn: number): Promise<TurnResult> {
    const messages = buildMessages(history, context.goal, turn);
    const stream = await this.deps.transport.sendRequest(context.handle, {
      systemPrompt: context.systemPrompt,
      messages,
      options: context.toolOptions,
    });
    const { text, toolCalls } = await collectResponse(stream);
    return { text, toolCalls, turn };
  }
}

/**
 * Run one autonomous conversation toward `options.goal`.
 */
export function runAgent(deps: AgentDeps, options: RunAgentOptions): Promise<AgentRunResult> {
  return new ConversationOrchestrator(deps).run(options);
}
