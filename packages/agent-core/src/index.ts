/**
 * @loopwright/agent-core
 *
 * Autonomous agent loop and single-shot prompting
 */

export * from './constants.js';
export { loadAgentDefaults, type AgentDefaults } from './config.js';

// Errors
export { AgentRunError, isAgentRunError, toErrorMessage, type AgentRunErrorCode } from './errors.js';

// Logging
export { createLogger, createNoopLogger, resolveLogLevel, PinoAgentLogger, type LoggerOptions } from './logger.js';

// Execution primitives - collector, dispatcher, messages
export { collectResponse, type CollectedResponse } from './execution/response-collector.js';
export { ToolDispatcher } from './execution/tool-dispatcher.js';
export { extractToolResultText, extractNodeText } from './execution/tool-result-text.js';
export { buildMessages, buildGoalMessage, formatToolResult } from './execution/message-builder.js';

// Conversation history
export { appendAssistantEntry, appendToolResults, countAssistantTurns } from './history/conversation-history.js';

// Prompt construction
export { buildAgenticSystemPrompt } from './prompt/agentic-system-prompt.js';

// Tool selection
export { selectTools } from './tools/tool-selection.js';

// Orchestration
export {
  ConversationOrchestrator,
  runAgent,
  type AgentDeps,
  type RunAgentOptions,
} from './orchestrator/conversation-orchestrator.js';
export { runAutonomous, formatRunSummary, type AutonomousOptions } from './orchestrator/run-autonomous.js';

// Single-shot prompting
export { Prompter, type PromptRequest, type PromptResult, type PrompterDeps } from './prompter.js';
