// ============================================
// Loopwright - Type Contracts
// ============================================

// Tool Types
export type {
  ToolInputSchema,
  ToolInfo,
  ToolCall,
  ToolSuccess,
  ToolFailure,
  ToolResult,
  ToolCapability,
  ToolMode,
  ToolRequestOptions,
} from './tool-types.js';
export { isToolFailure, ASK_HUMAN_TOOL_NAME } from './tool-types.js';

// Model Transport Types
export type {
  ChatMessage,
  ModelHandle,
  TextPart,
  ToolCallPart,
  DataPart,
  ResponsePart,
  ModelRequest,
  ModelTransport,
} from './transport.js';

// Conversation Types
export type {
  AssistantEntry,
  ToolResultsEntry,
  ConversationEntry,
  ConversationRole,
  ConversationHistory,
  TurnResult,
} from './conversation.js';

// Outcome Types
export type {
  ContinueReason,
  OutcomeReason,
  Outcome,
  CompletionReason,
  FailureReason,
  RunReason,
  CompletedRun,
  FailedRun,
  AgentRunResult,
  ProgressCallback,
} from './outcome.js';
export { isFailedRun } from './outcome.js';

// Human Query Types
export type {
  QuickPickItem,
  QueryItem,
  HumanSelection,
  HumanQueryPhase,
  TerminalQueryPhase,
  HumanQueryState,
  HumanQueryOutcome,
  HumanAnswer,
  Disposable,
  UiEvent,
  QuickPickWidget,
  InputBoxWidget,
  InteractiveUi,
} from './human-query.js';

// Logger
export type { LogMeta, ILogger } from './logger.js';

// Zod Schemas (runtime validation)
export {
  AgentRunOptionsSchema,
  AutonomousRunOptionsSchema,
  QueryItemSchema,
  HumanQueryOptionsSchema,
  AskHumanInputSchema,
  AgentEnvSchema,
} from './agent-schemas.js';
export type {
  AgentRunOptionsInput,
  AgentRunOptions,
  AutonomousRunOptionsInput,
  AutonomousRunOptions,
  HumanQueryOptionsInput,
  HumanQueryOptions,
  AskHumanInput,
  AgentEnv,
} from './agent-schemas.js';
