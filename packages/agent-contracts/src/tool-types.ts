/**
 * Tool System Types
 *
 * Defines the shapes the agent loop uses to describe, request and
 * correlate tool invocations. Execution itself belongs to a ToolCapability.
 */

/**
 * JSON Schema for tool input
 *
 * This is the schema the model sees when it generates tool calls
 */
export interface ToolInputSchema {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
  additionalProperties?: boolean;
}

/**
 * Tool description as published by a ToolCapability
 */
export interface ToolInfo {
  /** Unique tool name (e.g., "ask_human", "workspace_findFiles") */
  name: string;
  /** Human-readable description for the model */
  description: string;
  /** JSON Schema for tool input */
  inputSchema?: ToolInputSchema;
}

/**
 * Tool call announced by the model
 */
export interface ToolCall {
  /** Call ID assigned by the model transport */
  id: string;
  /** Tool name to execute */
  name: string;
  /** Tool input, passed through to the capability untouched */
  input: Record<string, unknown>;
}

interface ToolResultBase {
  /** ID of the ToolCall this result answers */
  callId: string;
  toolName: string;
}

/**
 * Successful invocation, reduced to plain text
 */
export interface ToolSuccess extends ToolResultBase {
  result: string;
}

/**
 * Failed invocation, recorded instead of aborting the batch
 */
export interface ToolFailure extends ToolResultBase {
  error: string;
}

/**
 * Tool execution result, correlated 1:1 with a ToolCall by `callId`
 */
export type ToolResult = ToolSuccess | ToolFailure;

export function isToolFailure(result: ToolResult): result is ToolFailure {
  return 'error' in result;
}

/**
 * External capability that actually runs tools.
 * The core treats it as opaque: it never inspects what a tool does.
 */
export interface ToolCapability {
  /** Tools this capability can invoke */
  listTools(): readonly ToolInfo[];
  /** Invoke a tool; resolves with an opaque structured payload */
  invoke(toolName: string, input: Record<string, unknown>): Promise<unknown>;
}

/**
 * How the model may use the enabled tools
 */
export type ToolMode = 'auto' | 'required';

/**
 * Tool options sent along with a model request
 */
export interface ToolRequestOptions {
  tools: ToolInfo[];
  toolMode: ToolMode;
}

/**
 * Name of the tool that puts a question to the human
 */
export const ASK_HUMAN_TOOL_NAME = 'ask_human';
