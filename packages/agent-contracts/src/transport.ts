/**
 * @module @loopwright/agent-contracts/transport
 * Model transport contract.
 *
 * Model enumeration and the wire protocol are out of scope. The agent loop
 * only needs to resolve a model by ID and read back a forward-only part stream.
 */

import type { ToolRequestOptions } from './tool-types.js';

/**
 * Chat message as sent to the model (system prompt travels separately)
 */
export interface ChatMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Resolved model handle
 */
export interface ModelHandle {
  id: string;
  name?: string;
  vendor?: string;
  family?: string;
  maxInputTokens?: number;
}

/**
 * Text fragment streamed by the model
 */
export interface TextPart {
  type: 'text';
  value: string;
}

/**
 * Tool call announcement streamed by the model
 */
export interface ToolCallPart {
  type: 'tool-call';
  callId: string;
  name: string;
  input: Record<string, unknown>;
}

/**
 * Any other payload the transport may surface (images, usage, ...).
 * The agent loop ignores these.
 */
export interface DataPart {
  type: 'data';
  mimeType?: string;
  data: unknown;
}

export type ResponsePart = TextPart | ToolCallPart | DataPart;

/**
 * One model request
 */
export interface ModelRequest {
  systemPrompt?: string;
  messages: ChatMessage[];
  options?: ToolRequestOptions;
}

export interface ModelTransport {
  /** Resolve a model by ID; null when no such model is available */
  resolveModel(modelId: string): Promise<ModelHandle | null>;

  /**
   * Send a request. The returned stream is single-pass: it can only be
   * iterated forward once and ends with the transport's done signal.
   */
  sendRequest(handle: ModelHandle, request: ModelRequest): Promise<AsyncIterable<ResponsePart>>;
}
