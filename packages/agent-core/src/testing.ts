/**
 * @loopwright/agent-core/testing
 *
 * Mock helpers for testing code built on the agent loop. Import from this
 * sub-path, never from the main index.
 *
 * @example
 *   import { makeScriptedTransport, textReply, makeToolCapability } from '@loopwright/agent-core/testing';
 *
 * All helpers use vitest's `vi.fn()`; vitest must be available in the test env.
 */

import { vi } from 'vitest';
import type {
  ModelHandle,
  ModelRequest,
  ResponsePart,
  ToolCall,
  ToolInfo,
} from '@loopwright/agent-contracts';

// ─── Logger mock ──────────────────────────────────────────────────────────────

export function makeMockLogger() {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: vi.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

// ─── Model replies ────────────────────────────────────────────────────────────

/** One scripted model reply: the parts to stream, or an error to fail the request with */
export type ScriptedReply = ResponsePart[] | Error;

export function textReply(text: string): ResponsePart[] {
  return [{ type: 'text', value: text }];
}

/** Reply that calls tools, optionally preceded by text */
export function toolCallReply(calls: ToolCall[], text = ''): ResponsePart[] {
  const parts: ResponsePart[] = text ? [{ type: 'text', value: text }] : [];
  for (const call of calls) {
    parts.push({ type: 'tool-call', callId: call.id, name: call.name, input: call.input });
  }
  return parts;
}

export async function* streamOf(parts: readonly ResponsePart[]): AsyncGenerator<ResponsePart> {
  for (const part of parts) {
    yield part;
  }
}

// ─── ModelTransport mock ──────────────────────────────────────────────────────

export interface ScriptedTransportOptions {
  /** Model IDs that resolve (default: ['test-model']) */
  models?: string[];
  /** Sequential replies: each request takes the next one; an empty text reply once exhausted */
  replies?: ScriptedReply[];
}

export function makeScriptedTransport(options: ScriptedTransportOptions = {}) {
  const models = options.models ?? ['test-model'];
  const replies = [...(options.replies ?? [])];
  const requests: ModelRequest[] = [];

  return {
    requests,
    resolveModel: vi.fn(async (modelId: string): Promise<ModelHandle | null> =>
      models.includes(modelId) ? { id: modelId, name: modelId, vendor: 'test' } : null,
    ),
    sendRequest: vi.fn(async (_handle: ModelHandle, request: ModelRequest): Promise<AsyncIterable<ResponsePart>> => {
      requests.push({ ...request, messages: [...request.messages] });
      const reply = replies.shift() ?? textReply('');
      if (reply instanceof Error) {
        throw reply;
      }
      return streamOf(reply);
    }),
  };
}

// ─── ToolCapability mock ──────────────────────────────────────────────────────

export type ToolHandler = (input: Record<string, unknown>) => unknown;

export function makeToolCapability(handlers: Record<string, ToolHandler> = {}) {
  const catalog: ToolInfo[] = Object.keys(handlers).map((name) => ({
    name,
    description: `Test tool ${name}`,
  }));

  return {
    listTools: vi.fn((): readonly ToolInfo[] => catalog),
    invoke: vi.fn(async (toolName: string, input: Record<string, unknown>): Promise<unknown> => {
      const handler = handlers[toolName];
      if (!handler) {
        throw new Error(`Unknown tool: ${toolName}`);
      }
      return handler(input);
    }),
  };
}
