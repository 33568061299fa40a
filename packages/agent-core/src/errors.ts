/**
 * Agent run errors.
 *
 * Runtime failures of a run are returned as results; AgentRunError is thrown
 * only by single-shot helpers and by option validation.
 */

import type { ZodError } from 'zod';

export type AgentRunErrorCode =
  | 'MODEL_NOT_FOUND'
  | 'TRANSPORT_ERROR'
  | 'INVALID_OPTIONS';

export class AgentRunError extends Error {
  readonly code: AgentRunErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(code: AgentRunErrorCode, message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AgentRunError';
    this.code = code;
    this.details = options?.details;
  }

  static invalidOptions(error: ZodError): AgentRunError {
    const issues = error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    return new AgentRunError('INVALID_OPTIONS', `Invalid options: ${issues.join('; ')}`, {
      cause: error,
      details: { issues },
    });
  }
}

export function isAgentRunError(error: unknown): error is AgentRunError {
  return error instanceof AgentRunError;
}

/**
 * Message of anything thrown
 */
export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) {return error.message;}
  if (typeof error === 'string') {return error;}
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
