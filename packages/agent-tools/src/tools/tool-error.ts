export class ToolError extends Error {
  readonly code: string;
  readonly retryable: boolean;
  readonly hint?: string;
  readonly details?: Record<string, unknown>;

  constructor(input: {
    code: string;
    message: string;
    retryable?: boolean;
    hint?: string;
    details?: Record<string, unknown>;
  }) {
    const hintBlock = input.hint ? `\n\nHint: ${input.hint}` : '';
    super(`${input.code}: ${input.message}${hintBlock}`);
    this.name = 'ToolError';
    this.code = input.code;
    this.retryable = input.retryable ?? false;
    this.hint = input.hint;
    this.details = input.details;
  }
}

export function toolError(input: {
  code: string;
  message: string;
  retryable?: boolean;
  hint?: string;
  details?: Record<string, unknown>;
}): ToolError {
  return new ToolError(input);
}
