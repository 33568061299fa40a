import { describe, it, expect } from 'vitest';
import { toolError, ToolError } from '../tool-error.js';

describe('toolError', () => {
  it('puts the code first in the message', () => {
    const error = toolError({ code: 'NOT_FOUND', message: 'No such file' });

    expect(error).toBeInstanceOf(ToolError);
    expect(error.message).toBe('NOT_FOUND: No such file');
    expect(error.retryable).toBe(false);
  });

  it('appends the hint', () => {
    const error = toolError({ code: 'TIMEOUT', message: 'Took too long', retryable: true, hint: 'Try a smaller query' });

    expect(error.message).toBe('TIMEOUT: Took too long\n\nHint: Try a smaller query');
    expect(error.retryable).toBe(true);
    expect(error.hint).toBe('Try a smaller query');
  });
});
