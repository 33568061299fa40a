import { describe, it, expect } from 'vitest';
import type { ToolCall } from '@loopwright/agent-contracts';
import { ToolDispatcher } from '../tool-dispatcher.js';
import { makeMockLogger, makeToolCapability } from '../../testing.js';

function call(id: string, name: string, input: Record<string, unknown> = {}): ToolCall {
  return { id, name, input };
}

describe('ToolDispatcher', () => {
  it('resolves [] without touching the capability for no calls', async () => {
    const tools = makeToolCapability({ find: () => 'x' });
    const dispatcher = new ToolDispatcher(tools);

    expect(await dispatcher.dispatch([])).toEqual([]);
    expect(tools.invoke).not.toHaveBeenCalled();
  });

  it('passes the input through and reduces the output to text', async () => {
    const tools = makeToolCapability({
      count: (input) => ({ content: [{ value: `counted ${String(input.glob)}` }] }),
    });
    const dispatcher = new ToolDispatcher(tools);

    const results = await dispatcher.dispatch([call('c1', 'count', { glob: '*.md' })]);

    expect(tools.invoke).toHaveBeenCalledWith('count', { glob: '*.md' });
    expect(results).toEqual([{ callId: 'c1', toolName: 'count', result: 'counted *.md' }]);
  });

  it('isolates a failing call from the others', async () => {
    const tools = makeToolCapability({
      ok: () => 'fine',
      boom: () => {
        throw new Error('disk full');
      },
    });
    const logger = makeMockLogger();
    const dispatcher = new ToolDispatcher(tools, logger);

    const results = await dispatcher.dispatch([call('1', 'ok'), call('2', 'boom'), call('3', 'ok')]);

    expect(results).toEqual([
      { callId: '1', toolName: 'ok', result: 'fine' },
      { callId: '2', toolName: 'boom', error: 'disk full' },
      { callId: '3', toolName: 'ok', result: 'fine' },
    ]);
    expect(logger.warn).toHaveBeenCalledWith('❌ Tool boom failed', { callId: '2', error: 'disk full' });
  });

  it('records unknown tools as failures', async () => {
    const dispatcher = new ToolDispatcher(makeToolCapability());

    const [result] = await dispatcher.dispatch([call('9', 'missing')]);

    expect(result).toEqual({ callId: '9', toolName: 'missing', error: 'Unknown tool: missing' });
  });

  it('runs calls concurrently and keeps call order', async () => {
    const settled: string[] = [];
    let releaseSlow: () => void = () => {};
    const slowGate = new Promise<void>((resolve) => {
      releaseSlow = resolve;
    });

    const tools = makeToolCapability({
      slow: async () => {
        await slowGate;
        settled.push('slow');
        return 'slow done';
      },
      fast: async () => {
        settled.push('fast');
        releaseSlow();
        return 'fast done';
      },
    });
    const dispatcher = new ToolDispatcher(tools);

    const results = await dispatcher.dispatch([call('a', 'slow'), call('b', 'fast')]);

    expect(settled).toEqual(['fast', 'slow']);
    expect(results.map((r) => r.callId)).toEqual(['a', 'b']);
  });
});
