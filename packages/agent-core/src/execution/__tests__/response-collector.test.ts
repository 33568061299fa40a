import { describe, it, expect } from 'vitest';
import type { ResponsePart } from '@loopwright/agent-contracts';
import { collectResponse } from '../response-collector.js';
import { streamOf } from '../../testing.js';

describe('collectResponse', () => {
  it('concatenates text parts in arrival order', async () => {
    const result = await collectResponse(
      streamOf([
        { type: 'text', value: 'Hello' },
        { type: 'text', value: ', ' },
        { type: 'text', value: 'world' },
      ]),
    );

    expect(result).toEqual({ text: 'Hello, world', toolCalls: [] });
  });

  it('collects tool calls in arrival order, interleaved with text', async () => {
    const parts: ResponsePart[] = [
      { type: 'text', value: 'Looking' },
      { type: 'tool-call', callId: 'c1', name: 'find', input: { glob: '*.ts' } },
      { type: 'text', value: ' around' },
      { type: 'tool-call', callId: 'c2', name: 'read', input: { path: 'a.ts' } },
    ];

    const result = await collectResponse(streamOf(parts));

    expect(result.text).toBe('Looking around');
    expect(result.toolCalls).toEqual([
      { id: 'c1', name: 'find', input: { glob: '*.ts' } },
      { id: 'c2', name: 'read', input: { path: 'a.ts' } },
    ]);
  });

  it('ignores other part kinds', async () => {
    const result = await collectResponse(
      streamOf([
        { type: 'data', mimeType: 'application/json', data: { usage: 12 } },
        { type: 'text', value: 'ok' },
      ]),
    );

    expect(result).toEqual({ text: 'ok', toolCalls: [] });
  });

  it('returns empty accumulators for an empty stream', async () => {
    expect(await collectResponse(streamOf([]))).toEqual({ text: '', toolCalls: [] });
  });

  it('propagates a stream failure', async () => {
    async function* failing(): AsyncGenerator<ResponsePart> {
      yield { type: 'text', value: 'partial' };
      throw new Error('connection reset');
    }

    await expect(collectResponse(failing())).rejects.toThrow('connection reset');
  });
});
