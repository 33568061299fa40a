import { describe, it, expect, vi } from 'vitest';
import { isFailedRun } from '@loopwright/agent-contracts';
import type { ToolCall } from '@loopwright/agent-contracts';
import type { ProgressEvent } from '@loopwright/progress-reporter';
import { runAgent, ConversationOrchestrator } from '../conversation-orchestrator.js';
import { AgentRunError } from '../../errors.js';
import {
  makeMockLogger,
  makeScriptedTransport,
  makeToolCapability,
  textReply,
  toolCallReply,
} from '../../testing.js';

// ─── Helpers ──────────────────────────────────────────────────────────────────

function countCall(id: string): ToolCall {
  return { id, name: 'count_files', input: { glob: '**/*' } };
}

function makeDeps(replies: Parameters<typeof makeScriptedTransport>[0] = {}) {
  const transport = makeScriptedTransport(replies);
  const tools = makeToolCapability({
    count_files: () => ({ content: [{ value: '12 files' }] }),
    explode: () => {
      throw new Error('permission denied');
    },
  });
  const logger = makeMockLogger();
  return { transport, tools, logger };
}

// ─── Tests ────────────────────────────────────────────────────────────────────

describe('ConversationOrchestrator', () => {
  describe('turn loop', () => {
    it('runs tool turns until the model reports completion', async () => {
      const deps = makeDeps({
        replies: [
          toolCallReply([countCall('c1')]),
          toolCallReply([countCall('c2')], 'Checking again'),
          textReply('Task complete'),
        ],
      });
      const progress = vi.fn();

      const result = await runAgent(deps, {
        goal: 'count files',
        modelId: 'test-model',
        toolIds: ['count_files'],
        maxTurns: 3,
        progressCallback: progress,
      });

      expect(result.reason).toBe('task-complete');
      expect(deps.transport.sendRequest).toHaveBeenCalledTimes(3);
      expect(progress.mock.calls.map((c) => c[0])).toEqual(['Turn 1/3', 'Turn 2/3', 'Turn 3/3']);
      expect(result.history.map((e) => `${e.role}@${e.turn}`)).toEqual([
        'assistant@1',
        'tool-results@1',
        'assistant@2',
        'tool-results@2',
        'assistant@3',
      ]);
      expect(result.finalResponse).toEqual({ text: 'Task complete', toolCalls: [], turn: 3 });
    });

    it('stops with max-turns-reached once the budget is spent', async () => {
      const deps = makeDeps({
        replies: [textReply('Let me keep going'), textReply('Let me keep going'), textReply('Task complete')],
      });
      const progress = vi.fn();

      const result = await runAgent(deps, {
        goal: 'count files',
        modelId: 'test-model',
        maxTurns: 2,
        progressCallback: progress,
      });

      expect(result.reason).toBe('max-turns-reached');
      expect(deps.transport.sendRequest).toHaveBeenCalledTimes(2);
      expect(progress.mock.calls.map((c) => c[0])).toEqual(['Turn 1/2', 'Turn 2/2', 'Turn 3/2']);
      expect(result.history).toHaveLength(2);
      expect(result.finalResponse).toEqual({ text: 'Let me keep going', toolCalls: [], turn: 2 });
    });

    it('ends with agent-finished when the reply carries no signal', async () => {
      const deps = makeDeps({ replies: [textReply('There are 12 files.')] });

      const result = await runAgent(deps, { goal: 'count files', modelId: 'test-model', maxTurns: 4 });

      expect(result.reason).toBe('agent-finished');
      expect(result.history).toHaveLength(1);
    });

    it('records a failing tool and keeps going', async () => {
      const deps = makeDeps({
        replies: [toolCallReply([{ id: 'x1', name: 'explode', input: {} }]), textReply('Task complete')],
      });

      const result = await runAgent(deps, { goal: 'g', modelId: 'test-model', maxTurns: 3 });

      expect(result.reason).toBe('task-complete');
      expect(result.history[1]).toEqual({
        role: 'tool-results',
        results: [{ callId: 'x1', toolName: 'explode', error: 'permission denied' }],
        turn: 1,
      });
    });
  });

  describe('requests', () => {
    it('sends the goal, prior replies and tool results with the enabled tools', async () => {
      const deps = makeDeps({ replies: [toolCallReply([countCall('c1')]), textReply('Task complete')] });

      await runAgent(deps, { goal: 'count files', modelId: 'test-model', toolIds: ['count_files'], maxTurns: 3 });

      const [first, second] = deps.transport.requests;
      expect(first.messages).toHaveLength(1);
      expect(first.options).toEqual({
        tools: [{ name: 'count_files', description: 'Test tool count_files' }],
        toolMode: 'auto',
      });
      expect(first.systemPrompt).toContain('AVAILABLE TOOLS:\n- count_files: Test tool count_files');

      expect(second.messages.map((m) => m.role)).toEqual(['user', 'assistant', 'user']);
      expect(second.messages[0].content).toContain('This is turn 2.');
      expect(second.messages[2].content.startsWith('TOOL RESULT (count_files): 12 files')).toBe(true);
    });

    it('uses a caller-supplied system prompt', async () => {
      const deps = makeDeps({ replies: [textReply('Task complete')] });

      await runAgent(deps, { goal: 'g', modelId: 'test-model', systemPrompt: 'Be brief.' });

      expect(deps.transport.requests[0].systemPrompt).toBe('Be brief.');
    });
  });

  describe('failures', () => {
    it('returns model-not-found-error before any turn', async () => {
      const deps = makeDeps();
      const progress = vi.fn();

      const result = await runAgent(deps, { goal: 'g', modelId: 'missing-model', progressCallback: progress });

      expect(result).toEqual({
        history: [],
        error: true,
        reason: 'model-not-found-error',
        errorMessage: 'Model not found: missing-model',
        finalResponse: null,
      });
      expect(deps.transport.sendRequest).not.toHaveBeenCalled();
      expect(progress).not.toHaveBeenCalled();
    });

    it('ends the run on a transport failure without retrying', async () => {
      const deps = makeDeps({
        replies: [toolCallReply([countCall('c1')]), new Error('rate limited'), textReply('Task complete')],
      });

      const result = await runAgent(deps, { goal: 'g', modelId: 'test-model', maxTurns: 5 });

      expect(isFailedRun(result)).toBe(true);
      expect(result).toMatchObject({ error: true, reason: 'transport-error', errorMessage: 'rate limited' });
      expect(result.history).toHaveLength(2);
      expect(result.finalResponse).toEqual({ text: '', toolCalls: [countCall('c1')], turn: 1 });
      expect(deps.transport.sendRequest).toHaveBeenCalledTimes(2);
    });

    it('rejects invalid options', async () => {
      const deps = makeDeps();

      await expect(runAgent(deps, { goal: 'g', modelId: 'test-model', maxTurns: 0 })).rejects.toBeInstanceOf(
        AgentRunError,
      );
      await expect(runAgent(deps, { goal: '', modelId: 'test-model' })).rejects.toMatchObject({
        code: 'INVALID_OPTIONS',
      });
    });
  });

  describe('collaborators', () => {
    it('logs progress lines when no callback is given', async () => {
      const deps = makeDeps({ replies: [textReply('Task complete')] });

      await runAgent(deps, { goal: 'g', modelId: 'test-model', maxTurns: 2 });

      expect(deps.logger.info).toHaveBeenCalledWith('Progress: Turn 1/2');
    });

    it('passes the zero-based turn index to the classifier', async () => {
      const deps = makeDeps({ replies: [textReply('hi')] });
      const classify = vi.fn(() => ({ continue: false as const, reason: 'agent-finished' as const }));
      const orchestrator = new ConversationOrchestrator({ ...deps, classifier: { classify } });

      await orchestrator.run({ goal: 'g', modelId: 'test-model', maxTurns: 5 });

      expect(classify).toHaveBeenCalledWith({ turn: 0, maxTurns: 5, toolCalls: [], text: 'hi' });
    });

    it('emits typed progress events', async () => {
      const events: ProgressEvent[] = [];
      const deps = makeDeps({ replies: [toolCallReply([countCall('c1')]), textReply('Task complete')] });

      await runAgent(
        { ...deps, onEvent: (event) => events.push(event) },
        { goal: 'g', modelId: 'test-model', maxTurns: 3 },
      );

      expect(events.map((e) => e.type)).toEqual([
        'run_started',
        'turn_started',
        'tools_dispatched',
        'turn_completed',
        'turn_started',
        'turn_completed',
        'run_completed',
      ]);
    });
  });
});
