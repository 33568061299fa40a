import { describe, it, expect } from 'vitest';
import { Prompter } from '../prompter.js';
import { AgentRunError } from '../errors.js';
import {
  makeMockLogger,
  makeScriptedTransport,
  makeToolCapability,
  textReply,
  toolCallReply,
} from '../testing.js';

function makePrompter(replies: Parameters<typeof makeScriptedTransport>[0] = {}) {
  const transport = makeScriptedTransport(replies);
  const tools = makeToolCapability({ evaluate: (input) => `=> ${String(input.code)}` });
  const prompter = new Prompter({ transport, tools, logger: makeMockLogger() });
  return { prompter, transport, tools };
}

describe('Prompter', () => {
  it('returns text with no tools used', async () => {
    const { prompter } = makePrompter({ replies: [textReply('Hello there')] });

    const result = await prompter.askWithSystem('test-model', 'Be kind.', 'Greet me');

    expect(result).toEqual({ text: 'Hello there', toolCalls: [], toolsUsed: [], toolResults: [] });
  });

  it('sends the system prompt and the question', async () => {
    const { prompter, transport } = makePrompter({ replies: [textReply('ok')] });

    await prompter.askWithSystem('test-model', 'Be kind.', 'Greet me', ['evaluate']);

    expect(transport.requests[0]).toEqual({
      systemPrompt: 'Be kind.',
      messages: [{ role: 'user', content: 'Greet me' }],
      options: { tools: [{ name: 'evaluate', description: 'Test tool evaluate' }], toolMode: 'auto' },
    });
  });

  it('executes requested tools once', async () => {
    const { prompter, tools } = makePrompter({
      replies: [toolCallReply([{ id: 'e1', name: 'evaluate', input: { code: '(+ 1 2)' } }])],
    });

    const result = await prompter.promptWithTools({
      modelId: 'test-model',
      messages: [{ role: 'user', content: 'add' }],
      toolIds: ['evaluate'],
    });

    expect(tools.invoke).toHaveBeenCalledTimes(1);
    expect(result.toolsUsed).toEqual(['evaluate']);
    expect(result.toolResults).toEqual([{ callId: 'e1', toolName: 'evaluate', result: '=> (+ 1 2)' }]);
  });

  it('appends the new message when continuing a conversation', async () => {
    const { prompter, transport } = makePrompter({ replies: [textReply('3')] });

    await prompter.continueConversation(
      'test-model',
      [
        { role: 'user', content: 'add 1 and 2' },
        { role: 'assistant', content: 'Sure' },
      ],
      'go on',
    );

    expect(transport.requests[0].messages).toEqual([
      { role: 'user', content: 'add 1 and 2' },
      { role: 'assistant', content: 'Sure' },
      { role: 'user', content: 'go on' },
    ]);
  });

  it('throws MODEL_NOT_FOUND for an unknown model', async () => {
    const { prompter } = makePrompter();

    await expect(prompter.askWithSystem('ghost', 's', 'q')).rejects.toMatchObject({
      code: 'MODEL_NOT_FOUND',
      message: 'Model not found: ghost',
    });
  });

  it('wraps transport failures', async () => {
    const { prompter } = makePrompter({ replies: [new Error('socket hang up')] });

    const error = await prompter.askWithSystem('test-model', 's', 'q').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AgentRunError);
    expect(error).toMatchObject({ code: 'TRANSPORT_ERROR', message: 'socket hang up' });
  });
});
