import { describe, it, expect, vi, beforeEach } from 'vitest';
import { APIError } from '@anthropic-ai/sdk';
import { AnthropicGenerator } from '../bridge/anthropic-generator.js';
import { GenerationError } from '../utils/errors.js';
import { quietLogger } from './helpers/fakes.js';

const { create, constructed } = vi.hoisted(() => {
  const options: unknown[] = [];
  return { create: vi.fn(), constructed: options };
});

vi.mock('@anthropic-ai/sdk', async (importOriginal) => {
  const actual = await importOriginal<typeof import('@anthropic-ai/sdk')>();
  class FakeAnthropic {
    messages = { create };
    constructor(options: unknown) {
      constructed.push(options);
    }
  }
  return { ...actual, default: FakeAnthropic };
});

function message(content: unknown[], stopReason = 'end_turn') {
  return {
    id: 'msg_test',
    type: 'message',
    role: 'assistant',
    model: 'claude-test',
    content,
    stop_reason: stopReason,
    usage: { input_tokens: 10, output_tokens: 5 },
  };
}

describe('AnthropicGenerator', () => {
  beforeEach(() => {
    create.mockReset();
    constructed.length = 0;
  });

  function generator(onUsage?: (u: { inputTokens: number; outputTokens: number }) => void) {
    return new AnthropicGenerator({
      apiKey: 'test-secret',
      model: 'claude-test',
      maxTokens: 256,
      onUsage,
      logger: quietLogger,
    });
  }

  it('sends the prompt as a single user message', async () => {
    create.mockResolvedValueOnce(message([{ type: 'text', text: 'Hello' }]));

    await generator().generate('## Company Research\nTell me about Acme');

    expect(create).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 256,
      messages: [{ role: 'user', content: '## Company Research\nTell me about Acme' }],
    });
    expect(constructed).toEqual([{ apiKey: 'test-secret', maxRetries: 2 }]);
  });

  it('joins text blocks, skips other blocks and trims', async () => {
    create.mockResolvedValueOnce(message([
      { type: 'text', text: '  First part' },
      { type: 'tool_use', id: 't1', name: 'noop', input: {} },
      { type: 'text', text: 'Second part  ' },
    ]));

    expect(await generator().generate('prompt')).toBe('First part\nSecond part');
  });

  it('reports token usage', async () => {
    const onUsage = vi.fn();
    create.mockResolvedValueOnce(message([{ type: 'text', text: 'ok' }]));

    await generator(onUsage).generate('prompt');

    expect(onUsage).toHaveBeenCalledWith({ inputTokens: 10, outputTokens: 5 });
  });

  it('rejects an empty answer with the stop reason', async () => {
    create.mockResolvedValueOnce(message([], 'max_tokens'));

    await expect(generator().generate('prompt')).rejects.toThrow(
      'Generation: empty response (stop reason: max_tokens)',
    );
  });

  it('wraps API errors with their status', async () => {
    create.mockRejectedValueOnce(new APIError(429, { message: 'rate limited' }, undefined, undefined));

    const error = await generator().generate('prompt').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(GenerationError);
    if (!(error instanceof GenerationError)) return;
    expect(error.message).toMatch(/^Generation: HTTP 429: /);
    expect(error.cause).toBeInstanceOf(APIError);
  });

  it('wraps other failures', async () => {
    create.mockRejectedValueOnce(new Error('socket hang up'));
    await expect(generator().generate('prompt')).rejects.toThrow('Generation request failed: socket hang up');
  });

  it('requires an API key', () => {
    expect(() => new AnthropicGenerator({ apiKey: '' })).toThrow('ANTHROPIC_API_KEY is not set');
  });
});
