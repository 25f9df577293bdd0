// Generation collaborator backed by the Anthropic Messages API

import Anthropic, { APIError } from '@anthropic-ai/sdk';
import type { GenerationProvider, TokenUsage } from '../types/collaborators.js';
import { GenerationError, describeError } from '../utils/errors.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { DEFAULT_MODEL } from '../config/settings.js';

export interface AnthropicGeneratorConfig {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  /** SDK-level retries for 429/5xx/connection errors (default: 2) */
  maxRetries?: number;
  /** Called with the token usage of every successful call. */
  onUsage?: (usage: TokenUsage) => void;
  logger?: Logger;
}

export class AnthropicGenerator implements GenerationProvider {
  private readonly client: Anthropic;
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly onUsage?: (usage: TokenUsage) => void;
  private readonly log: Logger;

  constructor(config: AnthropicGeneratorConfig) {
    if (!config.apiKey) {
      throw new GenerationError('ANTHROPIC_API_KEY is not set');
    }
    this.client = new Anthropic({ apiKey: config.apiKey, maxRetries: config.maxRetries ?? 2 });
    this.model = config.model ?? DEFAULT_MODEL;
    this.maxTokens = config.maxTokens ?? 4096;
    this.onUsage = config.onUsage;
    this.log = config.logger ?? createLogger('Anthropic');
  }

  async generate(prompt: string): Promise<string> {
    let response: Anthropic.Message;
    try {
      response = await this.client.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        messages: [{ role: 'user', content: prompt }],
      });
    } catch (err) {
      if (err instanceof APIError) {
        throw new GenerationError(`Generation: HTTP ${err.status ?? 'error'}: ${err.message}`, err);
      }
      throw new GenerationError(`Generation request failed: ${describeError(err)}`, err);
    }

    const usage = { inputTokens: response.usage.input_tokens, outputTokens: response.usage.output_tokens };
    this.onUsage?.(usage);
    this.log.debug('Generation complete', { model: this.model, ...usage, stopReason: response.stop_reason });

    const text = response.content
      .flatMap(block => (block.type === 'text' ? [block.text] : []))
      .join('\n')
      .trim();
    if (!text) {
      throw new GenerationError(`Generation: empty response (stop reason: ${response.stop_reason ?? 'unknown'})`);
    }
    return text;
  }
}
