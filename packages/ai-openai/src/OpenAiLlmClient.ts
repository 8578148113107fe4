import OpenAI from 'openai';
import {
  ProviderError,
  RateLimitedError,
  serializeError,
  sleep as defaultSleep,
  type CompletionRequest,
  type CoreLogger,
  type LlmClient,
  type Sleep
} from '@session-insights/core';

const DEFAULT_RATE_LIMIT_COOLDOWN_MS = 30_000;

export interface OpenAiLlmClientConfig {
  client?: OpenAI;
  apiKey?: string;
  model?: string;
  rateLimitCooldownMs?: number;
  sleep?: Sleep;
  logger?: CoreLogger;
}

export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly rateLimitCooldownMs: number;
  private readonly sleep: Sleep;
  private readonly logger?: CoreLogger;
  private lastResponseId?: string;

  constructor(config: OpenAiLlmClientConfig = {}) {
    const apiKey = config.client ? undefined : config.apiKey ?? process.env.OPENAI_API_KEY;

    if (!config.client && !apiKey) {
      throw new Error('OPENAI_API_KEY is required to instantiate OpenAiLlmClient');
    }

    this.client = config.client ?? new OpenAI({ apiKey, maxRetries: 0 });
    this.model = config.model ?? process.env.OPENAI_MODEL ?? 'gpt-4o-mini';
    this.rateLimitCooldownMs = config.rateLimitCooldownMs ?? DEFAULT_RATE_LIMIT_COOLDOWN_MS;
    this.sleep = config.sleep ?? defaultSleep;
    this.logger = config.logger;
  }

  async complete(request: CompletionRequest): Promise<string> {
    let completion: OpenAI.Chat.Completions.ChatCompletion;
    try {
      completion = await this.client.chat.completions.create({
        model: this.model,
        max_tokens: request.maxOutputTokens,
        temperature: request.temperature,
        messages: [{ role: 'user', content: request.prompt }]
      });
    } catch (error) {
      throw await this.translateError(error);
    }

    this.lastResponseId = completion.id;

    const text = completion.choices[0]?.message?.content;
    if (!text) {
      throw new ProviderError('OpenAI response missing text content');
    }
    return text;
  }

  getLastResponseId(): string | undefined {
    return this.lastResponseId;
  }

  private async translateError(error: unknown): Promise<Error> {
    if (error instanceof OpenAI.RateLimitError) {
      this.logger?.warn('Rate limit exceeded; cooling down before surfacing', {
        cooldownMs: this.rateLimitCooldownMs,
        error: serializeError(error)
      });
      await this.sleep(this.rateLimitCooldownMs);
      return new RateLimitedError(`OpenAI rate limit exceeded: ${error.message}`, this.rateLimitCooldownMs, {
        cause: error
      });
    }

    this.logger?.error('Error calling OpenAI API', { error: serializeError(error) });
    if (error instanceof OpenAI.APIError) {
      return new ProviderError(`OpenAI request failed: ${error.message}`, error.status, { cause: error });
    }
    const message = error instanceof Error ? error.message : String(error);
    return new ProviderError(`OpenAI request failed: ${message}`, undefined, { cause: error });
  }
}
