import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../ports/Clock';
import type { LlmClient } from '../ports/LlmClient';
import type { CoreLogger } from '../ports/Logger';
import { ChunkSplitter } from './ChunkSplitter';
import { RequestQueue } from './RequestQueue';
import { TokenBucket } from './TokenBucket';
import { estimateRequestTokens } from './tokens';

export const DEFAULT_MAX_OUTPUT_TOKENS = 4000;
export const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_CHUNK_DELAY_BASE_MS = 5_000;
const DEFAULT_CHUNK_DELAY_MS_PER_TOKEN = 0.1;

export interface RequestCoordinatorOptions {
  llm: LlmClient;
  tokensPerMinute: number;
  maxTokensPerCall: number;
  chunkDelayBaseMs?: number;
  chunkDelayMsPerToken?: number;
  defaultMaxOutputTokens?: number;
  defaultTemperature?: number;
  turnMarker?: string;
  clock?: Clock;
  sleep?: Sleep;
  logger?: CoreLogger;
}

export interface SubmitOptions {
  maxOutputTokens?: number;
  temperature?: number;
}

export class RequestCoordinator {
  readonly bucket: TokenBucket;
  private readonly queue: RequestQueue;
  private readonly splitter: ChunkSplitter;
  private readonly maxTokensPerCall: number;
  private readonly chunkDelayBaseMs: number;
  private readonly chunkDelayMsPerToken: number;
  private readonly defaultMaxOutputTokens: number;
  private readonly defaultTemperature: number;
  private readonly sleep: Sleep;
  private readonly logger?: CoreLogger;

  constructor(options: RequestCoordinatorOptions) {
    const clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
    this.maxTokensPerCall = options.maxTokensPerCall;
    this.chunkDelayBaseMs = options.chunkDelayBaseMs ?? DEFAULT_CHUNK_DELAY_BASE_MS;
    this.chunkDelayMsPerToken = options.chunkDelayMsPerToken ?? DEFAULT_CHUNK_DELAY_MS_PER_TOKEN;
    this.defaultMaxOutputTokens = options.defaultMaxOutputTokens ?? DEFAULT_MAX_OUTPUT_TOKENS;
    this.defaultTemperature = options.defaultTemperature ?? DEFAULT_TEMPERATURE;

    this.bucket = TokenBucket.perMinute(options.tokensPerMinute, clock);
    this.splitter = new ChunkSplitter({
      maxTokensPerCall: options.maxTokensPerCall,
      turnMarker: options.turnMarker
    });
    this.queue = new RequestQueue({
      llm: options.llm,
      bucket: this.bucket,
      clock,
      sleep: this.sleep,
      logger: options.logger
    });
  }

  get pendingRequests(): number {
    return this.queue.size;
  }

  async submit(prompt: string, options: SubmitOptions = {}): Promise<string> {
    const maxOutputTokens = options.maxOutputTokens ?? this.defaultMaxOutputTokens;
    const temperature = options.temperature ?? this.defaultTemperature;
    if (!Number.isInteger(maxOutputTokens) || maxOutputTokens <= 0) {
      throw new RangeError(`maxOutputTokens must be a positive integer, got ${maxOutputTokens}`);
    }

    const estimatedTokens = estimateRequestTokens(prompt, maxOutputTokens);
    if (estimatedTokens <= this.maxTokensPerCall) {
      return this.queue.enqueue({ prompt, maxOutputTokens, temperature, estimatedTokens });
    }

    this.logger?.info('Request exceeds per-call ceiling; processing in chunks', {
      estimatedTokens,
      maxTokensPerCall: this.maxTokensPerCall
    });
    return this.submitChunked(prompt, maxOutputTokens, temperature);
  }

  close(): Promise<void> {
    return this.queue.close();
  }

  private async submitChunked(
    prompt: string,
    maxOutputTokens: number,
    temperature: number
  ): Promise<string> {
    const { chunks } = this.splitter.plan(prompt, maxOutputTokens);
    this.logger?.info('Split large request into chunks', { chunks: chunks.length });

    const results: string[] = [];
    for (const chunk of chunks) {
      this.logger?.info('Processing chunk', { position: chunk.position, total: chunk.total });
      results.push(
        await this.queue.enqueue({
          prompt: chunk.prompt,
          maxOutputTokens,
          temperature,
          estimatedTokens: chunk.estimatedTokens
        })
      );

      if (chunk.position < chunk.total) {
        const delayMs = this.chunkDelayBaseMs + chunk.estimatedTokens * this.chunkDelayMsPerToken;
        this.logger?.info('Waiting before next chunk', { delayMs });
        await this.sleep(delayMs);
      }
    }

    return results.join('\n\n');
  }
}
