import { QueueClosedError, serializeError } from '../domain/errors';
import { sleep as defaultSleep, systemClock, type Clock, type Sleep } from '../ports/Clock';
import type { CompletionRequest, LlmClient } from '../ports/LlmClient';
import type { CoreLogger } from '../ports/Logger';
import { Completion } from './Completion';
import type { TokenBucket } from './TokenBucket';

export interface QueuedRequest extends CompletionRequest {
  estimatedTokens: number;
  enqueuedAt: number;
  completion: Completion<string>;
}

export type EnqueueInput = CompletionRequest & { estimatedTokens: number };

export interface RequestQueueOptions {
  llm: LlmClient;
  bucket: TokenBucket;
  clock?: Clock;
  sleep?: Sleep;
  logger?: CoreLogger;
}

export class RequestQueue {
  private readonly llm: LlmClient;
  private readonly bucket: TokenBucket;
  private readonly clock: Clock;
  private readonly sleep: Sleep;
  private readonly logger?: CoreLogger;
  private readonly pending: QueuedRequest[] = [];
  private readonly loop: Promise<void>;
  private wake: (() => void) | undefined;
  private closed = false;

  constructor(options: RequestQueueOptions) {
    this.llm = options.llm;
    this.bucket = options.bucket;
    this.clock = options.clock ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.logger = options.logger;
    this.loop = this.drain();
  }

  get size(): number {
    return this.pending.length;
  }

  enqueue(input: EnqueueInput): Promise<string> {
    if (this.closed) {
      return Promise.reject(new QueueClosedError());
    }
    if (!Number.isFinite(input.estimatedTokens) || input.estimatedTokens < 0) {
      return Promise.reject(
        new RangeError(`estimatedTokens must be a non-negative number, got ${input.estimatedTokens}`)
      );
    }

    const request: QueuedRequest = {
      prompt: input.prompt,
      maxOutputTokens: input.maxOutputTokens,
      temperature: input.temperature,
      estimatedTokens: input.estimatedTokens,
      enqueuedAt: this.clock.now(),
      completion: new Completion<string>()
    };
    this.logger?.info('Request added to queue', {
      position: this.pending.length + 1,
      estimatedTokens: request.estimatedTokens
    });
    this.pending.push(request);

    this.notify();
    return request.completion.promise;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.notify();
    await this.loop;
  }

  private notify(): void {
    const wake = this.wake;
    this.wake = undefined;
    wake?.();
  }

  private async drain(): Promise<void> {
    for (;;) {
      const head = this.pending[0];
      if (head) {
        try {
          await this.process(head);
        } catch (error) {
          this.discard(head, error);
        }
        continue;
      }
      if (this.closed) {
        return;
      }
      await new Promise<void>(resolve => {
        this.wake = resolve;
      });
    }
  }

  private async process(request: QueuedRequest): Promise<void> {
    // Oversized requests wait for a full bucket and are charged its capacity.
    const cost = Math.min(request.estimatedTokens, this.bucket.capacity);

    let text: string;
    try {
      await this.waitForTokens(cost);

      this.pending.shift();
      if (!this.bucket.tryConsume(cost)) {
        throw new Error(`Token bucket could not pay ${cost} tokens after waiting`);
      }

      this.logger?.info('Processing request', {
        waitedMs: Math.round(this.clock.now() - request.enqueuedAt),
        estimatedTokens: request.estimatedTokens,
        remaining: this.pending.length
      });

      text = await this.llm.complete({
        prompt: request.prompt,
        maxOutputTokens: request.maxOutputTokens,
        temperature: request.temperature
      });
    } catch (error) {
      if (this.pending[0] === request) {
        this.pending.shift();
      }
      request.completion.reject(error);
      this.logger?.error('Error processing request', {
        error: serializeError(error),
        remaining: this.pending.length
      });
      return;
    }

    request.completion.resolve(text);
    this.logger?.info('Request processed successfully', { remaining: this.pending.length });
  }

  // Failures outside the provider call: the request is settled and the loop goes on.
  private discard(request: QueuedRequest, error: unknown): void {
    if (this.pending[0] === request) {
      this.pending.shift();
    }
    if (!request.completion.settled) {
      request.completion.reject(error);
    }
    try {
      this.logger?.error('Unexpected error in drain loop', { error: serializeError(error) });
    } catch (logError) {
      process.emitWarning(logError instanceof Error ? logError : String(logError));
    }
  }

  private async waitForTokens(cost: number): Promise<void> {
    let waitSeconds = this.bucket.timeUntilAvailable(cost);
    while (waitSeconds > 0) {
      const waitMs = Math.ceil(waitSeconds * 1_000);
      this.logger?.info('Rate limit: waiting for token bucket to refill', {
        waitMs,
        cost
      });
      await this.sleep(waitMs);
      waitSeconds = this.bucket.timeUntilAvailable(cost);
    }
  }
}
