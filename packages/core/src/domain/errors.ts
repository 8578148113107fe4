export class RateLimitedError extends Error {
  constructor(
    message: string,
    readonly cooldownMs: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RateLimitedError';
  }
}

export class ProviderError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ProviderError';
  }
}

export class PromptTooLargeError extends Error {
  constructor(
    readonly reservedTokens: number,
    readonly ceiling: number
  ) {
    super(
      `Prompt preamble and output reservation (${reservedTokens} tokens) leave no room for content under the ${ceiling}-token ceiling`
    );
    this.name = 'PromptTooLargeError';
  }
}

export class QueueClosedError extends Error {
  constructor() {
    super('Request queue is closed');
    this.name = 'QueueClosedError';
  }
}

export function serializeError(error: unknown): Record<string, unknown> {
  const base: Record<string, unknown> = { message: 'Unknown error' };
  if (error instanceof Error) {
    base.message = error.message;
    base.name = error.name;
    base.stack = error.stack;
    if ('cause' in error && error.cause) {
      base.cause = error.cause;
    }
  } else if (typeof error === 'string') {
    base.message = error;
  }
  return base;
}
