import { createHash } from 'node:crypto';
import type { CompletionRequest, LlmClient } from '@session-insights/core';

export interface OpenAiMockClientOptions {
  seed?: string;
}

export class OpenAiMockClient implements LlmClient {
  private readonly seed: string;

  constructor(options: OpenAiMockClientOptions = {}) {
    this.seed = options.seed ?? 'session-insights';
  }

  async complete(request: CompletionRequest): Promise<string> {
    const hash = createHash('sha256').update(`${request.prompt}:${this.seed}`).digest('hex');
    const firstLine = request.prompt.trimStart().split('\n', 1)[0] ?? '';
    const subject = firstLine.length > 80 ? `${firstLine.slice(0, 77)}...` : firstLine;

    return `[MOCK ${hash.slice(0, 12)}] Response to "${subject}" (${request.prompt.length} chars, max ${request.maxOutputTokens} tokens).`;
  }
}
