export interface CompletionRequest {
  prompt: string;
  maxOutputTokens: number;
  temperature: number;
}

/**
 * Single LLM call. Implementations throw `RateLimitedError` when the provider
 * throttles and `ProviderError` for any other failure.
 */
export interface LlmClient {
  complete(request: CompletionRequest): Promise<string>;
}
