export * from './OpenAiLlmClient';
export * from './OpenAiMockClient';
