import { createHash } from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { OpenAiMockClient } from '@session-insights/ai-openai';

describe('OpenAiMockClient', () => {
  it('answers deterministically from the prompt and seed', async () => {
    const prompt = '\n  Summarise the session.\nHuman: transcript follows';
    const hash = createHash('sha256').update(`${prompt}:test-seed`).digest('hex').slice(0, 12);

    const client = new OpenAiMockClient({ seed: 'test-seed' });
    const first = await client.complete({ prompt, maxOutputTokens: 300, temperature: 0.2 });
    const second = await client.complete({ prompt, maxOutputTokens: 300, temperature: 0.2 });

    expect(first).toBe(
      `[MOCK ${hash}] Response to "Summarise the session." (${prompt.length} chars, max 300 tokens).`
    );
    expect(second).toBe(first);
  });

  it('varies with the seed', async () => {
    const request = { prompt: 'hello', maxOutputTokens: 10, temperature: 0 };

    const a = await new OpenAiMockClient({ seed: 'one' }).complete(request);
    const b = await new OpenAiMockClient({ seed: 'two' }).complete(request);

    expect(a).not.toBe(b);
  });

  it('shortens a long first line', async () => {
    const prompt = 'x'.repeat(100);

    const response = await new OpenAiMockClient().complete({ prompt, maxOutputTokens: 10, temperature: 0 });

    expect(response).toContain(`Response to "${'x'.repeat(77)}..." (100 chars, max 10 tokens).`);
  });
});
