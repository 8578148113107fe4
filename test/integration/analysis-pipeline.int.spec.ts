import { afterEach, describe, expect, it, vi } from 'vitest';
import { Logger } from '@aws-lambda-powertools/logger';
import { ZodError } from 'zod';
import type { CompletionRequest } from '@session-insights/core';
import { createPipeline, type AnalysisPipeline, type AppConfig } from '@session-insights/pipeline';
import { ManualClock } from '../fixtures/clock';
import { transcriptFixturePath } from '../fixtures';

const baseConfig = (overrides: Partial<AppConfig> = {}): AppConfig => ({
  appName: 'session-insights-test',
  stage: 'test',
  logLevel: 'SILENT',
  mockOpenAi: false,
  openAiMockSeed: 'test-seed',
  openAi: { apiKey: 'test-key', model: 'gpt-test' },
  llm: {
    tokensPerMinute: 30_000,
    maxTokensPerCall: 15_000,
    maxOutputTokens: 4_000,
    temperature: 0.2,
    rateLimitCooldownMs: 30_000,
    chunkDelayBaseMs: 5_000,
    chunkDelayMsPerToken: 0.1
  },
  analysisTypeDelayMs: 5_000,
  ...overrides
});

const fakeLlm = () =>
  vi.fn(async ({ prompt }: CompletionRequest) => {
    if (prompt.startsWith('You are preparing an executive summary')) {
      return 'Executive summary text.';
    }
    if (prompt.startsWith('You are an instructional coach')) {
      return 'Pedagogical notes.';
    }
    if (prompt.startsWith('You are reviewing a recorded teaching session for moments of insight')) {
      return 'Aha moments.';
    }
    return '```json\n{"overall": "engaged"}\n```';
  });

describe('AnalysisPipeline', () => {
  let pipeline: AnalysisPipeline | undefined;

  afterEach(async () => {
    await pipeline?.close();
    pipeline = undefined;
  });

  const build = (config: AppConfig, complete?: ReturnType<typeof fakeLlm>) => {
    const clock = new ManualClock();
    pipeline = createPipeline(config, {
      llm: complete ? { complete } : undefined,
      clock,
      sleep: clock.sleep,
      logger: new Logger({ serviceName: 'test', logLevel: 'SILENT' })
    });
    return { pipeline, clock };
  };

  it('analyses a transcript with its chat log', async () => {
    const complete = fakeLlm();
    const { pipeline: p, clock } = build(baseConfig(), complete);

    const result = await p.analyze({
      transcriptPath: transcriptFixturePath('session.vtt'),
      chatLogPath: transcriptFixturePath('chat.txt'),
      analysisTypes: ['executive_summary', 'pedagogical_analysis']
    });

    expect(result).toEqual({
      executiveSummary: 'Executive summary text.',
      pedagogicalAnalysis: 'Pedagogical notes.'
    });
    expect(clock.sleeps).toEqual([5_000]);
    expect(complete).toHaveBeenCalledTimes(2);

    const [first] = complete.mock.calls[0];
    expect(first.maxOutputTokens).toBe(4_000);
    expect(first.temperature).toBe(0.2);
    expect(first.prompt).toContain(
      "Human: Here is the session transcript:\n\nAlice Smith: Good morning everyone. Let's get started.\n\nBob Jones: Thanks, Alice.\n\n"
    );
    expect(first.prompt.endsWith('Additional context from chat log:\nBob Jones: Could you share the slides?\n')).toBe(
      true
    );
  });

  it('runs every analysis type when none are named', async () => {
    const complete = fakeLlm();
    const { pipeline: p, clock } = build(baseConfig(), complete);

    const result = await p.analyze({
      transcriptPath: transcriptFixturePath('session.vtt'),
      participantSchoolMapping: { 'Alice Smith': 'North High', 'Bob Jones': 'South High' }
    });

    expect(result).toEqual({
      executiveSummary: 'Executive summary text.',
      pedagogicalAnalysis: 'Pedagogical notes.',
      ahaMoments: 'Aha moments.',
      engagementMetrics: { overall: 'engaged' }
    });
    expect(clock.sleeps).toEqual([5_000, 5_000, 5_000]);
  });

  it('continues without a chat log that cannot be read', async () => {
    const complete = fakeLlm();
    const { pipeline: p } = build(baseConfig(), complete);

    await p.analyze({
      transcriptPath: transcriptFixturePath('session.vtt'),
      chatLogPath: transcriptFixturePath('missing-chat.txt'),
      analysisTypes: ['executive_summary']
    });

    const [request] = complete.mock.calls[0];
    expect(request.prompt).not.toContain('Additional context from chat log');
  });

  it('rejects a request with an unknown analysis type', async () => {
    const complete = fakeLlm();
    const { pipeline: p } = build(baseConfig(), complete);

    await expect(
      p.analyze({ transcriptPath: transcriptFixturePath('session.vtt'), analysisTypes: ['bogus'] })
    ).rejects.toBeInstanceOf(ZodError);
    expect(complete).not.toHaveBeenCalled();
  });

  it('fails when the transcript is missing', async () => {
    const complete = fakeLlm();
    const { pipeline: p } = build(baseConfig(), complete);

    await expect(
      p.analyze({ transcriptPath: transcriptFixturePath('missing.vtt'), analysisTypes: ['executive_summary'] })
    ).rejects.toMatchObject({ code: 'ENOENT' });
    expect(complete).not.toHaveBeenCalled();
  });

  it('uses the offline client in mock mode', async () => {
    const { pipeline: p } = build(baseConfig({ mockOpenAi: true, openAi: { model: 'gpt-test' } }));

    const result = await p.analyze({
      transcriptPath: transcriptFixturePath('session.vtt'),
      analysisTypes: ['executive_summary']
    });

    expect(result.executiveSummary?.startsWith('[MOCK ')).toBe(true);
    expect(result.executiveSummary?.endsWith('max 4000 tokens).')).toBe(true);
  });
});
