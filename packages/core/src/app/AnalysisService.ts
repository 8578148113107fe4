import { z } from 'zod';
import { serializeError } from '../domain/errors';
import type {
  AnalysisResult,
  AnalysisType,
  EngagementMetrics,
  TranscriptAnalysisInput
} from '../domain/models';
import { sleep as defaultSleep, type Sleep } from '../ports/Clock';
import type { CoreLogger } from '../ports/Logger';
import { buildAnalysisPrompt, buildConciseSummaryPrompt } from './prompts';
import type { SubmitOptions } from './RequestCoordinator';

const DEFAULT_TYPE_DELAY_MS = 5_000;
const CONCISE_SUMMARY_MAX_TOKENS = 1_000;
const JSON_BLOCK_PATTERN = /```json\s*\n([\s\S]*?)\n\s*```/;
const EngagementMetricsSchema = z.record(z.string(), z.unknown());

export interface PromptSubmitter {
  submit(prompt: string, options?: SubmitOptions): Promise<string>;
}

export interface AnalysisServiceOptions {
  typeDelayMs?: number;
  sleep?: Sleep;
}

export class AnalysisService {
  private readonly typeDelayMs: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly llm: PromptSubmitter,
    options: AnalysisServiceOptions = {},
    private readonly logger?: CoreLogger
  ) {
    this.typeDelayMs = options.typeDelayMs ?? DEFAULT_TYPE_DELAY_MS;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async generate(input: TranscriptAnalysisInput): Promise<AnalysisResult> {
    const result: AnalysisResult = {};

    for (const [idx, type] of input.analysisTypes.entries()) {
      this.logger?.info('Generating analysis', { analysisType: type });
      const prompt = buildAnalysisPrompt(type, input.transcript, {
        chatLog: input.chatLog,
        participantSchoolMapping: input.participantSchoolMapping
      });
      const response = await this.submit(type, prompt);
      assign(result, type, response);

      if (idx < input.analysisTypes.length - 1) {
        this.logger?.info('Waiting before next analysis type', { delayMs: this.typeDelayMs });
        await this.sleep(this.typeDelayMs);
      }
    }

    return result;
  }

  conciseSummary(executiveSummary: string): Promise<string> {
    return this.submit('concise_summary', buildConciseSummaryPrompt(executiveSummary), {
      maxOutputTokens: CONCISE_SUMMARY_MAX_TOKENS
    });
  }

  private async submit(label: string, prompt: string, options?: SubmitOptions): Promise<string> {
    this.logger?.debug('Queuing LLM request', { analysisType: label, promptChars: prompt.length });
    try {
      const response = await this.llm.submit(prompt, options);
      this.logger?.debug('Received LLM response', {
        analysisType: label,
        responseChars: response.length
      });
      return response;
    } catch (error) {
      this.logger?.error('Error generating analysis', {
        analysisType: label,
        error: serializeError(error)
      });
      throw error;
    }
  }
}

function assign(result: AnalysisResult, type: AnalysisType, response: string): void {
  switch (type) {
    case 'executive_summary':
      result.executiveSummary = response;
      return;
    case 'pedagogical_analysis':
      result.pedagogicalAnalysis = response;
      return;
    case 'aha_moments':
      result.ahaMoments = response;
      return;
    case 'engagement_analysis':
      result.engagementMetrics = parseEngagementMetrics(response);
      return;
  }
}

export function parseEngagementMetrics(response: string): EngagementMetrics {
  const candidate = JSON_BLOCK_PATTERN.exec(response)?.[1] ?? response;
  try {
    const parsed = EngagementMetricsSchema.safeParse(JSON.parse(candidate));
    if (parsed.success) {
      return parsed.data;
    }
  } catch {
    // not JSON
  }
  return { rawResponse: response };
}
