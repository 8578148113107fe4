import { readFile } from 'node:fs/promises';
import { Logger } from '@aws-lambda-powertools/logger';
import { Metrics, MetricUnit } from '@aws-lambda-powertools/metrics';
import {
  AnalysisRequestSchema,
  AnalysisService,
  RateLimitedError,
  RequestCoordinator,
  formatTranscript,
  mergeConsecutiveSegments,
  parseVtt,
  serializeError,
  type AnalysisResult,
  type Clock,
  type CompletionRequest,
  type CoreLogger,
  type LlmClient,
  type Sleep
} from '@session-insights/core';
import { OpenAiLlmClient, OpenAiMockClient } from '@session-insights/ai-openai';
import { loadConfig, type AppConfig } from './env';

export function toCoreLogger(logger: Logger): CoreLogger {
  return {
    debug: (message, context) => (context ? logger.debug(message, context) : logger.debug(message)),
    info: (message, context) => (context ? logger.info(message, context) : logger.info(message)),
    warn: (message, context) => (context ? logger.warn(message, context) : logger.warn(message)),
    error: (message, context) => (context ? logger.error(message, context) : logger.error(message))
  };
}

class InstrumentedLlmClient implements LlmClient {
  constructor(
    private readonly inner: LlmClient,
    private readonly metrics: Metrics,
    private readonly logger: Logger
  ) {}

  async complete(request: CompletionRequest): Promise<string> {
    try {
      const text = await this.inner.complete(request);
      this.metrics.addMetric('llm_call_success', MetricUnit.Count, 1);
      const responseId = this.getResponseId();
      if (responseId) {
        this.logger.debug('LLM completion received', { openaiResponseId: responseId });
      }
      return text;
    } catch (error) {
      this.metrics.addMetric(
        error instanceof RateLimitedError ? 'llm_rate_limited' : 'llm_call_error',
        MetricUnit.Count,
        1
      );
      throw error;
    }
  }

  private getResponseId(): string | undefined {
    return this.inner instanceof OpenAiLlmClient ? this.inner.getLastResponseId() : undefined;
  }
}

export interface PipelineDependencies {
  llm?: LlmClient;
  clock?: Clock;
  sleep?: Sleep;
  logger?: Logger;
  metrics?: Metrics;
}

export class AnalysisPipeline {
  constructor(
    readonly coordinator: RequestCoordinator,
    readonly analysis: AnalysisService,
    private readonly logger: Logger,
    private readonly metrics: Metrics
  ) {}

  async analyze(input: unknown): Promise<AnalysisResult> {
    const request = AnalysisRequestSchema.parse(input);

    try {
      const content = await readFile(request.transcriptPath, 'utf8');
      const segments = mergeConsecutiveSegments(parseVtt(content));
      this.logger.info('Parsed transcript', {
        transcriptPath: request.transcriptPath,
        segments: segments.length
      });

      const chatLog = request.chatLogPath ? await this.loadChatLog(request.chatLogPath) : undefined;

      const result = await this.analysis.generate({
        transcript: formatTranscript(segments),
        chatLog,
        analysisTypes: request.analysisTypes,
        participantSchoolMapping: request.participantSchoolMapping
      });
      this.metrics.addMetric('analysis_completed', MetricUnit.Count, 1);
      return result;
    } catch (error) {
      this.metrics.addMetric('analysis_failed', MetricUnit.Count, 1);
      this.logger.error('Error generating analysis', {
        transcriptPath: request.transcriptPath,
        error: serializeError(error)
      });
      throw error;
    } finally {
      this.metrics.publishStoredMetrics();
    }
  }

  close(): Promise<void> {
    return this.coordinator.close();
  }

  private async loadChatLog(path: string): Promise<string | undefined> {
    try {
      const chatLog = await readFile(path, 'utf8');
      this.logger.info('Loaded chat log', { characters: chatLog.length });
      return chatLog;
    } catch (error) {
      this.logger.warn('Error loading chat log; continuing without it', {
        chatLogPath: path,
        error: serializeError(error)
      });
      return undefined;
    }
  }
}

export function createPipeline(
  config: AppConfig = loadConfig(),
  deps: PipelineDependencies = {}
): AnalysisPipeline {
  const logger = deps.logger ?? new Logger({ serviceName: config.appName, logLevel: config.logLevel });
  const metrics = deps.metrics ?? new Metrics({ namespace: config.appName, serviceName: config.appName });
  logger.appendKeys({ stage: config.stage });
  metrics.setDefaultDimensions({ stage: config.stage });
  const coreLogger = toCoreLogger(logger);

  if (config.mockOpenAi) {
    logger.warn('MOCK_OPENAI enabled; OpenAI API calls are disabled.');
  }
  const llm =
    deps.llm ??
    (config.mockOpenAi
      ? new OpenAiMockClient({ seed: config.openAiMockSeed })
      : new OpenAiLlmClient({
          apiKey: config.openAi.apiKey,
          model: config.openAi.model,
          rateLimitCooldownMs: config.llm.rateLimitCooldownMs,
          sleep: deps.sleep,
          logger: coreLogger
        }));

  const coordinator = new RequestCoordinator({
    llm: new InstrumentedLlmClient(llm, metrics, logger),
    tokensPerMinute: config.llm.tokensPerMinute,
    maxTokensPerCall: config.llm.maxTokensPerCall,
    chunkDelayBaseMs: config.llm.chunkDelayBaseMs,
    chunkDelayMsPerToken: config.llm.chunkDelayMsPerToken,
    defaultMaxOutputTokens: config.llm.maxOutputTokens,
    defaultTemperature: config.llm.temperature,
    clock: deps.clock,
    sleep: deps.sleep,
    logger: coreLogger
  });
  const analysis = new AnalysisService(
    coordinator,
    { typeDelayMs: config.analysisTypeDelayMs, sleep: deps.sleep },
    coreLogger
  );

  return new AnalysisPipeline(coordinator, analysis, logger, metrics);
}
