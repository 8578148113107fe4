const LOG_LEVELS = ['DEBUG', 'INFO', 'WARN', 'ERROR', 'SILENT'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  appName: string;
  stage: string;
  logLevel: LogLevel;
  mockOpenAi: boolean;
  openAiMockSeed: string;
  openAi: {
    apiKey?: string;
    model: string;
  };
  llm: {
    tokensPerMinute: number;
    maxTokensPerCall: number;
    maxOutputTokens: number;
    temperature: number;
    rateLimitCooldownMs: number;
    chunkDelayBaseMs: number;
    chunkDelayMsPerToken: number;
  };
  analysisTypeDelayMs: number;
}

let cachedConfig: AppConfig | undefined;

export function loadConfig(options: { forceRefresh?: boolean } = {}): AppConfig {
  if (!options.forceRefresh && cachedConfig) {
    return cachedConfig;
  }

  const appName = process.env.APP_NAME ?? 'session-insights';
  const stage = process.env.STAGE ?? 'dev';
  const logLevel = parseLogLevel(process.env.LOG_LEVEL ?? 'INFO');

  const mockOpenAi = (process.env.MOCK_OPENAI ?? 'false').toLowerCase() === 'true';
  const openAiKey = mockOpenAi ? process.env.OPENAI_API_KEY : requiredEnv('OPENAI_API_KEY');
  const openAiModel = process.env.OPENAI_MODEL ?? 'gpt-4o-mini';
  const openAiMockSeed = process.env.OPENAI_MOCK_SEED ?? 'session-insights';

  const tokensPerMinute = parsePositiveInt('LLM_TOKENS_PER_MINUTE', 30_000);
  const maxTokensPerCall = parsePositiveInt('LLM_MAX_TOKENS_PER_CALL', 15_000);
  if (maxTokensPerCall > tokensPerMinute) {
    throw new Error('LLM_MAX_TOKENS_PER_CALL must not exceed LLM_TOKENS_PER_MINUTE');
  }
  const maxOutputTokens = parsePositiveInt('LLM_MAX_OUTPUT_TOKENS', 4_000);
  if (maxOutputTokens >= maxTokensPerCall) {
    throw new Error('LLM_MAX_OUTPUT_TOKENS must be below LLM_MAX_TOKENS_PER_CALL');
  }

  const config: AppConfig = {
    appName,
    stage,
    logLevel,
    mockOpenAi,
    openAiMockSeed,
    openAi: {
      apiKey: openAiKey,
      model: openAiModel
    },
    llm: {
      tokensPerMinute,
      maxTokensPerCall,
      maxOutputTokens,
      temperature: parseNonNegativeNumber('LLM_TEMPERATURE', 0.2),
      rateLimitCooldownMs: parseNonNegativeNumber('LLM_RATE_LIMIT_COOLDOWN_MS', 30_000),
      chunkDelayBaseMs: parseNonNegativeNumber('LLM_CHUNK_DELAY_BASE_MS', 5_000),
      chunkDelayMsPerToken: parseNonNegativeNumber('LLM_CHUNK_DELAY_MS_PER_TOKEN', 0.1)
    },
    analysisTypeDelayMs: parseNonNegativeNumber('ANALYSIS_TYPE_DELAY_MS', 5_000)
  };

  cachedConfig = config;
  return config;
}

export function clearConfigCache(): void {
  cachedConfig = undefined;
}

function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value.toUpperCase());
  if (!level) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${value}"`);
  }
  return level;
}

function requiredEnv(name: string): string {
  const value = process.env[name];
  if (!value) {
    throw new Error(`${name} environment variable is required`);
  }
  return value;
}

function parsePositiveInt(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

function parseNonNegativeNumber(name: string, fallback: number): number {
  const value = process.env[name];
  if (!value) {
    return fallback;
  }

  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`${name} must be a non-negative number, got "${value}"`);
  }
  return parsed;
}
