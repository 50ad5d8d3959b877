/**
 * Environment variable handling with validation
 * API keys are never logged or exposed
 */

export type LlmProvider = 'openai' | 'anthropic';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';
export type NodeEnv = 'development' | 'production' | 'test';

export interface EnvConfig {
  enableLlm: boolean;
  llmProvider: LlmProvider | null;
  llmModel: string | null;
  openaiApiKey: string | null;
  anthropicApiKey: string | null;
  fredApiKey: string | null;
  tavilyApiKey: string | null;
  logLevel: LogLevel;
  nodeEnv: NodeEnv;
}

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];
const NODE_ENVS: readonly NodeEnv[] = ['development', 'production', 'test'];

function getEnvVar(name: string): string | undefined {
  const value = process.env[name];
  return value && value.trim() !== '' ? value.trim() : undefined;
}

function requireEnvVar(name: string): string {
  const value = getEnvVar(name);
  if (!value) {
    throw new Error(`Missing required environment variable: ${name}`);
  }
  return value;
}

function isOneOf<T extends string>(options: readonly T[], value: string): value is T {
  return options.some((option) => option === value);
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = value?.trim().toLowerCase();
  return level !== undefined && isOneOf(LOG_LEVELS, level) ? level : 'info';
}

export function loadEnvConfig(): EnvConfig {
  const enableLlm = getEnvVar('ENABLE_LLM') === 'true';
  const llmProviderRaw = getEnvVar('LLM_PROVIDER');
  const llmProvider: LlmProvider | null =
    llmProviderRaw === 'openai' || llmProviderRaw === 'anthropic' ? llmProviderRaw : null;

  const logLevel = parseLogLevel(getEnvVar('LOG_LEVEL'));

  const nodeEnvRaw = getEnvVar('NODE_ENV') ?? 'development';
  const nodeEnv: NodeEnv = isOneOf(NODE_ENVS, nodeEnvRaw) ? nodeEnvRaw : 'development';

  return {
    enableLlm,
    llmProvider,
    llmModel: getEnvVar('LLM_MODEL') ?? null,
    openaiApiKey: enableLlm && llmProvider === 'openai' ? requireEnvVar('OPENAI_API_KEY') : null,
    anthropicApiKey: enableLlm && llmProvider === 'anthropic' ? requireEnvVar('ANTHROPIC_API_KEY') : null,
    fredApiKey: getEnvVar('FRED_API_KEY') ?? null,
    tavilyApiKey: getEnvVar('TAVILY_API_KEY') ?? null,
    logLevel,
    nodeEnv,
  };
}

let cachedConfig: EnvConfig | null = null;

export function getEnvConfig(): EnvConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvConfig();
  }
  return cachedConfig;
}

export function resetEnvConfig(): void {
  cachedConfig = null;
}
