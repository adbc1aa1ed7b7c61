import { LLMProviders, type DecisionTable, type LogLevel } from '../types.js';
import { DEFAULT_DECISION_TABLE } from '../rules/default-table.js';
import { loadDecisionTableFile } from '../rules/table.js';
import { isLogLevel } from './logger.js';

export interface EngineConfig {
  provider: LLMProviders;
  apiKey: string;
  logLevel: LogLevel;
  decisionTablePath?: string;
}

type Env = Record<string, string | undefined>;

/**
 * Read configuration from environment variables. Unknown provider or level
 * values fall back to the defaults.
 */
export function configFromEnv(env: Env): EngineConfig {
  const provider = Object.values(LLMProviders).find((p) => p === env.PAYOUT_LLM_PROVIDER);
  const level = env.PAYOUT_LOG_LEVEL?.toLowerCase() ?? '';

  return {
    provider: provider ?? LLMProviders.openai_gpt4o,
    apiKey: env.PAYOUT_LLM_API_KEY || '',
    logLevel: isLogLevel(level) ? level : 'info',
    decisionTablePath: env.PAYOUT_DECISION_TABLE || undefined,
  };
}

/**
 * Default configuration from environment variables
 */
export const DEFAULT_CONFIG: EngineConfig = configFromEnv(process.env);

/**
 * Merges provided config with defaults. Keys set to `undefined` keep the default.
 */
export function getConfig(config: Partial<EngineConfig> = {}, base: EngineConfig = DEFAULT_CONFIG): EngineConfig {
  return {
    provider: config.provider ?? base.provider,
    apiKey: config.apiKey ?? base.apiKey,
    logLevel: config.logLevel ?? base.logLevel,
    decisionTablePath: config.decisionTablePath ?? base.decisionTablePath,
  };
}

/**
 * The configured table file, or the built-in table when none is set.
 */
export function loadTableFromConfig(config: EngineConfig): DecisionTable {
  return config.decisionTablePath
    ? loadDecisionTableFile(config.decisionTablePath)
    : DEFAULT_DECISION_TABLE;
}
