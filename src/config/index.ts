/**
 * Application configuration, read from the environment once at startup.
 * Blank variables count as unset.
 */
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { DEFAULT_MODELS, PROVIDERS, type ProviderName } from '../providers/base.js';
import { LOG_LEVELS, type LogLevel } from '../telemetry/logger.js';

export interface AppConfig {
  provider: ProviderName;
  apiKey: string;
  baseUrl?: string;
  model: string;
  temperature: number;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

const API_KEY_VARS: Record<ProviderName, 'OPENAI_API_KEY' | 'ANTHROPIC_API_KEY'> = {
  openai: 'OPENAI_API_KEY',
  anthropic: 'ANTHROPIC_API_KEY',
};

const EnvSchema = z.object({
  COMPLETION_PROVIDER: z.enum(PROVIDERS).default('openai'),
  OPENAI_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  COMPLETION_BASE_URL: z.string().url().optional(),
  COMPLETION_MODEL: z.string().optional(),
  COMPLETION_TEMPERATURE: z.coerce.number().min(0).max(1).default(0),
  REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
});

function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value.trim();
    }
  }
  return result;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const details = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment: ${details}`);
  }

  const vars = parsed.data;
  const provider = vars.COMPLETION_PROVIDER;
  const keyVar = API_KEY_VARS[provider];
  const apiKey = vars[keyVar];
  if (!apiKey) {
    throw new ConfigurationError(`${keyVar} is not set`);
  }

  return {
    provider,
    apiKey,
    baseUrl: vars.COMPLETION_BASE_URL,
    model: vars.COMPLETION_MODEL ?? DEFAULT_MODELS[provider],
    temperature: vars.COMPLETION_TEMPERATURE,
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
  };
}
