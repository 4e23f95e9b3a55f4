/**
 * Environment configuration
 */
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { formatIssues } from '../spec/schema';
import { LoggerFactory } from '../logging/logger';

const EnvSchema = z.object({
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_FILE: z.string().optional(),
  INITIAL_CAPITAL: z.coerce.number().finite().positive().default(10000),
  TRANSLATOR_API_KEY: z.string().optional(),
  GROQ_API_KEY: z.string().optional(),
  TRANSLATOR_BASE_URL: z.string().url().default('https://api.groq.com/openai/v1'),
  TRANSLATOR_MODEL: z.string().default('openai/gpt-oss-120b'),
  TRANSLATOR_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),
  TRANSLATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(60000),
});

export interface TranslatorConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  temperature: number;
  timeoutMs: number;
}

export interface AppConfig {
  logLevel: 'error' | 'warn' | 'info' | 'debug';
  logFile?: string;
  initialCapital: number;
  translator: TranslatorConfig;
}

/**
 * Load .env into process.env (existing variables win)
 */
export function loadEnvFile(path?: string): void {
  dotenv.config(path ? { path } : undefined);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and blank are the same thing
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  return {
    logLevel: vars.LOG_LEVEL,
    logFile: vars.LOG_FILE,
    initialCapital: vars.INITIAL_CAPITAL,
    translator: {
      apiKey: vars.TRANSLATOR_API_KEY ?? vars.GROQ_API_KEY,
      baseUrl: vars.TRANSLATOR_BASE_URL,
      model: vars.TRANSLATOR_MODEL,
      temperature: vars.TRANSLATOR_TEMPERATURE,
      timeoutMs: vars.TRANSLATOR_TIMEOUT_MS,
    },
  };
}

export function configureLogging(config: AppConfig): void {
  LoggerFactory.configure({
    logLevel: config.logLevel,
    enableFile: config.logFile !== undefined,
    logFilePath: config.logFile,
  });
}
