import { z } from 'zod';
import type { LogLevel } from './logger';

export const DEFAULT_OUTPUT_CSV = 'Результат парсинга информации в интернете.csv';

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  OUTPUT_CSV: z.string().min(1).default(DEFAULT_OUTPUT_CSV),
  LOG_FILE: z.string().min(1).default('parsing.log'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  DELAY_MIN_MS: intFromEnv(2000),
  DELAY_MAX_MS: intFromEnv(7000),
  DELAY_429_MS: intFromEnv(25000),
  REQUEST_TIMEOUT_MS: intFromEnv(30000),
  PAGE_LOAD_TIMEOUT_MS: intFromEnv(20000),
  MAX_BROWSER_PHONE_ATTEMPTS: intFromEnv(60),
  CHROMIUM_PATH: z.string().min(1).optional(),
});

export interface ParserConfig {
  outputCsv: string;
  logFile: string;
  logLevel: LogLevel;
  delayMinMs: number;
  delayMaxMs: number;
  delay429Ms: number;
  requestTimeoutMs: number;
  pageLoadTimeoutMs: number;
  maxBrowserPhoneAttempts: number;
  chromiumPath: string | null;
  useBrowser: boolean;
  browserHeadless: boolean;
}

/**
 * Reads parser settings from the environment. Empty variables count as unset.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ParserConfig {
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = envSchema.parse(cleaned);

  if (parsed.DELAY_MAX_MS < parsed.DELAY_MIN_MS) {
    throw new Error(`DELAY_MAX_MS (${parsed.DELAY_MAX_MS}) must not be below DELAY_MIN_MS (${parsed.DELAY_MIN_MS})`);
  }

  return {
    outputCsv: parsed.OUTPUT_CSV,
    logFile: parsed.LOG_FILE,
    logLevel: parsed.LOG_LEVEL,
    delayMinMs: parsed.DELAY_MIN_MS,
    delayMaxMs: parsed.DELAY_MAX_MS,
    delay429Ms: parsed.DELAY_429_MS,
    requestTimeoutMs: parsed.REQUEST_TIMEOUT_MS,
    pageLoadTimeoutMs: parsed.PAGE_LOAD_TIMEOUT_MS,
    maxBrowserPhoneAttempts: parsed.MAX_BROWSER_PHONE_ATTEMPTS,
    chromiumPath: parsed.CHROMIUM_PATH ?? null,
    useBrowser: true,
    browserHeadless: true,
  };
}
