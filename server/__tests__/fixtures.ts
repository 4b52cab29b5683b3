import { createEmptyVillage, type Village } from '@shared/schema';
import type { ParserConfig } from '../config';
import { PipelineContext, type PhoneRevealer } from '../context';
import { RunLogger, type LogLevel } from '../logger';
import { RateLimiter, type PageFetcher } from '../services/scraper-utils';

export const RUN_DATE = '2024-05-20';
export const RUN_NOW = new Date(2024, 4, 20, 12, 0, 0);

export interface CapturedLogger {
  logger: RunLogger;
  lines: Array<{ level: LogLevel; line: string }>;
}

export function captureLogger(level: LogLevel = 'debug'): CapturedLogger {
  const lines: CapturedLogger['lines'] = [];
  const logger = new RunLogger('test', level, (lvl, line) => lines.push({ level: lvl, line }), null);
  return { logger, lines };
}

export function testConfig(overrides: Partial<ParserConfig> = {}): ParserConfig {
  return {
    outputCsv: 'villages.csv',
    logFile: 'parsing.log',
    logLevel: 'debug',
    delayMinMs: 0,
    delayMaxMs: 0,
    delay429Ms: 0,
    requestTimeoutMs: 1000,
    pageLoadTimeoutMs: 1000,
    maxBrowserPhoneAttempts: 60,
    chromiumPath: null,
    useBrowser: false,
    browserHeadless: true,
    ...overrides,
  };
}

/**
 * Serves canned HTML by exact URL; anything else is a 404-like failure.
 */
export class FakePageFetcher implements PageFetcher {
  readonly requested: string[] = [];

  constructor(private readonly pages: Record<string, string | Error> = {}) {}

  async fetchHtml(url: string): Promise<string> {
    this.requested.push(url);
    const page = this.pages[url];
    if (page === undefined) throw new Error(`HTTP 404 for ${url}`);
    if (page instanceof Error) throw page;
    return page;
  }
}

export class FakePhoneRevealer implements PhoneRevealer {
  readonly visited: string[] = [];

  constructor(private readonly phones: Record<string, string> = {}) {}

  async extractPhoneFromUrl(url: string): Promise<string | null> {
    this.visited.push(url);
    return this.phones[url] ?? null;
  }
}

export interface TestContextOptions {
  pages?: Record<string, string | Error>;
  revealer?: PhoneRevealer | null;
  config?: Partial<ParserConfig>;
}

export function createTestContext(options: TestContextOptions = {}) {
  const { logger, lines } = captureLogger();
  const fetcher = new FakePageFetcher(options.pages);
  const ctx = new PipelineContext({
    config: testConfig(options.config),
    logger,
    fetcher,
    revealer: options.revealer ?? null,
    rateLimiter: new RateLimiter(0, 0, async () => {}),
    now: RUN_NOW,
  });
  return { ctx, fetcher, lines };
}

export function makeVillage(overrides: Partial<Village> = {}): Village {
  return {
    ...createEmptyVillage({ sourceName: 'Cian.ru', runDate: RUN_DATE }),
    ...overrides,
  };
}
