import type { ParserConfig } from './config';
import { errorMessage, type Logger } from './logger';
import { HttpPageFetcher, RateLimiter, type PageFetcher } from './services/scraper-utils';

// ============================================
// BROWSER FALLBACK CONTRACT
// ============================================

/**
 * Anything that can open a page and reveal a hidden phone number.
 * Implemented by the playwright extractor, faked in tests.
 */
export interface PhoneRevealer {
  extractPhoneFromUrl(url: string): Promise<string | null>;
}

/**
 * A revealer that holds a resource for the length of a run.
 */
export interface ManagedPhoneRevealer extends PhoneRevealer {
  open(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Process-wide cap on browser phone lookups.
 */
export class PhoneLookupBudget {
  private used = 0;

  constructor(readonly limit: number) {}

  get attempts(): number {
    return this.used;
  }

  get exhausted(): boolean {
    return this.used >= this.limit;
  }

  tryConsume(): boolean {
    if (this.exhausted) return false;
    this.used++;
    return true;
  }
}

/**
 * Provisional ids for records created during the run.
 * Storage renumbers them against the persisted file on save.
 */
export class IdSequence {
  constructor(private nextId = 1) {}

  take(): number {
    return this.nextId++;
  }
}

export function formatRunDate(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
}

// ============================================
// PIPELINE CONTEXT
// ============================================

export interface RunStats {
  browserPhones: number;
}

export interface PipelineContextOptions {
  config: ParserConfig;
  logger: Logger;
  fetcher?: PageFetcher;
  revealer?: PhoneRevealer | null;
  rateLimiter?: RateLimiter;
  now?: Date;
}

/**
 * Everything one run shares: settings, logging, counters, network access.
 * Built once in the entry point and handed to every component.
 */
export class PipelineContext {
  readonly config: ParserConfig;
  readonly logger: Logger;
  readonly runDate: string;
  readonly ids = new IdSequence();
  readonly phoneBudget: PhoneLookupBudget;
  readonly rateLimiter: RateLimiter;
  readonly fetcher: PageFetcher;
  readonly stats: RunStats = { browserPhones: 0 };

  private revealer: PhoneRevealer | null;
  private abortRequested = false;
  private budgetReported = false;
  private readonly detailUrls = new Set<string>();

  constructor(options: PipelineContextOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.runDate = formatRunDate(options.now ?? new Date());
    this.phoneBudget = new PhoneLookupBudget(options.config.maxBrowserPhoneAttempts);
    this.rateLimiter = options.rateLimiter
      ?? new RateLimiter(options.config.delayMinMs, options.config.delayMaxMs);
    this.fetcher = options.fetcher ?? new HttpPageFetcher({
      rateLimiter: this.rateLimiter,
      logger: options.logger.child('http'),
      timeoutMs: options.config.requestTimeoutMs,
      retryAfter429Ms: options.config.delay429Ms,
    });
    this.revealer = options.revealer ?? null;
  }

  get aborted(): boolean {
    return this.abortRequested;
  }

  /**
   * Ask the pipeline to stop at the next page boundary.
   */
  abort(): void {
    this.abortRequested = true;
  }

  /**
   * True the first time a detail page URL is claimed in this run, false afterwards.
   */
  claimDetailUrl(url: string): boolean {
    if (this.detailUrls.has(url)) return false;
    this.detailUrls.add(url);
    return true;
  }

  get hasPhoneRevealer(): boolean {
    return this.revealer !== null;
  }

  setPhoneRevealer(revealer: PhoneRevealer | null): void {
    this.revealer = revealer;
  }

  /**
   * Browser phone lookup under the run-wide budget, after the usual randomized pause.
   * Never throws; every failure reads as "no phone".
   */
  async lookupPhoneInBrowser(url: string, logger: Logger = this.logger): Promise<string | null> {
    const revealer = this.revealer;
    if (!revealer || this.abortRequested) return null;

    if (!this.phoneBudget.tryConsume()) {
      if (!this.budgetReported) {
        this.budgetReported = true;
        logger.warn(`⚠️ Browser phone budget exhausted (${this.phoneBudget.limit}), skipping fallback for the rest of the run`);
      }
      return null;
    }

    await this.rateLimiter.delay();
    logger.debug(`🌐 Browser phone lookup ${this.phoneBudget.attempts}/${this.phoneBudget.limit}: ${url}`);

    try {
      const phone = await revealer.extractPhoneFromUrl(url);
      if (phone) {
        this.stats.browserPhones++;
        logger.info(`📞 Phone revealed in browser: ${phone}`);
      }
      return phone;
    } catch (error) {
      logger.warn(`⚠️ Browser phone lookup failed for ${url}: ${errorMessage(error)}`);
      return null;
    }
  }
}
