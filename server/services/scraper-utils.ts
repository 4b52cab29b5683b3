/**
 * Shared Scraper Utilities
 * Common plumbing used by every village source
 */

import axios, { type AxiosInstance } from 'axios';
import type { Logger } from '../logger';

// ============================================
// DELAY & JITTER UTILITIES
// ============================================

export type SleepFn = (ms: number) => Promise<void>;

export function sleep(ms: number): Promise<void> {
  return new Promise(r => setTimeout(r, ms));
}

export function randomBetween(min: number, max: number): number {
  return min + Math.floor(Math.random() * (max - min + 1));
}

/**
 * Randomized pause before every network operation.
 */
export class RateLimiter {
  constructor(
    private readonly minMs: number,
    private readonly maxMs: number,
    private readonly sleepFn: SleepFn = sleep
  ) {}

  delay(): Promise<void> {
    return this.sleepFn(randomBetween(this.minMs, this.maxMs));
  }

  pause(ms: number): Promise<void> {
    return this.sleepFn(ms);
  }
}

// ============================================
// USER-AGENT ROTATION
// ============================================

export const DEFAULT_USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64; rv:121.0) Gecko/20100101 Firefox/121.0',
];

export function rotateUserAgent(userAgents: string[] = DEFAULT_USER_AGENTS): string {
  return userAgents[Math.floor(Math.random() * userAgents.length)];
}

// ============================================
// PAGE FETCHING
// ============================================

export interface PageFetcher {
  fetchHtml(url: string): Promise<string>;
}

export class HttpStatusError extends Error {
  constructor(public readonly url: string, public readonly status: number) {
    super(`HTTP ${status} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

export interface HttpPageFetcherOptions {
  rateLimiter: RateLimiter;
  logger: Logger;
  timeoutMs: number;
  retryAfter429Ms: number;
  axiosInstance?: AxiosInstance;
}

/**
 * Plain HTTP fetch with browser-like headers. Every request is preceded by the
 * rate limiter's pause; a 429 gets exactly one more attempt after a long pause.
 */
export class HttpPageFetcher implements PageFetcher {
  private readonly axiosInstance: AxiosInstance;

  constructor(private readonly options: HttpPageFetcherOptions) {
    this.axiosInstance = options.axiosInstance ?? axios.create({
      timeout: options.timeoutMs,
      maxRedirects: 5,
      responseType: 'text',
      headers: {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': 'ru-RU,ru;q=0.9,en-US;q=0.8,en;q=0.7',
        'Accept-Encoding': 'gzip, deflate, br',
        'Connection': 'keep-alive',
        'Upgrade-Insecure-Requests': '1'
      }
    });
  }

  async fetchHtml(url: string): Promise<string> {
    await this.options.rateLimiter.delay();

    let status = await this.request(url);
    if (status.code === 429) {
      this.options.logger.warn(`🚫 429 for ${url}, pausing ${Math.round(this.options.retryAfter429Ms / 1000)}s`);
      await this.options.rateLimiter.pause(this.options.retryAfter429Ms);
      status = await this.request(url);
    }

    if (status.code < 200 || status.code >= 300) {
      throw new HttpStatusError(url, status.code);
    }
    return status.body;
  }

  private async request(url: string): Promise<{ code: number; body: string }> {
    const response = await this.axiosInstance.get<unknown>(url, {
      headers: { 'User-Agent': rotateUserAgent() },
      validateStatus: () => true
    });
    const body = typeof response.data === 'string' ? response.data : '';
    return { code: response.status, body };
  }
}

// ============================================
// URL HELPERS
// ============================================

/**
 * Resolves card links against the site base. Bare relative paths ("foo/bar")
 * are treated as rooted, protocol-relative ones get https.
 */
export function resolveUrl(href: string, base: string): string | null {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#') || /^(?:javascript|mailto|tel):/i.test(trimmed)) {
    return null;
  }

  let candidate = trimmed;
  if (candidate.startsWith('//')) {
    candidate = 'https:' + candidate;
  } else if (!/^https?:\/\//i.test(candidate) && !candidate.startsWith('/')) {
    candidate = '/' + candidate;
  }

  try {
    return new URL(candidate, base).toString();
  } catch {
    return null;
  }
}

export function hostnameOf(url: string): string | null {
  try {
    return new URL(url).hostname.replace(/^www\./, '');
  } catch {
    return null;
  }
}

// ============================================
// STRATEGY CASCADE
// ============================================

export type Strategy<I, T> = (input: I) => T | null;

/**
 * Runs strategies in order, first non-null result wins.
 */
export function firstMatch<I, T>(strategies: ReadonlyArray<Strategy<I, T>>, input: I): T | null {
  for (const strategy of strategies) {
    const value = strategy(input);
    if (value !== null) return value;
  }
  return null;
}
