import { chromium, errors, type Browser, type BrowserContext, type Locator, type Page } from 'playwright-core';
import type { PhoneRevealer } from '../context';
import { errorMessage, type Logger } from '../logger';
import { extractPhone, normalizePhone } from './contact-extractor';
import { randomBetween, rotateUserAgent, sleep, type SleepFn } from './scraper-utils';

export interface BrowserPhoneOptions {
  headless: boolean;
  executablePath: string | null;
  pageLoadTimeoutMs: number;
  logger: Logger;
  sleepFn?: SleepFn;
}

// Ordered: explicit links and attributes first, then "show phone" buttons by text, test ids and classes
export const REVEAL_SELECTORS = [
  'a[href^="tel:"]',
  '[data-phone]',
  'button:text-matches("показать\\s+телефон", "i")',
  'a:text-matches("показать\\s+телефон", "i")',
  '[data-name="PhoneButton"]',
  '[data-testid*="phone"]',
  '.show-phone, .phone-button, .contact-phone',
  'button[class*="phone"], a[class*="phone"]',
];

const PHONE_ATTRIBUTES = ['data-phone', 'data-tel', 'data-telephone'];
const PHONE_TEXT_SELECTOR = '.phone, .tel, .telephone, [class*="phone"], [class*="tel"]';
const MAX_CANDIDATES_PER_SELECTOR = 5;

/**
 * What the phone scan reads from a rendered page.
 */
export interface PhoneScanTarget {
  telHrefs(): Promise<string[]>;
  attributeValues(attribute: string): Promise<string[]>;
  markup(): Promise<string>;
  phoneElementTexts(): Promise<string[]>;
}

/**
 * First usable candidate, trying REVEAL_SELECTORS in order and at most
 * five matches of each.
 */
export async function findRevealControl<T>(
  candidates: (selector: string) => Promise<T[]>,
  isUsable: (candidate: T) => Promise<boolean>
): Promise<T | null> {
  for (const selector of REVEAL_SELECTORS) {
    const matches = (await candidates(selector)).slice(0, MAX_CANDIDATES_PER_SELECTOR);
    for (const candidate of matches) {
      if (await isUsable(candidate)) return candidate;
    }
  }
  return null;
}

/**
 * tel: links, then phone data attributes, then the markup, then the text of
 * phone-like elements. Stops at the first normalised number.
 */
export async function scanForPhone(target: PhoneScanTarget): Promise<string | null> {
  for (const href of await target.telHrefs()) {
    const phone = normalizePhone(href.replace(/^tel:/i, ''));
    if (phone) return phone;
  }

  for (const attribute of PHONE_ATTRIBUTES) {
    for (const value of await target.attributeValues(attribute)) {
      const phone = normalizePhone(value);
      if (phone) return phone;
    }
  }

  const fromSource = extractPhone(await target.markup());
  if (fromSource) return fromSource;

  for (const text of await target.phoneElementTexts()) {
    const phone = extractPhone(text);
    if (phone) return phone;
  }

  return null;
}

async function attributeValues(page: Page, selector: string, attribute: string): Promise<string[]> {
  const values: string[] = [];
  for (const el of await page.locator(selector).all()) {
    values.push((await el.getAttribute(attribute)) ?? '');
  }
  return values;
}

function pageScanTarget(page: Page): PhoneScanTarget {
  return {
    telHrefs: () => attributeValues(page, 'a[href^="tel:"]', 'href'),
    attributeValues: attribute => attributeValues(page, `[${attribute}]`, attribute),
    markup: () => page.content(),
    phoneElementTexts: () => page.locator(PHONE_TEXT_SELECTOR).allInnerTexts(),
  };
}

/**
 * Headless Chromium that opens a detail page, clicks "show phone" and reads
 * the revealed number. One browser per run, one context per lookup.
 */
export class BrowserPhoneExtractor implements PhoneRevealer {
  private browser: Browser | null = null;
  private readonly sleepFn: SleepFn;

  constructor(private readonly options: BrowserPhoneOptions) {
    this.sleepFn = options.sleepFn ?? sleep;
  }

  get isOpen(): boolean {
    return this.browser !== null;
  }

  /**
   * Launch Chromium. False when it cannot start; the caller runs without the fallback.
   */
  async open(): Promise<boolean> {
    if (this.browser) return true;

    try {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath ?? undefined,
        args: [
          '--no-sandbox',
          '--disable-dev-shm-usage',
          '--disable-gpu',
          '--disable-blink-features=AutomationControlled'
        ]
      });
      this.options.logger.info(`🌐 Browser started (${this.options.headless ? 'headless' : 'visible'})`);
      return true;
    } catch (error) {
      this.options.logger.warn(`⚠️ Browser failed to start, phone fallback disabled: ${errorMessage(error)}`);
      this.browser = null;
      return false;
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    if (!browser) return;

    try {
      await browser.close();
      this.options.logger.info('🌐 Browser closed');
    } catch (error) {
      this.options.logger.warn(`⚠️ Browser close failed: ${errorMessage(error)}`);
    }
  }

  async extractPhoneFromUrl(url: string): Promise<string | null> {
    const browser = this.browser;
    if (!browser || !url) return null;

    const { logger } = this.options;
    let context: BrowserContext | null = null;
    try {
      context = await browser.newContext({ userAgent: rotateUserAgent(), locale: 'ru-RU' });
      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.pageLoadTimeoutMs });
      await this.sleepFn(randomBetween(2000, 4000));

      const control = await findRevealControl(
        async selector => page.locator(selector).all(),
        async candidate => await candidate.isVisible() && await candidate.isEnabled()
      );
      if (control) {
        await this.clickControl(control);
      } else {
        logger.debug(`No reveal control on ${url}`);
      }

      return await scanForPhone(pageScanTarget(page));
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        logger.debug(`⏱️ Timeout loading ${url}`);
      } else {
        logger.warn(`⚠️ Browser error on ${url}: ${errorMessage(error)}`);
      }
      return null;
    } finally {
      if (context) {
        await context.close().catch((error: unknown) => {
          logger.debug(`Context close failed: ${errorMessage(error)}`);
        });
      }
    }
  }

  private async clickControl(control: Locator): Promise<void> {
    await control.scrollIntoViewIfNeeded({ timeout: 2000 });
    await this.sleepFn(500);
    try {
      await control.click({ timeout: 3000 });
    } catch (error) {
      this.options.logger.debug(`Direct click failed, dispatching: ${errorMessage(error)}`);
      await control.dispatchEvent('click');
    }
    await this.sleepFn(1000);
  }
}
