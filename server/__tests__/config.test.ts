import { describe, it, expect } from 'vitest';
import { DEFAULT_OUTPUT_CSV, loadConfig } from '../config';
import { applyCliOverrides, parseCliOptions } from '../cli';

describe('loadConfig', () => {
  it('falls back to defaults for unset and empty variables', () => {
    const config = loadConfig({ LOG_LEVEL: '', OUTPUT_CSV: '' });

    expect(config).toEqual({
      outputCsv: DEFAULT_OUTPUT_CSV,
      logFile: 'parsing.log',
      logLevel: 'info',
      delayMinMs: 2000,
      delayMaxMs: 7000,
      delay429Ms: 25000,
      requestTimeoutMs: 30000,
      pageLoadTimeoutMs: 20000,
      maxBrowserPhoneAttempts: 60,
      chromiumPath: null,
      useBrowser: true,
      browserHeadless: true,
    });
  });

  it('reads numbers and paths from the environment', () => {
    const config = loadConfig({
      DELAY_MIN_MS: '100',
      DELAY_MAX_MS: '200',
      MAX_BROWSER_PHONE_ATTEMPTS: '5',
      CHROMIUM_PATH: '/usr/bin/chromium',
      LOG_LEVEL: 'debug',
    });

    expect(config).toMatchObject({
      delayMinMs: 100,
      delayMaxMs: 200,
      maxBrowserPhoneAttempts: 5,
      chromiumPath: '/usr/bin/chromium',
      logLevel: 'debug',
    });
  });

  it('rejects an inverted delay range and unknown log levels', () => {
    expect(() => loadConfig({ DELAY_MIN_MS: '500', DELAY_MAX_MS: '100' }))
      .toThrow('DELAY_MAX_MS (100) must not be below DELAY_MIN_MS (500)');
    expect(() => loadConfig({ LOG_LEVEL: 'verbose' })).toThrow();
    expect(() => loadConfig({ DELAY_MIN_MS: 'soon' })).toThrow();
  });
});

describe('parseCliOptions', () => {
  it('defaults to three pages of the Moscow-region Cian catalogue with the browser on', () => {
    expect(parseCliOptions(['node', 'index.ts'])).toEqual({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 3,
      selenium: true,
      seleniumVisible: false,
    });
  });

  it('reads sources, pages and overrides', () => {
    const cli = parseCliOptions([
      'node', 'index.ts',
      '-s', 'cottage', 'poselki',
      '-p', '2',
      '--no-selenium',
      '-o', 'leads.csv',
      '--log-file', 'run.log',
    ]);

    expect(cli).toEqual({
      sources: ['cottage', 'poselki'],
      regions: ['moskovskaya-oblast'],
      maxPages: 2,
      selenium: false,
      seleniumVisible: false,
      output: 'leads.csv',
      logFile: 'run.log',
    });

    const config = applyCliOverrides(loadConfig({}), cli);
    expect(config).toMatchObject({ outputCsv: 'leads.csv', logFile: 'run.log', useBrowser: false });
  });

  it('shows the browser window on request', () => {
    const cli = parseCliOptions(['node', 'index.ts', '--selenium-visible']);
    expect(applyCliOverrides(loadConfig({}), cli).browserHeadless).toBe(false);
  });

  it('rejects a non-positive page count', () => {
    expect(() => parseCliOptions(['node', 'index.ts', '-p', '0'])).toThrow();
  });
});
