import { describe, it, expect } from 'vitest';
import { IdSequence, PhoneLookupBudget, formatRunDate, type PhoneRevealer } from '../context';
import { FakePhoneRevealer, createTestContext } from './fixtures';

const URL_A = 'https://www.cian.ru/kottedzhnye-poselki/a/';
const URL_B = 'https://www.cian.ru/kottedzhnye-poselki/b/';
const URL_C = 'https://www.cian.ru/kottedzhnye-poselki/c/';

describe('PhoneLookupBudget', () => {
  it('allows exactly `limit` lookups', () => {
    const budget = new PhoneLookupBudget(2);

    expect([budget.tryConsume(), budget.tryConsume(), budget.tryConsume()]).toEqual([true, true, false]);
    expect(budget.attempts).toBe(2);
    expect(budget.exhausted).toBe(true);
  });
});

describe('IdSequence and formatRunDate', () => {
  it('hands out increasing ids and local calendar dates', () => {
    const ids = new IdSequence();
    expect([ids.take(), ids.take(), ids.take()]).toEqual([1, 2, 3]);
    expect(formatRunDate(new Date(2024, 0, 5, 23, 59))).toBe('2024-01-05');
  });
});

describe('PipelineContext', () => {
  it('stamps the run date', () => {
    const { ctx } = createTestContext();
    expect(ctx.runDate).toBe('2024-05-20');
  });

  it('claims each detail url once', () => {
    const { ctx } = createTestContext();
    expect([ctx.claimDetailUrl(URL_A), ctx.claimDetailUrl(URL_A), ctx.claimDetailUrl(URL_B)]).toEqual([true, false, true]);
  });

  it('stops browser lookups once the budget is spent and says so once', async () => {
    const revealer = new FakePhoneRevealer({ [URL_A]: '+74951234567' });
    const { ctx, lines } = createTestContext({ revealer, config: { maxBrowserPhoneAttempts: 1 } });

    expect(await ctx.lookupPhoneInBrowser(URL_A)).toBe('+74951234567');
    expect(await ctx.lookupPhoneInBrowser(URL_B)).toBeNull();
    expect(await ctx.lookupPhoneInBrowser(URL_C)).toBeNull();

    expect(revealer.visited).toEqual([URL_A]);
    expect(ctx.stats.browserPhones).toBe(1);
    expect(lines.filter(l => l.level === 'warn')).toHaveLength(1);
  });

  it('reads a failing lookup as no phone', async () => {
    const failing: PhoneRevealer = {
      extractPhoneFromUrl: async () => {
        throw new Error('net::ERR_CONNECTION_RESET');
      },
    };
    const { ctx, lines } = createTestContext({ revealer: failing });

    expect(await ctx.lookupPhoneInBrowser(URL_A)).toBeNull();
    expect(lines.some(l => l.level === 'warn' && l.line.endsWith(
      `⚠️ Browser phone lookup failed for ${URL_A}: net::ERR_CONNECTION_RESET`
    ))).toBe(true);
  });

  it('skips the browser without a revealer or after an abort', async () => {
    const revealer = new FakePhoneRevealer({ [URL_A]: '+74951234567' });
    const { ctx } = createTestContext();

    expect(await ctx.lookupPhoneInBrowser(URL_A)).toBeNull();

    ctx.setPhoneRevealer(revealer);
    ctx.abort();
    expect(await ctx.lookupPhoneInBrowser(URL_A)).toBeNull();
    expect(revealer.visited).toEqual([]);
    expect(ctx.phoneBudget.attempts).toBe(0);
  });
});
