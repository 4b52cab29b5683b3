import { describe, it, expect } from 'vitest';
import { LEAD_SCORE, VILLAGE_STATUS, type Village } from '@shared/schema';
import type { ManagedPhoneRevealer } from '../context';
import { VillagePipeline, isPersistable } from '../pipeline';
import type { IVillageStorage, SaveOptions } from '../storage';
import type { SourceId, VillageSource } from '../services/village-source';
import { createTestContext, makeVillage } from './fixtures';

class FakeSource implements VillageSource {
  readonly calls: Array<string | null> = [];

  constructor(
    readonly id: SourceId,
    readonly regional: boolean,
    private readonly results: (region: string | null) => Village[]
  ) {}

  async scrape(region: string | null): Promise<Village[]> {
    this.calls.push(region);
    return this.results(region);
  }
}

class MemoryStorage implements IVillageStorage {
  readonly batches: Village[][] = [];

  async load(): Promise<Village[]> {
    return this.batches.flat();
  }

  async save(villages: readonly Village[], _options?: SaveOptions): Promise<Village[]> {
    this.batches.push([...villages]);
    return [...villages];
  }
}

class FakeBrowser implements ManagedPhoneRevealer {
  opened = false;
  closed = false;

  constructor(private readonly starts: boolean) {}

  async open(): Promise<boolean> {
    this.opened = true;
    return this.starts;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  async extractPhoneFromUrl(): Promise<string | null> {
    return null;
  }
}

const bor = makeVillage({
  id: 1,
  name: 'Сосновый Бор',
  house_count: 120,
  has_fence: 'Да',
  has_checkpoint: 'Да',
  has_security: 'Да',
  status: VILLAGE_STATUS.built,
  phone_primary: '+74951112233',
});

describe('isPersistable', () => {
  it('needs a valid name and, when present, a village url', () => {
    expect(isPersistable(bor)).toBe(true);
    expect(isPersistable({ ...bor, name: 'Подробнее' })).toBe(false);
    expect(isPersistable({ ...bor, source_url: 'https://www.cian.ru/sale/flat/1/' })).toBe(false);
  });
});

describe('VillagePipeline', () => {
  it('scrapes every region of regional sources, validates, merges and saves', async () => {
    const { ctx, lines } = createTestContext();
    const cian = new FakeSource('cian', true, region =>
      region === 'moskovskaya-oblast'
        ? [bor]
        : [{ ...bor, id: 2, phone_primary: null }, makeVillage({ id: 3, name: 'Подробнее' })]
    );
    const cottage = new FakeSource('cottage', false, () => {
      throw new Error('layout changed');
    });
    const storage = new MemoryStorage();

    const summary = await new VillagePipeline(ctx, { storage, sources: { cian: () => cian, cottage: () => cottage } }).run({
      sources: ['cian', 'nowhere', 'cottage'],
      regions: ['moskovskaya-oblast', 'leningradskaya-oblast'],
      maxPages: 1,
    });

    expect(cian.calls).toEqual(['moskovskaya-oblast', 'leningradskaya-oblast']);
    expect(cottage.calls).toEqual([null]);
    expect(storage.batches).toHaveLength(1);
    expect(storage.batches[0].map(v => [v.id, v.name, v.phone_primary])).toEqual([[1, 'Сосновый Бор', '+74951112233']]);
    expect(summary).toEqual({
      scraped: 3,
      valid: 2,
      merged: 1,
      saved: 1,
      browserPhones: 0,
      withPhone: 1,
      targets: 1,
      interrupted: false,
    });
    expect(lines.some(l => l.level === 'error' && l.line.endsWith('[pipeline] ❌ Source cottage failed: layout changed'))).toBe(true);
    expect(lines.some(l => l.level === 'debug' && l.line.endsWith('Unknown source "nowhere", skipped'))).toBe(true);
  });

  it('saves nothing when no village survives', async () => {
    const { ctx } = createTestContext();
    const storage = new MemoryStorage();
    const cian = new FakeSource('cian', true, () => []);

    const summary = await new VillagePipeline(ctx, { storage, sources: { cian: () => cian } }).run({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 1,
    });

    expect(storage.batches).toEqual([]);
    expect(summary.saved).toBe(0);
  });

  it('hands the browser to the context for the run and closes it', async () => {
    const { ctx } = createTestContext();
    const browser = new FakeBrowser(true);
    let revealerDuringRun = false;
    const cian = new FakeSource('cian', true, () => {
      revealerDuringRun = ctx.hasPhoneRevealer;
      return [];
    });

    await new VillagePipeline(ctx, { storage: new MemoryStorage(), browser, sources: { cian: () => cian } }).run({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 1,
    });

    expect(revealerDuringRun).toBe(true);
    expect(ctx.hasPhoneRevealer).toBe(false);
    expect(browser.closed).toBe(true);
  });

  it('runs without the fallback when the browser does not start', async () => {
    const { ctx } = createTestContext();
    const browser = new FakeBrowser(false);
    let revealerDuringRun = true;
    const cian = new FakeSource('cian', true, () => {
      revealerDuringRun = ctx.hasPhoneRevealer;
      return [bor];
    });
    const storage = new MemoryStorage();

    const summary = await new VillagePipeline(ctx, { storage, browser, sources: { cian: () => cian } }).run({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 1,
    });

    expect(browser.opened).toBe(true);
    expect(revealerDuringRun).toBe(false);
    expect(summary.saved).toBe(1);
  });

  it('stops before scraping once interrupted and reports it', async () => {
    const { ctx } = createTestContext();
    const cian = new FakeSource('cian', true, () => [bor]);
    ctx.abort();

    const summary = await new VillagePipeline(ctx, { storage: new MemoryStorage(), sources: { cian: () => cian } }).run({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 1,
    });

    expect(cian.calls).toEqual([]);
    expect(summary.interrupted).toBe(true);
    expect(summary.scraped).toBe(0);
  });

  it('scores the merged records before counting targets', async () => {
    const { ctx } = createTestContext();
    const weak = makeVillage({ name: 'Лесные Дали', house_count: 5 });
    const cian = new FakeSource('cian', true, () => [weak]);

    const summary = await new VillagePipeline(ctx, { storage: new MemoryStorage(), sources: { cian: () => cian } }).run({
      sources: ['cian'],
      regions: ['moskovskaya-oblast'],
      maxPages: 1,
    });

    expect(weak.lead_score).toBe(LEAD_SCORE.needsReview);
    expect(summary.targets).toBe(0);
  });
});
