import { LEAD_SCORE, type Village } from '@shared/schema';
import type { ManagedPhoneRevealer, PipelineContext } from './context';
import { errorMessage, type Logger } from './logger';
import type { IVillageStorage } from './storage';
import { mergeAll } from './services/duplicate-detector';
import { withLeadScore } from './services/lead-scorer';
import { AvitoScraper } from './services/scraper-avito';
import { CianScraper } from './services/scraper-cian';
import { CottageScraper } from './services/scraper-cottage';
import { DomclickScraper } from './services/scraper-domclick';
import { PoselkiScraper } from './services/scraper-poselki';
import { YandexScraper } from './services/scraper-yandex';
import { VillageEnricher } from './services/village-enricher';
import { isValidVillageName, isVillageUrl } from './services/village-validator';
import { isSourceId, type SourceId, type VillageSource } from './services/village-source';

export type SourceFactory = (ctx: PipelineContext) => VillageSource;

export const SOURCE_FACTORIES: Record<SourceId, SourceFactory> = {
  cian: ctx => new CianScraper(ctx),
  avito: ctx => new AvitoScraper(ctx),
  domclick: ctx => new DomclickScraper(ctx),
  yandex: ctx => new YandexScraper(ctx),
  cottage: ctx => new CottageScraper(ctx),
  poselki: ctx => new PoselkiScraper(ctx),
};

export interface PipelineRunOptions {
  sources: readonly string[];
  regions: readonly string[];
  maxPages: number;
}

export interface PipelineSummary {
  scraped: number;
  valid: number;
  merged: number;
  saved: number;
  browserPhones: number;
  withPhone: number;
  targets: number;
  interrupted: boolean;
}

export interface VillagePipelineOptions {
  storage: IVillageStorage;
  browser?: ManagedPhoneRevealer | null;
  sources?: Partial<Record<SourceId, SourceFactory>>;
}

export function isPersistable(village: Village): boolean {
  return isValidVillageName(village.name) && (!village.source_url || isVillageUrl(village.source_url));
}

/**
 * scrape → validate → enrich → merge → save, for the requested sources and regions.
 */
export class VillagePipeline {
  private readonly logger: Logger;
  private readonly factories: Partial<Record<SourceId, SourceFactory>>;

  constructor(private readonly ctx: PipelineContext, private readonly options: VillagePipelineOptions) {
    this.logger = ctx.logger.child('pipeline');
    this.factories = options.sources ?? SOURCE_FACTORIES;
  }

  async run(options: PipelineRunOptions): Promise<PipelineSummary> {
    const browser = this.options.browser ?? null;
    if (browser && await browser.open()) {
      this.ctx.setPhoneRevealer(browser);
    }

    try {
      return await this.execute(options);
    } finally {
      this.ctx.setPhoneRevealer(null);
      if (browser) await browser.close();
    }
  }

  private async execute(options: PipelineRunOptions): Promise<PipelineSummary> {
    const scraped = await this.scrapeAll(options);
    const valid = scraped.filter(isPersistable);
    this.logger.info(`📊 Records: ${scraped.length} scraped, ${valid.length} after validation`);

    await this.enrichAll(valid);

    const merged = mergeAll(valid);
    this.logger.info(`📊 After merge: ${merged.length}`);

    let saved: Village[] = [];
    if (merged.length > 0) {
      saved = await this.options.storage.save(merged);
    } else {
      this.logger.warn('⚠️ Nothing to save');
    }

    const scored = merged.map(withLeadScore);
    const summary: PipelineSummary = {
      scraped: scraped.length,
      valid: valid.length,
      merged: merged.length,
      saved: saved.length,
      browserPhones: this.ctx.stats.browserPhones,
      withPhone: scored.filter(v => Boolean(v.phone_primary)).length,
      targets: scored.filter(v => v.lead_score === LEAD_SCORE.target).length,
      interrupted: this.ctx.aborted,
    };

    this.logger.info(`📞 Phones: ${summary.withPhone}/${summary.merged} (browser: ${summary.browserPhones})`);
    this.logger.info(`🎯 Target villages: ${summary.targets}`);
    this.logger.info(`💾 Rows in file: ${summary.saved}`);
    return summary;
  }

  private async scrapeAll(options: PipelineRunOptions): Promise<Village[]> {
    const villages: Village[] = [];

    for (const name of options.sources) {
      if (this.ctx.aborted) break;

      const factory = isSourceId(name) ? this.factories[name] : undefined;
      if (!factory) {
        this.logger.debug(`Unknown source "${name}", skipped`);
        continue;
      }

      const source = factory(this.ctx);
      const regions: ReadonlyArray<string | null> = source.regional ? options.regions : [null];
      for (const region of regions) {
        if (this.ctx.aborted) break;
        try {
          villages.push(...await source.scrape(region, options.maxPages));
        } catch (error) {
          this.logger.error(`❌ Source ${name} failed: ${errorMessage(error)}`);
        }
      }
    }

    return villages;
  }

  private async enrichAll(villages: Village[]): Promise<void> {
    const enricher = new VillageEnricher(this.ctx);
    const pending = villages.filter(v => enricher.needsEnrichment(v));
    if (pending.length === 0) return;

    this.logger.info(`🔎 Enriching ${pending.length} villages from detail pages`);
    for (const village of pending) {
      if (this.ctx.aborted) {
        this.logger.warn('⏹️ Interrupted, skipping remaining enrichment');
        break;
      }
      await enricher.enrich(village);
    }
  }
}
