import { load, type Cheerio, type CheerioAPI } from 'cheerio';
import { isTag, type Element } from 'domhandler';
import type { Village } from '@shared/schema';
import type { PipelineContext } from '../context';
import { errorMessage, type Logger } from '../logger';
import { VillageCardParser, toFragment, type SiteProfile } from './village-card-parser';

export const SOURCE_IDS = ['cian', 'avito', 'domclick', 'yandex', 'cottage', 'poselki'] as const;
export type SourceId = (typeof SOURCE_IDS)[number];

export function isSourceId(value: string): value is SourceId {
  return (SOURCE_IDS as readonly string[]).includes(value);
}

/**
 * A listing site the pipeline can scrape. Regional sources run once per requested region.
 */
export interface VillageSource {
  readonly id: SourceId;
  readonly regional: boolean;
  scrape(region: string | null, maxPages: number): Promise<Village[]>;
}

export interface ListingSite extends SiteProfile {
  id: SourceId;
  regional: boolean;
  pageUrl(region: string | null, page: number): string;
  /** Tried in order, the first selector with hits wins */
  cardSelectors: readonly string[];
  /** Fallback: article/div elements whose class looks like a card */
  cardClassPattern: RegExp;
}

/**
 * Keeps the outermost elements only, nested card-like wrappers collapse into their container.
 */
export function outermost($: CheerioAPI, elements: Element[]): Cheerio<Element>[] {
  const set = new Set(elements);
  return elements
    .filter(el => !$(el).parents().toArray().some(parent => set.has(parent)))
    .map(el => $(el));
}

/**
 * Paginated catalogue of village cards: fetch page, find cards, parse each.
 */
export class ListingCardSource implements VillageSource {
  readonly id: SourceId;
  readonly regional: boolean;
  protected readonly logger: Logger;
  protected readonly parser: VillageCardParser;

  constructor(protected readonly ctx: PipelineContext, protected readonly site: ListingSite) {
    this.id = site.id;
    this.regional = site.regional;
    this.logger = ctx.logger.child(site.id);
    this.parser = new VillageCardParser(ctx, site, this.logger);
  }

  async scrape(region: string | null, maxPages: number): Promise<Village[]> {
    const villages: Village[] = [];
    this.logger.info(`🚀 ${this.site.sourceName}: region=${region ?? '-'}, up to ${maxPages} pages`);

    for (let page = 1; page <= maxPages; page++) {
      if (this.ctx.aborted) {
        this.logger.warn('⏹️ Interrupted, stopping pagination');
        break;
      }

      const url = this.site.pageUrl(region, page);
      this.logger.info(`📄 Page ${page}/${maxPages}: ${url}`);

      let html: string;
      try {
        html = await this.ctx.fetcher.fetchHtml(url);
      } catch (error) {
        this.logger.error(`❌ Page ${page} failed: ${errorMessage(error)}`);
        continue;
      }

      const $ = load(html);
      const cards = this.findCards($);
      if (cards.length === 0) {
        this.logger.warn(`⚠️ No cards on page ${page}, stopping`);
        break;
      }

      let valid = 0;
      for (const card of cards) {
        const village = await this.parser.parseCard(toFragment($, card), url);
        if (village) {
          villages.push(village);
          valid++;
        }
      }
      this.logger.info(`✅ Page ${page}: ${valid}/${cards.length} cards kept`);

      if (valid === 0 && page > 1) {
        this.logger.info('🛑 No valid villages on this page, stopping');
        break;
      }
    }

    this.logger.info(`🏁 ${this.site.sourceName}: ${villages.length} villages`);
    return villages;
  }

  findCards($: CheerioAPI): Cheerio<Element>[] {
    for (const selector of this.site.cardSelectors) {
      const hits = $(selector).toArray().filter(isTag);
      if (hits.length > 0) return outermost($, hits);
    }

    const classed = $('article[class], div[class]').toArray()
      .filter(el => this.site.cardClassPattern.test($(el).attr('class') ?? ''));
    if (classed.length > 0) return outermost($, classed);

    const linkParents = $('a[href]').toArray()
      .filter(el => this.site.villageLinkPattern.test($(el).attr('href') ?? ''))
      .flatMap(el => $(el).parent().toArray().filter(isTag));
    return outermost($, [...new Set(linkParents)]);
  }
}
