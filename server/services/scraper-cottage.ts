import { load } from 'cheerio';
import type { Village } from '@shared/schema';
import type { PipelineContext } from '../context';
import { errorMessage, type Logger } from '../logger';
import { resolveUrl } from './scraper-utils';
import { MOSCOW_REGION } from './village-heuristics';
import { VillageCardParser, toFragment, type SiteProfile } from './village-card-parser';
import type { VillageSource } from './village-source';

export const COTTAGE_CATALOGUE_URL = 'https://www.cottage.ru/objects/village/';

const VILLAGE_LINK = /\/objects\/village\/[^/]+\.html/;

export const COTTAGE_SITE: SiteProfile = {
  sourceName: 'Cottage.ru',
  baseUrl: 'https://www.cottage.ru',
  domain: 'cottage.ru',
  villageLinkPattern: VILLAGE_LINK,
  defaultRegion: MOSCOW_REGION,
  nameStrategies: ['anchor', 'heading', 'textLine'],
};

export function cottagePageUrl(page: number): string {
  return page > 1 ? `${COTTAGE_CATALOGUE_URL.replace(/\/$/, '')}?page=${page}` : COTTAGE_CATALOGUE_URL;
}

/**
 * Cottage.ru village catalogue. Cards are the nearest container of each
 * village link; a link seen on an earlier page is not parsed twice.
 */
export class CottageScraper implements VillageSource {
  readonly id = 'cottage' as const;
  readonly regional = false;
  private readonly logger: Logger;
  private readonly parser: VillageCardParser;

  constructor(private readonly ctx: PipelineContext) {
    this.logger = ctx.logger.child('cottage');
    this.parser = new VillageCardParser(ctx, COTTAGE_SITE, this.logger);
  }

  async scrape(_region: string | null, maxPages: number): Promise<Village[]> {
    const villages: Village[] = [];
    const seenHrefs = new Set<string>();
    this.logger.info(`🚀 Cottage.ru: up to ${maxPages} pages`);

    for (let page = 1; page <= maxPages; page++) {
      if (this.ctx.aborted) {
        this.logger.warn('⏹️ Interrupted, stopping pagination');
        break;
      }

      const url = cottagePageUrl(page);
      let html: string;
      try {
        html = await this.ctx.fetcher.fetchHtml(url);
      } catch (error) {
        this.logger.warn(`⚠️ Failed to load ${url}: ${errorMessage(error)}`);
        break;
      }

      const $ = load(html);
      const links = $('a[href]').toArray().filter(el => VILLAGE_LINK.test($(el).attr('href') ?? ''));
      if (links.length === 0 && page > 1) break;

      for (const link of links) {
        const href = $(link).attr('href') ?? '';
        if (!href || seenHrefs.has(href)) continue;
        seenHrefs.add(href);

        const container = $(link).parents('div, article, section').first();
        const card = container.length > 0 ? container : $(link);
        const village = await this.parser.parseCard(toFragment($, card), url, {
          detailUrl: resolveUrl(href, COTTAGE_SITE.baseUrl),
        });
        if (village) {
          villages.push(village);
          this.logger.info(`✅ Added: ${village.name}`);
        }
      }

      this.logger.info(`📄 Page ${page}/${maxPages}: ${villages.length} villages so far`);
    }

    this.logger.info(`🏁 Cottage.ru: ${villages.length} villages`);
    return villages;
  }
}
