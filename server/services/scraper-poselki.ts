import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';
import type { Village } from '@shared/schema';
import type { PipelineContext } from '../context';
import { errorMessage, type Logger } from '../logger';
import { VillageCardParser, toFragment, type SiteProfile } from './village-card-parser';
import { VillageEnricher } from './village-enricher';
import type { VillageSource } from './village-source';

export const POSELKI_BASE_URL = 'https://poselki.ru';

// Villages on the portal link out to their own sites, mostly on .рф
const VILLAGE_SITE_LINK = /\.рф|xn--p1ai|zolotye-sosny\.ru|верба-парк|марьина-гора/i;
const VILLAGE_SECTION_CLASS = /village|poselok|item|card|descr/i;
const VILLAGE_KEYWORDS = /поселок|посёлок|коттеджный|кп/i;

export const POSELKI_SITE: SiteProfile = {
  sourceName: 'Poselki.ru',
  baseUrl: POSELKI_BASE_URL,
  domain: 'poselki.ru',
  villageLinkPattern: VILLAGE_SITE_LINK,
  nameStrategies: ['heading', 'anchor', 'textLine'],
  regionFromText: true,
};

/**
 * "//site.рф" → https, "/path" → portal-relative, bare host → https.
 */
export function normalizeVillageSiteUrl(href: string, base: string = POSELKI_BASE_URL): string {
  const trimmed = href.trim();
  if (/^https?:\/\//i.test(trimmed)) return trimmed;
  if (trimmed.startsWith('//')) return `https:${trimmed}`;
  if (trimmed.startsWith('/')) return new URL(trimmed, base).toString();
  return `https://${trimmed}`;
}

/**
 * Poselki.ru portal: one home page listing villages with links to their own sites.
 * Each village site is fetched for contacts before the browser fallback is tried.
 */
export class PoselkiScraper implements VillageSource {
  readonly id = 'poselki' as const;
  readonly regional = false;
  private readonly logger: Logger;
  private readonly parser: VillageCardParser;
  private readonly enricher: VillageEnricher;

  constructor(private readonly ctx: PipelineContext) {
    this.logger = ctx.logger.child('poselki');
    this.parser = new VillageCardParser(ctx, POSELKI_SITE, this.logger);
    this.enricher = new VillageEnricher(ctx, this.logger);
  }

  async scrape(): Promise<Village[]> {
    this.logger.info('🚀 Poselki.ru: home page');

    let html: string;
    try {
      html = await this.ctx.fetcher.fetchHtml(POSELKI_BASE_URL);
    } catch (error) {
      this.logger.error(`❌ Poselki.ru home page failed: ${errorMessage(error)}`);
      return [];
    }

    // The portal page is a listing, never a detail page to enrich from
    this.ctx.claimDetailUrl(POSELKI_BASE_URL);

    const $ = load(html);
    const villages = await this.parseLinkedVillages($);
    if (villages.length === 0) {
      villages.push(...await this.parseSections($));
    }

    this.logger.info(`🏁 Poselki.ru: ${villages.length} villages`);
    return villages;
  }

  private async parseLinkedVillages($: CheerioAPI): Promise<Village[]> {
    const villages: Village[] = [];
    const processed = new Set<string>();
    const links = $('a[href]').toArray().filter(el => VILLAGE_SITE_LINK.test($(el).attr('href') ?? ''));
    this.logger.info(`🔗 Village site links: ${links.length}`);

    for (const link of links) {
      if (this.ctx.aborted) break;

      const villageUrl = normalizeVillageSiteUrl($(link).attr('href') ?? '');
      if (processed.has(villageUrl)) continue;
      processed.add(villageUrl);

      const [block] = $(link).parents('div, article, section, li').first().toArray();
      const village = block
        ? await this.parseBlock($, block, villageUrl)
        : await this.parseVillageSite(villageUrl);

      if (village) {
        villages.push(village);
        this.logger.info(`✅ Added: ${village.name}`);
      }
    }
    return villages;
  }

  private async parseSections($: CheerioAPI): Promise<Village[]> {
    const villages: Village[] = [];
    const sections = $('section[class], div[class]').toArray()
      .filter(el => VILLAGE_SECTION_CLASS.test($(el).attr('class') ?? ''))
      .filter(el => VILLAGE_KEYWORDS.test($(el).text()));

    for (const section of sections) {
      if (this.ctx.aborted) break;
      const village = await this.parseBlock($, section, null);
      if (village) villages.push(village);
    }
    return villages;
  }

  private async parseBlock($: CheerioAPI, block: Element, villageUrl: string | null): Promise<Village | null> {
    const village = await this.parser.parseCard(toFragment($, $(block)), POSELKI_BASE_URL, {
      detailUrl: villageUrl ?? POSELKI_BASE_URL,
      website: villageUrl,
      browserFallback: false,
    });
    if (!village) return null;

    // The village's own site doubles as its detail page
    if (villageUrl) {
      await this.enricher.enrich(village);
    }
    return village;
  }

  /**
   * A linked village without a surrounding block: the site itself is the card.
   */
  private async parseVillageSite(villageUrl: string): Promise<Village | null> {
    let html: string;
    try {
      html = await this.ctx.fetcher.fetchHtml(villageUrl);
    } catch (error) {
      this.logger.warn(`⚠️ Village site failed ${villageUrl}: ${errorMessage(error)}`);
      return null;
    }

    const page = load(html);
    // Name from the page heading or the <title>
    const parser = new VillageCardParser(this.ctx, {
      ...POSELKI_SITE,
      nameStrategies: ['heading', 'documentTitle'],
    }, this.logger);
    const village = await parser.parseCard(toFragment(page, page('body')), villageUrl, {
      detailUrl: villageUrl,
      website: villageUrl,
    });
    return village;
  }
}
