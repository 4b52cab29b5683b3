import { load, type CheerioAPI } from 'cheerio';
import type { Village, VillageField } from '@shared/schema';
import type { PipelineContext } from '../context';
import { errorMessage, type Logger } from '../logger';
import { extractEmail, extractPhone, isServiceEmail, normalizePhone } from './contact-extractor';
import { hostnameOf, resolveUrl } from './scraper-utils';
import { blockText } from './village-card-parser';
import {
  DETAIL_PROFILE,
  applyInfrastructure,
  collapseWhitespace,
  detectMoscowRegion,
  extractManagementName,
  splitRegionDistrict,
} from './village-heuristics';
import { isVillageUrl } from './village-validator';

// Aggregators and social networks never count as the village's own site
const NON_WEBSITE_DOMAINS = [
  'cian.ru',
  'domclick.ru',
  'yandex.ru',
  'google.com',
  'vk.com',
  'facebook.com',
  'instagram.com',
  'ok.ru',
  'avito.ru',
  'cottage.ru',
  'poselki.ru',
];

const SOCIAL_DOMAINS = ['vk.com', 'ok.ru', 't.me'];

/**
 * Fields a detail page can fill. A record missing any of them is worth a fetch.
 */
export const ENRICHABLE_FIELDS: readonly VillageField[] = [
  'house_count',
  'status',
  'has_fence',
  'has_checkpoint',
  'has_security',
  'has_internet',
  'phone_primary',
  'email',
  'website',
  'management_name',
];

function onDomain(host: string, domains: readonly string[]): boolean {
  return domains.some(d => host === d || host.endsWith(`.${d}`));
}

/**
 * Fills empty fields of a record from its detail page. Never overwrites a value,
 * never throws: a failed fetch leaves the record as it was.
 */
export class VillageEnricher {
  private readonly logger: Logger;

  constructor(private readonly ctx: PipelineContext, logger?: Logger) {
    this.logger = logger ?? ctx.logger.child('enrich');
  }

  needsEnrichment(village: Village): boolean {
    if (!village.source_url || !isVillageUrl(village.source_url)) return false;
    return ENRICHABLE_FIELDS.some(field => village[field] === null || village[field] === '');
  }

  async enrich(village: Village): Promise<Village> {
    const url = village.source_url;
    if (!url || !isVillageUrl(url)) return village;

    if (!this.ctx.claimDetailUrl(url)) {
      this.logger.debug(`↩️ Already fetched this run: ${url}`);
      return village;
    }

    let html: string;
    try {
      html = await this.ctx.fetcher.fetchHtml(url);
    } catch (error) {
      this.logger.warn(`⚠️ Detail page failed for ${village.name}: ${errorMessage(error)}`);
      return village;
    }

    const draft: Village = { ...village };
    let changed: string[];
    try {
      changed = this.applyPage(draft, load(html), url);
    } catch (error) {
      this.logger.warn(`⚠️ Detail page unparsable for ${village.name}: ${errorMessage(error)}`);
      return village;
    }

    if (!draft.phone_primary) {
      draft.phone_primary = await this.ctx.lookupPhoneInBrowser(url, this.logger);
      if (draft.phone_primary) changed.push('phone_primary');
    }

    draft.date_updated = this.ctx.runDate;
    Object.assign(village, draft);

    if (changed.length > 0) {
      this.logger.info(`🔎 ${village.name}: +${changed.join(', ')}`);
    }
    return village;
  }

  private applyPage(village: Village, $: CheerioAPI, url: string): string[] {
    const body = $('body');
    const text = body.length > 0 ? blockText(body) : blockText($.root());
    const host = hostnameOf(url);
    // Addresses on a listing site's domain belong to the site, a village's own domain is fine
    const listingHost = host && onDomain(host, NON_WEBSITE_DOMAINS) ? host : null;
    const changed = applyInfrastructure(village, text, DETAIL_PROFILE);

    const fill = (field: 'phone_primary' | 'email' | 'website' | 'social_links' | 'management_name' | 'address' | 'region' | 'district', value: string | null) => {
      if (value && !village[field]) {
        village[field] = value;
        changed.push(field);
      }
    };

    if (!village.phone_primary) fill('phone_primary', this.findPhone($, text));
    if (!village.email) fill('email', this.findEmail($, text, listingHost));
    if (!village.website) fill('website', this.findWebsite($, url, host));
    if (!village.social_links) fill('social_links', this.findSocialLinks($, url));
    if (!village.management_name) fill('management_name', extractManagementName(text));

    if (!village.address) {
      const address = $('div[class], span[class]').toArray()
        .map(el => $(el))
        .filter(el => /address|location|geo/i.test(el.attr('class') ?? ''))
        .map(el => collapseWhitespace(el.text()))
        .find(value => value.length > 0);
      fill('address', address ?? null);
      if (address) {
        const { region, district } = splitRegionDistrict(address);
        fill('region', region);
        fill('district', district);
      }
    }
    if (!village.region) fill('region', detectMoscowRegion(text));

    return changed;
  }

  private findPhone($: CheerioAPI, text: string): string | null {
    for (const el of $('a[href^="tel:"]').toArray()) {
      const phone = normalizePhone(($(el).attr('href') ?? '').replace(/^tel:/i, ''));
      if (phone) return phone;
    }

    const blocks = $('div[class], span[class]').toArray()
      .map(el => $(el))
      .filter(el => /phone|contact|tel/i.test(el.attr('class') ?? ''));
    for (const block of blocks) {
      const phone = extractPhone(block.text());
      if (phone) return phone;
    }

    return extractPhone(text);
  }

  private findEmail($: CheerioAPI, text: string, excludedHost: string | null): string | null {
    for (const el of $('a[href^="mailto:"]').toArray()) {
      const email = ($(el).attr('href') ?? '').replace(/^mailto:/i, '').split('?')[0].trim();
      if (email && !isServiceEmail(email, excludedHost)) return email;
    }

    const blocks = $('a[class], span[class]').toArray()
      .map(el => $(el))
      .filter(el => /email|mail|contact/i.test(el.attr('class') ?? ''));
    for (const block of blocks) {
      const email = extractEmail(block.text(), excludedHost);
      if (email) return email;
    }

    return extractEmail(text, excludedHost);
  }

  private findWebsite($: CheerioAPI, pageUrl: string, host: string | null): string | null {
    for (const el of $('a[href^="http"]').toArray()) {
      const href = $(el).attr('href') ?? '';
      const linkHost = hostnameOf(href);
      if (!linkHost || linkHost === host) continue;
      if (onDomain(linkHost, NON_WEBSITE_DOMAINS)) continue;
      return resolveUrl(href, pageUrl);
    }
    return null;
  }

  private findSocialLinks($: CheerioAPI, pageUrl: string): string | null {
    const links = new Set<string>();
    for (const el of $('a[href]').toArray()) {
      const href = $(el).attr('href') ?? '';
      const linkHost = hostnameOf(href);
      if (!linkHost || !onDomain(linkHost, SOCIAL_DOMAINS)) continue;
      const url = resolveUrl(href, pageUrl);
      if (url) links.add(url);
    }
    return links.size > 0 ? [...links].join(', ') : null;
  }
}
