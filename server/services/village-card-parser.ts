import type { Cheerio, CheerioAPI } from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode, type Element } from 'domhandler';
import { createEmptyVillage, type Village } from '@shared/schema';
import type { PipelineContext } from '../context';
import { errorMessage, type Logger } from '../logger';
import { extractEmail, extractPhone, isServiceEmail, normalizePhone } from './contact-extractor';
import { firstMatch, resolveUrl, type Strategy } from './scraper-utils';
import {
  ADDRESS_TEXT_PATTERNS,
  CARD_PROFILE,
  applyInfrastructure,
  collapseWhitespace,
  detectMoscowRegion,
  extractDistrict,
  splitRegionDistrict,
} from './village-heuristics';
import { isValidVillageName, isVillageUrl } from './village-validator';

// ============================================
// CARD FRAGMENT
// ============================================

/**
 * One listing card: the loaded document, the card root and its text with one line per text node.
 */
export interface CardFragment {
  $: CheerioAPI;
  root: Cheerio<Element>;
  text: string;
}

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript']);

function collectText(node: AnyNode, out: string[]): void {
  if (isText(node)) {
    const value = collapseWhitespace(node.data);
    if (value) out.push(value);
    return;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) return;
  if (hasChildren(node)) {
    for (const child of node.children) collectText(child, out);
  }
}

export function blockText<T extends AnyNode>(root: Cheerio<T>): string {
  const lines: string[] = [];
  for (const node of root.toArray()) collectText(node, lines);
  return lines.join('\n');
}

export function toFragment($: CheerioAPI, root: Cheerio<Element>): CardFragment {
  return { $, root, text: blockText(root) };
}

/**
 * The card root and its descendants matching a selector.
 */
function selectWithin(fragment: CardFragment, selector: string): Cheerio<Element>[] {
  const { $, root } = fragment;
  return [...root.filter(selector).toArray(), ...root.find(selector).toArray()].map(el => $(el));
}

// ============================================
// SITE PROFILE
// ============================================

export type NameStrategyId = 'attribute' | 'heading' | 'anchor' | 'textLine' | 'documentTitle';

export interface SiteProfile {
  sourceName: string;
  baseUrl: string;
  /** Host whose addresses are the site's own, never the village's */
  domain: string;
  villageLinkPattern: RegExp;
  defaultRegion?: string;
  nameStrategies?: readonly NameStrategyId[];
  /** Read "Подмосковье"/"Московская" mentions as the Moscow region */
  regionFromText?: boolean;
}

const DEFAULT_NAME_STRATEGIES: readonly NameStrategyId[] = ['attribute', 'heading', 'anchor', 'textLine'];
const MAX_NAME_LINES = 15;

export interface ParseCardOptions {
  /** Known detail URL; skips link resolution */
  detailUrl?: string | null;
  website?: string | null;
  /** Browser phone lookup when the card shows none; on by default */
  browserFallback?: boolean;
}

// ============================================
// CARD PARSER
// ============================================

/**
 * Maps a listing card to a village record through ordered fallback strategies.
 * Shared by every listing source; the site profile only supplies URLs and patterns.
 */
export class VillageCardParser {
  private readonly nameStrategies: ReadonlyArray<Strategy<CardFragment, string>>;
  private readonly addressStrategies: ReadonlyArray<Strategy<CardFragment, string>>;
  private readonly phoneStrategies: ReadonlyArray<Strategy<CardFragment, string>>;

  constructor(
    private readonly ctx: PipelineContext,
    private readonly profile: SiteProfile,
    private readonly logger: Logger
  ) {
    const byId: Record<NameStrategyId, Strategy<CardFragment, string>> = {
      attribute: f => this.nameFromAttribute(f),
      heading: f => this.nameFromHeading(f),
      anchor: f => this.nameFromVillageLink(f),
      textLine: f => this.nameFromTextLines(f),
      documentTitle: f => this.nameFromDocumentTitle(f),
    };
    this.nameStrategies = (profile.nameStrategies ?? DEFAULT_NAME_STRATEGIES).map(id => byId[id]);

    this.addressStrategies = [
      f => this.addressFromAttribute(f),
      f => this.addressFromClass(f),
      f => this.addressFromText(f),
    ];

    this.phoneStrategies = [
      f => this.phoneFromTelLink(f),
      f => this.phoneFromPhoneElement(f),
      f => extractPhone(f.text),
    ];
  }

  async parseCard(fragment: CardFragment, listingUrl: string, options: ParseCardOptions = {}): Promise<Village | null> {
    try {
      return await this.parse(fragment, listingUrl, options);
    } catch (error) {
      this.logger.warn(`⚠️ Card skipped: ${errorMessage(error)}`);
      return null;
    }
  }

  private async parse(fragment: CardFragment, listingUrl: string, options: ParseCardOptions): Promise<Village | null> {
    const village = createEmptyVillage({
      sourceName: this.profile.sourceName,
      runDate: this.ctx.runDate,
      region: this.profile.defaultRegion ?? null,
    });

    // 1. Detail URL
    const detailUrl = options.detailUrl !== undefined
      ? options.detailUrl
      : this.resolveDetailUrl(fragment, listingUrl);
    if (detailUrl && isVillageUrl(detailUrl)) {
      village.source_url = detailUrl;
    }
    if (options.website) {
      village.website = options.website;
    }

    // 2. Name
    const name = firstMatch(this.nameStrategies, fragment);
    if (!name) {
      this.logger.debug('Card without a usable name');
      return null;
    }
    village.name = name;

    // 3. Location
    this.applyLocation(village, fragment);

    // 4. Infrastructure
    applyInfrastructure(village, fragment.text, CARD_PROFILE);

    // 5. Contacts
    village.phone_primary = firstMatch(this.phoneStrategies, fragment);
    if (!village.phone_primary && village.source_url && options.browserFallback !== false) {
      village.phone_primary = await this.ctx.lookupPhoneInBrowser(village.source_url, this.logger);
    }
    village.email = this.extractCardEmail(fragment);

    // 6. Final validation
    if (!isValidVillageName(village.name)) return null;
    if (village.source_url && !isVillageUrl(village.source_url)) return null;

    village.id = this.ctx.ids.take();
    this.logger.debug(`✅ ${village.name} (${village.source_url ?? 'no url'})`);
    return village;
  }

  // ============================================
  // DETAIL URL
  // ============================================

  private resolveDetailUrl(fragment: CardFragment, listingUrl: string): string | null {
    const anchors = selectWithin(fragment, 'a[href]');

    for (const anchor of anchors) {
      const href = anchor.attr('href') ?? '';
      if (!this.profile.villageLinkPattern.test(href)) continue;
      const url = resolveUrl(href, listingUrl);
      if (url && isVillageUrl(url)) return url;
    }

    const first = anchors[0]?.attr('href');
    if (!first) return null;
    const url = resolveUrl(first, listingUrl);
    return url && isVillageUrl(url) ? url : null;
  }

  // ============================================
  // NAME STRATEGIES
  // ============================================

  private firstValidText(elements: Cheerio<Element>[]): string | null {
    for (const el of elements) {
      const candidate = collapseWhitespace(el.text());
      if (isValidVillageName(candidate)) return candidate;
    }
    return null;
  }

  private nameFromAttribute(fragment: CardFragment): string | null {
    const tagged = selectWithin(fragment, '[data-name]')
      .filter(el => /Title|Name/i.test(el.attr('data-name') ?? ''));
    return this.firstValidText(tagged);
  }

  private nameFromHeading(fragment: CardFragment): string | null {
    const headings = selectWithin(fragment, 'h1, h2, h3, h4');
    const titled = headings.filter(el => /title|name|heading/i.test(el.attr('class') ?? ''));
    return this.firstValidText(titled) ?? this.firstValidText(headings);
  }

  private nameFromVillageLink(fragment: CardFragment): string | null {
    const links = selectWithin(fragment, 'a[href]')
      .filter(el => this.profile.villageLinkPattern.test(el.attr('href') ?? ''));
    return this.firstValidText(links);
  }

  private nameFromTextLines(fragment: CardFragment): string | null {
    const lines = fragment.text.split('\n').slice(0, MAX_NAME_LINES);
    for (const line of lines) {
      const candidate = collapseWhitespace(line.replace(/[^\p{L}\p{N}\s«»"'-]/gu, ' '));
      if (isValidVillageName(candidate)) return candidate;
    }
    return null;
  }

  private nameFromDocumentTitle(fragment: CardFragment): string | null {
    const title = fragment.$('title').first().text();
    const head = collapseWhitespace(title.split(/[|—–]/)[0] ?? '');
    return isValidVillageName(head) ? head : null;
  }

  // ============================================
  // LOCATION
  // ============================================

  private addressFromAttribute(fragment: CardFragment): string | null {
    const tagged = selectWithin(fragment, '[data-name]')
      .filter(el => /Address|Location|Geo/i.test(el.attr('data-name') ?? ''));
    return this.firstNonEmptyText(tagged);
  }

  private addressFromClass(fragment: CardFragment): string | null {
    const classed = selectWithin(fragment, 'div[class], span[class]')
      .filter(el => /address|location|geo|region/i.test(el.attr('class') ?? ''));
    return this.firstNonEmptyText(classed);
  }

  private addressFromText(fragment: CardFragment): string | null {
    for (const pattern of ADDRESS_TEXT_PATTERNS) {
      const line = fragment.text.split('\n').find(l => pattern.test(l));
      if (line) return line.trim();
    }
    return null;
  }

  private firstNonEmptyText(elements: Cheerio<Element>[]): string | null {
    for (const el of elements) {
      const value = collapseWhitespace(el.text());
      if (value) return value;
    }
    return null;
  }

  private applyLocation(village: Village, fragment: CardFragment): void {
    const address = firstMatch(this.addressStrategies, fragment);
    if (address) {
      village.address = address;
      const { region, district } = splitRegionDistrict(address);
      if (region) village.region = region;
      if (district) village.district = district;
    }

    if (!village.district) {
      village.district = extractDistrict(fragment.text) ?? this.districtFromLinks(fragment);
    }

    if (!village.region && this.profile.regionFromText) {
      village.region = detectMoscowRegion(fragment.text);
    }
  }

  private districtFromLinks(fragment: CardFragment): string | null {
    const links = selectWithin(fragment, 'a[href]')
      .filter(el => /[?&](?:location|direction)=/i.test(el.attr('href') ?? ''));
    return this.firstNonEmptyText(links);
  }

  // ============================================
  // CONTACTS
  // ============================================

  private phoneFromTelLink(fragment: CardFragment): string | null {
    for (const link of selectWithin(fragment, 'a[href^="tel:"]')) {
      const phone = normalizePhone((link.attr('href') ?? '').replace(/^tel:/i, ''));
      if (phone) return phone;
    }
    return null;
  }

  private phoneFromPhoneElement(fragment: CardFragment): string | null {
    const elements = selectWithin(fragment, '[data-phone], [data-tel], [class*="phone"]');
    for (const el of elements) {
      const attr = el.attr('data-phone') ?? el.attr('data-tel');
      const phone = attr ? normalizePhone(attr) : extractPhone(el.text());
      if (phone) return phone;
    }
    return null;
  }

  private extractCardEmail(fragment: CardFragment): string | null {
    for (const link of selectWithin(fragment, 'a[href^="mailto:"]')) {
      const email = (link.attr('href') ?? '').replace(/^mailto:/i, '').split('?')[0].trim();
      if (email && !isServiceEmail(email, this.profile.domain)) return email;
    }
    return extractEmail(fragment.text, this.profile.domain);
  }
}
