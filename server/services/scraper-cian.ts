import type { PipelineContext } from '../context';
import { ListingCardSource, type ListingSite } from './village-source';

export const CIAN_BASE_URL = 'https://www.cian.ru';

export const CIAN_SITE: ListingSite = {
  id: 'cian',
  sourceName: 'Cian.ru',
  baseUrl: CIAN_BASE_URL,
  domain: 'cian.ru',
  regional: true,
  villageLinkPattern: /kottedzhnye-poselki|poselok|uchastok/i,
  pageUrl(region, page) {
    const url = `${CIAN_BASE_URL}/kottedzhnye-poselki-${region ?? 'moskovskaya-oblast'}/`;
    return page > 1 ? `${url}?p=${page}` : url;
  },
  cardSelectors: ['[data-name*="Card"], [data-name*="Offer"]'],
  cardClassPattern: /card|item|village|offer|lot/i,
};

/**
 * Cian cottage-village catalogue, one listing per region slug ("moskovskaya-oblast").
 */
export class CianScraper extends ListingCardSource {
  constructor(ctx: PipelineContext) {
    super(ctx, CIAN_SITE);
  }
}
