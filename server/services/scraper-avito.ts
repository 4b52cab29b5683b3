import type { PipelineContext } from '../context';
import { ListingCardSource, type ListingSite } from './village-source';

export const AVITO_BASE_URL = 'https://www.avito.ru';

export const AVITO_SITE: ListingSite = {
  id: 'avito',
  sourceName: 'Avito.ru',
  baseUrl: AVITO_BASE_URL,
  domain: 'avito.ru',
  regional: true,
  villageLinkPattern: /kottedzhnye_poselki|zemelnye_uchastki|poselok/i,
  // Avito region slugs use underscores: moskovskaya_oblast
  pageUrl(region, page) {
    const slug = (region ?? 'moskovskaya_oblast').replace(/-/g, '_');
    const url = `${AVITO_BASE_URL}/${slug}/zemelnye_uchastki/kottedzhnye_poselki`;
    return page > 1 ? `${url}?p=${page}` : url;
  },
  cardSelectors: ['[data-marker="item"]'],
  cardClassPattern: /item|card|snippet/i,
};

export class AvitoScraper extends ListingCardSource {
  constructor(ctx: PipelineContext) {
    super(ctx, AVITO_SITE);
  }
}
