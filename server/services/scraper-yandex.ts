import type { PipelineContext } from '../context';
import { ListingCardSource, type ListingSite } from './village-source';

export const YANDEX_BASE_URL = 'https://realty.yandex.ru';

export const YANDEX_SITE: ListingSite = {
  id: 'yandex',
  sourceName: 'Яндекс.Недвижимость',
  baseUrl: YANDEX_BASE_URL,
  domain: 'yandex.ru',
  regional: false,
  villageLinkPattern: /kottedzhnye-poselki|kottedzhnyj-poselok|\/village\//i,
  // Pages are zero-based on Yandex: the second page is ?page=1
  pageUrl(_region, page) {
    const url = `${YANDEX_BASE_URL}/moskva_i_mo/kupit/uchastok/`;
    return page > 1 ? `${url}?page=${page - 1}` : url;
  },
  cardSelectors: ['[data-test="OffersSerpItem"]', 'li.OffersSerpItem'],
  cardClassPattern: /SerpItem|card|village/i,
};

export class YandexScraper extends ListingCardSource {
  constructor(ctx: PipelineContext) {
    super(ctx, YANDEX_SITE);
  }
}
