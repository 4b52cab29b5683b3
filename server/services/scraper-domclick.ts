import type { PipelineContext } from '../context';
import { ListingCardSource, type ListingSite } from './village-source';

export const DOMCLICK_BASE_URL = 'https://domclick.ru';

export const DOMCLICK_SITE: ListingSite = {
  id: 'domclick',
  sourceName: 'Domclick.ru',
  baseUrl: DOMCLICK_BASE_URL,
  domain: 'domclick.ru',
  regional: false,
  villageLinkPattern: /village|poselok|kottedzh/i,
  pageUrl(_region, page) {
    const url = `${DOMCLICK_BASE_URL}/search?deal_type=sale&category=living&offer_type=village`;
    return page > 1 ? `${url}&page=${page}` : url;
  },
  cardSelectors: ['[data-e2e-id*="offer"]', '[data-test*="card"]'],
  cardClassPattern: /card|offer|village/i,
};

export class DomclickScraper extends ListingCardSource {
  constructor(ctx: PipelineContext) {
    super(ctx, DOMCLICK_SITE);
  }
}
