import { describe, it, expect } from 'vitest';
import { createTestContext } from '../../__tests__/fixtures';
import { COTTAGE_CATALOGUE_URL, CottageScraper, cottagePageUrl } from '../scraper-cottage';

const CATALOGUE_HTML = `
<html><body>
  <div class="catalog">
    <div class="item">
      <a href="/objects/village/zolotaya-dolina.html">Золотая Долина</a>
      <span>Дмитровское шоссе, 35 км, 85 участков</span>
    </div>
    <div class="item">
      <a href="/objects/village/zolotaya-dolina.html">Золотая Долина</a>
    </div>
    <div class="item">
      <a href="/objects/village/tihiy-bereg.html">Тихий Берег</a>
      <span>Телефон: 8 (495) 222-33-44</span>
    </div>
  </div>
</body></html>`;

describe('cottagePageUrl', () => {
  it('adds ?page= from the second page', () => {
    expect(cottagePageUrl(1)).toBe('https://www.cottage.ru/objects/village/');
    expect(cottagePageUrl(2)).toBe('https://www.cottage.ru/objects/village?page=2');
  });
});

describe('CottageScraper', () => {
  it('parses each village link once and stops when the next page fails', async () => {
    const { ctx, fetcher } = createTestContext({ pages: { [COTTAGE_CATALOGUE_URL]: CATALOGUE_HTML } });

    const villages = await new CottageScraper(ctx).scrape(null, 2);

    expect(villages).toHaveLength(2);
    expect(villages[0]).toMatchObject({
      id: 1,
      name: 'Золотая Долина',
      source_url: 'https://www.cottage.ru/objects/village/zolotaya-dolina.html',
      source_name: 'Cottage.ru',
      region: 'Московская область',
      address: 'Дмитровское шоссе, 35 км, 85 участков',
      district: 'Дмитровское шоссе',
      house_count: 85,
      phone_primary: null,
    });
    expect(villages[1]).toMatchObject({
      id: 2,
      name: 'Тихий Берег',
      source_url: 'https://www.cottage.ru/objects/village/tihiy-bereg.html',
      address: null,
      district: null,
      phone_primary: '+74952223344',
    });
    expect(fetcher.requested).toEqual([COTTAGE_CATALOGUE_URL, 'https://www.cottage.ru/objects/village?page=2']);
  });
});
