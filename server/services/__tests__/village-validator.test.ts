import { describe, it, expect } from 'vitest';
import { isValidVillageName, isVillageUrl } from '../village-validator';

describe('isValidVillageName', () => {
  it('accepts real village names', () => {
    expect(isValidVillageName('Сосновый Бор')).toBe(true);
    expect(isValidVillageName('  КП Лесные Дали ')).toBe(true);
    expect(isValidVillageName('Ромашка')).toBe(true);
  });

  it('rejects navigation and promo text', () => {
    for (const text of ['Подробнее', 'Ещё фото', 'Первичная продажа', 'Читать далее', 'Смотреть все', 'Нажмите здесь', 'В избранное', 'Участки с коммуникациями']) {
      expect(isValidVillageName(text)).toBe(false);
    }
  });

  it('rejects generic catalogue headings', () => {
    expect(isValidVillageName('Коттеджные посёлки в Подмосковье')).toBe(false);
    expect(isValidVillageName('Коттеджные поселки')).toBe(false);
    expect(isValidVillageName('Поселки в области')).toBe(false);
    expect(isValidVillageName('поселки')).toBe(false);
  });

  it('rejects numbers and short tokens', () => {
    expect(isValidVillageName('12345')).toBe(false);
    expect(isValidVillageName('КП')).toBe(false);
    expect(isValidVillageName('Лес')).toBe(false);
    expect(isValidVillageName('Луга')).toBe(false);
    expect(isValidVillageName('')).toBe(false);
    expect(isValidVillageName(null)).toBe(false);
  });
});

describe('isVillageUrl', () => {
  it('rejects flat, room, commercial and garage listings', () => {
    expect(isVillageUrl('https://www.cian.ru/sale/flat/123456/')).toBe(false);
    expect(isVillageUrl('https://www.cian.ru/sale/room/1/')).toBe(false);
    expect(isVillageUrl('https://www.cian.ru/sale/commercial/77/')).toBe(false);
    expect(isVillageUrl('https://www.cian.ru/SALE/GARAGE/5/')).toBe(false);
  });

  it('accepts village pages and, permissively, anything else', () => {
    expect(isVillageUrl('https://www.cian.ru/kottedzhnye-poselki-moskovskaya-oblast/')).toBe(true);
    expect(isVillageUrl('https://sosny-village.ru/')).toBe(true);
  });

  it('rejects empty input', () => {
    expect(isVillageUrl('')).toBe(false);
    expect(isVillageUrl(null)).toBe(false);
  });
});
