import { describe, it, expect } from 'vitest';
import { captureLogger } from '../../__tests__/fixtures';
import {
  BrowserPhoneExtractor,
  REVEAL_SELECTORS,
  findRevealControl,
  scanForPhone,
  type PhoneScanTarget,
} from '../browser-phone';

/**
 * Scan target over fixed page content that records which parts were read.
 */
function scanTarget(content: {
  telHrefs?: string[];
  attributes?: Record<string, string[]>;
  markup?: string;
  texts?: string[];
}): { target: PhoneScanTarget; reads: string[] } {
  const reads: string[] = [];
  const target: PhoneScanTarget = {
    telHrefs: async () => {
      reads.push('tel');
      return content.telHrefs ?? [];
    },
    attributeValues: async attribute => {
      reads.push(attribute);
      return content.attributes?.[attribute] ?? [];
    },
    markup: async () => {
      reads.push('markup');
      return content.markup ?? '';
    },
    phoneElementTexts: async () => {
      reads.push('text');
      return content.texts ?? [];
    },
  };
  return { target, reads };
}

describe('findRevealControl', () => {
  it('tries selectors in order and returns the first usable match', async () => {
    const queried: string[] = [];
    const bySelector: Record<string, string[]> = {
      '[data-phone]': ['hidden-attribute'],
      '[data-testid*="phone"]': ['testid-button'],
      '.show-phone, .phone-button, .contact-phone': ['class-button'],
    };

    const control = await findRevealControl(
      async selector => {
        queried.push(selector);
        return bySelector[selector] ?? [];
      },
      async candidate => candidate !== 'hidden-attribute'
    );

    expect(control).toBe('testid-button');
    expect(queried).toEqual(REVEAL_SELECTORS.slice(0, 6));
  });

  it('looks at no more than five matches per selector', async () => {
    const control = await findRevealControl(
      async selector => (selector === '[data-phone]' ? ['a', 'b', 'c', 'd', 'e', 'f'] : []),
      async candidate => candidate === 'f'
    );

    expect(control).toBeNull();
  });
});

describe('scanForPhone', () => {
  it('normalises the first dialable tel: link and reads nothing else', async () => {
    const { target, reads } = scanTarget({
      telHrefs: ['tel:', 'tel:8 (495) 123-45-67'],
      markup: '<p>+7 495 765-43-21</p>',
    });

    expect(await scanForPhone(target)).toBe('+74951234567');
    expect(reads).toEqual(['tel']);
  });

  it('falls back to phone data attributes in attribute order', async () => {
    const { target, reads } = scanTarget({
      attributes: { 'data-phone': [''], 'data-tel': ['8 916 000 11 22'] },
    });

    expect(await scanForPhone(target)).toBe('+79160001122');
    expect(reads).toEqual(['tel', 'data-phone', 'data-tel']);
  });

  it('reads the markup before element text', async () => {
    const { target, reads } = scanTarget({
      markup: '<div class="contacts">Отдел продаж: +7 495 765-43-21</div>',
      texts: ['8 916 000-11-22'],
    });

    expect(await scanForPhone(target)).toBe('+74957654321');
    expect(reads).toEqual(['tel', 'data-phone', 'data-tel', 'data-telephone', 'markup']);
  });

  it('uses element text when the markup only has a masked number', async () => {
    const { target, reads } = scanTarget({
      markup: '<span>+7 (495) 1xx-xx-xx</span>',
      texts: ['Позвоните: 8 916 000-11-22'],
    });

    expect(await scanForPhone(target)).toBe('+79160001122');
    expect(reads.at(-1)).toBe('text');
  });

  it('finds nothing on a page without numbers', async () => {
    const { target } = scanTarget({ markup: '<p>Звоните в офис</p>', texts: ['Отдел продаж'] });
    expect(await scanForPhone(target)).toBeNull();
  });
});

describe('BrowserPhoneExtractor', () => {
  it('finds no phone before the browser is opened', async () => {
    const { logger } = captureLogger();
    const extractor = new BrowserPhoneExtractor({
      headless: true,
      executablePath: null,
      pageLoadTimeoutMs: 1000,
      logger,
    });

    expect(extractor.isOpen).toBe(false);
    expect(await extractor.extractPhoneFromUrl('https://www.cian.ru/kottedzhnye-poselki/a/')).toBeNull();
    await extractor.close();
    expect(extractor.isOpen).toBe(false);
  });
});
