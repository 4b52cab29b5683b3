import { SECURITY_TYPE, VILLAGE_STATUS, YES, type Village } from '@shared/schema';

/**
 * Keyword heuristics over plain text, shared by the card parsers (short card text)
 * and the enricher (full detail page text). Everything here fills only empty fields.
 */

export const HOUSE_COUNT_RANGE = { min: 10, max: 10000 } as const;

const HOUSE_WORDS = '(?:дом|участк|коттедж|лот)';

export interface HeuristicProfile {
  houseCount: readonly RegExp[];
  fence: RegExp;
  checkpoint: RegExp;
  checkpointCount: readonly RegExp[];
  security: RegExp;
  securityTypes: ReadonlyArray<{ pattern: RegExp; type: string }>;
  status: ReadonlyArray<{ pattern: RegExp; status: string }>;
  internet: RegExp | null;
}

export const CARD_PROFILE: HeuristicProfile = {
  houseCount: [
    new RegExp(`(\\d+)\\s*${HOUSE_WORDS}`, 'i'),
    new RegExp(`${HOUSE_WORDS}[а-яё]*[:\\s]+(\\d+)`, 'i'),
    /(\d+)\s*в\s*продаже/i,
  ],
  fence: /огражден|забор|периметр/i,
  checkpoint: /кпп|контрольно-пропускной|пропускной\s*пункт/i,
  checkpointCount: [/(\d+)\s*кпп/i],
  security: /охрана|чоп|охраняем/i,
  securityTypes: [{ pattern: /чоп/i, type: SECURITY_TYPE.privateCompany }],
  status: [
    { pattern: /построен/i, status: VILLAGE_STATUS.built },
    { pattern: /заселен/i, status: VILLAGE_STATUS.built },
    { pattern: /сдача/i, status: VILLAGE_STATUS.underConstruction },
    { pattern: /строительств/i, status: VILLAGE_STATUS.underConstruction },
  ],
  internet: null,
};

export const DETAIL_PROFILE: HeuristicProfile = {
  houseCount: [
    new RegExp(`(\\d+)\\s*${HOUSE_WORDS}[а-яё]*\\s*в\\s*продаже`, 'i'),
    new RegExp(`в\\s*продаже\\s*(\\d+)\\s*${HOUSE_WORDS}`, 'i'),
    new RegExp(`(\\d+)\\s*${HOUSE_WORDS}`, 'i'),
    /количество[:\s]+(\d+)/i,
  ],
  fence: /огражден|забор|периметр|ограждение|защищен/i,
  checkpoint: /кпп|контрольно-пропускной|пропускной\s*пункт|контроль\s*доступа/i,
  checkpointCount: [/(\d+)\s*кпп/i, /кпп[:\s]+(\d+)/i],
  security: /охрана|чоп|охраняем|безопасность|сторож/i,
  securityTypes: [
    { pattern: /чоп|частн.*охранн/i, type: SECURITY_TYPE.privateCompany },
    { pattern: /собственн.*охрана|внутренн.*охрана/i, type: SECURITY_TYPE.inHouse },
  ],
  status: [
    { pattern: /построен|заселен|сдан|эксплуат/i, status: VILLAGE_STATUS.built },
    { pattern: /сдача\s*в\s*\d{4}|строительств|возводится/i, status: VILLAGE_STATUS.underConstruction },
  ],
  internet: /интернет|wi-fi|wifi/i,
};

// ============================================
// HOUSE COUNT
// ============================================

/**
 * First pattern whose first match lands in the sane range wins.
 */
export function extractHouseCount(text: string, patterns: readonly RegExp[]): number | null {
  for (const pattern of patterns) {
    const match = text.match(pattern);
    if (!match) continue;
    const n = Number.parseInt(match[1], 10);
    if (Number.isFinite(n) && n >= HOUSE_COUNT_RANGE.min && n <= HOUSE_COUNT_RANGE.max) {
      return n;
    }
  }
  return null;
}

// ============================================
// INFRASTRUCTURE FLAGS
// ============================================

export function detectStatus(text: string, profile: HeuristicProfile): string | null {
  const rule = profile.status.find(r => r.pattern.test(text));
  return rule ? rule.status : null;
}

export function detectSecurityType(text: string, profile: HeuristicProfile): string | null {
  const rule = profile.securityTypes.find(r => r.pattern.test(text));
  return rule ? rule.type : null;
}

export function detectCheckpointCount(text: string, profile: HeuristicProfile): number | null {
  for (const pattern of profile.checkpointCount) {
    const match = text.match(pattern);
    if (!match) continue;
    const n = Number.parseInt(match[1], 10);
    if (Number.isFinite(n)) return n;
  }
  return null;
}

/**
 * Fills house count, status, fence, checkpoint, security and internet from text.
 * Returns the names of the fields that changed.
 */
export function applyInfrastructure(village: Village, text: string, profile: HeuristicProfile): string[] {
  const changed: string[] = [];

  if (village.house_count === null) {
    const houses = extractHouseCount(text, profile.houseCount);
    if (houses !== null) {
      village.house_count = houses;
      changed.push('house_count');
    }
  }

  if (!village.status) {
    const status = detectStatus(text, profile);
    if (status) {
      village.status = status;
      changed.push('status');
    }
  }

  if (!village.has_fence && profile.fence.test(text)) {
    village.has_fence = YES;
    changed.push('has_fence');
  }

  if (!village.has_checkpoint && profile.checkpoint.test(text)) {
    village.has_checkpoint = YES;
    changed.push('has_checkpoint');
    const checkpoints = detectCheckpointCount(text, profile);
    if (checkpoints !== null && village.checkpoint_count === null) {
      village.checkpoint_count = checkpoints;
      changed.push('checkpoint_count');
    }
  }

  if (!village.has_security && profile.security.test(text)) {
    village.has_security = YES;
    changed.push('has_security');
    const type = detectSecurityType(text, profile);
    if (type && !village.security_type) {
      village.security_type = type;
      changed.push('security_type');
    }
  }

  if (profile.internet && !village.has_internet && profile.internet.test(text)) {
    village.has_internet = YES;
    changed.push('has_internet');
  }

  return changed;
}

// ============================================
// LOCATION
// ============================================

export const MOSCOW_REGION = 'Московская область';

export const ADDRESS_TEXT_PATTERNS: readonly RegExp[] = [
  /[А-ЯЁ][а-яё]+\s*(?:область|край|район)/,
  /[А-ЯЁ][а-яё]+\s*шоссе/,
  /\d+\s*км\s*до\s*МКАД/i,
];

const REGION_KEYWORD = /область|край/i;

/**
 * "Московская область, Истринский район, д. Лешково" → region + first other part.
 * Only splits when a region/territory keyword is present.
 */
export function splitRegionDistrict(address: string): { region: string | null; district: string | null } {
  if (!REGION_KEYWORD.test(address)) {
    return { region: null, district: null };
  }

  let region: string | null = null;
  let district: string | null = null;
  for (const raw of address.split(/[,;]/)) {
    const part = raw.trim();
    if (!part) continue;
    if (REGION_KEYWORD.test(part)) {
      region = part;
    } else if (!district) {
      district = part;
    }
  }
  return { region, district };
}

const DISTRICT_PATTERNS: ReadonlyArray<{ pattern: RegExp; format: (m: RegExpMatchArray) => string }> = [
  { pattern: /город\s+([А-ЯЁ][а-яё-]+(?:\s+[А-ЯЁ][а-яё-]+)*)/, format: m => `город ${m[1]}` },
  { pattern: /([А-ЯЁ][а-яё-]+\s+район)/, format: m => m[1] },
  { pattern: /([А-ЯЁ][а-яё-]+\s+шоссе)/, format: m => m[1] },
];

export function extractDistrict(text: string): string | null {
  for (const { pattern, format } of DISTRICT_PATTERNS) {
    const match = text.match(pattern);
    if (match) return format(match).trim();
  }
  return null;
}

export function detectMoscowRegion(text: string): string | null {
  return /подмосков|московск/i.test(text) ? MOSCOW_REGION : null;
}

// ============================================
// MANAGEMENT COMPANY
// ============================================

const MANAGEMENT_PATTERNS: readonly RegExp[] = [
  /[Уу]правляющ[а-яё]*\s+компани[а-яё]*[:\s]+([«"]?[А-ЯЁ][А-Яа-яёЁ «»"-]+)/,
  /(?:^|[^А-Яа-яёЁ])УК[:\s]+([«"]?[А-ЯЁ][А-Яа-яёЁ «»"-]+)/,
  /(?:^|[^А-Яа-яёЁ])ТСЖ[:\s]+([«"]?[А-ЯЁ][А-Яа-яёЁ «»"-]+)/,
];

export function extractManagementName(text: string): string | null {
  for (const pattern of MANAGEMENT_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const name = match[1].replace(/\s+/g, ' ').trim().slice(0, 80);
    if (name.length > 3) return name;
  }
  return null;
}

export function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}
