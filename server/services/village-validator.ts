/**
 * Name / URL filters applied wherever a village candidate is proposed.
 */

const MIN_NAME_LENGTH = 3;
const MIN_MEANINGFUL_NAME_LENGTH = 5;

const INVALID_NAME_PATTERNS: readonly RegExp[] = [
  // navigation & promo text
  /ещё\s*фото/i,
  /первичная\s*продажа/i,
  /продажа/i,
  /фото/i,
  /подробнее/i,
  /подробности/i,
  /читать\s*далее/i,
  /смотреть/i,
  /клик/i,
  /нажмите/i,
  /в\s*избранное/i,
  /с\s*коммуникациями/i,
  // numbers and stray letters
  /^\d+$/,
  /^[а-яё]{1,2}$/i,
  // catalogue headings rather than a village
  /коттеджные\s*посёл?ки\s*в\s*/i,
  /коттеджные\s*поселки\s*в\s*/i,
  /поселки\s*в\s*области/i,
  /коттеджные\s*поселки$/i,
];

const BANNED_NAMES = new Set(['коттеджные посёлки', 'коттеджные поселки', 'поселки', 'кп']);

export function isValidVillageName(candidate: string | null | undefined): boolean {
  if (!candidate) return false;

  const trimmed = candidate.trim();
  if (trimmed.length < MIN_NAME_LENGTH) return false;

  const lower = trimmed.toLowerCase();
  if (INVALID_NAME_PATTERNS.some(p => p.test(lower))) return false;

  if (trimmed.length < MIN_MEANINGFUL_NAME_LENGTH) return false;

  return !BANNED_NAMES.has(lower);
}

// Flats, rooms, commercial and garages share catalogues with villages
const NON_VILLAGE_URL_PATTERNS: readonly RegExp[] = [
  /\/sale\/flat\//i,
  /\/sale\/room\//i,
  /\/sale\/commercial\//i,
  /\/sale\/garage\//i,
];

/**
 * Rejects known non-village listing URLs; anything else passes.
 */
export function isVillageUrl(url: string | null | undefined): boolean {
  if (!url) return false;
  return !NON_VILLAGE_URL_PATTERNS.some(p => p.test(url));
}
