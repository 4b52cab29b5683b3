import { NOT_PROCESSED, UNKNOWN, VILLAGE_FIELDS, isEmptyValue, type Village } from '@shared/schema';

/**
 * DUPLICATE DETECTOR
 *
 * Collapses records describing the same village, within one run and across runs.
 *
 * Key: normalized name + normalized address, or the name alone when there is no address.
 *
 * When duplicates are found:
 * - The more complete record wins wholesale (ties keep the first seen)
 * - Empty fields of the winner are back-filled from the other record
 * - Qualification and CRM fields filled by hand are kept, the first seen taking precedence
 * - The lower id and the earliest date added survive, so persisted ids never change
 */

// Fields that decide which duplicate is "more complete"
const COMPLETENESS_FIELDS = ['address', 'phone_primary', 'email', 'house_count', 'source_url'] as const;

// Filled downstream, never by the scraper
const MANUAL_FIELDS = [
  'challenges', 'authority', 'budget', 'priority',
  'crm_status', 'crm_deal_id', 'manager', 'first_contact_date', 'last_contact_date',
  'next_contact_date', 'comments', 'outcome', 'sale_date', 'deal_amount', 'refusal_reason',
] as const;

function isPlaceholder(value: string | null): boolean {
  return isEmptyValue(value) || value === UNKNOWN || value === NOT_PROCESSED;
}

/**
 * Lowercase, drop punctuation (any script), collapse whitespace.
 */
export function normalizeKeyPart(value: string | null | undefined): string {
  if (!value) return '';
  return value
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function dedupKey(village: Village): string | null {
  const name = normalizeKeyPart(village.name);
  if (!name) return null;
  const address = normalizeKeyPart(village.address);
  return address ? `${name}\u0000${address}` : name;
}

export function completenessScore(village: Village): number {
  return COMPLETENESS_FIELDS.filter(field => !isEmptyValue(village[field])).length;
}

function minDefined<T extends number | string>(a: T | null, b: T | null): T | null {
  if (a === null) return b;
  if (b === null) return a;
  return a <= b ? a : b;
}

function maxDefined<T extends number | string>(a: T | null, b: T | null): T | null {
  if (a === null) return b;
  if (b === null) return a;
  return a >= b ? a : b;
}

/**
 * Merge two records sharing a key. `incumbent` is the one seen first.
 */
export function mergePair(incumbent: Village, challenger: Village): Village {
  const challengerWins = completenessScore(challenger) > completenessScore(incumbent);
  const winner = challengerWins ? challenger : incumbent;
  const loser = challengerWins ? incumbent : challenger;

  const merged: Village = { ...winner };
  for (const field of VILLAGE_FIELDS) {
    if (isEmptyValue(merged[field]) && !isEmptyValue(loser[field])) {
      Object.assign(merged, { [field]: loser[field] });
    }
  }

  for (const field of MANUAL_FIELDS) {
    if (!isPlaceholder(incumbent[field])) merged[field] = incumbent[field];
    else if (!isPlaceholder(challenger[field])) merged[field] = challenger[field];
  }

  merged.id = minDefined(incumbent.id, challenger.id);
  merged.date_added = minDefined(incumbent.date_added, challenger.date_added);
  merged.date_updated = maxDefined(incumbent.date_updated, challenger.date_updated);
  return merged;
}

/**
 * One record per dedup key, in first-seen order. Records without a usable name are dropped.
 */
export function mergeAll(villages: readonly Village[]): Village[] {
  const byKey = new Map<string, Village>();

  for (const village of villages) {
    const key = dedupKey(village);
    if (key === null) continue;

    const existing = byKey.get(key);
    byKey.set(key, existing ? mergePair(existing, village) : { ...village });
  }

  return [...byKey.values()];
}
