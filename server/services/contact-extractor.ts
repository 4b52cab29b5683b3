// ============================================
// PHONE EXTRACTION & NORMALIZATION
// ============================================

/**
 * Ordered: +7 with optional separators, +7 followed by ten digits,
 * 8-prefixed, bare ten digits.
 */
export const PHONE_PATTERNS: readonly RegExp[] = [
  /\+?7\s?\(?\d{3}\)?\s?\d{3}[- ]?\d{2}[- ]?\d{2}/,
  /\+?7\s?\d{10}/,
  /8\s?\(?\d{3}\)?\s?\d{3}[- ]?\d{2}[- ]?\d{2}/,
  /\d{3}[- ]?\d{3}[- ]?\d{2}[- ]?\d{2}/,
];

// Listing sites print "+7 (495) 1xx-xx-xx" until the reveal button is clicked
const MASKED_PHONE_PATTERNS: readonly RegExp[] = [
  /[xх]-[xх]{2}/i,
  /\d-[xх]\d/i,
  /\d[xх]{2}-/i,
];

const CANONICAL_PHONE = /^\+7\d{10}$/;

export function isMaskedPhoneText(text: string): boolean {
  return MASKED_PHONE_PATTERNS.some(p => p.test(text));
}

/**
 * First raw phone-looking substring, or null.
 */
export function findPhone(text: string | null | undefined): string | null {
  if (!text) return null;
  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (match) return match[0].trim();
  }
  return null;
}

/**
 * Canonical +7XXXXXXXXXX form, or '' when the input cannot be one.
 */
export function normalizePhone(raw: string | null | undefined): string {
  if (!raw) return '';

  const cleaned = raw.replace(/[^\d+]/g, '');
  const digits = cleaned.replace(/\+/g, '');

  let phone: string;
  if (cleaned.startsWith('+7')) {
    phone = '+' + digits;
  } else if (digits.startsWith('8') && digits.length === 11) {
    phone = '+7' + digits.slice(1);
  } else if (digits.startsWith('7') && digits.length === 11) {
    phone = '+' + digits;
  } else {
    phone = '+7' + digits;
  }

  return CANONICAL_PHONE.test(phone) ? phone : '';
}

/**
 * Extract and normalize the first usable phone from free text.
 * Text carrying a masked number yields nothing.
 */
export function extractPhone(text: string | null | undefined): string | null {
  if (!text || isMaskedPhoneText(text)) return null;

  for (const pattern of PHONE_PATTERNS) {
    const match = text.match(pattern);
    if (!match) continue;
    const phone = normalizePhone(match[0]);
    if (phone) return phone;
  }
  return null;
}

// ============================================
// EMAIL EXTRACTION
// ============================================

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}\b/;

export function isServiceEmail(email: string, excludedDomain?: string | null): boolean {
  const lower = email.toLowerCase();
  if (lower.includes('support')) return true;
  return Boolean(excludedDomain && lower.includes(excludedDomain.toLowerCase()));
}

export function extractEmail(text: string | null | undefined, excludedDomain?: string | null): string | null {
  if (!text) return null;
  const match = text.match(EMAIL_PATTERN);
  if (!match) return null;
  return isServiceEmail(match[0], excludedDomain) ? null : match[0];
}
