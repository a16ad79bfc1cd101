/**
 * Every textual form a phone number may appear as, in the order the export
 * tool and contact stores are most likely to use. Numbers that fit no known
 * shape yield only the untouched input.
 */
export function phoneVariants(raw: string): string[] {
  const cleaned = raw.replace(/[^\d+]/g, '');
  const variants: string[] = [];

  if (cleaned.startsWith('+1') && cleaned.length === 12) {
    const national = cleaned.slice(2);
    variants.push(cleaned, national, `1${national}`);
  } else if (cleaned.startsWith('1') && cleaned.length === 11) {
    variants.push(`+${cleaned}`, cleaned, cleaned.slice(1));
  } else if (cleaned.length === 10) {
    variants.push(`+1${cleaned}`, `1${cleaned}`, cleaned);
  } else if (cleaned.startsWith('+')) {
    // International numbers are kept as-is
    variants.push(cleaned);
  }

  if (!variants.includes(raw)) {
    variants.push(raw);
  }

  return variants.filter(v => v.length > 0);
}

/** Normalize an email address (lowercase, trim). */
export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}
