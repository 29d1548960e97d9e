/**
 * Canadian postal code helpers.
 *
 * A postal code is six alternating letters and digits (`K1A0B1`), commonly
 * written with a space after the forward sortation area (`K1A 0B1`).
 */

const POSTAL_CODE_PATTERN = /^[A-Z]\d[A-Z]\d[A-Z]\d$/;

// Forward sortation areas starting with these letters belong to Ontario
export const ONTARIO_FSA_PREFIXES = ['K', 'L', 'M', 'N', 'P'] as const;

/** Strips whitespace and upper-cases; does not validate. */
export function normalizePostalCode(raw: string): string {
  return raw.replace(/\s+/g, '').toUpperCase();
}

export function isWellFormedPostalCode(raw: string): boolean {
  return POSTAL_CODE_PATTERN.test(normalizePostalCode(raw));
}

/** The forward sortation area: first three characters of a normalised code. */
export function forwardSortationArea(postalCode: string): string {
  return normalizePostalCode(postalCode).slice(0, 3);
}

export function isOntarioPostalCode(postalCode: string): boolean {
  const first = normalizePostalCode(postalCode).charAt(0);
  return ONTARIO_FSA_PREFIXES.some(prefix => prefix === first);
}

/** Formats a normalised code the way it is printed on mail: `K1A 0B1`. */
export function formatPostalCode(postalCode: string): string {
  const normalized = normalizePostalCode(postalCode);
  return normalized.length === 6 ? `${normalized.slice(0, 3)} ${normalized.slice(3)}` : normalized;
}
