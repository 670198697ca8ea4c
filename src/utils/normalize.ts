const LEGAL_SUFFIX_PATTERN =
  /(?:,\s*|\s+)(?:llc|l\.l\.c|inc|incorporated|corp|corporation|ltd|limited|lp|l\.p|co|company)\.?$/i;

const collapseWhitespace = (value: string) => value.replace(/\s+/g, ' ').trim();

export const normalizeEmail = (value: string | null | undefined): string | null => {
  if (!value) return null;
  const email = value.trim().toLowerCase();
  return email || null;
};

/**
 * Digits only, with a leading US country code dropped from 11-digit numbers:
 * "+1 (713) 555-1234" -> "7135551234".
 */
export const normalizePhone = (value: string | null | undefined): string | null => {
  if (!value) return null;
  let digits = value.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  return digits || null;
};

/**
 * Dedup key for companies. Strips legal entity suffixes only, so
 * "ABC Lending, LLC" and "abc lending" collide while "XYZ Holdings" keeps its
 * business word.
 */
export const normalizeCompanyName = (name: string): string => {
  let result = collapseWhitespace(name.toLowerCase());
  let previous = '';
  while (result !== previous) {
    previous = result;
    result = result.replace(LEGAL_SUFFIX_PATTERN, '').replace(/[,\s]+$/, '');
  }
  return result;
};

export const normalizePersonName = (value: string) => collapseWhitespace(value.toLowerCase());
