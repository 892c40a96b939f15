export function digitsOnly(raw: string): string {
  return raw.replace(/[^0-9]/g, "");
}

export function padNumber(value: string | number, width = 2): string {
  return String(value).padStart(width, "0");
}

/** Strips formatting from a property registration id ("0123.456-7" -> "01234567"). */
export function normalizePropertyId(raw: string): string {
  const clean = digitsOnly(raw);
  return clean.length < 8 ? clean.padStart(8, "0") : clean;
}

/**
 * Parses "1, 2 e 03" style selections into zero-padded, de-duplicated numbers
 * preserving the order given by the user. Returns null when nothing numeric is present.
 */
export function parseNumberSelection(raw: string, width = 2): string[] | null {
  if (!raw) return null;
  const matches = raw.match(/\d+/g) ?? [];
  if (matches.length === 0) return null;
  return Array.from(new Set(matches.map((value) => padNumber(Number.parseInt(value, 10), width))));
}

/** Parses "dd/MM/yyyy" into a UTC date; null for anything else. */
export function parseBrazilianDate(raw: string): Date | null {
  const match = /^(\d{2})\/(\d{2})\/(\d{4})$/.exec(raw.trim());
  if (!match) return null;
  const [, day, month, year] = match;
  const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)));
  return date.getUTCMonth() === Number(month) - 1 ? date : null;
}
