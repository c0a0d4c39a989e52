/**
 * Normalizes a column header: NBSP and line breaks become spaces,
 * whitespace runs collapse, ends are trimmed.
 */
export function normalizeHeader(raw: unknown): string {
  if (raw === null || raw === undefined) return '';
  return String(raw)
    .replace(/\u00A0/g, ' ')
    .replace(/[\r\n]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

export function normalizeHeaders(raw: readonly unknown[]): string[] {
  return raw.map(normalizeHeader);
}

/**
 * Normalizes headers and makes them usable as record keys:
 * a blank header at column n becomes "Column{n}", repeats get ".1", ".2", ...
 */
export function toUniqueHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>();

  return normalizeHeaders(raw).map((header, index) => {
    const base = header || `Column${index + 1}`;
    const count = seen.get(base) ?? 0;
    seen.set(base, count + 1);
    if (count === 0) return base;

    let suffix = count;
    let candidate = `${base}.${suffix}`;
    while (seen.has(candidate)) {
      suffix++;
      candidate = `${base}.${suffix}`;
    }
    seen.set(candidate, 1);
    return candidate;
  });
}
