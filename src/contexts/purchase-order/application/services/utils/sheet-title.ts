export const MAX_SHEET_TITLE_LENGTH = 31;

const INVALID_SHEET_CHARS = /[:\\/?*[\]]/g;

// exceljs rejects this name for user worksheets
const RESERVED_TITLES = new Set(['history']);

export function sanitizeSheetTitle(title: string): string {
  const cleaned = String(title).replace(INVALID_SHEET_CHARS, '-').trim() || 'Sheet';
  return cleaned.slice(0, MAX_SHEET_TITLE_LENGTH);
}

/**
 * Makes a sanitized title acceptable next to the existing sheet names.
 * Names compare case-insensitively; a taken name gets the first free numeric suffix.
 */
export function uniqueSheetTitle(title: string, taken: Iterable<string>): string {
  const base = title.replace(/^'|'$/g, '-');
  const used = new Set<string>(RESERVED_TITLES);
  for (const name of taken) {
    used.add(name.toLowerCase());
  }

  if (!used.has(base.toLowerCase())) return base;

  for (let n = 1; ; n++) {
    const suffix = String(n);
    const candidate = base.slice(0, MAX_SHEET_TITLE_LENGTH - suffix.length) + suffix;
    if (!used.has(candidate.toLowerCase())) return candidate;
  }
}
