import type { CanonicalLine } from '../../../domain/value-objects';

export const GROUP_KEY_SEPARATOR = '\u0001';

/**
 * Grouping key of a line. Exact match only: no case or full/half-width folding.
 */
export function groupingKey(line: Pick<CanonicalLine, 'controlNo' | 'itemNo'>): string {
  return `${line.controlNo.trim()}${GROUP_KEY_SEPARATOR}${line.itemNo.trim()}`;
}

/**
 * Keeps the first line of every (controlNo, itemNo) pair, in input order
 */
export function firstPerGroup<T extends Pick<CanonicalLine, 'controlNo' | 'itemNo'>>(
  lines: readonly T[],
): T[] {
  const seen = new Set<string>();
  const result: T[] = [];

  for (const line of lines) {
    const key = groupingKey(line);
    if (seen.has(key)) continue;
    seen.add(key);
    result.push(line);
  }

  return result;
}
