import type {
  CanonicalLine,
  ColumnMap,
  InputRecord,
} from '../../../domain/value-objects';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)(e[+-]?\d+)?$/i;

function parseDecimal(text: string): number | null {
  if (!DECIMAL_PATTERN.test(text)) return null;
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : null;
}

function isBlank(value: unknown): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === 'number') return Number.isNaN(value);
  if (typeof value === 'string') return value.trim() === '';
  return false;
}

/**
 * Parses localized amounts such as "¥6,000", "￥ 1 200" or full-width "６，０００".
 * Blank input is absent (null), and anything unparseable is null as well.
 */
export function parseAmount(value: unknown): number | null {
  if (isBlank(value)) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;

  // NFKC folds full-width forms to ASCII
  const cleaned = String(value)
    .normalize('NFKC')
    .replace(/,/g, '')
    .replace(/[￥¥]/g, '')
    .trim();

  return parseDecimal(cleaned) ?? parseDecimal(cleaned.replace(/\s+/g, ''));
}

/**
 * Round half to even: 2.5 → 2, 3.5 → 4, -2.5 → -2
 */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function toInteger(value: unknown): number | null {
  const parsed = parseAmount(value);
  return parsed === null ? null : roundHalfEven(parsed);
}

export function toText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (value instanceof Date) return value.toISOString().split('T')[0];
  return String(value).trim();
}

/** Missing quantity or price counts as zero */
export function computeAmount(qty: number | null, price: number | null): number {
  return (qty ?? 0) * (price ?? 0);
}

export function toCanonicalLine(record: InputRecord, columns: ColumnMap): CanonicalLine {
  const qty = toInteger(record[columns.qty]);
  const price = parseAmount(record[columns.price]);

  return {
    controlNo: toText(record[columns.controlNo]),
    itemNo: toText(record[columns.itemNo]),
    barcode: toText(record[columns.barcode]),
    qty,
    price,
    delivery: toText(record[columns.delivery]),
    amount: computeAmount(qty, price),
  };
}
