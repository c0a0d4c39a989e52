import type { CanonicalField, ColumnMap } from './purchase-order-line.vo';

export type MatchPass = 'exact' | 'case_insensitive' | 'substring' | 'manual';

export interface FieldMatch {
  field: CanonicalField;
  header: string | null;
  pass: MatchPass | null;
}

export interface FieldResolutionVO {
  headers: string[];
  matches: FieldMatch[];
  /** Partial map of everything that was matched */
  guesses: Partial<Record<CanonicalField, string>>;
  missing: CanonicalField[];
}

export type FieldOverrides = Partial<Record<CanonicalField, string>>;

/**
 * Returns the complete column map once nothing is missing
 */
export function toColumnMap(resolution: FieldResolutionVO): ColumnMap | null {
  const { guesses } = resolution;
  if (
    resolution.missing.length > 0 ||
    guesses.controlNo === undefined ||
    guesses.itemNo === undefined ||
    guesses.barcode === undefined ||
    guesses.qty === undefined ||
    guesses.price === undefined ||
    guesses.delivery === undefined
  ) {
    return null;
  }

  return {
    controlNo: guesses.controlNo,
    itemNo: guesses.itemNo,
    barcode: guesses.barcode,
    qty: guesses.qty,
    price: guesses.price,
    delivery: guesses.delivery,
  };
}
