/**
 * Purchase Order Line Value Objects
 * Raw source rows and the typed line every generated sheet is built from
 */

// ============================================
// Canonical Fields
// ============================================

export const CANONICAL_FIELDS = [
  'controlNo',
  'itemNo',
  'barcode',
  'qty',
  'price',
  'delivery',
] as const;

export type CanonicalField = (typeof CANONICAL_FIELDS)[number];

/** Fields written to a sheet: the canonical fields plus the derived amount */
export type LineField = CanonicalField | 'amount';

export const FIELD_LABELS: Record<LineField, string> = {
  controlNo: 'Control No',
  itemNo: 'Item No',
  barcode: 'Barcode',
  qty: 'Qty',
  price: 'Unit Price',
  delivery: 'Delivery',
  amount: 'Amount',
};

// ============================================
// Records & Lines
// ============================================

/** One source row: header → raw cell value */
export type InputRecord = Record<string, unknown>;

/** Header chosen for each canonical field */
export type ColumnMap = Record<CanonicalField, string>;

export interface CanonicalLine {
  controlNo: string;
  itemNo: string;
  barcode: string;
  qty: number | null;
  price: number | null;
  delivery: string;
  amount: number;
}

export interface ManualLineEntry {
  controlNo: string;
  itemNo: string;
  barcode?: string | null;
  qty?: string | number | null;
  price?: string | number | null;
  delivery?: string | null;
}

/**
 * Manual entries are stored under the canonical field names,
 * so their column map is the identity.
 */
export const MANUAL_ENTRY_COLUMNS: ColumnMap = {
  controlNo: 'controlNo',
  itemNo: 'itemNo',
  barcode: 'barcode',
  qty: 'qty',
  price: 'price',
  delivery: 'delivery',
};
