/**
 * Purchase Order Layout
 * Header candidates, template cell coordinates and cleanup ranges in one place.
 * Both the template and the generated sheet paths read from this object.
 */

import type { CanonicalField, LineField } from './purchase-order-line.vo';

export interface RowRange {
  start: number;
  count: number;
}

export interface PurchaseOrderLayout {
  /** Candidate header names per field, most preferred first */
  candidates: Record<CanonicalField, readonly string[]>;
  requiredFields: readonly CanonicalField[];
  /** Template cells that receive each value (blue cells) */
  cellMap: Record<LineField, readonly string[]>;
  /** Template cells emptied on every clone */
  clearCells: readonly string[];
  /** Rows removed from every clone */
  deleteRows: RowRange;
}

export const DEFAULT_HEADER_CANDIDATES: Record<CanonicalField, readonly string[]> = {
  controlNo: [
    'Control NO',
    'CONTROL NO',
    'Control No',
    'control no',
    'ControlNO',
    'Ctrl No',
    'Control code',
    'Control',
  ],
  itemNo: ['Item NO', 'ITEM NO', 'Item No', 'item no', 'Item code', '品番', '品番 / Item no'],
  barcode: ['Barcode', 'JAN', 'JAN code', 'JAN Code', 'JANコード'],
  qty: ['Qty', 'QTY', 'Quantity', '数量'],
  price: ['Price', '単価', 'Unit Price', 'Unit price'],
  delivery: ['Delivery time', 'Delivery', 'Delivery date', '納期'],
};

export const DEFAULT_LAYOUT: PurchaseOrderLayout = {
  candidates: DEFAULT_HEADER_CANDIDATES,
  requiredFields: ['controlNo', 'itemNo', 'barcode', 'qty', 'price', 'delivery'],
  cellMap: {
    controlNo: ['AD9'],
    itemNo: ['E16'],
    barcode: ['S16'],
    delivery: ['B28'],
    qty: ['AA24'],
    price: ['N30', 'N32'],
    amount: ['F37'],
  },
  clearCells: ['E18', 'E20', 'E24', 'N24', 'B26', 'A35', 'R37', 'F39'],
  deleteRows: { start: 60, count: 5 },
};

/** Write order for the cell map */
export const LINE_FIELD_ORDER: readonly LineField[] = [
  'controlNo',
  'itemNo',
  'barcode',
  'delivery',
  'qty',
  'price',
  'amount',
];
