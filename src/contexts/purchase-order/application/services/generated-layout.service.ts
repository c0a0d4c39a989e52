import { Injectable } from '@nestjs/common';
import * as ExcelJS from 'exceljs';
import { FIELD_LABELS, type CanonicalLine, type SheetReport } from '../../domain/value-objects';
import type { MaterializeResult } from './template-materializer.service';
import { sanitizeSheetTitle, uniqueSheetTitle } from './utils/sheet-title';

export const GENERATED_SHEET_TITLE = 'Purchase Order';

export const COLUMN_WIDTH_BOUNDS = { min: 10, max: 50 } as const;

export const NUMBER_FORMATS = {
  qty: '#,##0',
  price: '#,##0.000',
  amount: '"¥"#,##0.00',
} as const;

const COLORS = {
  headerBg: 'FFDDEBF7',
  border: 'FF9BA5B4',
};

const TABLE_HEADER_ROW = 6;
const TABLE_VALUE_ROW = 7;

const FULL_WIDTH = /[\u1100-\u115F\u2E80-\uA4CF\uAC00-\uD7A3\uF900-\uFAFF\uFE30-\uFE4F\uFF00-\uFF60\uFFE0-\uFFE6]/;

const integerFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });
const priceFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 3,
  maximumFractionDigits: 3,
});
const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Display width of a rendered value; full-width characters take two columns
 */
export function displayWidth(text: string): number {
  let width = 0;
  for (const ch of text) {
    width += FULL_WIDTH.test(ch) ? 2 : 1;
  }
  return width;
}

/**
 * Generated Layout
 * Builds purchase order sheets without a template: title, header block, one-row item table.
 */
@Injectable()
export class GeneratedLayoutService {
  build(lines: readonly CanonicalLine[]): { workbook: ExcelJS.Workbook; result: MaterializeResult } {
    const workbook = new ExcelJS.Workbook();
    const sheets: SheetReport[] = [];

    for (const line of lines) {
      const title = uniqueSheetTitle(
        sanitizeSheetTitle(`${line.controlNo}_${line.itemNo}`),
        workbook.worksheets.map((ws) => ws.name),
      );
      const sheet = workbook.addWorksheet(title);
      this.renderLine(sheet, line);

      sheets.push({
        title: sheet.name,
        controlNo: line.controlNo,
        itemNo: line.itemNo,
        operations: [],
        skippedCount: 0,
      });
    }

    return {
      workbook,
      result: { sheets, sheetTitles: sheets.map((s) => s.title), templateRemoval: null },
    };
  }

  private renderLine(sheet: ExcelJS.Worksheet, line: CanonicalLine): void {
    const widths: number[] = [];
    const track = (col: number, text: string) => {
      widths[col] = Math.max(widths[col] ?? 0, displayWidth(text));
    };

    // Title
    sheet.mergeCells('A1:E1');
    const titleCell = sheet.getCell('A1');
    titleCell.value = GENERATED_SHEET_TITLE;
    titleCell.font = { size: 16, bold: true };
    titleCell.alignment = { horizontal: 'center', vertical: 'middle' };
    sheet.getRow(1).height = 28;

    // Header block
    const headerBlock: Array<[string, string]> = [
      [FIELD_LABELS.controlNo, line.controlNo],
      [FIELD_LABELS.delivery, line.delivery],
    ];
    headerBlock.forEach(([label, value], idx) => {
      const row = sheet.getRow(3 + idx);
      row.getCell(1).value = label;
      row.getCell(1).font = { bold: true };
      row.getCell(2).value = value;
      track(1, label);
      track(2, value);
    });

    // Item table
    const columns: Array<{ label: string; value: string | number | null; numFmt?: string; text: string }> = [
      { label: FIELD_LABELS.itemNo, value: line.itemNo, text: line.itemNo },
      { label: FIELD_LABELS.barcode, value: line.barcode, text: line.barcode },
      {
        label: FIELD_LABELS.qty,
        value: line.qty,
        numFmt: NUMBER_FORMATS.qty,
        text: line.qty === null ? '' : integerFormat.format(line.qty),
      },
      {
        label: FIELD_LABELS.price,
        value: line.price,
        numFmt: NUMBER_FORMATS.price,
        text: line.price === null ? '' : priceFormat.format(line.price),
      },
      {
        label: FIELD_LABELS.amount,
        value: line.amount,
        numFmt: NUMBER_FORMATS.amount,
        text: `¥${amountFormat.format(line.amount)}`,
      },
    ];

    const headerRow = sheet.getRow(TABLE_HEADER_ROW);
    const valueRow = sheet.getRow(TABLE_VALUE_ROW);
    const border: Partial<ExcelJS.Borders> = {
      top: { style: 'thin', color: { argb: COLORS.border } },
      left: { style: 'thin', color: { argb: COLORS.border } },
      bottom: { style: 'thin', color: { argb: COLORS.border } },
      right: { style: 'thin', color: { argb: COLORS.border } },
    };

    columns.forEach((column, idx) => {
      const col = idx + 1;

      const head = headerRow.getCell(col);
      head.value = column.label;
      head.font = { bold: true };
      head.fill = { type: 'pattern', pattern: 'solid', fgColor: { argb: COLORS.headerBg } };
      head.alignment = { horizontal: 'center', vertical: 'middle' };
      head.border = border;

      const cell = valueRow.getCell(col);
      cell.value = column.value;
      cell.border = border;
      if (column.numFmt) {
        cell.numFmt = column.numFmt;
        cell.alignment = { horizontal: 'right' };
      }

      track(col, column.label);
      track(col, column.text);
    });

    for (let col = 1; col <= columns.length; col++) {
      sheet.getColumn(col).width = Math.min(
        COLUMN_WIDTH_BOUNDS.max,
        Math.max(COLUMN_WIDTH_BOUNDS.min, (widths[col] ?? 0) + 2),
      );
    }
  }
}
