import * as ExcelJS from 'exceljs';
import { DEFAULT_LAYOUT } from '../domain/value-objects';
import { writeWorkbook } from '../application/services/utils/excel-utils';

export const TEMPLATE_SHEET = 'Template';
export const TEMPLATE_ROW_COUNT = 70;
/** Column holding a "row N" marker on every template row */
export const MARKER_COLUMN = 'AH';

export const STANDARD_HEADERS = ['Control NO', 'Item NO', 'JAN', 'Qty', 'Price', 'Delivery'];

/**
 * Purchase order template: a marker on rows 1-70, placeholders in the
 * mapped cells, stale text in the cells that get cleared, one merged title.
 */
export function buildTemplateWorkbook(extraSheets: string[] = []): ExcelJS.Workbook {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(TEMPLATE_SHEET);

  for (let row = 1; row <= TEMPLATE_ROW_COUNT; row++) {
    sheet.getCell(`${MARKER_COLUMN}${row}`).value = `row ${row}`;
  }

  sheet.getCell('B2').value = 'PURCHASE ORDER';
  sheet.mergeCells('B2:D2');

  for (const addresses of Object.values(DEFAULT_LAYOUT.cellMap)) {
    for (const address of addresses) {
      sheet.getCell(address).value = 'placeholder';
    }
  }
  for (const address of DEFAULT_LAYOUT.clearCells) {
    sheet.getCell(address).value = 'stale';
  }

  for (const name of extraSheets) {
    workbook.addWorksheet(name).getCell('A1').value = name;
  }

  return workbook;
}

export function buildTemplateBuffer(extraSheets: string[] = []): Promise<Buffer> {
  return writeWorkbook(buildTemplateWorkbook(extraSheets));
}

export function buildInputBuffer(
  rows: unknown[][],
  headers: string[] = STANDARD_HEADERS,
  sheetName = 'Orders',
): Promise<Buffer> {
  const workbook = new ExcelJS.Workbook();
  const sheet = workbook.addWorksheet(sheetName);
  sheet.addRow(headers);
  for (const row of rows) {
    sheet.addRow(row);
  }
  return writeWorkbook(workbook);
}
