import * as ExcelJS from 'exceljs';

const MAX_COLUMN = 16384; // XFD
const MAX_ROW = 1048576;

/**
 * Loads an xlsx/xlsm buffer into a new exceljs workbook
 */
export async function loadWorkbook(buffer: Buffer): Promise<ExcelJS.Workbook> {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.load(buffer as unknown as ExcelJS.Buffer);
  return workbook;
}

export async function writeWorkbook(workbook: ExcelJS.Workbook): Promise<Buffer> {
  const output = await workbook.xlsx.writeBuffer();
  return Buffer.from(output);
}

/**
 * Plain value of a cell: rich text joined, formula result, hyperlink text
 */
export function extractCellValue(cell: ExcelJS.Cell): unknown {
  const value = cell.value;

  if (value === null || value === undefined) {
    return null;
  }

  if (value instanceof Date) {
    return value;
  }

  if (typeof value === 'object') {
    if ('richText' in value) {
      return value.richText.map((t) => t.text).join('');
    }
    if ('formula' in value || 'sharedFormula' in value) {
      return 'result' in value && value.result !== undefined && !isErrorValue(value.result)
        ? value.result
        : null;
    }
    if ('hyperlink' in value) {
      return value.text;
    }
    if ('error' in value) {
      return null;
    }
  }

  return value;
}

function isErrorValue(value: unknown): boolean {
  return typeof value === 'object' && value !== null && 'error' in value;
}

export function columnLetterToNumber(letters: string): number {
  let result = 0;
  for (const ch of letters.toUpperCase()) {
    result = result * 26 + (ch.charCodeAt(0) - 64);
  }
  return result;
}

/**
 * A1-style address inside the sheet bounds ("AD9", "$E$16")
 */
export function isValidCellAddress(address: string): boolean {
  const match = /^\$?([A-Za-z]{1,3})\$?(\d+)$/.exec(address.trim());
  if (!match) return false;
  const col = columnLetterToNumber(match[1]);
  const row = Number(match[2]);
  return col >= 1 && col <= MAX_COLUMN && row >= 1 && row <= MAX_ROW;
}
