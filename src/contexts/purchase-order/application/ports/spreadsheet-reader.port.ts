/**
 * Tabular content of one sheet, cut at the header row
 */
export interface SheetTable {
  sheetName: string;
  /** Raw header cells, one per column */
  headers: unknown[];
  /** Data rows below the header, aligned with `headers` */
  rows: unknown[][];
}

export interface ReadSheetOptions {
  sheetName?: string;
  /** 1-based header row */
  headerRow?: number;
}

/**
 * Spreadsheet Reader Port
 */
export interface SpreadsheetReaderPort {
  /**
   * Reads one sheet of an uploaded workbook below its header row
   */
  readSheet(buffer: Buffer, options?: ReadSheetOptions): Promise<SheetTable>;

  getSheetNames(buffer: Buffer): Promise<string[]>;
}

export const SPREADSHEET_READER_PORT = Symbol('SPREADSHEET_READER_PORT');
