import { Injectable } from '@nestjs/common';
import type * as ExcelJS from 'exceljs';
import type {
  ReadSheetOptions,
  SheetTable,
  SpreadsheetReaderPort,
} from '../../application/ports';
import { InputAcquisitionException } from '../../application/errors/purchase-order.errors';
import {
  extractCellValue,
  loadWorkbook,
} from '../../application/services/utils/excel-utils';

@Injectable()
export class ExceljsReaderAdapter implements SpreadsheetReaderPort {
  async readSheet(buffer: Buffer, options: ReadSheetOptions = {}): Promise<SheetTable> {
    const workbook = await this.load(buffer);
    const sheetNames = workbook.worksheets.map((ws) => ws.name);

    const targetSheet = options.sheetName?.trim() || sheetNames[0];
    const worksheet = targetSheet ? workbook.getWorksheet(targetSheet) : undefined;

    if (!worksheet) {
      throw new InputAcquisitionException(
        `Could not read sheet "${targetSheet ?? ''}": not found (available: ${sheetNames.join(', ') || 'none'})`,
      );
    }

    const headerRow = options.headerRow ?? 1;
    if (headerRow > worksheet.rowCount) {
      throw new InputAcquisitionException(
        `Sheet "${worksheet.name}" has no row ${headerRow} to read headers from`,
      );
    }

    const colCount = this.countColumns(worksheet, headerRow);
    const headers = this.readRow(worksheet.getRow(headerRow), colCount);
    const rows: unknown[][] = [];

    worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber <= headerRow) return;
      const values = this.readRow(row, colCount);
      if (values.some((v) => v !== null && String(v).trim() !== '')) {
        rows.push(values);
      }
    });

    return { sheetName: worksheet.name, headers, rows };
  }

  async getSheetNames(buffer: Buffer): Promise<string[]> {
    const workbook = await this.load(buffer);
    return workbook.worksheets.map((ws) => ws.name);
  }

  private async load(buffer: Buffer): Promise<ExcelJS.Workbook> {
    try {
      return await loadWorkbook(buffer);
    } catch (error) {
      throw new InputAcquisitionException(
        `Could not open the input workbook: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }

  /**
   * Widest row from the header down, so data under blank headers is kept
   */
  private countColumns(worksheet: ExcelJS.Worksheet, headerRow: number): number {
    let maxCol = 0;
    worksheet.eachRow({ includeEmpty: false }, (row, rowNumber) => {
      if (rowNumber < headerRow) return;
      row.eachCell({ includeEmpty: false }, (_cell, colNumber) => {
        maxCol = Math.max(maxCol, colNumber);
      });
    });
    return maxCol;
  }

  private readRow(row: ExcelJS.Row, colCount: number): unknown[] {
    const values: unknown[] = [];
    for (let col = 1; col <= colCount; col++) {
      values.push(extractCellValue(row.getCell(col)));
    }
    return values;
  }
}
