import { Injectable } from '@nestjs/common';
import type * as ExcelJS from 'exceljs';
import {
  DEFAULT_LAYOUT,
  LINE_FIELD_ORDER,
  attemptOperation,
  countSkipped,
  type CanonicalLine,
  type CellOperationResult,
  type PurchaseOrderLayout,
  type SheetReport,
} from '../../domain/value-objects';
import { TemplateLoadException } from '../errors/purchase-order.errors';
import { isValidCellAddress } from './utils/excel-utils';
import { sanitizeSheetTitle, uniqueSheetTitle } from './utils/sheet-title';

export interface TemplateMaterializeOptions {
  removeTemplateSheet: boolean;
}

export interface MaterializeResult {
  sheets: SheetReport[];
  sheetTitles: string[];
  templateRemoval: CellOperationResult | null;
}

/**
 * Template Materializer
 *
 * One clone of the reference sheet per line:
 * 1. copy the reference sheet model (values, styles, merges, images, page setup)
 * 2. write the line into the mapped cells
 * 3. clear the auxiliary cells
 * 4. delete the reserved row range
 * Every step is best-effort; failures are reported per operation and never abort the run.
 */
@Injectable()
export class TemplateMaterializerService {
  /**
   * Named sheet if given, else the workbook's active sheet, else the first one
   */
  selectReferenceSheet(workbook: ExcelJS.Workbook, sheetName?: string): ExcelJS.Worksheet {
    const sheetNames = workbook.worksheets.map((ws) => ws.name);
    const requested = sheetName?.trim();

    if (requested) {
      const named = workbook.getWorksheet(requested);
      if (!named) {
        throw new TemplateLoadException(
          `Template sheet "${requested}" not found (available: ${sheetNames.join(', ') || 'none'})`,
        );
      }
      return named;
    }

    const reference = workbook.worksheets[this.activeTabIndex(workbook)] ?? workbook.worksheets[0];
    if (!reference) {
      throw new TemplateLoadException('The template workbook contains no sheets');
    }
    return reference;
  }

  materialize(
    workbook: ExcelJS.Workbook,
    reference: ExcelJS.Worksheet,
    lines: readonly CanonicalLine[],
    options: TemplateMaterializeOptions,
    layout: PurchaseOrderLayout = DEFAULT_LAYOUT,
  ): MaterializeResult {
    const sheets: SheetReport[] = [];

    for (const line of lines) {
      const title = uniqueSheetTitle(
        sanitizeSheetTitle(`${line.controlNo}_${line.itemNo}`),
        workbook.worksheets.map((ws) => ws.name),
      );
      const sheet = this.cloneSheet(workbook, reference, title);

      const operations = [
        ...this.writeLine(sheet, line, layout),
        ...this.clearCells(sheet, layout.clearCells),
        this.deleteRows(sheet, layout),
      ];

      sheets.push({
        title: sheet.name,
        controlNo: line.controlNo,
        itemNo: line.itemNo,
        operations,
        skippedCount: countSkipped(operations),
      });
    }

    const templateRemoval = options.removeTemplateSheet
      ? this.removeReference(workbook, reference)
      : null;

    return { sheets, sheetTitles: sheets.map((s) => s.title), templateRemoval };
  }

  private cloneSheet(
    workbook: ExcelJS.Workbook,
    reference: ExcelJS.Worksheet,
    title: string,
  ): ExcelJS.Worksheet {
    const sheet = workbook.addWorksheet(title);
    const model = reference.model;

    // the model getter lists merged ranges as `merges`, the setter reads `mergeCells`
    const merges =
      'merges' in model && Array.isArray(model.merges)
        ? model.merges.filter((range): range is string => typeof range === 'string')
        : [];

    const cloned = { ...model, id: sheet.id, name: title, mergeCells: merges };
    sheet.model = cloned;
    return sheet;
  }

  private writeLine(
    sheet: ExcelJS.Worksheet,
    line: CanonicalLine,
    layout: PurchaseOrderLayout,
  ): CellOperationResult[] {
    const results: CellOperationResult[] = [];

    for (const field of LINE_FIELD_ORDER) {
      const value = line[field];
      for (const address of layout.cellMap[field]) {
        results.push(
          this.onCell(sheet, 'write', address, (cell) => {
            cell.value = value;
          }),
        );
      }
    }

    return results;
  }

  private clearCells(sheet: ExcelJS.Worksheet, addresses: readonly string[]): CellOperationResult[] {
    return addresses.map((address) =>
      this.onCell(sheet, 'clear', address, (cell) => {
        cell.value = null;
      }),
    );
  }

  private deleteRows(sheet: ExcelJS.Worksheet, layout: PurchaseOrderLayout): CellOperationResult {
    const { start, count } = layout.deleteRows;
    const target = `${start}:${start + count - 1}`;

    if (!Number.isInteger(start) || !Number.isInteger(count) || start < 1 || count < 1) {
      return { operation: 'delete_rows', target, status: 'skipped', reason: 'invalid row range' };
    }
    if (sheet.rowCount < start) {
      return { operation: 'delete_rows', target, status: 'skipped', reason: 'rows do not exist' };
    }

    return attemptOperation('delete_rows', target, () => sheet.spliceRows(start, count));
  }

  private removeReference(
    workbook: ExcelJS.Workbook,
    reference: ExcelJS.Worksheet,
  ): CellOperationResult {
    if (workbook.worksheets.length <= 1) {
      console.warn('[TemplateMaterializer] Reference sheet kept: it is the only sheet left');
      return {
        operation: 'remove_sheet',
        target: reference.name,
        status: 'skipped',
        reason: 'the workbook would have no sheets left',
      };
    }

    return attemptOperation('remove_sheet', reference.name, () =>
      workbook.removeWorksheet(reference.id),
    );
  }

  private onCell(
    sheet: ExcelJS.Worksheet,
    operation: 'write' | 'clear',
    address: string,
    apply: (cell: ExcelJS.Cell) => void,
  ): CellOperationResult {
    if (!isValidCellAddress(address)) {
      return { operation, target: address, status: 'skipped', reason: 'invalid cell address' };
    }
    return attemptOperation(operation, address, () => {
      const cell = sheet.getCell(address.trim().replace(/\$/g, '').toUpperCase());
      // exceljs forwards writes on a merged cell to the range's top-left cell
      if (cell.isMerged && cell.master !== cell) {
        throw new Error('merged cell');
      }
      apply(cell);
    });
  }

  private activeTabIndex(workbook: ExcelJS.Workbook): number {
    const view = workbook.views?.[0];
    if (view && 'activeTab' in view && typeof view.activeTab === 'number') {
      return view.activeTab;
    }
    return 0;
  }
}
