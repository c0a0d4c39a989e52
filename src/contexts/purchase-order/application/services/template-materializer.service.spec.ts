import type * as ExcelJS from 'exceljs';
import { DEFAULT_LAYOUT, type CanonicalLine } from '../../domain/value-objects';
import { TemplateLoadException } from '../errors/purchase-order.errors';
import {
  MARKER_COLUMN,
  TEMPLATE_SHEET,
  buildTemplateBuffer,
  buildTemplateWorkbook,
} from '../../test/workbook.fixture';
import { TemplateMaterializerService } from './template-materializer.service';
import { loadWorkbook, writeWorkbook } from './utils/excel-utils';

const line = (
  controlNo: string,
  itemNo: string,
  overrides: Partial<CanonicalLine> = {},
): CanonicalLine => ({
  controlNo,
  itemNo,
  barcode: '4900000000017',
  qty: 12,
  price: 60.5,
  delivery: '2024-11-30',
  amount: 726,
  ...overrides,
});

function requireSheet(workbook: ExcelJS.Workbook, name: string): ExcelJS.Worksheet {
  const sheet = workbook.getWorksheet(name);
  if (!sheet) throw new Error(`missing sheet ${name}`);
  return sheet;
}

describe('TemplateMaterializerService', () => {
  const materializer = new TemplateMaterializerService();

  beforeEach(() => {
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  async function loadTemplate(extraSheets: string[] = []) {
    const workbook = await loadWorkbook(await buildTemplateBuffer(extraSheets));
    return { workbook, reference: materializer.selectReferenceSheet(workbook) };
  }

  describe('selectReferenceSheet', () => {
    it('picks the named sheet', async () => {
      const { workbook } = await loadTemplate(['Notes']);

      expect(materializer.selectReferenceSheet(workbook, 'Notes').name).toBe('Notes');
    });

    it('falls back to the active sheet', async () => {
      const { workbook, reference } = await loadTemplate(['Notes']);

      expect(reference.name).toBe(TEMPLATE_SHEET);
      expect(workbook.worksheets).toHaveLength(2);
    });

    it('rejects a sheet name the template does not have', async () => {
      const { workbook } = await loadTemplate();

      expect(() => materializer.selectReferenceSheet(workbook, 'Nope')).toThrow(
        TemplateLoadException,
      );
    });
  });

  it('writes the line into the mapped cells and clears the stale ones', async () => {
    const { workbook, reference } = await loadTemplate();

    materializer.materialize(workbook, reference, [line('C1', 'I1')], {
      removeTemplateSheet: false,
    });
    const sheet = requireSheet(workbook, 'C1_I1');

    expect(sheet.getCell('AD9').value).toBe('C1');
    expect(sheet.getCell('E16').value).toBe('I1');
    expect(sheet.getCell('S16').value).toBe('4900000000017');
    expect(sheet.getCell('B28').value).toBe('2024-11-30');
    expect(sheet.getCell('AA24').value).toBe(12);
    expect(sheet.getCell('N30').value).toBe(60.5);
    expect(sheet.getCell('N32').value).toBe(60.5);
    expect(sheet.getCell('F37').value).toBe(726);
    for (const address of DEFAULT_LAYOUT.clearCells) {
      expect(sheet.getCell(address).value).toBeNull();
    }
  });

  it('keeps the template content and merged ranges on the clone', async () => {
    const { workbook, reference } = await loadTemplate();

    materializer.materialize(workbook, reference, [line('C1', 'I1')], {
      removeTemplateSheet: false,
    });
    const sheet = requireSheet(workbook, 'C1_I1');

    expect(sheet.getCell('B2').value).toBe('PURCHASE ORDER');
    expect(sheet.getCell('C2').isMerged).toBe(true);
    expect(reference.getCell('AD9').value).toBe('placeholder');
  });

  it('removes rows 60 to 64 from every clone', async () => {
    const { workbook, reference } = await loadTemplate();

    const result = materializer.materialize(workbook, reference, [line('C1', 'I1')], {
      removeTemplateSheet: false,
    });
    const sheet = requireSheet(workbook, 'C1_I1');

    expect(sheet.actualRowCount).toBe(65);
    expect(sheet.getCell(`${MARKER_COLUMN}59`).value).toBe('row 59');
    expect(sheet.getCell(`${MARKER_COLUMN}60`).value).toBe('row 65');
    expect(result.sheets[0].operations).toContainEqual({
      operation: 'delete_rows',
      target: '60:64',
      status: 'applied',
    });
  });

  it('skips the row deletion when the clone is shorter than the range', async () => {
    const { workbook } = await loadTemplate(['Short']);
    const short = requireSheet(workbook, 'Short');

    const result = materializer.materialize(workbook, short, [line('C1', 'I1')], {
      removeTemplateSheet: false,
    });

    expect(result.sheets[0].operations).toContainEqual({
      operation: 'delete_rows',
      target: '60:64',
      status: 'skipped',
      reason: 'rows do not exist',
    });
  });

  it('reports an invalid address and still applies the other operations', async () => {
    const { workbook, reference } = await loadTemplate();
    const layout = {
      ...DEFAULT_LAYOUT,
      cellMap: { ...DEFAULT_LAYOUT.cellMap, controlNo: ['AD9', 'NOT-A-CELL'] },
    };

    const result = materializer.materialize(
      workbook,
      reference,
      [line('C1', 'I1')],
      { removeTemplateSheet: false },
      layout,
    );
    const report = result.sheets[0];

    expect(report.skippedCount).toBe(1);
    expect(report.operations).toContainEqual({
      operation: 'write',
      target: 'NOT-A-CELL',
      status: 'skipped',
      reason: 'invalid cell address',
    });
    expect(requireSheet(workbook, 'C1_I1').getCell('AD9').value).toBe('C1');
    expect(requireSheet(workbook, 'C1_I1').getCell('E16').value).toBe('I1');
  });

  it('leaves the top-left cell of a merged block alone when clearing inside it', async () => {
    const template = buildTemplateWorkbook();
    const templateSheet = requireSheet(template, TEMPLATE_SHEET);
    templateSheet.mergeCells('F37:H39');
    templateSheet.getCell('A33').value = 'Remarks';
    templateSheet.mergeCells('A33:D35');
    const workbook = await loadWorkbook(await writeWorkbook(template));
    const reference = materializer.selectReferenceSheet(workbook);

    const result = materializer.materialize(workbook, reference, [line('C1', 'I1')], {
      removeTemplateSheet: false,
    });
    const sheet = requireSheet(workbook, 'C1_I1');
    const report = result.sheets[0];

    expect(sheet.getCell('F37').value).toBe(726);
    expect(sheet.getCell('A33').value).toBe('Remarks');
    expect(report.skippedCount).toBe(2);
    expect(report.operations).toContainEqual({
      operation: 'clear',
      target: 'F39',
      status: 'skipped',
      reason: 'merged cell',
    });
    expect(report.operations).toContainEqual({
      operation: 'clear',
      target: 'A35',
      status: 'skipped',
      reason: 'merged cell',
    });
  });

  it('leaves one sheet per line once the template sheet is removed', async () => {
    const { workbook, reference } = await loadTemplate();

    const result = materializer.materialize(
      workbook,
      reference,
      [line('C1', 'I1'), line('C2', 'I2'), line('C3', 'I3')],
      { removeTemplateSheet: true },
    );

    expect(workbook.worksheets.map((ws) => ws.name)).toEqual(['C1_I1', 'C2_I2', 'C3_I3']);
    expect(result.sheetTitles).toEqual(['C1_I1', 'C2_I2', 'C3_I3']);
    expect(result.templateRemoval).toEqual({
      operation: 'remove_sheet',
      target: TEMPLATE_SHEET,
      status: 'applied',
    });
  });

  it('keeps the template sheet when it would be the last one', async () => {
    const { workbook, reference } = await loadTemplate();

    const result = materializer.materialize(workbook, reference, [], { removeTemplateSheet: true });

    expect(workbook.worksheets.map((ws) => ws.name)).toEqual([TEMPLATE_SHEET]);
    expect(result.templateRemoval).toEqual({
      operation: 'remove_sheet',
      target: TEMPLATE_SHEET,
      status: 'skipped',
      reason: 'the workbook would have no sheets left',
    });
  });

  it('sanitizes titles and keeps them unique', async () => {
    const { workbook, reference } = await loadTemplate();

    const result = materializer.materialize(
      workbook,
      reference,
      [line('C/1', 'I1'), line('C:1', 'I1'), line('', '')],
      { removeTemplateSheet: false },
    );

    expect(result.sheetTitles).toEqual(['C-1_I1', 'C-1_I11', '_']);
  });
});
