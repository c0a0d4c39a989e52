import { Inject, Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type * as ExcelJS from 'exceljs';
import {
  DEFAULT_LAYOUT,
  MANUAL_ENTRY_COLUMNS,
  toColumnMap,
  type CanonicalLine,
  type ColumnMap,
  type FieldMatch,
  type FieldOverrides,
  type GenerationReport,
  type InputRecord,
  type LineAccumulator,
  type PurchaseOrderLayout,
} from '../../domain/value-objects';
import {
  TEMPLATE_SOURCE_PORT,
  type TemplateFile,
  type TemplateSourcePort,
} from '../ports';
import { TemplateLoadException } from '../errors/purchase-order.errors';
import { FieldResolverService } from './field-resolver.service';
import { GeneratedLayoutService } from './generated-layout.service';
import { RowSourceService, type UploadedInput } from './row-source.service';
import {
  TemplateMaterializerService,
  type MaterializeResult,
} from './template-materializer.service';
import { loadWorkbook, writeWorkbook } from './utils/excel-utils';
import { firstPerGroup } from './utils/line-grouping';
import { toCanonicalLine } from './utils/value-coercion';

export const XLSX_CONTENT_TYPE =
  'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet';
export const DEFAULT_OUTPUT_FILE_NAME = 'PurchaseOrders.xlsx';
export const PREVIEW_LIMIT = 20;

export type SheetLayoutMode = 'template' | 'generated';

export interface GenerationOptions {
  layout?: SheetLayoutMode;
  /** Uploaded template; the bundled one is used when absent */
  template?: TemplateFile;
  templateSheet?: string;
  removeTemplateSheet?: boolean;
}

export interface UploadGenerationParams extends GenerationOptions {
  input: UploadedInput;
  sheetName?: string;
  headerRow?: number;
  mapping?: FieldOverrides;
}

export interface GenerateResult {
  buffer: Buffer;
  contentType: string;
  fileName: string;
  report: GenerationReport;
}

export interface UploadAnalysis {
  sheetNames: string[];
  sheetName: string | null;
  headers: string[];
  matches: FieldMatch[];
  guesses: FieldOverrides;
  missing: FieldMatch['field'][];
  totalRows: number;
  /** Null until every required field is mapped */
  uniqueLines: number | null;
  preview: CanonicalLine[];
}

/**
 * Purchase Order Generator
 *
 * Row source → field resolution → coercion & dedupe → sheet materialization → bytes.
 * One call owns its workbook from load to serialization.
 */
@Injectable()
export class PurchaseOrderGeneratorService {
  constructor(
    private readonly rowSource: RowSourceService,
    private readonly fieldResolver: FieldResolverService,
    private readonly templateMaterializer: TemplateMaterializerService,
    private readonly generatedLayout: GeneratedLayoutService,
    private readonly configService: ConfigService,
    @Inject(TEMPLATE_SOURCE_PORT)
    private readonly templateSource: TemplateSourcePort,
  ) {}

  async analyzeUpload(
    input: UploadedInput,
    options: { sheetName?: string; headerRow?: number; mapping?: FieldOverrides } = {},
  ): Promise<UploadAnalysis> {
    const recordSet = await this.rowSource.readUpload(input, {
      sheetName: options.sheetName ?? this.defaultInputSheet(),
      headerRow: options.headerRow,
    });
    const resolution = this.fieldResolver.resolveWithOverrides(recordSet.headers, options.mapping);
    const columns = toColumnMap(resolution);
    const lines = columns ? this.toUniqueLines(recordSet.records, columns) : [];

    return {
      sheetNames: recordSet.sheetNames,
      sheetName: recordSet.sheetName,
      headers: recordSet.headers,
      matches: resolution.matches,
      guesses: resolution.guesses,
      missing: resolution.missing,
      totalRows: recordSet.records.length,
      uniqueLines: columns ? lines.length : null,
      preview: lines.slice(0, PREVIEW_LIMIT),
    };
  }

  async generateFromUpload(
    params: UploadGenerationParams,
    layout: PurchaseOrderLayout = DEFAULT_LAYOUT,
  ): Promise<GenerateResult> {
    const recordSet = await this.rowSource.readUpload(params.input, {
      sheetName: params.sheetName ?? this.defaultInputSheet(),
      headerRow: params.headerRow,
    });
    const resolution = this.fieldResolver.resolveWithOverrides(
      recordSet.headers,
      params.mapping,
      layout,
    );
    const columns = this.fieldResolver.requireColumnMap(resolution);

    return this.run(recordSet.records, columns, params, layout);
  }

  async generateFromAccumulator(
    accumulator: LineAccumulator,
    options: GenerationOptions = {},
    layout: PurchaseOrderLayout = DEFAULT_LAYOUT,
  ): Promise<GenerateResult> {
    const recordSet = this.rowSource.fromAccumulator(accumulator);
    return this.run(recordSet.records, MANUAL_ENTRY_COLUMNS, options, layout);
  }

  private async run(
    records: InputRecord[],
    columns: ColumnMap,
    options: GenerationOptions,
    layout: PurchaseOrderLayout,
  ): Promise<GenerateResult> {
    const lines = this.toUniqueLines(records, columns);
    const mode = options.layout ?? 'template';

    console.log(
      `[PurchaseOrderGenerator] ${records.length} records → ${lines.length} unique lines (${mode} layout)`,
    );

    let workbook: ExcelJS.Workbook;
    let result: MaterializeResult;

    if (mode === 'generated') {
      ({ workbook, result } = this.generatedLayout.build(lines));
    } else {
      workbook = await this.loadTemplate(options.template);
      const reference = this.templateMaterializer.selectReferenceSheet(
        workbook,
        options.templateSheet,
      );
      result = this.templateMaterializer.materialize(
        workbook,
        reference,
        lines,
        { removeTemplateSheet: options.removeTemplateSheet ?? this.defaultRemoveTemplateSheet() },
        layout,
      );
    }

    const skippedOperations =
      result.sheets.reduce((sum, sheet) => sum + sheet.skippedCount, 0) +
      (result.templateRemoval?.status === 'skipped' ? 1 : 0);

    const report: GenerationReport = {
      layout: mode,
      sheetTitles: result.sheetTitles,
      sheets: result.sheets,
      templateRemoval: result.templateRemoval,
      totalRecords: records.length,
      uniqueLines: lines.length,
      skippedOperations,
    };

    if (skippedOperations > 0) {
      console.warn(
        `[PurchaseOrderGenerator] ${skippedOperations} sheet operations skipped across ${result.sheets.length} sheets`,
      );
      for (const sheet of result.sheets) {
        for (const op of sheet.operations) {
          if (op.status === 'skipped') {
            console.warn(
              `[PurchaseOrderGenerator] ${sheet.title}: ${op.operation} ${op.target} skipped (${op.reason})`,
            );
          }
        }
      }
    }

    const buffer = await writeWorkbook(workbook);
    console.log(`[PurchaseOrderGenerator] Created ${result.sheetTitles.length} sheet(s)`);

    return {
      buffer,
      contentType: XLSX_CONTENT_TYPE,
      fileName: this.outputFileName(),
      report,
    };
  }

  private toUniqueLines(records: InputRecord[], columns: ColumnMap): CanonicalLine[] {
    return firstPerGroup(records.map((record) => toCanonicalLine(record, columns)));
  }

  private async loadTemplate(upload?: TemplateFile): Promise<ExcelJS.Workbook> {
    const file = upload ?? (await this.templateSource.loadBundled());
    if (!file) {
      throw new TemplateLoadException(
        'No template was uploaded and no bundled template is configured (PO_TEMPLATE_PATH)',
      );
    }

    const ext = file.fileName.toLowerCase().split('.').pop();
    if (ext !== 'xlsx') {
      throw new TemplateLoadException(`Template "${file.fileName}" must be an .xlsx workbook`);
    }

    try {
      return await loadWorkbook(file.buffer);
    } catch (error) {
      throw new TemplateLoadException(`Failed to open template "${file.fileName}"`, error);
    }
  }

  private defaultInputSheet(): string | undefined {
    return this.configService.get<string>('PO_DEFAULT_INPUT_SHEET')?.trim() || undefined;
  }

  private defaultRemoveTemplateSheet(): boolean {
    return this.configService.get<string>('PO_REMOVE_TEMPLATE_SHEET')?.trim().toLowerCase() !== 'false';
  }

  private outputFileName(): string {
    return this.configService.get<string>('PO_OUTPUT_FILE_NAME')?.trim() || DEFAULT_OUTPUT_FILE_NAME;
  }
}
