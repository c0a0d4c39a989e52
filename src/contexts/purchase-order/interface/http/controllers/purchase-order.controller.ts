import {
  Controller,
  Post,
  UseInterceptors,
  UploadedFiles,
  Body,
  Res,
  HttpCode,
  HttpStatus,
  BadRequestException,
} from '@nestjs/common';
import { FileFieldsInterceptor } from '@nestjs/platform-express';
import type { Response } from 'express';
import { LineAccumulator } from '../../../domain/value-objects';
import { InputAcquisitionException } from '../../../application/errors/purchase-order.errors';
import {
  PurchaseOrderGeneratorService,
  type GenerateResult,
  type UploadAnalysis,
} from '../../../application/services';
import type { TemplateFile } from '../../../application/ports';
import {
  AnalyzeUploadDto,
  GenerateFromManualDto,
  GenerateFromUploadDto,
} from '../dto';

type UploadFiles = { input?: Express.Multer.File[]; template?: Express.Multer.File[] };

export const GENERATED_SHEETS_HEADER = 'X-Generated-Sheets';
export const SKIPPED_OPERATIONS_HEADER = 'X-Skipped-Operations';
export const GENERATED_SHEET_TITLES_HEADER = 'X-Generated-Sheet-Titles';

/**
 * Download headers for a generated workbook.
 * Sheet titles are URI-encoded one by one and joined with commas.
 */
export function workbookResponseHeaders(result: GenerateResult): Record<string, string> {
  return {
    'Content-Type': result.contentType,
    'Content-Disposition': `attachment; filename="${encodeURIComponent(result.fileName)}"`,
    [GENERATED_SHEETS_HEADER]: String(result.report.sheetTitles.length),
    [GENERATED_SHEET_TITLES_HEADER]: result.report.sheetTitles.map(encodeURIComponent).join(','),
    [SKIPPED_OPERATIONS_HEADER]: String(result.report.skippedOperations),
  };
}

@Controller('purchase-orders')
export class PurchaseOrderController {
  constructor(private readonly generatorService: PurchaseOrderGeneratorService) {}

  /**
   * Headers, field guesses and a preview of the unique lines
   * POST /api/purchase-orders/analyze
   */
  @Post('analyze')
  @HttpCode(HttpStatus.OK)
  @UseInterceptors(FileFieldsInterceptor([{ name: 'input', maxCount: 1 }]))
  async analyze(
    @UploadedFiles() files: UploadFiles | undefined,
    @Body() dto: AnalyzeUploadDto,
  ): Promise<UploadAnalysis> {
    const input = this.requireInput(files);
    console.log('[PurchaseOrderController] Analyze:', input.originalname);

    return this.generatorService.analyzeUpload(
      { buffer: input.buffer, fileName: input.originalname },
      { sheetName: dto.sheetName, headerRow: dto.headerRow, mapping: dto.mapping },
    );
  }

  /**
   * One sheet per unique (Control No, Item No) line of the uploaded input
   * POST /api/purchase-orders/generate
   *
   * @param input - input workbook or CSV
   * @param template - template workbook (optional, bundled template otherwise)
   */
  @Post('generate')
  @UseInterceptors(
    FileFieldsInterceptor([
      { name: 'input', maxCount: 1 },
      { name: 'template', maxCount: 1 },
    ]),
  )
  async generate(
    @UploadedFiles() files: UploadFiles | undefined,
    @Body() dto: GenerateFromUploadDto,
    @Res() res: Response,
  ): Promise<void> {
    const input = this.requireInput(files);
    const template = this.toTemplateFile(files?.template?.[0]);

    console.log('[PurchaseOrderController] Input:', input.originalname);
    if (template) {
      console.log('[PurchaseOrderController] Template:', template.fileName);
    }

    try {
      const result = await this.generatorService.generateFromUpload({
        input: { buffer: input.buffer, fileName: input.originalname },
        template,
        sheetName: dto.sheetName,
        headerRow: dto.headerRow,
        mapping: dto.mapping,
        templateSheet: dto.templateSheet,
        removeTemplateSheet: dto.removeTemplateSheet,
        layout: dto.layout,
      });
      this.sendWorkbook(res, result);
    } catch (error) {
      console.error('[PurchaseOrderController] Error:', error);
      throw error;
    }
  }

  /**
   * Same output from manually entered lines
   * POST /api/purchase-orders/manual/generate
   */
  @Post('manual/generate')
  @UseInterceptors(FileFieldsInterceptor([{ name: 'template', maxCount: 1 }]))
  async generateManual(
    @UploadedFiles() files: UploadFiles | undefined,
    @Body() dto: GenerateFromManualDto,
    @Res() res: Response,
  ): Promise<void> {
    let accumulator: LineAccumulator;
    try {
      accumulator = new LineAccumulator(dto.lines);
    } catch (error) {
      throw new InputAcquisitionException(
        error instanceof Error ? error.message : 'Invalid manual line',
      );
    }

    try {
      const result = await this.generatorService.generateFromAccumulator(accumulator, {
        template: this.toTemplateFile(files?.template?.[0]),
        templateSheet: dto.templateSheet,
        removeTemplateSheet: dto.removeTemplateSheet,
        layout: dto.layout,
      });
      this.sendWorkbook(res, result);
    } catch (error) {
      console.error('[PurchaseOrderController] Error:', error);
      throw error;
    }
  }

  private requireInput(files: UploadFiles | undefined): Express.Multer.File {
    const input = files?.input?.[0];
    if (!input) {
      throw new BadRequestException('An input file (field "input") is required.');
    }
    return input;
  }

  private toTemplateFile(file: Express.Multer.File | undefined): TemplateFile | undefined {
    return file ? { buffer: file.buffer, fileName: file.originalname } : undefined;
  }

  private sendWorkbook(res: Response, result: GenerateResult): void {
    console.log('[PurchaseOrderController] Generation complete:', result.fileName);

    for (const [name, value] of Object.entries(workbookResponseHeaders(result))) {
      res.setHeader(name, value);
    }
    res.status(HttpStatus.OK).send(result.buffer);
  }
}
