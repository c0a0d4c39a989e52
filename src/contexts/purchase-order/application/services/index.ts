export * from './field-resolver.service';
export * from './row-source.service';
export * from './template-materializer.service';
export * from './generated-layout.service';
export { PurchaseOrderGeneratorService } from './purchase-order-generator.service';
export type {
  GenerationOptions,
  UploadGenerationParams,
  GenerateResult,
  UploadAnalysis,
  SheetLayoutMode,
} from './purchase-order-generator.service';
export {
  XLSX_CONTENT_TYPE,
  DEFAULT_OUTPUT_FILE_NAME,
  PREVIEW_LIMIT,
} from './purchase-order-generator.service';
