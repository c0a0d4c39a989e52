import { Module } from '@nestjs/common';
import { PurchaseOrderController } from './interface/http/controllers';
import {
  FieldResolverService,
  GeneratedLayoutService,
  PurchaseOrderGeneratorService,
  RowSourceService,
  TemplateMaterializerService,
} from './application/services';
import { ExceljsReaderAdapter, FileTemplateSourceAdapter } from './infrastructure/adapters';
import { SPREADSHEET_READER_PORT, TEMPLATE_SOURCE_PORT } from './application/ports';

@Module({
  controllers: [PurchaseOrderController],
  providers: [
    FieldResolverService,
    RowSourceService,
    TemplateMaterializerService,
    GeneratedLayoutService,
    PurchaseOrderGeneratorService,
    // Port implementations
    {
      provide: SPREADSHEET_READER_PORT,
      useClass: ExceljsReaderAdapter,
    },
    {
      provide: TEMPLATE_SOURCE_PORT,
      useClass: FileTemplateSourceAdapter,
    },
  ],
  exports: [PurchaseOrderGeneratorService],
})
export class PurchaseOrderModule {}
