import { Module } from '@nestjs/common';
import { CatalogModule } from '../catalog/catalog.module';
import { ReportController } from './report.controller';
import { ReportProfileService } from './services/report-profile.service';
import { ExportReaderService } from './services/export-reader.service';
import { CodeHierarchyService } from './services/code-hierarchy.service';
import { CurrencyFormatterService } from './services/currency-formatter.service';
import { ReportAssemblerService } from './services/report-assembler.service';

@Module({
  imports: [CatalogModule],
  providers: [
    ReportProfileService,
    ExportReaderService,
    CodeHierarchyService,
    CurrencyFormatterService,
    ReportAssemblerService,
  ],
  exports: [ReportAssemblerService],
  controllers: [ReportController],
})
export class ReportModule {}
