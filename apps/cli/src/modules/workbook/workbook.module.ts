import { Module } from '@nestjs/common';
import { XlsxParserService } from './xlsx-parser.service';
import { XlsxExportService } from './xlsx-export.service';

@Module({
  providers: [XlsxParserService, XlsxExportService],
  exports: [XlsxParserService, XlsxExportService],
})
export class WorkbookModule {}
