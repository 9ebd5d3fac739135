import { Module } from '@nestjs/common';
import { ConfigSheetModule } from '../config-sheet/config-sheet.module';
import { MatchModule } from '../match/match.module';
import { TargetModule } from '../target/target.module';
import { WorkbookModule } from '../workbook/workbook.module';
import { ExtractService } from './extract.service';

@Module({
  imports: [ConfigSheetModule, MatchModule, TargetModule, WorkbookModule],
  providers: [ExtractService],
  exports: [ExtractService],
})
export class ExtractModule {}
