import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { validateEnv } from './config/env.config';
import { ConfigSheetModule } from './modules/config-sheet/config-sheet.module';
import { ExtractModule } from './modules/extract/extract.module';
import { MatchModule } from './modules/match/match.module';
import { TargetModule } from './modules/target/target.module';
import { WorkbookModule } from './modules/workbook/workbook.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    WorkbookModule,
    MatchModule,
    TargetModule,
    ConfigSheetModule,
    ExtractModule,
  ],
})
export class AppModule {}
