import { Module } from '@nestjs/common';
import { ConfigSheetService } from './config-sheet.service';

@Module({
  providers: [ConfigSheetService],
  exports: [ConfigSheetService],
})
export class ConfigSheetModule {}
