import { Module } from '@nestjs/common';
import { CellMatchService } from './cell-match.service';
import { RangeMatchService } from './range-match.service';
import { MatchService } from './match.service';

@Module({
  providers: [CellMatchService, RangeMatchService, MatchService],
  exports: [CellMatchService, RangeMatchService, MatchService],
})
export class MatchModule {}
