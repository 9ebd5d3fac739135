import { Module } from '@nestjs/common';
import { MatchModule } from '../match/match.module';
import { TargetService } from './target.service';

@Module({
  imports: [MatchModule],
  providers: [TargetService],
  exports: [TargetService],
})
export class TargetModule {}
