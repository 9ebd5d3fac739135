import { Injectable } from '@nestjs/common';
import type { Workbook } from '../workbook/workbook.model';
import { CellMatchService, type MatchScope } from './cell-match.service';
import { RangeMatchService } from './range-match.service';
import type { Match, MatchResult } from './match.types';

/** Dispatches a match to its resolver by kind */
@Injectable()
export class MatchService {
  constructor(
    private readonly cellMatch: CellMatchService,
    private readonly rangeMatch: RangeMatchService,
  ) {}

  match(m: Match, workbook: Workbook, scope?: MatchScope): MatchResult | null {
    switch (m.kind) {
      case 'cell':
        return this.cellMatch.match(m, workbook, scope);
      case 'range':
        return this.rangeMatch.match(m, workbook);
    }
  }
}
