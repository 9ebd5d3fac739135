import { Injectable, Logger } from '@nestjs/common';
import { createId } from '@paralleldrive/cuid2';
import type { ActionRecord, CellValue } from '@sheetlift/shared';
import { BLOCK_START_KEYS, GLOBAL_KEYS, MATCH_KEYS, RUN_DEFAULTS } from '@sheetlift/shared';
import { ConfigurationError } from '../../common/errors';
import {
  ConfigSheetService,
  blockName,
  type ConfigBlock,
  type SourceFile,
  type Variables,
} from '../config-sheet/config-sheet.service';
import { Comparator } from '../match/comparator';
import { createCellMatch, createRangeMatch } from '../match/match.schema';
import { MatchService } from '../match/match.service';
import type { MatchResult } from '../match/match.types';
import { RangeMatchService } from '../match/range-match.service';
import { TargetService } from '../target/target.service';
import type { Workbook } from '../workbook/workbook.model';
import { XlsxParserService } from '../workbook/xlsx-parser.service';

export interface ExtractOptions {
  /** Directory source files are looked up in until a `directory` block changes it */
  sourceDirectory: string;
  /** Source file loaded before the first block */
  sourceFile?: string;
  configSheet?: string;
}

interface RunState {
  directory: string;
  source: Workbook | null;
  variables: Variables;
  history: ActionRecord[];
}

const BLOCK_START_PATTERN = `^\\s*(${BLOCK_START_KEYS.join('|')})\\s*$`;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Runs the blocks of a config sheet against a target workbook: `directory`
 * and `file` blocks pick the source workbook, `name` blocks match in it
 * and optionally write into the target.
 */
@Injectable()
export class ExtractService {
  private readonly logger = new Logger(ExtractService.name);

  constructor(
    private readonly configSheet: ConfigSheetService,
    private readonly matchService: MatchService,
    private readonly rangeMatch: RangeMatchService,
    private readonly targetService: TargetService,
    private readonly parser: XlsxParserService,
  ) {}

  /**
   * Execute every block in order and return what happened. A failed block
   * is recorded and the run moves on. Returns null when the target has no
   * config sheet.
   */
  async run(target: Workbook, options: ExtractOptions): Promise<ActionRecord[] | null> {
    const sheet = target.getSheet(options.configSheet ?? RUN_DEFAULTS.CONFIG_SHEET);
    if (!sheet) {
      this.logger.warn(`No config sheet ${options.configSheet ?? RUN_DEFAULTS.CONFIG_SHEET} in target`);
      return null;
    }

    const runId = createId();
    this.logger.log(`Run ${runId}: reading blocks from ${sheet.title}`);
    const state: RunState = {
      directory: options.sourceDirectory,
      source: null,
      variables: new Map(),
      history: [],
    };
    if (options.sourceFile) {
      await this.loadSource(state, options.sourceFile, options.sourceFile);
    }

    const sheetComparator = new Comparator('equal', sheet.title);
    let minRow = 1;
    for (;;) {
      const blockMatch = createRangeMatch({
        name: 'block',
        sheet: sheetComparator,
        startCell: createCellMatch({
          name: 'key',
          value: new Comparator('regex', BLOCK_START_PATTERN),
          minRow,
        }),
      });
      const found = this.rangeMatch.match(blockMatch, target);
      const last = found?.range.lastCell;
      if (!found || !last) break;
      minRow = last.row + 1;

      await this.runBlock(state, found, target);
    }

    const failures = state.history.filter((a) => !a.success).length;
    this.logger.log(`Run ${runId}: processed ${state.history.length} actions, ${failures} failed`);
    return state.history;
  }

  private async runBlock(state: RunState, found: MatchResult, target: Workbook): Promise<void> {
    const label = typeof found.captured === 'string' ? found.captured.trim().toLowerCase() : 'block';

    let block: ConfigBlock | null;
    try {
      block = this.configSheet.parseBlock(found.range, state.variables);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      this.record(state, label, false, err.message);
      return;
    }
    if (!block) return;

    if (block.has(GLOBAL_KEYS.DIRECTORY)) {
      const directory = this.configSheet.extractDirectory(block);
      if (directory === null) {
        this.record(state, GLOBAL_KEYS.DIRECTORY, false, 'Directory block must use operator `is` and a text value');
        return;
      }
      state.directory = directory;
      state.variables.set(GLOBAL_KEYS.DIRECTORY, directory);
      this.record(state, GLOBAL_KEYS.DIRECTORY, true, `Obtained ${directory}`);
    }

    if (block.has(GLOBAL_KEYS.FILE)) {
      let file: SourceFile | null;
      try {
        file = this.configSheet.extractFilename(block, state.directory);
      } catch (err) {
        this.record(state, GLOBAL_KEYS.FILE, false, errorMessage(err));
        return;
      }
      if (!file) return;
      if (!(await this.loadSource(state, file.path, file.match))) return;
    }

    if (block.has(MATCH_KEYS.NAME)) {
      this.runMatch(state, block, target);
    }
  }

  private async loadSource(state: RunState, filename: string, match: CellValue): Promise<boolean> {
    try {
      state.source = await this.parser.parseFile(filename);
    } catch (err) {
      this.record(state, GLOBAL_KEYS.FILE, false, `Could not read ${filename}: ${errorMessage(err)}`);
      return false;
    }
    state.variables.set(GLOBAL_KEYS.FILE, match);
    this.record(state, GLOBAL_KEYS.FILE, true, `Obtained ${filename}`);
    return true;
  }

  private runMatch(state: RunState, block: ConfigBlock, target: Workbook): void {
    let name: string;
    try {
      name = blockName(block);
    } catch (err) {
      this.record(state, MATCH_KEYS.NAME, false, errorMessage(err));
      return;
    }

    const source = state.source;
    if (!source) {
      this.record(state, name, false, `No source file set ahead of ${name}`);
      return;
    }

    let result: MatchResult | null;
    try {
      const sourceMatch = this.configSheet.buildSourceMatch(block, source);
      if (!sourceMatch) {
        this.record(state, name, false, `Could not build a source match from block ${name}`);
        return;
      }
      const transfer = this.configSheet.buildTarget(block, sourceMatch, target);
      result = transfer
        ? this.targetService.extract(transfer, source, target)
        : this.matchService.match(sourceMatch, source);
    } catch (err) {
      if (!(err instanceof ConfigurationError)) throw err;
      this.record(state, name, false, err.message);
      return;
    }

    if (!result) {
      this.record(state, name, false, `${name} failed to match`);
      return;
    }
    this.record(state, name, true, `Matched ${result.range.getReference() ?? name}`);

    // A reference match has no capture; the cell's own value stands in
    const value = result.captured !== undefined ? result.captured : result.range.cell?.value;
    if (value !== undefined) state.variables.set(name.toLowerCase(), value);
  }

  private record(state: RunState, name: string, success: boolean, message: string): void {
    state.history.push({ name, success, message });
    if (success) {
      this.logger.debug(`${name}: ${message}`);
    } else {
      this.logger.warn(`${name}: ${message}`);
    }
  }
}
