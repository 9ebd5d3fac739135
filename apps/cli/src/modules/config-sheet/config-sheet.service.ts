import { Injectable, Logger } from '@nestjs/common';
import * as fs from 'fs';
import * as path from 'path';
import type { CellMatchPrefix, CellValue } from '@sheetlift/shared';
import {
  CELL_MATCH_KEYS,
  CELL_MATCH_PREFIXES,
  GLOBAL_KEYS,
  MATCH_KEYS,
  OPERATOR_ALIASES,
  RANGE_MATCH_KEYS,
  RUN_DEFAULTS,
  formatValue,
  letterToColumn,
} from '@sheetlift/shared';
import { ConfigurationError } from '../../common/errors';
import { Comparator } from '../match/comparator';
import { createCellMatch, createRangeMatch } from '../match/match.schema';
import type { CellMatch, Match } from '../match/match.types';
import type { Range } from '../match/range';
import { resolveReference, selectSheet } from '../match/reference-resolver';
import type { Target } from '../target/target.types';
import { createTarget } from '../target/target.types';
import type { Workbook } from '../workbook/workbook.model';

/** Lower-cased key → comparator, one entry per row of a config block */
export type ConfigBlock = Map<string, Comparator>;

/** Variables captured by earlier blocks, keyed by lower-cased name */
export type Variables = Map<string, CellValue>;

export interface SourceFile {
  path: string;
  /** The file name, or the regex capture when the file was matched by pattern */
  match: CellValue;
}

const PREFIXES: readonly CellMatchPrefix[] = Object.values(CELL_MATCH_PREFIXES);
const SUB_BLOCK_KEYS: readonly string[] = [
  MATCH_KEYS.SHEET,
  MATCH_KEYS.REFERENCE,
  ...Object.values(CELL_MATCH_KEYS),
];
const COLUMN_KEYS: readonly string[] = [CELL_MATCH_KEYS.MIN_COL, CELL_MATCH_KEYS.MAX_COL];
const TRUE_WORDS = new Set(['true', 'yes', 'y', '1', 'x']);
const VARIABLE_PATTERN = /\$(?:(\$)|([_a-z][_a-z0-9]*)|\{([_a-z][_a-z0-9]*)\})/gi;

function splitKey(key: string): { prefix: CellMatchPrefix; key: string } | null {
  // Prefixes are ordered longest first; a remainder that is not a cell-match
  // key falls through to a shorter prefix (`target row offset`)
  for (const prefix of PREFIXES) {
    if (!key.startsWith(`${prefix} `)) continue;
    const rest = key.slice(prefix.length + 1).trim();
    if (SUB_BLOCK_KEYS.includes(rest)) return { prefix, key: rest };
  }
  return null;
}

/** Keys of `block` under `prefix`, with the prefix removed */
export function subBlock(block: ConfigBlock, prefix: CellMatchPrefix): ConfigBlock {
  const keys: ConfigBlock = new Map();
  for (const [key, comparator] of block) {
    const split = splitKey(key);
    if (split?.prefix === prefix) keys.set(split.key, comparator);
  }
  // A bare `target` row is shorthand for `target reference`
  const bare = block.get(MATCH_KEYS.TARGET);
  if (prefix === CELL_MATCH_PREFIXES.TARGET && bare && !keys.has(MATCH_KEYS.REFERENCE)) {
    keys.set(MATCH_KEYS.REFERENCE, bare);
  }
  return keys;
}

/** The block's `name` as text; throws when it is blank */
export function blockName(block: ConfigBlock): string {
  const operand = block.get(MATCH_KEYS.NAME)?.operand ?? null;
  const name = operand === null ? '' : formatValue(operand).trim();
  if (name === '') {
    throw new ConfigurationError('Block `name` must have a value');
  }
  return name;
}

function referenceText(comparator: Comparator): string {
  if (comparator.operator !== 'equal' || typeof comparator.operand !== 'string') {
    throw new ConfigurationError('`reference` must use operator `is` and a text value');
  }
  return comparator.operand;
}

function integerOption(keys: ConfigBlock, key: string): number | undefined {
  const operand = keys.get(key)?.operand ?? null;
  if (operand === null) return undefined;
  if (typeof operand === 'number') return operand;
  if (typeof operand === 'string') {
    const text = operand.trim();
    if (/^-?\d+$/.test(text)) return Number(text);
    if (COLUMN_KEYS.includes(key) && /^[a-z]{1,3}$/i.test(text)) return letterToColumn(text);
  }
  throw new ConfigurationError(`\`${key}\` needs a number, got ${formatValue(operand)}`);
}

function flag(block: ConfigBlock, key: string): boolean {
  const operand = block.get(key)?.operand ?? null;
  if (typeof operand === 'boolean') return operand;
  if (typeof operand === 'number') return operand !== 0;
  if (typeof operand === 'string') return TRUE_WORDS.has(operand.trim().toLowerCase());
  return false;
}

function hasPrefix(block: ConfigBlock, ...prefixes: CellMatchPrefix[]): boolean {
  return prefixes.some((prefix) => subBlock(block, prefix).size > 0);
}

/**
 * Reads the key/operator/value blocks of a config sheet and turns them into
 * matches and targets.
 */
@Injectable()
export class ConfigSheetService {
  private readonly logger = new Logger(ConfigSheetService.name);

  /** Build a comparator from an operator word such as `is` or `matches` */
  parseComparator(operator: string, value: CellValue): Comparator {
    const op = OPERATOR_ALIASES.get(operator.trim().toLowerCase());
    if (!op) {
      throw new ConfigurationError(`Operator \`${operator}\` not recognised`);
    }
    return new Comparator(op, value);
  }

  /**
   * Turn a range of at least three columns into a block. Rows without a text
   * key and operator are skipped. Returns null for anything narrower.
   */
  parseBlock(range: Range, variables: Variables): ConfigBlock | null {
    if (!range.isRange || range.columns < RUN_DEFAULTS.BLOCK_COLUMNS) return null;

    const block: ConfigBlock = new Map();
    for (const [key, operator, value] of range.getValues()) {
      if (typeof key !== 'string' || key.trim() === '') continue;
      if (typeof operator !== 'string' || operator.trim() === '') continue;

      const interpolated = this.interpolateVariables(value ?? null, variables);
      block.set(key.trim().toLowerCase(), this.parseComparator(operator, interpolated));
    }
    return block;
  }

  /**
   * Substitute `$name` and `${name}` in text. Names are case-insensitive,
   * `$$` is a literal dollar and unknown names are left as they are.
   */
  interpolateVariables(value: CellValue, variables: Variables): CellValue {
    if (typeof value !== 'string' || value === '') return value;

    return value.replace(VARIABLE_PATTERN, (whole, dollar?: string, bare?: string, braced?: string) => {
      if (dollar) return '$';
      const name = (bare ?? braced ?? '').toLowerCase();
      if (!variables.has(name)) return whole;
      const found = variables.get(name) ?? null;
      return found === null ? '' : formatValue(found);
    });
  }

  /** The `directory is …` path of a block, or null when there is none */
  extractDirectory(block: ConfigBlock): string | null {
    const comparator = block.get(GLOBAL_KEYS.DIRECTORY);
    if (!comparator) return null;
    if (comparator.operator !== 'equal' || typeof comparator.operand !== 'string') return null;
    return path.normalize(comparator.operand);
  }

  /**
   * Resolve `file is <name>` or `file matches <pattern>` against a
   * directory. A pattern picks the most recently modified matching file.
   */
  extractFilename(block: ConfigBlock, directory: string): SourceFile | null {
    const comparator = block.get(GLOBAL_KEYS.FILE);
    if (!comparator) return null;

    const pattern = comparator.operand;
    if (
      typeof pattern !== 'string' ||
      (comparator.operator !== 'equal' && comparator.operator !== 'regex')
    ) {
      throw new ConfigurationError('File block must use operator `is` or `matches` and a text value');
    }
    if (!fs.existsSync(directory) || !fs.statSync(directory).isDirectory()) {
      throw new ConfigurationError(`Directory ${directory} not found`);
    }

    const isFile = (name: string): boolean => {
      const full = path.resolve(directory, name);
      return fs.existsSync(full) && fs.statSync(full).isFile();
    };

    let filename = pattern;
    let match: CellValue = pattern;
    if (comparator.operator === 'regex') {
      const candidates = fs
        .readdirSync(directory)
        .filter(isFile)
        .map((name) => ({ name, mtime: fs.statSync(path.resolve(directory, name)).mtimeMs }))
        .sort((a, b) => b.mtime - a.mtime);

      const found = candidates
        .map((c) => ({ name: c.name, captured: comparator.match(c.name) }))
        .find((c) => c.captured !== undefined);
      if (!found || found.captured === undefined) {
        throw new ConfigurationError(`No file matching ${pattern} found in ${directory}`);
      }
      filename = found.name;
      match = found.captured;
    }

    if (!isFile(filename)) {
      throw new ConfigurationError(`File ${pattern} not found in ${directory}`);
    }
    this.logger.debug(`Resolved file ${pattern} to ${filename}`);
    return { path: path.resolve(directory, filename), match };
  }

  /**
   * Build the source match of a `name` block. A block with `start` keys is a
   * range match; a reference is a range match when it resolves to more than
   * one cell, or fails to resolve while row/column locators are given.
   */
  buildSourceMatch(block: ConfigBlock, source: Workbook): Match | null {
    const name = blockName(block);
    const start = this.cellMatchFrom(`${name}:start`, subBlock(block, CELL_MATCH_PREFIXES.START));
    if (start) {
      const end = this.cellMatchFrom(`${name}:end`, subBlock(block, CELL_MATCH_PREFIXES.END));
      return createRangeMatch({
        name,
        sheet: block.get(MATCH_KEYS.SHEET),
        startCell: start,
        endCell: end ?? undefined,
        rows: integerOption(block, RANGE_MATCH_KEYS.ROWS),
        cols: integerOption(block, RANGE_MATCH_KEYS.COLS),
      });
    }

    const locators = hasPrefix(block, CELL_MATCH_PREFIXES.SOURCE_ROW, CELL_MATCH_PREFIXES.SOURCE_COL);
    return this.matchFrom(name, block, source, locators);
  }

  /** Build the target of a block, or null when the block only has a source */
  buildTarget(block: ConfigBlock, sourceMatch: Match, destination: Workbook): Target | null {
    const name = sourceMatch.name;
    const keys = subBlock(block, CELL_MATCH_PREFIXES.TARGET);
    if (keys.size === 0) {
      if (hasPrefix(block, CELL_MATCH_PREFIXES.TARGET_ROW, CELL_MATCH_PREFIXES.TARGET_COL)) {
        throw new ConfigurationError(`${name} sets target row or column keys without a \`target\``);
      }
      if (flag(block, MATCH_KEYS.ALIGN) || flag(block, MATCH_KEYS.EXPAND)) {
        throw new ConfigurationError(`${name} sets \`align\` or \`expand\` without a \`target\``);
      }
      return null;
    }

    const locators = hasPrefix(block, CELL_MATCH_PREFIXES.TARGET_ROW, CELL_MATCH_PREFIXES.TARGET_COL);
    const target = this.matchFrom(`${name}:target`, keys, destination, locators);
    if (!target) {
      throw new ConfigurationError(`Target of ${name} needs a reference or a value`);
    }

    const locator = (prefix: CellMatchPrefix): CellMatch | undefined =>
      this.cellMatchFrom(`${name}:${prefix}`, subBlock(block, prefix)) ?? undefined;

    return createTarget({
      name,
      source: sourceMatch,
      target,
      sourceRow: locator(CELL_MATCH_PREFIXES.SOURCE_ROW),
      sourceCol: locator(CELL_MATCH_PREFIXES.SOURCE_COL),
      targetRow: locator(CELL_MATCH_PREFIXES.TARGET_ROW),
      targetCol: locator(CELL_MATCH_PREFIXES.TARGET_COL),
      align: flag(block, MATCH_KEYS.ALIGN),
      expand: flag(block, MATCH_KEYS.EXPAND),
    });
  }

  private matchFrom(name: string, keys: ConfigBlock, workbook: Workbook, locators: boolean): Match | null {
    const reference = keys.get(MATCH_KEYS.REFERENCE);
    if (reference && !keys.has(CELL_MATCH_KEYS.VALUE)) {
      const text = referenceText(reference);
      const sheet = keys.get(MATCH_KEYS.SHEET);
      const resolved = resolveReference(workbook, text, selectSheet(workbook, sheet));
      if (resolved ? resolved.isRange : locators) {
        return createRangeMatch({ name, sheet, reference: text });
      }
    }
    return this.cellMatchFrom(name, keys);
  }

  private cellMatchFrom(name: string, keys: ConfigBlock): CellMatch | null {
    const reference = keys.get(MATCH_KEYS.REFERENCE);
    const value = keys.get(CELL_MATCH_KEYS.VALUE);
    if (!reference && !value) return null;

    return createCellMatch({
      name,
      sheet: keys.get(MATCH_KEYS.SHEET),
      reference: reference ? referenceText(reference) : undefined,
      value,
      rowOffset: integerOption(keys, CELL_MATCH_KEYS.ROW_OFFSET),
      colOffset: integerOption(keys, CELL_MATCH_KEYS.COL_OFFSET),
      minRow: integerOption(keys, CELL_MATCH_KEYS.MIN_ROW),
      minCol: integerOption(keys, CELL_MATCH_KEYS.MIN_COL),
      maxRow: integerOption(keys, CELL_MATCH_KEYS.MAX_ROW),
      maxCol: integerOption(keys, CELL_MATCH_KEYS.MAX_COL),
    });
  }
}
