import { ConfigurationError } from '../../common/errors';
import type { CellMatch, Match, RangeMatch } from '../match/match.types';

export type Axis = 'row' | 'column';

/** One side of a single-cell copy */
export type CellEndpoint =
  | { kind: 'direct'; match: CellMatch }
  | { kind: 'triangulated'; match: RangeMatch; row: CellMatch; column: CellMatch };

/** A table and the locator picking one row or column out of it */
export interface VectorEndpoint {
  match: RangeMatch;
  axis: Axis;
  locator: CellMatch;
}

export type Target =
  | { shape: 'cell'; name: string; source: CellEndpoint; target: CellEndpoint }
  | { shape: 'table'; name: string; source: RangeMatch; target: RangeMatch; expand: boolean }
  | {
      shape: 'vector';
      name: string;
      source: VectorEndpoint;
      target: VectorEndpoint;
      align: boolean;
      expand: boolean;
    };

export interface TargetOptions {
  name?: string;
  source: Match;
  target: Match;
  sourceRow?: CellMatch;
  sourceCol?: CellMatch;
  targetRow?: CellMatch;
  targetCol?: CellMatch;
  align?: boolean;
  expand?: boolean;
}

type Side =
  | { shape: 'cell'; endpoint: CellEndpoint }
  | { shape: 'table'; match: RangeMatch }
  | { shape: 'vector'; endpoint: VectorEndpoint };

function classify(label: string, match: Match, row?: CellMatch, column?: CellMatch): Side {
  if (match.kind === 'cell') {
    if (row || column) {
      throw new ConfigurationError(`${label} row/column locators need a range match, not a cell match`);
    }
    return { shape: 'cell', endpoint: { kind: 'direct', match } };
  }
  if (row && column) {
    return { shape: 'cell', endpoint: { kind: 'triangulated', match, row, column } };
  }
  if (row) return { shape: 'vector', endpoint: { match, axis: 'row', locator: row } };
  if (column) return { shape: 'vector', endpoint: { match, axis: 'column', locator: column } };
  return { shape: 'table', match };
}

/**
 * Validate a target's options and fix its transfer shape. Both sides must
 * agree on a single cell, a whole table or a row/column vector.
 */
export function createTarget(options: TargetOptions): Target {
  const name = options.name ?? options.source.name;
  const align = options.align ?? false;
  const expand = options.expand ?? false;
  const source = classify('Source', options.source, options.sourceRow, options.sourceCol);
  const target = classify('Target', options.target, options.targetRow, options.targetCol);

  if (source.shape === 'cell' && target.shape === 'cell') {
    if (align || expand) {
      throw new ConfigurationError(`Target ${name} copies a single cell and cannot align or expand`);
    }
    return { shape: 'cell', name, source: source.endpoint, target: target.endpoint };
  }
  if (source.shape === 'table' && target.shape === 'table') {
    if (align) {
      throw new ConfigurationError(`Target ${name} needs a row or column locator on both sides to align`);
    }
    return { shape: 'table', name, source: source.match, target: target.match, expand };
  }
  if (source.shape === 'vector' && target.shape === 'vector') {
    return { shape: 'vector', name, source: source.endpoint, target: target.endpoint, align, expand };
  }

  throw new ConfigurationError(
    `Target ${name} resolves a ${describe(source)} source to a ${describe(target)} target`,
  );
}

function describe(side: Side): string {
  switch (side.shape) {
    case 'cell':
      return 'single-cell';
    case 'table':
      return 'whole-table';
    case 'vector':
      return `${side.endpoint.axis}-vector`;
  }
}
