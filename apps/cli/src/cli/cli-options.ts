import { parseArgs } from 'util';
import type { ActionRecord } from '@sheetlift/shared';

export const USAGE =
  'Usage: sheetlift <target.xlsx> [output.xlsx] [--update] [--allow-failures] ' +
  '[--config-sheet Config] [--source-directory dir] [--source-file file]';

export interface CliOptions {
  /** Workbook holding the config sheet and receiving the results */
  target: string;
  output: string;
  /** Write the output even when some actions failed */
  allowFailures: boolean;
  configSheet?: string;
  sourceDirectory?: string;
  sourceFile?: string;
}

export type CliCommand = { kind: 'help' } | { kind: 'run'; options: CliOptions };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        update: { type: 'boolean' },
        'allow-failures': { type: 'boolean' },
        'config-sheet': { type: 'string' },
        'source-directory': { type: 'string' },
        'source-file': { type: 'string' },
        help: { type: 'boolean', short: 'h' },
      },
      allowPositionals: true,
    });
  } catch (err) {
    throw new UsageError(err instanceof Error ? err.message : String(err));
  }
}

export function parseCliArgs(argv: string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: 'help' };

  const [target, output, ...rest] = positionals;
  if (!target) throw new UsageError('A target workbook is required');
  if (rest.length > 0) throw new UsageError(`Unexpected arguments: ${rest.join(' ')}`);
  if (values.update && output) throw new UsageError('Give either an output file or --update, not both');
  if (!values.update && !output) throw new UsageError('An output file is required unless --update is given');

  return {
    kind: 'run',
    options: {
      target,
      output: values.update ? target : output ?? target,
      allowFailures: values['allow-failures'] ?? false,
      configSheet: values['config-sheet'],
      sourceDirectory: values['source-directory'],
      sourceFile: values['source-file'],
    },
  };
}

export function formatAction(action: ActionRecord): string {
  return `${action.success ? 'ok  ' : 'FAIL'} ${action.name}: ${action.message}`;
}
