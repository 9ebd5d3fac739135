#!/usr/bin/env node
import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as fs from 'fs';
import * as path from 'path';
import { RUN_DEFAULTS } from '@sheetlift/shared';
import { AppModule } from './app.module';
import { formatAction, parseCliArgs, USAGE, UsageError, type CliOptions } from './cli/cli-options';
import { logLevelsFor, validateEnv } from './config/env.config';
import { ExtractService } from './modules/extract/extract.service';
import { XlsxExportService } from './modules/workbook/xlsx-export.service';
import { XlsxParserService } from './modules/workbook/xlsx-parser.service';

const isFile = (p: string): boolean => fs.existsSync(p) && fs.statSync(p).isFile();
const isDirectory = (p: string): boolean => fs.existsSync(p) && fs.statSync(p).isDirectory();

async function run(options: CliOptions): Promise<number> {
  const logger = new Logger('Bootstrap');
  const env = validateEnv();

  const app = await NestFactory.createApplicationContext(AppModule, {
    logger: logLevelsFor(env.LOG_LEVEL),
  });

  try {
    const config = app.get(ConfigService);
    const configSheet =
      options.configSheet ?? config.get<string>('SHEETLIFT_CONFIG_SHEET') ?? RUN_DEFAULTS.CONFIG_SHEET;
    const sourceDirectory = path.resolve(
      options.sourceDirectory ?? config.get<string>('SHEETLIFT_SOURCE_DIRECTORY') ?? process.cwd(),
    );
    const sourceFile = options.sourceFile ? path.resolve(options.sourceFile) : undefined;

    if (!isFile(options.target)) {
      logger.error(`Target file ${options.target} not found`);
      return 1;
    }
    if (!isDirectory(sourceDirectory)) {
      logger.error(`Source directory ${sourceDirectory} not found`);
      return 1;
    }
    if (sourceFile && !isFile(sourceFile)) {
      logger.error(`Source file ${sourceFile} not found`);
      return 1;
    }

    const target = await app.get(XlsxParserService).parseFile(options.target);
    const history = await app.get(ExtractService).run(target, { sourceDirectory, sourceFile, configSheet });
    if (!history) {
      logger.error(`Config sheet ${configSheet} not found in ${options.target}`);
      return 1;
    }

    for (const action of history) {
      process.stdout.write(`${formatAction(action)}\n`);
    }

    const success = history.every((a) => a.success);
    if (success || options.allowFailures) {
      await app.get(XlsxExportService).exportToFile(target, options.output);
    } else {
      logger.warn(`Not writing ${options.output}: some actions failed`);
    }
    return success ? 0 : 1;
  } finally {
    await app.close();
  }
}

async function bootstrap(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === 'help') {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }
  return run(command.options);
}

bootstrap()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (err instanceof UsageError) {
      process.stderr.write(`${err.message}\n${USAGE}\n`);
      process.exitCode = 2;
      return;
    }
    // eslint-disable-next-line no-console
    console.error('sheetlift failed:', err);
    process.exitCode = 1;
  });
