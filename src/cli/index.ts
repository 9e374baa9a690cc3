#!/usr/bin/env node

import { glob } from 'fast-glob';
import { loadConfigFile } from '../lib/config/options';
import { convertEach } from '../lib/convert/batch';
import { convertMarkupFile } from '../lib/convert/convertMarkup';
import { convertWorkbookFile } from '../lib/convert/convertWorkbook';
import { describeError } from '../lib/errors/DocumentError';
import { setLogLevel } from '../lib/utils/logger';
import { CliArgs, CliUsageError, HELP, parseCliArgs, resolveOptions } from './args';

/**
 * Expand glob patterns to file paths; plain paths pass through.
 */
async function expandGlobs(patterns: string[]): Promise<string[]> {
  const files: string[] = [];

  for (const pattern of patterns) {
    if (/[*?[{]/.test(pattern)) {
      files.push(...(await glob(pattern, { absolute: true, onlyFiles: true })));
    } else {
      files.push(pattern);
    }
  }

  return files;
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(process.argv.slice(2));
  } catch (error) {
    if (error instanceof CliUsageError) {
      console.error(error.message);
      console.log(HELP);
      return 1;
    }
    throw error;
  }

  if (args.command === 'help') {
    console.log(HELP);
    return 0;
  }
  if (args.logLevel) {
    setLogLevel(args.logLevel);
  }

  const config = args.configPath ? await loadConfigFile(args.configPath) : {};
  const options = resolveOptions(args, config);

  const files = await expandGlobs(args.patterns);
  if (files.length === 0) {
    console.error('No files found matching the pattern');
    return 1;
  }

  const result = args.command === 'sheet'
    ? await convertEach(files, file => convertWorkbookFile(file, options))
    : await convertEach(files, file => convertMarkupFile(file, options));

  return result.failed.length > 0 ? 1 : 0;
}

main().then(
  code => {
    process.exitCode = code;
  },
  (error: unknown) => {
    console.error('Error:', describeError(error));
    process.exitCode = 1;
  }
);
