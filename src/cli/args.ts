import {
  ConfigFile,
  ConversionOptions,
  DEFAULT_MARKUP_OPTIONS,
  DEFAULT_SHEET_OPTIONS,
  mergeConfig
} from '../lib/config/options';
import { LogLevel, isLogLevel } from '../lib/utils/logger';
import { OutputFormat } from '../lib/types';
import { trimQuotes } from '../lib/utils/paths';

export type CliCommand = 'markup' | 'sheet';

export interface CliArgs {
  command: CliCommand | 'help';
  patterns: string[];
  format?: OutputFormat;
  password?: string;
  marginLines: boolean;
  debugPoints: boolean;
  configPath?: string;
  logLevel?: LogLevel;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const HELP = `
leafpress - typeset markup and workbooks into PDF and text

Commands:
  markup <files...>       Markup -> .pdf (or .txt with --format text)
  sheet <files...>        JSON workbook -> .pdf and .txt

Options:
  --format pdf|text       Markup output format (default pdf)
  -p, --password <pw>     Password for protected workbooks
  -m, --margin-lines      Draw the margin rectangle on every page
  --debug-points          Draw wrap-stop ticks on every page
  --config <file>         JSON options file (page size, font, margins...)
  --log-level <level>     error | warn | info | debug (default info)
  -h, --help              Show this message

Examples:
  leafpress markup notes/*.md
  leafpress sheet -p test-secret budget.json
`;

function isCommand(value: string): value is CliCommand {
  return value === 'markup' || value === 'sheet';
}

/**
 * Parse command-line arguments (without the node and script entries).
 */
export function parseCliArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    command: 'help',
    patterns: [],
    marginLines: false,
    debugPoints: false
  };

  if (argv.length === 0 || argv.includes('--help') || argv.includes('-h')) {
    return args;
  }

  const [command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new CliUsageError(`Unknown command: ${command}`);
  }
  args.command = command;

  // Passwords and paths may start with a dash
  const valueOf = (flag: string, index: number, allowDash = false): string => {
    const value = rest[index + 1];
    if (value === undefined || (!allowDash && value.startsWith('-'))) {
      throw new CliUsageError(`${flag} needs a value`);
    }
    return value;
  };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];
    switch (arg) {
      case '--format': {
        const format = valueOf(arg, i++);
        if (format !== 'pdf' && format !== 'text') {
          throw new CliUsageError(`Unknown format: ${format}`);
        }
        args.format = format;
        break;
      }
      case '-p':
      case '--password':
        args.password = valueOf(arg, i++, true);
        break;
      case '-m':
      case '--margin-lines':
        args.marginLines = true;
        break;
      case '--debug-points':
        args.debugPoints = true;
        break;
      case '--config':
        args.configPath = trimQuotes(valueOf(arg, i++, true));
        break;
      case '--log-level': {
        const level = valueOf(arg, i++);
        if (!isLogLevel(level)) {
          throw new CliUsageError(`Unknown log level: ${level}`);
        }
        args.logLevel = level;
        break;
      }
      default:
        if (arg.startsWith('-')) {
          throw new CliUsageError(`Unknown option: ${arg}`);
        }
        args.patterns.push(trimQuotes(arg));
    }
  }

  if (args.patterns.length === 0) {
    throw new CliUsageError(`Usage: leafpress ${command} <files...>`);
  }
  return args;
}

/**
 * Conversion options for a parsed command line: the command's defaults,
 * then the config file, then the flags.
 */
export function resolveOptions(args: CliArgs, config: ConfigFile = {}): ConversionOptions {
  const base = args.command === 'sheet' ? DEFAULT_SHEET_OPTIONS : DEFAULT_MARKUP_OPTIONS;
  const options = mergeConfig(base, config);

  if (args.format) options.format = args.format;
  if (args.password !== undefined) options.password = args.password;
  if (args.marginLines) options.drawMarginLine = true;
  if (args.debugPoints) options.drawDebugPoints = true;
  return options;
}
