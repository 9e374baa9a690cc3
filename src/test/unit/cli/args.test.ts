/**
 * Unit tests for command-line parsing
 */
import { describe, it, expect } from 'vitest';
import { CliUsageError, parseCliArgs, resolveOptions } from '../../../cli/args';
import { DEFAULT_MARKUP_OPTIONS, DEFAULT_SHEET_OPTIONS } from '../../../lib/config/options';

describe('parseCliArgs()', () => {
  it('should show help without arguments or with --help', () => {
    expect(parseCliArgs([]).command).toBe('help');
    expect(parseCliArgs(['markup', 'a.md', '--help']).command).toBe('help');
    expect(parseCliArgs(['-h']).command).toBe('help');
  });

  it('should collect file patterns', () => {
    expect(parseCliArgs(['markup', 'a.md', '"docs/*.md"'])).toEqual({
      command: 'markup',
      patterns: ['a.md', 'docs/*.md'],
      marginLines: false,
      debugPoints: false
    });
  });

  it('should read options with values', () => {
    const args = parseCliArgs([
      'sheet', '-p', 'test-secret', '--config', 'leafpress.json',
      '--log-level', 'debug', '-m', '--debug-points', 'book.json'
    ]);

    expect(args).toEqual({
      command: 'sheet',
      patterns: ['book.json'],
      password: 'test-secret',
      configPath: 'leafpress.json',
      logLevel: 'debug',
      marginLines: true,
      debugPoints: true
    });
  });

  it('should take a password or config path that starts with a dash', () => {
    const args = parseCliArgs(['sheet', '--password', '-secret', '--config', '-leafpress.json', 'b.json']);

    expect(args.password).toBe('-secret');
    expect(args.configPath).toBe('-leafpress.json');
    expect(args.patterns).toEqual(['b.json']);
  });

  it('should accept the text format', () => {
    expect(parseCliArgs(['markup', '--format', 'text', 'a.md']).format).toBe('text');
  });

  it('should reject bad input', () => {
    expect(() => parseCliArgs(['print', 'a.md'])).toThrow(CliUsageError);
    expect(() => parseCliArgs(['markup'])).toThrowError('Usage: leafpress markup <files...>');
    expect(() => parseCliArgs(['markup', '--format', 'docx', 'a.md'])).toThrowError('Unknown format: docx');
    expect(() => parseCliArgs(['markup', '--password'])).toThrowError('--password needs a value');
    expect(() => parseCliArgs(['markup', '--format', '--debug-points', 'a.md'])).toThrowError('--format needs a value');
    expect(() => parseCliArgs(['markup', '--log-level', 'loud', 'a.md'])).toThrowError('Unknown log level: loud');
    expect(() => parseCliArgs(['markup', '--verbose', 'a.md'])).toThrowError('Unknown option: --verbose');
  });
});

describe('resolveOptions()', () => {
  it('should start from the command defaults', () => {
    expect(resolveOptions(parseCliArgs(['markup', 'a.md']))).toEqual(DEFAULT_MARKUP_OPTIONS);
    expect(resolveOptions(parseCliArgs(['sheet', 'b.json']))).toEqual(DEFAULT_SHEET_OPTIONS);
  });

  it('should let flags override the config file', () => {
    const args = parseCliArgs(['markup', '--format', 'text', '-m', 'a.md']);

    const options = resolveOptions(args, { format: 'pdf', pageSize: 'A3', drawMarginLine: false });

    expect(options.format).toBe('text');
    expect(options.pageSize).toBe('A3');
    expect(options.drawMarginLine).toBe(true);
  });

  it('should carry the password', () => {
    expect(resolveOptions(parseCliArgs(['sheet', '-p', 'test-secret', 'b.json'])).password).toBe('test-secret');
  });
});
