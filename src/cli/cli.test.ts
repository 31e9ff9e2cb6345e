/**
 * CLI Smoke Tests
 *
 * Tests cover:
 * - Program creation and configuration
 * - Global options parsing
 * - Command registration
 * - Base command functionality
 * - Formatter utilities
 *
 * @module cli/cli.test
 */

import { describe, it, expect, jest, beforeAll, beforeEach, afterEach } from '@jest/globals';
import chalk from 'chalk';
import { Command } from 'commander';
import { createProgram } from './index.js';
import { BaseCommand, EXIT_CODES, createBaseCommand, getBaseCommand } from './base-command.js';
import { VERSION, getVersionInfo } from './version.js';
import { ProgressSpinner, formatDuration, createSpinner } from './formatters/progress.js';
import {
  formatCoordinate,
  formatPlaceRow,
  formatPlacesTable,
  formatSearchSummary,
  padRight,
  toSearchResultDocument,
  truncate,
} from './formatters/places.js';
import { getCommandHelp } from './commands/index.js';
import { PlaceRecord } from '../places/record.js';

// ============================================================================
// Program Tests
// ============================================================================

describe('CLI Program', () => {
  it('should create a program with correct name and version', () => {
    const program = createProgram();

    expect(program.name()).toBe('citysearch');
    expect(program.version()).toBe(VERSION);
  });

  it('should have global options configured', () => {
    const program = createProgram();
    const optionNames = program.options.map((o) => o.long);

    expect(optionNames).toContain('--verbose');
    expect(optionNames).toContain('--quiet');
    expect(optionNames).toContain('--no-color');
    expect(optionNames).toContain('--provider');
  });

  it('should have subcommands registered', () => {
    const program = createProgram();
    const commandNames = program.commands.map((c) => c.name());

    expect(commandNames).toEqual(['search', 'providers', 'open']);
  });

  it('should configure search options', () => {
    const program = createProgram();
    const search = program.commands.find((c) => c.name() === 'search');

    expect(search?.options.map((o) => o.long)).toEqual(['--limit', '--format', '--open']);
  });

  it('should parse global options before a command', () => {
    const program = createProgram();
    program.parseOptions(['-q', '-p', 'mock']);

    expect(program.opts()).toMatchObject({ quiet: true, provider: 'mock', color: true });
  });
});

// ============================================================================
// Version Tests
// ============================================================================

describe('Version', () => {
  it('should export VERSION constant', () => {
    expect(VERSION).toBe('1.0.0');
  });

  it('should return formatted version info', () => {
    expect(getVersionInfo()).toBe('citysearch v1.0.0');
  });
});

// ============================================================================
// BaseCommand Tests
// ============================================================================

describe('BaseCommand', () => {
  let consoleSpy: {
    log: jest.SpiedFunction<typeof console.log>;
    warn: jest.SpiedFunction<typeof console.warn>;
    error: jest.SpiedFunction<typeof console.error>;
  };

  beforeEach(() => {
    consoleSpy = {
      log: jest.spyOn(console, 'log').mockImplementation(() => {}),
      warn: jest.spyOn(console, 'warn').mockImplementation(() => {}),
      error: jest.spyOn(console, 'error').mockImplementation(() => {}),
    };
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should create with default options', () => {
    const cmd = new BaseCommand({});

    expect(cmd.isVerbose()).toBe(false);
    expect(cmd.isQuiet()).toBe(false);
  });

  it('should respect verbose option', () => {
    const cmd = new BaseCommand({ verbose: true });

    expect(cmd.isVerbose()).toBe(true);
    cmd.debug('test message');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] test message');
  });

  it('should hide debug messages when not verbose', () => {
    const cmd = new BaseCommand({});

    cmd.debug('test message');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should respect quiet option', () => {
    const cmd = new BaseCommand({ quiet: true });

    expect(cmd.isQuiet()).toBe(true);
    cmd.info('test message');
    cmd.success('done');
    expect(consoleSpy.log).not.toHaveBeenCalled();
  });

  it('should log info messages when not quiet', () => {
    const cmd = new BaseCommand({});

    cmd.info('test message');
    expect(consoleSpy.log).toHaveBeenCalledWith('test message');
  });

  it('should always log warnings and errors', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.warn('warning message');
    cmd.error('error message');
    expect(consoleSpy.warn).toHaveBeenCalledWith('Warning: warning message');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: error message');
  });

  it('should log success messages without color', () => {
    const cmd = new BaseCommand({ color: false });

    cmd.success('success message');
    expect(cmd.hasColor()).toBe(false);
    expect(consoleSpy.log).toHaveBeenCalledWith('[OK] success message');
  });

  it('should route diagnostics to debug output', () => {
    const quietDiagnostics = new BaseCommand({}).diagnostics();
    quietDiagnostics.warn('hidden');
    quietDiagnostics.error('hidden');
    expect(consoleSpy.warn).not.toHaveBeenCalled();
    expect(consoleSpy.error).not.toHaveBeenCalled();
    expect(consoleSpy.log).not.toHaveBeenCalled();

    const verboseDiagnostics = new BaseCommand({ verbose: true }).diagnostics();
    verboseDiagnostics.warn('provider slow');
    expect(consoleSpy.log).toHaveBeenCalledWith('[DEBUG] warn provider slow');
  });

  it('should exit with the given code on fatal errors', () => {
    const exitSpy = jest.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
    const cmd = new BaseCommand({});

    expect(() => cmd.fatal('bad flag', EXIT_CODES.USAGE_ERROR)).toThrow('exit 2');
    expect(consoleSpy.error).toHaveBeenCalledWith('Error: bad flag');
    expect(() => cmd.fatal('broken', new Error('boom'))).toThrow('exit 1');
    expect(exitSpy).toHaveBeenCalledTimes(2);
  });

  it('should print JSON regardless of quiet mode', () => {
    const cmd = new BaseCommand({ quiet: true });

    cmd.json({ a: 1 });
    expect(consoleSpy.log).toHaveBeenCalledWith('{\n  "a": 1\n}');
  });

  it('should create with factory function', () => {
    const cmd = createBaseCommand({ verbose: true });

    expect(cmd).toBeInstanceOf(BaseCommand);
    expect(cmd.isVerbose()).toBe(true);
  });

  it('should get base command from commander opts', () => {
    const program = new Command();
    program.setOptionValue('_baseCommand', new BaseCommand({ verbose: true }));
    const child = program.command('search');

    const base = getBaseCommand(child);
    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(true);
  });

  it('should create default base command if not found', () => {
    const base = getBaseCommand(new Command());

    expect(base).toBeInstanceOf(BaseCommand);
    expect(base.isVerbose()).toBe(false);
  });
});

// ============================================================================
// Exit Codes Tests
// ============================================================================

describe('Exit Codes', () => {
  it('should define standard exit codes', () => {
    expect(EXIT_CODES.SUCCESS).toBe(0);
    expect(EXIT_CODES.ERROR).toBe(1);
    expect(EXIT_CODES.USAGE_ERROR).toBe(2);
    expect(EXIT_CODES.NOT_FOUND).toBe(3);
    expect(EXIT_CODES.API_ERROR).toBe(4);
    expect(EXIT_CODES.CANCELLED).toBe(130);
  });
});

// ============================================================================
// Progress Formatter Tests
// ============================================================================

describe('Progress Formatters', () => {
  describe('formatDuration', () => {
    it('should format milliseconds', () => {
      expect(formatDuration(500)).toBe('500ms');
      expect(formatDuration(999)).toBe('999ms');
    });

    it('should format seconds', () => {
      expect(formatDuration(1000)).toBe('1.0s');
      expect(formatDuration(5500)).toBe('5.5s');
    });

    it('should format minutes and seconds', () => {
      expect(formatDuration(60000)).toBe('1m 0s');
      expect(formatDuration(90000)).toBe('1m 30s');
    });
  });

  describe('ProgressSpinner', () => {
    it('should support method chaining', () => {
      const spinner = new ProgressSpinner('Loading...', { silent: true });
      const result = spinner.start('Starting...').stop();
      expect(result).toBe(spinner);
    });

    it('should create with factory function', () => {
      const spinner = createSpinner('Loading...', { silent: true });
      expect(spinner).toBeInstanceOf(ProgressSpinner);
    });
  });
});

// ============================================================================
// Place Formatter Tests
// ============================================================================

describe('Place Formatters', () => {
  const berlin = new PlaceRecord('Berlin', 'Berlin, Germany', 'Germany', 52.52, 13.405);
  const sydney = new PlaceRecord('Sydney', 'Sydney, Australia', 'Australia', -33.8688, 151.2093);

  beforeAll(() => {
    chalk.level = 0;
  });

  it('should truncate long text with an ellipsis', () => {
    expect(truncate('Berlin', 10)).toBe('Berlin');
    expect(truncate('Frankfurt am Main', 10)).toBe('Frankfu...');
  });

  it('should pad by visible width', () => {
    expect(padRight('ab', 4)).toBe('ab  ');
    expect(padRight('\x1b[1mab\x1b[22m', 4)).toBe('\x1b[1mab\x1b[22m  ');
    expect(padRight('abcdef', 4)).toBe('abcdef');
  });

  it('should format coordinates with four decimals', () => {
    expect(formatCoordinate(52.52)).toBe('52.5200');
    expect(formatCoordinate(-33.8688)).toBe('-33.8688');
  });

  it('should format a result row', () => {
    expect(formatPlaceRow(1, berlin)).toBe(
      '1'.padEnd(5) + 'Berlin, Germany'.padEnd(42) + 'Germany'.padEnd(22) + '52.5200'.padEnd(12) + '13.4050'
    );
  });

  it('should fall back to the name and a dash for missing fields', () => {
    const bare = new PlaceRecord('Atlantis', '', '', 0, 0);

    expect(formatPlaceRow(12, bare)).toBe(
      '12'.padEnd(5) + 'Atlantis'.padEnd(42) + '-'.padEnd(22) + '0.0000'.padEnd(12) + '0.0000'
    );
  });

  it('should truncate long labels', () => {
    const long = new PlaceRecord('X', 'A'.repeat(50), 'Nowhere', 1, 2);

    expect(formatPlaceRow(1, long).slice(5, 47)).toBe('A'.repeat(37) + '...  ');
  });

  it('should frame rows with header and dividers', () => {
    const lines = formatPlacesTable([berlin, sydney]);

    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe(
      '#'.padEnd(5) + 'CITY'.padEnd(42) + 'COUNTRY'.padEnd(22) + 'LATITUDE'.padEnd(12) + 'LONGITUDE'
    );
    expect(lines[1]).toBe('-'.repeat(93));
    expect(lines[3]).toBe(formatPlaceRow(2, sydney));
    expect(lines[4]).toBe('-'.repeat(93));
  });

  it('should summarise merged duplicates', () => {
    expect(formatSearchSummary(6, 5)).toBe('5 results (1 duplicate merged)');
    expect(formatSearchSummary(1, 1)).toBe('1 result (0 duplicates merged)');
    expect(formatSearchSummary(6, 5, 2)).toBe('5 results (1 duplicate merged), showing first 2');
  });

  it('should build the JSON document from plain fields', () => {
    const document = toSearchResultDocument('Berlin', 'Mock', 3, 2, [berlin]);

    expect(document).toEqual({
      query: 'Berlin',
      provider: 'Mock',
      received: 3,
      unique: 2,
      duplicatesMerged: 1,
      results: [
        {
          name: 'Berlin',
          displayLabel: 'Berlin, Germany',
          country: 'Germany',
          latitude: 52.52,
          longitude: 13.405,
        },
      ],
    });
  });
});

// ============================================================================
// Command Help Tests
// ============================================================================

describe('Command Help', () => {
  it('should return command help entries', () => {
    const help = getCommandHelp();

    expect(help.map((h) => h.name)).toEqual([
      'search <query>',
      'providers',
      'open <latitude> <longitude>',
    ]);
  });

  it('should have descriptions for all commands', () => {
    for (const entry of getCommandHelp()) {
      expect(entry.description.length).toBeGreaterThan(0);
    }
  });
});
