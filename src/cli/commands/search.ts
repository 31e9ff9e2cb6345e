/**
 * Search Command
 *
 * Runs a city search against the configured provider, prints the
 * deduplicated results and optionally opens one of them on the map.
 *
 * @module cli/commands/search
 */

import { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import type { Config } from '../../config/index.js';
import type { SearchErrorCode } from '../../providers/errors.js';
import { MAX_LIMIT, MIN_LIMIT } from '../../providers/nominatim/request.js';
import { createProvider, providerTypeFromString } from '../../providers/registry.js';
import type { SearchProvider } from '../../providers/types.js';
import { OutputFormatSchema } from '../../schemas/common.js';
import { CitySearchController, type UrlOpener } from '../../search/controller.js';
import { createSpinner } from '../formatters/progress.js';
import {
  formatPlacesTable,
  formatSearchSummary,
  toSearchResultDocument,
} from '../formatters/places.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Options for the search command.
 */
export interface SearchOptions {
  /** Maximum number of results to request and show */
  limit?: string;
  /** Output format */
  format?: string;
  /** 1-based row to open in the browser */
  open?: string;
}

/**
 * Collaborators the command builds itself unless given.
 */
export interface SearchDependencies {
  config?: Config;
  provider?: SearchProvider;
  openUrl?: UrlOpener;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Parse a decimal integer within [min, max].
 *
 * @returns The value, or undefined when it is not an integer in range
 */
export function parseBoundedInt(value: string, min: number, max: number): number | undefined {
  if (!/^\s*\d+\s*$/.test(value)) {
    return undefined;
  }
  const parsed = parseInt(value, 10);
  return parsed >= min && parsed <= max ? parsed : undefined;
}

/**
 * Map a provider failure to the process exit code.
 */
export function exitCodeForError(code: SearchErrorCode | null): ExitCode {
  switch (code) {
    case 'NO_RESULTS':
      return EXIT_CODES.NOT_FOUND;
    case 'EMPTY_QUERY':
    case 'INVALID_REQUEST':
      return EXIT_CODES.USAGE_ERROR;
    case 'HTTP_ERROR':
    case 'NETWORK_ERROR':
    case 'TIMEOUT':
    case 'PARSE_ERROR':
    case 'SIMULATED':
      return EXIT_CODES.API_ERROR;
    case 'CANCELLED':
      return EXIT_CODES.CANCELLED;
    default:
      return EXIT_CODES.ERROR;
  }
}

function buildProvider(base: BaseCommand, config: Config, limit: number | undefined): SearchProvider {
  const type = providerTypeFromString(base.options.provider ?? config.provider, base);
  const effective =
    limit === undefined ? config : { ...config, nominatim: { ...config.nominatim, limit } };
  return createProvider(type, effective, base.diagnostics());
}

// ============================================================================
// Command Registration
// ============================================================================

/**
 * Register the search command.
 */
export function registerSearchCommand(program: Command): void {
  program
    .command('search <query>')
    .description('Search cities by name and list unique matches')
    .option('-n, --limit <count>', `Maximum number of results (${MIN_LIMIT}-${MAX_LIMIT})`)
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .option('-o, --open <index>', 'Open result number <index> on OpenStreetMap')
    .action(async (query: string, options: SearchOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);

      try {
        const code = await handleSearch(query, options, base);
        if (code !== EXIT_CODES.SUCCESS) {
          base.exitWith(code);
        }
      } catch (error) {
        if (error instanceof Error) {
          base.fatal(error.message, error);
        }
        throw error;
      }
    });
}

/**
 * Handle the search command.
 *
 * @returns Exit code for the outcome
 */
export async function handleSearch(
  query: string,
  options: SearchOptions,
  base: BaseCommand,
  deps: SearchDependencies = {}
): Promise<ExitCode> {
  const format = OutputFormatSchema.safeParse(options.format ?? 'table');
  if (!format.success) {
    base.error(`Invalid format: ${options.format}. Use table or json`);
    return EXIT_CODES.USAGE_ERROR;
  }
  const json = format.data === 'json';

  let limit: number | undefined;
  if (options.limit !== undefined) {
    limit = parseBoundedInt(options.limit, MIN_LIMIT, MAX_LIMIT);
    if (limit === undefined) {
      base.error(`Limit must be between ${MIN_LIMIT} and ${MAX_LIMIT}`);
      return EXIT_CODES.USAGE_ERROR;
    }
  }

  let openPosition: number | undefined;
  if (options.open !== undefined) {
    openPosition = parseBoundedInt(options.open, 1, Number.MAX_SAFE_INTEGER);
    if (openPosition === undefined) {
      base.error(`Invalid result number: ${options.open}`);
      return EXIT_CODES.USAGE_ERROR;
    }
  }

  const config = deps.config ?? base.loadConfig();
  const provider = deps.provider ?? buildProvider(base, config, limit);
  const controller = new CitySearchController({
    provider,
    logger: base.diagnostics(),
    openUrl: deps.openUrl,
    mapZoom: config.mapZoom,
  });

  base.debug(`Searching "${query}" with ${provider.info.name}`);
  const spinner = createSpinner(`Searching ${provider.info.name} for "${query}"...`, {
    silent: json || base.isQuiet(),
  }).start();

  // Ctrl+C stops the request instead of killing the process mid-write
  let interrupted = false;
  const onInterrupt = () => {
    interrupted = true;
    controller.clearResults();
  };
  process.once('SIGINT', onInterrupt);

  let received: number;
  try {
    received = await controller.search(query);
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }

  if (interrupted) {
    spinner.stop();
    base.warn('Search cancelled');
    return EXIT_CODES.CANCELLED;
  }

  if (controller.errorMessage) {
    spinner.stop();
    base.error(controller.errorMessage);
    return exitCodeForError(controller.errorCode);
  }

  const rows = controller.results.toArray();
  const shown = limit === undefined ? rows : rows.slice(0, limit);
  spinner.succeed(`Found ${rows.length} ${rows.length === 1 ? 'city' : 'cities'}`);

  if (json) {
    base.json(toSearchResultDocument(query, provider.info.name, received, rows.length, shown));
  } else {
    for (const line of formatPlacesTable(shown)) {
      console.log(line);
    }
    base.blank();
    base.info(formatSearchSummary(received, rows.length, shown.length));
  }

  if (openPosition === undefined) {
    return EXIT_CODES.SUCCESS;
  }

  // Positions refer to printed rows
  const place = shown.at(openPosition - 1);
  if (!place) {
    base.error(`No result number ${openPosition} (${shown.length} shown)`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const opened = await controller.openPlaceInBrowser(place.latitude, place.longitude, place.name);
  if (!opened) {
    base.error(controller.errorMessage);
    return EXIT_CODES.ERROR;
  }

  if (!json) {
    base.success(`Opened ${place.displayLabel} on OpenStreetMap`);
  }
  return EXIT_CODES.SUCCESS;
}
