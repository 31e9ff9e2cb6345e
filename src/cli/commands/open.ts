/**
 * Open Command
 *
 * Opens an OpenStreetMap view of a coordinate in the default browser.
 *
 * @module cli/commands/open
 */

import { Command } from 'commander';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import type { Config } from '../../config/index.js';
import { CoordinatesSchema } from '../../schemas/common.js';
import { openInBrowser } from '../../search/browser.js';
import type { UrlOpener } from '../../search/controller.js';
import { buildMapUrl } from '../../search/map-url.js';

export interface OpenDependencies {
  config?: Config;
  openUrl?: UrlOpener;
}

// Blank strings would otherwise become 0
function parseDegrees(value: string): number {
  return value.trim() === '' ? Number.NaN : Number(value);
}

/**
 * Register the open command.
 */
export function registerOpenCommand(program: Command): void {
  program
    .command('open <latitude> <longitude>')
    .description('Open a coordinate on OpenStreetMap')
    .addHelpText('after', '\nPut -- before negative values:\n  $ citysearch open -- -33.8688 151.2093')
    .action(async (latitude: string, longitude: string, _options: unknown, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const code = await handleOpen(latitude, longitude, base);
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

/**
 * Handle the open command.
 */
export async function handleOpen(
  latitude: string,
  longitude: string,
  base: BaseCommand,
  deps: OpenDependencies = {}
): Promise<ExitCode> {
  const parsed = CoordinatesSchema.safeParse({
    latitude: parseDegrees(latitude),
    longitude: parseDegrees(longitude),
  });

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      base.debug(`${issue.path.join('.')}: ${issue.message}`);
    }
    base.error(`Invalid coordinates: ${latitude}, ${longitude}`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const config = deps.config ?? base.loadConfig();
  const openUrl = deps.openUrl ?? ((url: string) => openInBrowser(url));
  const url = buildMapUrl(parsed.data.latitude, parsed.data.longitude, config.mapZoom);

  base.debug(`Opening ${url}`);
  if (!(await openUrl(url))) {
    base.error('Failed to open location in browser');
    return EXIT_CODES.ERROR;
  }

  base.success(`Opened ${url}`);
  return EXIT_CODES.SUCCESS;
}
