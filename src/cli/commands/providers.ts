/**
 * Providers Command
 *
 * Lists the search providers this tool can use.
 *
 * @module cli/commands/providers
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { getBaseCommand, EXIT_CODES, type BaseCommand, type ExitCode } from '../base-command.js';
import type { Config } from '../../config/index.js';
import {
  defaultProviderType,
  describeProvider,
  providerInfo,
  providerTypeFromString,
} from '../../providers/registry.js';
import { OutputFormatSchema, ProviderTypeSchema, type ProviderType } from '../../schemas/common.js';

export interface ProvidersOptions {
  format?: string;
}

/**
 * Provider entry printed by `providers --format json`.
 */
export interface ProviderListing {
  type: ProviderType;
  name: string;
  description: string;
  version: string;
  features: string[];
  requiresApiKey: boolean;
  supportsAutocomplete: boolean;
  rateLimitPerMinute: number;
  supportedCountries: string[];
  isDefault: boolean;
  isActive: boolean;
}

/**
 * Describe every provider type, marking the default and the active one.
 */
export function listProviders(active: ProviderType): ProviderListing[] {
  return ProviderTypeSchema.options.map((type) => {
    const info = providerInfo(type);
    return {
      type,
      name: info.name,
      description: describeProvider(type),
      version: info.version,
      features: [...info.features],
      requiresApiKey: info.requiresApiKey,
      supportsAutocomplete: info.supportsAutocomplete,
      rateLimitPerMinute: info.rateLimitPerMinute,
      supportedCountries: [...info.supportedCountries],
      isDefault: type === defaultProviderType(),
      isActive: type === active,
    };
  });
}

/**
 * Register the providers command.
 */
export function registerProvidersCommand(program: Command): void {
  program
    .command('providers')
    .description('List available search providers')
    .option('-f, --format <type>', 'Output format: table, json', 'table')
    .action((options: ProvidersOptions, cmd: Command) => {
      const base = getBaseCommand(cmd);
      const code = handleProviders(options, base);
      if (code !== EXIT_CODES.SUCCESS) {
        base.exitWith(code);
      }
    });
}

/**
 * Handle the providers command.
 */
export function handleProviders(
  options: ProvidersOptions,
  base: BaseCommand,
  config?: Config
): ExitCode {
  const format = OutputFormatSchema.safeParse(options.format ?? 'table');
  if (!format.success) {
    base.error(`Invalid format: ${options.format}. Use table or json`);
    return EXIT_CODES.USAGE_ERROR;
  }

  const { provider } = config ?? base.loadConfig();
  const listings = listProviders(providerTypeFromString(base.options.provider ?? provider, base));

  if (format.data === 'json') {
    base.json(listings);
    return EXIT_CODES.SUCCESS;
  }

  base.section('Providers');
  for (const listing of listings) {
    const marks = [listing.isDefault ? 'default' : '', listing.isActive ? 'active' : '']
      .filter(Boolean)
      .join(', ');

    console.log(`${chalk.bold(listing.name)}${marks ? chalk.dim(` (${marks})`) : ''}`);
    console.log(`  ${listing.description}`);
    console.log(`  ${chalk.dim('Features:')} ${listing.features.join(', ')}`);
    console.log(`  ${chalk.dim('API key:')} ${listing.requiresApiKey ? 'required' : 'not required'}`);
    console.log(
      `  ${chalk.dim('Coverage:')} ${
        listing.supportedCountries.length > 0 ? listing.supportedCountries.join(', ') : 'worldwide'
      }`
    );
    base.blank();
  }

  return EXIT_CODES.SUCCESS;
}
