/**
 * CLI Commands Registry
 *
 * Registers all available CLI commands with the main program.
 * Each command is implemented in its own file and registered here.
 *
 * Available commands:
 * - search: Search cities by name
 * - providers: List search providers
 * - open: Open a coordinate on the map
 *
 * @module cli/commands
 */

import type { Command } from 'commander';
import { registerSearchCommand } from './search.js';
import { registerProvidersCommand } from './providers.js';
import { registerOpenCommand } from './open.js';

/**
 * Register all CLI commands with the program.
 */
export function registerCommands(program: Command): void {
  registerSearchCommand(program);
  registerProvidersCommand(program);
  registerOpenCommand(program);
}

/**
 * Get help text for all available commands.
 */
export function getCommandHelp(): Array<{ name: string; description: string }> {
  return [
    { name: 'search <query>', description: 'Search cities by name and list unique matches' },
    { name: 'providers', description: 'List available search providers' },
    { name: 'open <latitude> <longitude>', description: 'Open a coordinate on OpenStreetMap' },
  ];
}
