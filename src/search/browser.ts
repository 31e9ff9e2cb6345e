/**
 * Browser Launcher
 *
 * Opens a URL with the platform's default handler.
 *
 * @module search/browser
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => ChildProcess;

export interface OpenerCommand {
  command: string;
  args: string[];
}

export interface OpenInBrowserOptions {
  platform?: NodeJS.Platform;
  spawnFn?: SpawnFn;
}

/**
 * Command that hands a URL to the desktop: `open` on macOS, `start` through
 * cmd on Windows, `xdg-open` elsewhere.
 */
export function openerCommand(url: string, platform: NodeJS.Platform = process.platform): OpenerCommand {
  switch (platform) {
    case 'darwin':
      return { command: 'open', args: [url] };
    case 'win32':
      // The empty string is the window title argument of `start`
      return { command: 'cmd', args: ['/c', 'start', '""', url] };
    default:
      return { command: 'xdg-open', args: [url] };
  }
}

/**
 * Launch the opener detached from this process.
 *
 * Resolves true once the opener has started and false if it could not be
 * spawned. Whether a browser actually shows the page is not observable.
 */
export function openInBrowser(url: string, options: OpenInBrowserOptions = {}): Promise<boolean> {
  const { command, args } = openerCommand(url, options.platform);
  const spawnFn = options.spawnFn ?? spawn;

  return new Promise((resolve) => {
    let child: ChildProcess;
    try {
      child = spawnFn(command, args, { detached: true, stdio: 'ignore' });
    } catch {
      resolve(false);
      return;
    }

    child.once('error', () => resolve(false));
    child.once('spawn', () => {
      child.unref();
      resolve(true);
    });
  });
}
