/**
 * XDG Base Directory compliant paths for toolshelf.
 *
 * - Config: ~/.config/toolshelf/ (or $XDG_CONFIG_HOME/toolshelf/)
 * - Project: .toolshelf/ in the working directory
 *
 * @see https://specifications.freedesktop.org/basedir-spec/basedir-spec-latest.html
 */

import { homedir } from 'node:os';
import { join } from 'node:path';

const APP_DIR = 'toolshelf';

/**
 * Uses $XDG_CONFIG_HOME if set, otherwise ~/.config/toolshelf/
 */
export function getConfigDir(): string {
  const xdg = process.env.XDG_CONFIG_HOME;
  return xdg ? join(xdg, APP_DIR) : join(homedir(), '.config', APP_DIR);
}

export function getConfigPath(): string {
  return join(getConfigDir(), 'config.json');
}

/**
 * Project-level directory, `.toolshelf/` under cwd.
 */
export function getProjectDir(cwd: string = process.cwd()): string {
  return join(cwd, `.${APP_DIR}`);
}
