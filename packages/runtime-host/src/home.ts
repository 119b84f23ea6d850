/**
 * Loopdesk Runtime Host — LOOPDESK_HOME Resolution
 *
 * Resolves the loopdesk home directory using the following precedence:
 *
 *   1. Explicit `home` option (e.g. from the --home CLI flag)
 *   2. LOOPDESK_HOME environment variable
 *   3. OS application config file (last home persisted with --home)
 *   4. Default: ~/.loopdesk
 *
 * Layout under the resolved home:
 *
 *   <LOOPDESK_HOME>/
 *     logs/
 *       launches.jsonl
 *
 * The home holds host state only. The kernel process is launched with the
 * host's own working directory, never with this one.
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { homedir, platform } from 'node:os';

// ---------------------------------------------------------------------------
// OS Config File Location
// ---------------------------------------------------------------------------

/**
 * Platform-specific path of the loopdesk application config file.
 *
 *   macOS:   ~/Library/Preferences/loopdesk/config.json
 *   Windows: %APPDATA%\loopdesk\config.json
 *   Linux:   $XDG_CONFIG_HOME/loopdesk/config.json (fallback ~/.config)
 */
export function getOsConfigPath(): string {
  const home = homedir();
  switch (platform()) {
    case 'darwin':
      return join(home, 'Library', 'Preferences', 'loopdesk', 'config.json');
    case 'win32': {
      const appData = process.env['APPDATA'] ?? join(home, 'AppData', 'Roaming');
      return join(appData, 'loopdesk', 'config.json');
    }
    default: {
      const xdg = process.env['XDG_CONFIG_HOME'];
      const configRoot = xdg !== undefined && xdg !== '' ? xdg : join(home, '.config');
      return join(configRoot, 'loopdesk', 'config.json');
    }
  }
}

// ---------------------------------------------------------------------------
// OS Config Read / Write
// ---------------------------------------------------------------------------

/**
 * Read the persisted home path from the OS config file.
 *
 * Returns null when the file is missing, unparseable, or has no usable
 * `loopdeskHome` entry. Any other read error propagates.
 */
export function readLoopdeskHomeFromConfig(): string | null {
  let raw: string;
  try {
    raw = readFileSync(getOsConfigPath(), 'utf-8');
  } catch (err: unknown) {
    if (isNodeError(err, 'ENOENT')) return null;
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }

  if (parsed !== null && typeof parsed === 'object' && 'loopdeskHome' in parsed) {
    const value = parsed.loopdeskHome;
    return typeof value === 'string' && value !== '' ? value : null;
  }
  return null;
}

/** Persist a home path to the OS config file, creating its directory. */
export function writeLoopdeskHomeToConfig(loopdeskHome: string): void {
  const configPath = getOsConfigPath();
  mkdirSync(dirname(configPath), { recursive: true });
  writeFileSync(configPath, JSON.stringify({ loopdeskHome }, null, 2), 'utf-8');
}

// ---------------------------------------------------------------------------
// Primary Resolution Function
// ---------------------------------------------------------------------------

export interface ResolveLoopdeskHomeOptions {
  /** Explicit override; highest precedence. */
  readonly home?: string | undefined;
  /**
   * Persist the resolved home to the OS config file so later runs without
   * --home use it. Only meaningful together with `home`. Default: false.
   */
  readonly persist?: boolean | undefined;
}

/**
 * Resolve the loopdesk home directory, creating it if absent.
 *
 * @returns Path of the resolved home directory
 */
export function resolveLoopdeskHome(opts?: ResolveLoopdeskHomeOptions): string {
  const explicit = opts?.home;
  const fromEnv = process.env['LOOPDESK_HOME'];

  let loopdeskHome: string;
  if (explicit !== undefined && explicit !== '') {
    loopdeskHome = explicit;
  } else if (fromEnv !== undefined && fromEnv !== '') {
    loopdeskHome = fromEnv;
  } else {
    loopdeskHome = readLoopdeskHomeFromConfig() ?? join(homedir(), '.loopdesk');
  }

  if (!existsSync(loopdeskHome)) {
    mkdirSync(loopdeskHome, { recursive: true });
  }

  if (opts?.persist === true && explicit !== undefined && explicit !== '') {
    writeLoopdeskHomeToConfig(loopdeskHome);
  }

  return loopdeskHome;
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): boolean {
  return err !== null && typeof err === 'object' && 'code' in err && err.code === code;
}
