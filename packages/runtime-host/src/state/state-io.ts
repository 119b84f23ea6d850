/**
 * Loopdesk Runtime Host — StateIO
 *
 * An injectable I/O abstraction for the host's append-only logs.
 *
 *   - FileStateIO   — durable files under `<home>/logs/`
 *   - MemoryStateIO — in-memory, for tests and embedded (non-persistent) use
 *
 * Callers pass bare log filenames; the implementation decides where they
 * live. Nothing outside this file builds log paths.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { isNodeError } from '../home.js';

export interface StateIO {
  /**
   * Append one line to a log file, creating the logs directory on demand.
   * A newline is written after `line`.
   */
  appendLine(logfilename: string, line: string): void;

  /**
   * Raw text of a log file, or '' when it does not exist.
   * Parsing is left to the caller (see readLaunchLog).
   */
  readLogRaw(logfilename: string): string;
}

// ---------------------------------------------------------------------------
// FileStateIO
// ---------------------------------------------------------------------------

/**
 * Appends to and reads `<homeDir>/logs/<logfilename>`.
 *
 * Synchronous I/O: an entry is on disk before the launch reply is returned.
 * ENOENT on read is an empty log; any other I/O error is rethrown.
 */
export class FileStateIO implements StateIO {
  constructor(private readonly homeDir: string) {}

  appendLine(logfilename: string, line: string): void {
    const logsDir = join(this.homeDir, 'logs');
    mkdirSync(logsDir, { recursive: true });
    appendFileSync(join(logsDir, logfilename), line + '\n', 'utf-8');
  }

  readLogRaw(logfilename: string): string {
    try {
      return readFileSync(join(this.homeDir, 'logs', logfilename), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) {
        return '';
      }
      throw err;
    }
  }
}

// ---------------------------------------------------------------------------
// MemoryStateIO
// ---------------------------------------------------------------------------

/** In-memory StateIO. Instances share nothing. */
export class MemoryStateIO implements StateIO {
  private readonly logs: Map<string, string[]> = new Map();

  appendLine(logfilename: string, line: string): void {
    const lines = this.logs.get(logfilename) ?? [];
    lines.push(line);
    this.logs.set(logfilename, lines);
  }

  /**
   * Lines appended to a log file, in order. Not part of StateIO; tests use
   * it to inspect output without touching the file system.
   */
  readLines(logfilename: string): ReadonlyArray<string> {
    return this.logs.get(logfilename) ?? [];
  }

  readLogRaw(logfilename: string): string {
    const lines = this.logs.get(logfilename) ?? [];
    if (lines.length === 0) return '';
    // Same shape FileStateIO produces: every line newline-terminated.
    return lines.join('\n') + '\n';
  }
}
