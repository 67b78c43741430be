import * as fs from 'fs';
import * as path from 'path';

/**
 * Logging for the CLI.
 *
 * Lines go to stderr when verbose and are appended to a log file when one is configured.
 * stdout is left to the summary printed by the CLI.
 */

interface LogTarget {
  verbose: boolean;
  file: string | null;
}

const target: LogTarget = {
  verbose: false,
  file: null,
};

/**
 * Configure where log lines go
 */
export function configureLog(options: { verbose?: boolean; file?: string | null }): void {
  if (options.verbose !== undefined) {
    target.verbose = options.verbose;
  }
  if (options.file !== undefined) {
    target.file = options.file;
    if (options.file) {
      try {
        fs.mkdirSync(path.dirname(options.file), { recursive: true });
      } catch (error) {
        // Carry on without a log file
        console.error(`[xlf-translate] Cannot create log directory for ${options.file}:`, error);
        target.file = null;
      }
    }
  }
}

export function isVerbose(): boolean {
  return target.verbose;
}

/**
 * Log a message with timestamp
 */
export function log(message: string, ...args: unknown[]): void {
  const timestamp = new Date().toISOString();
  const formattedMessage = `[${timestamp}] [xlf-translate] ${message}`;
  const fullMessage = args.length > 0
    ? `${formattedMessage} ${args.map(a => JSON.stringify(a)).join(' ')}`
    : formattedMessage;

  if (target.verbose) {
    console.error(fullMessage);
  }

  if (!target.file) {
    return;
  }

  try {
    fs.appendFileSync(target.file, fullMessage + '\n', 'utf-8');
  } catch (error) {
    // Don't fail the run if we can't write to log file
    console.error('[xlf-translate] Failed to write to log file:', error);
  }
}
