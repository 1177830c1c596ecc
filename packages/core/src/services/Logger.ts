/**
 * Logger - pino setup shared by the adapters and the CLI.
 *
 * Logs go to stderr (so they never mix with command output on stdout) and,
 * optionally, to a file. Adapters take an optional ILogger and log through a
 * `component` child.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import pino from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

/** Re-export pino's Logger type for use throughout the codebase */
export type { Logger as ILogger } from 'pino';

export interface LoggerOptions {
  level?: LogLevel;
  /** Also append JSON log lines to this file */
  file?: string;
  /** Write to stderr (default true) */
  stderr?: boolean;
}

/**
 * Create a pino logger writing to stderr and/or a log file.
 */
export function createLogger(options: LoggerOptions = {}): pino.Logger {
  const { level = 'info', file, stderr = true } = options;
  if (level === 'silent') {
    return createNullLogger();
  }

  const streams: pino.StreamEntry[] = [];

  if (stderr) {
    streams.push({ level, stream: pino.destination({ fd: 2, sync: true }) });
  }
  if (file) {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    streams.push({ level, stream: pino.destination({ dest: file, sync: true }) });
  }
  if (streams.length === 0) {
    return createNullLogger();
  }

  return pino(
    {
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.multistream(streams),
  );
}

/**
 * Create a silent logger for testing.
 */
export function createNullLogger(): pino.Logger {
  return pino({ level: 'silent' });
}
