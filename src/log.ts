/**
 * Tagged console logging.
 *
 * Everything goes to stderr as `[tag] message`, filtered by level, with the
 * current run ID and category appended when a run context is active.
 */

import { getRunContext } from './run-context.js';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

let minLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(minLevel);
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel, message: string, details: unknown[]) => {
    if (!enabled(level)) return;
    const run = getRunContext();
    const suffix = run ? ` (run ${run.runId}${run.category ? `, ${run.category}` : ''})` : '';
    const line = `[${tag}] ${message}${suffix}`;
    if (level === 'warn') console.warn(line, ...details);
    else console.error(line, ...details);
  };

  return {
    debug: (message, ...details) => write('debug', message, details),
    info: (message, ...details) => write('info', message, details),
    warn: (message, ...details) => write('warn', message, details),
    error: (message, ...details) => write('error', message, details),
  };
}

/** Message text for anything caught. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
