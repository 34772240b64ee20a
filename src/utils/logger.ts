import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { errorMessage } from './errors.js';

type Level = 'INFO' | 'WARN' | 'ERROR';

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  child(tag: string): Logger;
}

export interface LoggerOptions {
  tag?: string;
  /** Run log the lines are appended to, in addition to the console. */
  logFile?: string;
  /** Suppresses console output; the log file still receives every line. */
  quiet?: boolean;
}

/**
 * Tagged console logger (`[Orchestrator] ...`) with an optional append-only
 * file sink for the run log.
 */
export const createLogger = (options: LoggerOptions = {}): Logger => {
  const { tag = 'Pipeline', logFile, quiet = false } = options;

  if (logFile) {
    mkdirSync(dirname(logFile), { recursive: true });
  }

  const write = (level: Level, message: string) => {
    const line = `[${tag}] ${message}`;
    if (!quiet) {
      if (level === 'ERROR') console.error(line);
      else if (level === 'WARN') console.warn(line);
      else console.log(line);
    }
    if (logFile) {
      appendFileSync(logFile, `${new Date().toISOString()} ${level} ${line}\n`, 'utf8');
    }
  };

  return {
    info: (message) => write('INFO', message),
    warn: (message) => write('WARN', message),
    error: (message, error) => write('ERROR', error === undefined ? message : `${message}: ${errorMessage(error)}`),
    child: (childTag) => createLogger({ tag: childTag, logFile, quiet }),
  };
};
