/**
 * Console + file logger. Every line lands in logs/<name>.log with an ISO
 * timestamp; the console gets an HH:MM:SS stamp, and `verbose` lines only
 * when verbose mode is on.
 */

import { appendFileSync, mkdirSync } from "fs";
import { resolve } from "path";

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
  verbose(msg: string): void;
  /** Path of the log file, or null when file logging is off. */
  readonly file: string | null;
}

export interface LoggerOptions {
  name: string;
  /** Directory for the log file; null disables file output. */
  logsDir?: string | null;
  verbose?: boolean;
  /** Print to the console (default true). */
  console?: boolean;
}

function stamp(): string {
  return new Date().toISOString().slice(11, 19);
}

export function createLogger(opts: LoggerOptions): Logger {
  const dir = opts.logsDir === undefined ? resolve(process.cwd(), "logs") : opts.logsDir;
  let file: string | null = null;
  if (dir !== null) {
    mkdirSync(dir, { recursive: true });
    file = resolve(dir, `${opts.name}.log`);
  }
  const toConsole = opts.console ?? true;

  function writeLog(line: string): void {
    if (file) appendFileSync(file, `${new Date().toISOString()} ${line}\n`);
  }

  return {
    file,
    info(msg) {
      writeLog(msg);
      if (toConsole) console.log(`[${stamp()}] ${msg}`);
    },
    warn(msg) {
      writeLog(`[WARN] ${msg}`);
      if (toConsole) console.warn(`[${stamp()}] [WARN] ${msg}`);
    },
    error(msg) {
      writeLog(`[ERROR] ${msg}`);
      if (toConsole) console.error(`[${stamp()}] [ERROR] ${msg}`);
    },
    verbose(msg) {
      writeLog(`  [verbose] ${msg}`);
      if (opts.verbose && toConsole) console.log(`[${stamp()}]   ${msg}`);
    },
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  file: null,
  info: () => {},
  warn: () => {},
  error: () => {},
  verbose: () => {},
};
