/**
 * Logger: writes timestamped lines to the console and, once initialized,
 * to a log file in the data directory.
 *
 * The log file is truncated each time Logger.init() is called,
 * so it always contains only the current session's logs.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export const LOG_FILE_NAME = 'bev-inventory.log';

let logStream: fs.WriteStream | null = null;
let logFilePath: string | null = null;
let consoleEnabled = true;
let minLevel: LogLevel = 'info';

/** Extract a printable message from anything thrown */
export function getErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'string') return err;
  return String(err);
}

function formatData(data: unknown): string {
  if (data === null || data === undefined) return '';
  if (data instanceof Error) return ` ${data.message}`;
  if (typeof data === 'string') return ` ${data}`;
  try {
    return ` ${JSON.stringify(data)}`;
  } catch {
    return ` ${String(data)}`;
  }
}

function timestamp(): string {
  const d = new Date();
  const hh = String(d.getHours()).padStart(2, '0');
  const mm = String(d.getMinutes()).padStart(2, '0');
  const ss = String(d.getSeconds()).padStart(2, '0');
  const ms = String(d.getMilliseconds()).padStart(3, '0');
  return `${hh}:${mm}:${ss}.${ms}`;
}

function writeLine(level: LogLevel, message: string, data: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
  const line = `${timestamp()} [${level.toUpperCase()}] ${message}${formatData(data)}\n`;

  if (consoleEnabled) {
    if (level === 'error') console.error(line.trimEnd());
    else if (level === 'warn') console.warn(line.trimEnd());
    else console.log(line.trimEnd());
  }

  if (logStream) {
    logStream.write(line);
  }
}

const Logger = {
  /**
   * Initialize file logging. Call once at startup with the data directory.
   * Truncates the log file so only the current session is kept.
   */
  init(dataDir: string): void {
    logFilePath = path.join(dataDir, LOG_FILE_NAME);
    if (logStream) {
      logStream.end();
      logStream = null;
    }
    try {
      fs.mkdirSync(dataDir, { recursive: true });
      fs.writeFileSync(logFilePath, '');
      logStream = fs.createWriteStream(logFilePath, { flags: 'a' });
      logStream.on('error', (err) => {
        if (consoleEnabled) console.error('Log stream error:', err);
        logStream = null;
      });
    } catch (err) {
      console.error('Failed to create log file:', err);
    }
    writeLine('info', `=== Session started (${new Date().toISOString()}) ===`, null);
  },

  /** Path of the current session's log file, or null before init() */
  filePath(): string | null {
    return logFilePath;
  },

  setLevel(level: LogLevel): void {
    minLevel = level;
  },

  /** Disable console output (the test setup uses this to keep runner output clean) */
  disableConsole(): void {
    consoleEnabled = false;
  },

  debug(message: string, data: unknown = null): void {
    writeLine('debug', message, data);
  },

  info(message: string, data: unknown = null): void {
    writeLine('info', message, data);
  },

  warn(message: string, data: unknown = null): void {
    writeLine('warn', message, data);
  },

  error(message: string, error: unknown = null): void {
    writeLine('error', message, error);
  },

  /** Flush and close the log stream (call before the process exits) */
  close(): void {
    if (logStream) {
      logStream.end();
      logStream = null;
    }
    logFilePath = null;
  }
};

export default Logger;
