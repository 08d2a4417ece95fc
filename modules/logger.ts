import { appendFileSync, mkdirSync, existsSync } from 'fs';
import { join } from 'path';
import { redactSecrets } from '@common/strings.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  logDir?: string;
  level?: LogLevel;
  //NOTE: Scrubbed from every line, console and file alike
  secrets?: ReadonlyArray<string | undefined>;
}

let logDir: string | null = null;
let minLevel: LogLevel = 'info';
let secrets: ReadonlyArray<string | undefined> = [];

export function initLogger(options: LoggerOptions = {}): void {
  minLevel = options.level ?? 'info';
  logDir = options.logDir ?? null;
  secrets = options.secrets ?? [];

  if (logDir && !existsSync(logDir)) {
    mkdirSync(logDir, { recursive: true });
  }
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function getLogFile(dir: string): string {
  const date = new Date().toISOString().split('T')[0];
  return join(dir, `${date}.log`);
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLevel];
}

export function formatConsoleLine(entry: LogEntry): string {
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : '';
  return `[${entry.timestamp}] [${entry.level.toUpperCase()}] ${entry.message}${contextStr}`;
}

function writeLog(entry: LogEntry): void {
  const write = entry.level === 'error' || entry.level === 'warn' ? console.error : console.log;
  write(redactSecrets(formatConsoleLine(entry), secrets));

  if (logDir) {
    try {
      appendFileSync(getLogFile(logDir), redactSecrets(JSON.stringify(entry), secrets) + '\n');
    } catch (err) {
      //NOTE: One warning, then console only
      console.error(`[${entry.timestamp}] [WARN] File logging disabled: ${String(err)}`);
      logDir = null;
    }
  }
}

export function log(
  level: LogLevel,
  message: string,
  context?: Record<string, unknown>
): void {
  if (!shouldLog(level)) return;

  const entry: LogEntry = {
    timestamp: formatTimestamp(),
    level,
    message,
    context,
  };

  writeLog(entry);
}

export function debug(message: string, context?: Record<string, unknown>): void {
  log('debug', message, context);
}

export function info(message: string, context?: Record<string, unknown>): void {
  log('info', message, context);
}

export function warn(message: string, context?: Record<string, unknown>): void {
  log('warn', message, context);
}

export function error(message: string, context?: Record<string, unknown>): void {
  log('error', message, context);
}

export type Logger = Pick<typeof logger, 'debug' | 'info' | 'warn' | 'error'>;

export const logger = { debug, info, warn, error, log, initLogger };
