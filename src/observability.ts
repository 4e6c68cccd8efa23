import process from 'node:process';
import { inspect, stripVTControlCharacters } from 'node:util';

import { config, type LogLevel } from './config.js';

export type LogMetadata = Record<string, unknown>;

const LEVEL_ORDER: Readonly<Record<LogLevel, number>> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let stderrAvailable = true;

process.stderr.on('error', () => {
  stderrAvailable = false;
});

function hasMetadata(meta?: LogMetadata): meta is LogMetadata {
  return meta !== undefined && Object.keys(meta).length > 0;
}

function formatMetadata(meta?: LogMetadata): string {
  if (!hasMetadata(meta)) return '';

  return ` ${inspect(meta, { breakLength: Infinity, colors: false, compact: true })}`;
}

function createTimestamp(): string {
  return new Date().toISOString();
}

export function formatLogEntry(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): string {
  if (config.logging.format === 'json') {
    const entry: Record<string, unknown> = {
      timestamp: createTimestamp(),
      level: level.toUpperCase(),
      message,
    };
    if (hasMetadata(meta)) {
      Object.assign(entry, meta);
    }
    return JSON.stringify(entry);
  }
  return `[${createTimestamp()}] ${level.toUpperCase()}: ${message}${formatMetadata(meta)}`;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[config.logging.level];
}

function safeWriteStderr(line: string): void {
  if (!stderrAvailable) return;
  if (process.stderr.destroyed || process.stderr.writableEnded) {
    stderrAvailable = false;
    return;
  }
  try {
    process.stderr.write(line);
  } catch {
    // Logging must never take down the process (e.g. EPIPE).
    stderrAvailable = false;
  }
}

export function writeLog(
  level: LogLevel,
  message: string,
  meta?: LogMetadata
): void {
  if (!shouldLog(level)) return;

  const line = formatLogEntry(level, message, meta);
  safeWriteStderr(`${stripVTControlCharacters(line)}\n`);
}

export function logInfo(message: string, meta?: LogMetadata): void {
  writeLog('info', message, meta);
}

export function logDebug(message: string, meta?: LogMetadata): void {
  writeLog('debug', message, meta);
}

export function logWarn(message: string, meta?: LogMetadata): void {
  writeLog('warn', message, meta);
}

export function logError(message: string, error?: Error | LogMetadata): void {
  const errorMeta: LogMetadata =
    error instanceof Error
      ? { error: error.message, stack: error.stack }
      : (error ?? {});
  writeLog('error', message, errorMeta);
}
