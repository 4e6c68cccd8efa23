import { STATUS_CODES } from 'node:http';

import {
  type CallFrame,
  formatCallstack,
  type ReportableError,
  severityForStatus,
} from './errors.js';
import { type LogMetadata, writeLog } from './observability.js';

/**
 * A structured log record built up over one request and written once by
 * calling one of the level methods.
 */
export interface LogEntry {
  addField(key: string, value: unknown): void;
  addFields(fields: Readonly<Record<string, unknown>>): void;
  addCallstack(frames: readonly CallFrame[]): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogEntryFactory = () => LogEntry;

export class StructuredLogEntry implements LogEntry {
  private readonly fields = new Map<string, unknown>();

  addField(key: string, value: unknown): void {
    this.fields.set(key, value);
  }

  addFields(fields: Readonly<Record<string, unknown>>): void {
    for (const [key, value] of Object.entries(fields)) {
      this.fields.set(key, value);
    }
  }

  addCallstack(frames: readonly CallFrame[]): void {
    if (frames.length === 0) return;
    this.fields.set('callstack', formatCallstack(frames));
  }

  info(message: string): void {
    writeLog('info', message, this.snapshot());
  }

  warn(message: string): void {
    writeLog('warn', message, this.snapshot());
  }

  error(message: string): void {
    writeLog('error', message, this.snapshot());
  }

  snapshot(): LogMetadata {
    return Object.fromEntries(this.fields);
  }
}

export const createStructuredLogEntry: LogEntryFactory = () =>
  new StructuredLogEntry();

export interface RequestLogDetails {
  readonly method: string;
  readonly uri: string;
  readonly remoteAddr: string;
  readonly remoteHost?: string | undefined;
  readonly handler: string;
  readonly status: number;
  readonly bytesSent: number;
  readonly elapsedMs: number;
  readonly error?: ReportableError | undefined;
}

/**
 * Adds the fixed request fields and writes the entry:
 *
 *   bytes_sent    bytes written to the client, after compression
 *   handler       name the handler was registered under
 *   http_status   status code returned
 *   method        request method
 *   remote_addr   client IP address
 *   remote_host   resolved client hostname, when a resolver is configured
 *   time_taken    milliseconds from admission to the end of the response
 *   uri           request URI
 *
 * The level follows the status code; the message is the error text, or the
 * status text when there is no error.
 */
export function writeRequestLog(
  entry: LogEntry,
  details: RequestLogDetails
): void {
  entry.addFields({
    bytes_sent: details.bytesSent,
    handler: details.handler,
    http_status: details.status,
    method: details.method,
    remote_addr: details.remoteAddr,
    time_taken: Math.round(details.elapsedMs),
    uri: details.uri,
  });
  if (details.remoteHost !== undefined) {
    entry.addField('remote_host', details.remoteHost);
  }

  const { error } = details;
  if (error) entry.addCallstack(error.frames);

  const message = error?.message ?? STATUS_CODES[details.status] ?? 'OK';

  switch (severityForStatus(details.status)) {
    case 'error':
      entry.error(message);
      return;
    case 'warn':
      entry.warn(message);
      return;
    case 'info':
      entry.info(message);
  }
}
