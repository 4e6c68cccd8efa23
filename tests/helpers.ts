import {
  createServer,
  request,
  type IncomingHttpHeaders,
  type Server,
} from 'node:http';
import type { AddressInfo } from 'node:net';

import { formatCallstack, type CallFrame } from '../src/errors.js';
import type { LogEntry, LogEntryFactory } from '../src/log-entry.js';
import type { RequestListener } from '../src/server.js';

export type RecordedLevel = 'info' | 'warn' | 'error';

export interface LogRecord {
  readonly level: RecordedLevel;
  readonly message: string;
  readonly fields: Readonly<Record<string, unknown>>;
}

export class RecordingLogEntry implements LogEntry {
  readonly fields: Record<string, unknown> = {};

  constructor(private readonly onWrite: (record: LogRecord) => void) {}

  addField(key: string, value: unknown): void {
    this.fields[key] = value;
  }

  addFields(fields: Readonly<Record<string, unknown>>): void {
    Object.assign(this.fields, fields);
  }

  addCallstack(frames: readonly CallFrame[]): void {
    if (frames.length === 0) return;
    this.fields.callstack = formatCallstack(frames);
  }

  info(message: string): void {
    this.write('info', message);
  }

  warn(message: string): void {
    this.write('warn', message);
  }

  error(message: string): void {
    this.write('error', message);
  }

  private write(level: RecordedLevel, message: string): void {
    this.onWrite({ level, message, fields: { ...this.fields } });
  }
}

/**
 * Collects every record written through the entries it hands out. Request
 * records are written after the response finishes, so tests wait for them.
 */
export class LogRecorder {
  readonly records: LogRecord[] = [];
  private waiters: { count: number; resolve: () => void }[] = [];

  readonly factory: LogEntryFactory = () =>
    new RecordingLogEntry((record) => {
      this.records.push(record);
      this.notify();
    });

  /** Records that carry request fields, in write order. */
  requestRecords(): LogRecord[] {
    return this.records.filter((record) => 'http_status' in record.fields);
  }

  waitForRequests(count: number): Promise<LogRecord[]> {
    return new Promise((resolve) => {
      const check = (): void => {
        resolve(this.requestRecords().slice(0, count));
      };
      if (this.requestRecords().length >= count) {
        check();
        return;
      }
      this.waiters.push({ count, resolve: check });
    });
  }

  private notify(): void {
    const ready = this.requestRecords().length;
    const pending = this.waiters.filter((waiter) => waiter.count <= ready);
    this.waiters = this.waiters.filter((waiter) => waiter.count > ready);
    for (const waiter of pending) waiter.resolve();
  }
}

export interface TestServer {
  readonly port: number;
  close(): Promise<void>;
}

export function listen(listener: RequestListener): Promise<TestServer> {
  const server: Server = createServer(listener);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(0, '127.0.0.1', () => {
      const address: AddressInfo | string | null = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('test server has no TCP address'));
        return;
      }
      resolve({
        port: address.port,
        close: () =>
          new Promise<void>((done, fail) => {
            server.closeAllConnections();
            server.close((error) => {
              if (error) fail(error);
              else done();
            });
          }),
      });
    });
  });
}

export interface TestResponse {
  readonly status: number;
  readonly headers: IncomingHttpHeaders;
  readonly body: Buffer;
}

export function fetchRaw(
  port: number,
  path: string,
  options: {
    method?: string;
    headers?: Record<string, string>;
    body?: string;
  } = {}
): Promise<TestResponse> {
  return new Promise((resolve, reject) => {
    const req = request(
      {
        host: '127.0.0.1',
        port,
        path,
        method: options.method ?? 'GET',
        headers: options.headers ?? {},
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('error', reject);
        res.on('end', () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks),
          });
        });
      }
    );
    req.on('error', reject);
    if (options.body === undefined) req.end();
    else req.end(options.body);
  });
}
