import type { IncomingMessage, ServerResponse } from 'node:http';
import { performance } from 'node:perf_hooks';
import { setTimeout as delay } from 'node:timers/promises';

import { ConnectionGate } from './connection-gate.js';
import {
  type DispatchResult,
  endResponse,
  ResponseDispatcher,
} from './dispatcher.js';
import {
  annotateError,
  combineErrors,
  getErrorMessage,
  ReportableError,
} from './errors.js';
import {
  type LogEntry,
  StructuredLogEntry,
  writeRequestLog,
} from './log-entry.js';
import type { MetricsSink } from './metrics.js';
import { logError, logWarn } from './observability.js';
import {
  type LoggedServerOptions,
  resolveServerOptions,
  type ResolvedServerOptions,
} from './options.js';
import type { HandlerResponse } from './response.js';

export type LoggedHandler = (
  req: IncomingMessage,
  entry: LogEntry
) => HandlerResponse | Promise<HandlerResponse>;

export type RequestListener = (
  req: IncomingMessage,
  res: ServerResponse
) => void;

export type ShutdownOutcome = 'drained' | 'deadline-exceeded';

export interface ShutdownResult {
  readonly outcome: ShutdownOutcome;
  readonly openConnections: number;
  readonly elapsedMs: number;
}

const SHUTTING_DOWN_MESSAGE = 'server shutting down';

function declaredRequestBytes(req: IncomingMessage): number {
  const length = Number.parseInt(req.headers['content-length'] ?? '', 10);
  return Number.isSafeInteger(length) && length > 0 ? length : 0;
}

/**
 * Writes a bodiless response, used when the dispatcher could not run: after
 * a panic or when admission was refused. Headers the handler already set are
 * dropped.
 */
async function respondWithStatus(
  res: ServerResponse,
  status: number,
  headers: Readonly<Record<string, string>> = {}
): Promise<ReportableError | undefined> {
  if (res.writableEnded) return undefined;
  if (res.headersSent) {
    res.destroy();
    return new ReportableError(
      `status ${status} not sent: response already committed`
    );
  }

  for (const name of res.getHeaderNames()) res.removeHeader(name);
  res.writeHead(status, { ...headers, 'Content-Length': '0' });
  try {
    await endResponse(res);
  } catch (error) {
    return ReportableError.wrap('write response', error);
  }
  return undefined;
}

/**
 * Wraps named handlers with admission control, panic recovery, response
 * dispatch and one structured log record per request, and drains in-flight
 * requests on shutdown.
 */
export class LoggedServer {
  readonly gate: ConnectionGate;
  readonly metrics: MetricsSink;
  private readonly options: ResolvedServerOptions;
  private readonly dispatcher: ResponseDispatcher;

  constructor(
    options: LoggedServerOptions = {},
    gate: ConnectionGate = new ConnectionGate()
  ) {
    this.options = resolveServerOptions(options);
    this.gate = gate;
    this.metrics = this.options.metrics;
    this.dispatcher = new ResponseDispatcher({
      jsonIndented: this.options.jsonIndented,
      disableCompression: this.options.disableCompression,
      minCompressBytes: this.options.minCompressBytes,
      serializer: this.options.serializer,
    });
  }

  /**
   * Adapts `handler` to a `node:http` request listener (usable as an
   * Express route handler too).
   *
   * After `beginShutdown()` requests get 503 without reaching the handler.
   * A thrown error or rejected promise becomes a 500 with the call-stack in
   * the log. An `error` on the handler's response is logged but leaves the
   * status alone. Non-text, non-byte bodies are sent as JSON.
   */
  handle(name: string, handler: LoggedHandler): RequestListener {
    return (req, res) => {
      this.serve(name, handler, req, res).catch((error: unknown) => {
        logError('Request wrapper failed', {
          handler: name,
          error: getErrorMessage(error),
        });
      });
    };
  }

  beginShutdown(): void {
    this.gate.beginShutdown();
  }

  /**
   * Closes admission and waits for in-flight requests, polling until none
   * remain or the shutdown timeout passes. Resolves either way.
   */
  async shutdown(): Promise<ShutdownResult> {
    this.gate.beginShutdown();

    const { shutdownTimeoutMs: timeoutMs, shutdownPollIntervalMs: pollMs } =
      this.options;
    const start = performance.now();

    for (;;) {
      const open = this.gate.openCount();
      const elapsedMs = performance.now() - start;

      if (open === 0) {
        this.newEntry().info('all connections closed');
        return { outcome: 'drained', openConnections: 0, elapsedMs };
      }

      const entry = this.newEntry();
      entry.addField('open_connections', open);

      if (elapsedMs >= timeoutMs) {
        entry.error(
          `shutdown deadline of ${timeoutMs}ms exceeded; ${open} connections still open`
        );
        return { outcome: 'deadline-exceeded', openConnections: open, elapsedMs };
      }

      entry.info(`waiting for ${open} connections to close`);
      await delay(Math.min(pollMs, timeoutMs - elapsedMs));
    }
  }

  private newEntry(): LogEntry {
    try {
      return this.options.logEntryFactory();
    } catch (error) {
      logWarn('Log entry factory failed; using the built-in entry', {
        error: getErrorMessage(error),
      });
      return new StructuredLogEntry();
    }
  }

  private async serve(
    name: string,
    handler: LoggedHandler,
    req: IncomingMessage,
    res: ServerResponse
  ): Promise<void> {
    const start = performance.now();
    const entry = this.newEntry();

    if (!this.gate.admit()) {
      const writeError = await respondWithStatus(res, 503, {
        Connection: 'close',
      });
      this.complete(name, req, entry, start, {
        status: 503,
        bytesSent: 0,
        error: annotateError(
          new ReportableError(SHUTTING_DOWN_MESSAGE),
          writeError
        ),
      });
      return;
    }

    let result: DispatchResult;
    try {
      result = await this.run(handler, req, res, entry);
    } finally {
      this.gate.release();
    }
    this.complete(name, req, entry, start, result);
  }

  private async run(
    handler: LoggedHandler,
    req: IncomingMessage,
    res: ServerResponse,
    entry: LogEntry
  ): Promise<DispatchResult> {
    let handlerError: ReportableError | undefined;
    try {
      const response = await handler(req, entry);
      if (response.error !== undefined && response.error !== null) {
        handlerError = ReportableError.from(response.error);
      }

      const result = await this.dispatcher.dispatch(req, res, response);
      return { ...result, error: combineErrors(handlerError, result.error) };
    } catch (thrown) {
      const panic = ReportableError.fromPanic(thrown);
      const merged = combineErrors(handlerError, panic) ?? panic;
      const writeError = await respondWithStatus(res, 500);
      return {
        status: 500,
        bytesSent: 0,
        error: annotateError(merged, writeError),
      };
    }
  }

  private complete(
    name: string,
    req: IncomingMessage,
    entry: LogEntry,
    start: number,
    result: DispatchResult
  ): void {
    const elapsedMs = performance.now() - start;
    const method = req.method ?? '';

    this.emitLog(entry, req, name, elapsedMs, result).catch(
      (error: unknown) => {
        logError('Failed to write request log', {
          handler: name,
          error: getErrorMessage(error),
        });
      }
    );

    try {
      this.metrics.observe({
        code: String(result.status),
        handler: name,
        method,
        durationSeconds: elapsedMs / 1000,
        requestBytes: declaredRequestBytes(req),
        responseBytes: result.bytesSent,
      });
    } catch (error) {
      logWarn('Metrics sink rejected a sample', {
        handler: name,
        error: getErrorMessage(error),
      });
    }
  }

  private async emitLog(
    entry: LogEntry,
    req: IncomingMessage,
    name: string,
    elapsedMs: number,
    result: DispatchResult
  ): Promise<void> {
    const remoteAddr = req.socket.remoteAddress ?? '';
    const { hostnames } = this.options;
    const remoteHost =
      hostnames && remoteAddr ? await hostnames.lookup(remoteAddr) : undefined;

    writeRequestLog(entry, {
      method: req.method ?? '',
      uri: req.url ?? '',
      remoteAddr,
      remoteHost,
      handler: name,
      status: result.status,
      bytesSent: result.bytesSent,
      elapsedMs,
      error: result.error,
    });
  }
}
