import { z } from 'zod';

import {
  DEFAULT_MIN_COMPRESS_BYTES,
  DEFAULT_SHUTDOWN_POLL_INTERVAL_MS,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
} from './config.js';
import type { HostnameCache } from './hostname-cache.js';
import { createStructuredLogEntry, type LogEntryFactory } from './log-entry.js';
import { type MetricsSink, RequestMetrics } from './metrics.js';
import { logWarn } from './observability.js';
import { type JsonSerializer, serializeJson } from './response.js';

export interface LoggedServerOptions {
  /** How long `shutdown()` waits for in-flight requests. Default 30s. */
  readonly shutdownTimeoutMs?: number;
  readonly shutdownPollIntervalMs?: number;
  /** Indent JSON bodies with two spaces. */
  readonly jsonIndented?: boolean;
  readonly disableCompression?: boolean;
  /** Bodies at or below this size are never compressed. */
  readonly minCompressBytes?: number;
  readonly logEntryFactory?: LogEntryFactory;
  readonly serializer?: JsonSerializer;
  readonly metrics?: MetricsSink;
  /** Adds `remote_host` to request logs when set. */
  readonly hostnames?: HostnameCache;
}

const TuningSchema = z
  .object({
    shutdownTimeoutMs: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SHUTDOWN_TIMEOUT_MS),
    shutdownPollIntervalMs: z
      .number()
      .int()
      .positive()
      .default(DEFAULT_SHUTDOWN_POLL_INTERVAL_MS),
    jsonIndented: z.boolean().default(false),
    disableCompression: z.boolean().default(false),
    minCompressBytes: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_MIN_COMPRESS_BYTES),
  })
  .strict();

type Tuning = z.infer<typeof TuningSchema>;

export interface ResolvedServerOptions extends Tuning {
  readonly logEntryFactory: LogEntryFactory;
  readonly serializer: JsonSerializer;
  readonly metrics: MetricsSink;
  readonly hostnames: HostnameCache | undefined;
}

export class OptionsError extends TypeError {
  override name = 'OptionsError';
}

let warnedDefaultLogEntry = false;

function defaultLogEntryFactory(): LogEntryFactory {
  if (!warnedDefaultLogEntry) {
    warnedDefaultLogEntry = true;
    logWarn(
      'No logEntryFactory configured; request logs go to the built-in stderr logger'
    );
  }
  return createStructuredLogEntry;
}

export function resolveServerOptions(
  options: LoggedServerOptions = {}
): ResolvedServerOptions {
  const parsed = TuningSchema.safeParse({
    shutdownTimeoutMs: options.shutdownTimeoutMs,
    shutdownPollIntervalMs: options.shutdownPollIntervalMs,
    jsonIndented: options.jsonIndented,
    disableCompression: options.disableCompression,
    minCompressBytes: options.minCompressBytes,
  });
  if (!parsed.success) {
    throw new OptionsError(
      parsed.error.issues
        .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
        .join('; ')
    );
  }

  return {
    ...parsed.data,
    logEntryFactory: options.logEntryFactory ?? defaultLogEntryFactory(),
    serializer: options.serializer ?? serializeJson,
    metrics: options.metrics ?? new RequestMetrics(),
    hostnames: options.hostnames,
  };
}
