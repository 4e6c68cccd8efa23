import { createRequire } from 'node:module';
import process from 'node:process';
import { fileURLToPath } from 'node:url';

const require = createRequire(import.meta.url);
const packageJsonPath = fileURLToPath(
  new URL('../package.json', import.meta.url)
);
const packageJson = require(packageJsonPath) as { version?: string };
if (typeof packageJson.version !== 'string') {
  throw new Error('package.json version is missing');
}

export const serverVersion: string = packageJson.version;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'text' | 'json';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const { env } = process;

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 30_000;
export const DEFAULT_SHUTDOWN_POLL_INTERVAL_MS = 100;
export const DEFAULT_MIN_COMPRESS_BYTES = 150;

function parseIntegerValue(
  envValue: string | undefined,
  min?: number,
  max?: number
): number | null {
  if (!envValue) return null;
  const parsed = Number.parseInt(envValue, 10);
  if (Number.isNaN(parsed)) return null;
  if (min !== undefined && parsed < min) return null;
  if (max !== undefined && parsed > max) return null;
  return parsed;
}

export function parseInteger(
  envValue: string | undefined,
  defaultValue: number,
  min?: number,
  max?: number
): number {
  return parseIntegerValue(envValue, min, max) ?? defaultValue;
}

function parseOptionalInteger(
  envValue: string | undefined,
  min?: number
): number | undefined {
  return parseIntegerValue(envValue, min) ?? undefined;
}

export function parseBoolean(
  envValue: string | undefined,
  defaultValue: boolean
): boolean {
  if (!envValue) return defaultValue;

  return envValue.trim().toLowerCase() !== 'false';
}

const ALLOWED_LOG_LEVELS: ReadonlySet<string> = new Set(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return ALLOWED_LOG_LEVELS.has(value);
}

export function parseLogLevel(envValue: string | undefined): LogLevel {
  if (!envValue) return 'info';
  const level = envValue.toLowerCase();
  return isLogLevel(level) ? level : 'info';
}

export function parseLogFormat(envValue: string | undefined): LogFormat {
  return envValue?.trim().toLowerCase() === 'json' ? 'json' : 'text';
}

export function parsePort(envValue: string | undefined): number {
  if (envValue?.trim() === '0') return 0;
  return parseInteger(envValue, 3000, 1024, 65535);
}

export const config = {
  server: {
    name: 'logged-http',
    version: serverVersion,
    host: (env.HOST ?? '127.0.0.1').trim(),
    port: parsePort(env.PORT),
    http: {
      headersTimeoutMs: parseOptionalInteger(env.HTTP_HEADERS_TIMEOUT_MS, 1),
      requestTimeoutMs: parseOptionalInteger(env.HTTP_REQUEST_TIMEOUT_MS, 0),
      keepAliveTimeoutMs: parseOptionalInteger(
        env.HTTP_KEEP_ALIVE_TIMEOUT_MS,
        0
      ),
    },
  },
  shutdown: {
    timeoutMs: parseInteger(
      env.SHUTDOWN_TIMEOUT_MS,
      DEFAULT_SHUTDOWN_TIMEOUT_MS,
      1
    ),
    pollIntervalMs: DEFAULT_SHUTDOWN_POLL_INTERVAL_MS,
  },
  response: {
    jsonIndented: parseBoolean(env.JSON_INDENT, false),
    disableCompression: parseBoolean(env.DISABLE_GZIP, false),
    minCompressBytes: parseInteger(
      env.MIN_COMPRESS_BYTES,
      DEFAULT_MIN_COMPRESS_BYTES,
      0
    ),
  },
  hostnames: {
    enabled: parseBoolean(env.RESOLVE_HOSTNAMES, false),
    maxEntries: 10_000,
  },
  logging: {
    level: parseLogLevel(env.LOG_LEVEL),
    format: parseLogFormat(env.LOG_FORMAT),
  },
};
