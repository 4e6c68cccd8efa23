import { config } from './config.js';
import { logDebug } from './observability.js';

interface HttpServerTuningTarget {
  headersTimeout?: number;
  requestTimeout?: number;
  keepAliveTimeout?: number;
  closeIdleConnections?: () => void;
  closeAllConnections?: () => void;
}

function setIfDefined<T>(
  value: T | undefined,
  setter: (resolved: T) => void
): void {
  if (value === undefined) return;
  setter(value);
}

export function applyHttpServerTuning(server: HttpServerTuningTarget): void {
  const { headersTimeoutMs, requestTimeoutMs, keepAliveTimeoutMs } =
    config.server.http;

  setIfDefined(headersTimeoutMs, (value) => {
    server.headersTimeout = value;
  });
  setIfDefined(requestTimeoutMs, (value) => {
    server.requestTimeout = value;
  });
  setIfDefined(keepAliveTimeoutMs, (value) => {
    server.keepAliveTimeout = value;
  });
}

// Keep-alive sockets with no request in flight would otherwise hold
// server.close() open until they time out.
export function drainConnectionsOnShutdown(
  server: HttpServerTuningTarget
): void {
  if (typeof server.closeIdleConnections === 'function') {
    server.closeIdleConnections();
    logDebug('Closed idle HTTP connections during shutdown');
  }
}

export function abortConnections(server: HttpServerTuningTarget): void {
  if (typeof server.closeAllConnections === 'function') {
    server.closeAllConnections();
    logDebug('Closed all HTTP connections after the shutdown deadline');
  }
}
