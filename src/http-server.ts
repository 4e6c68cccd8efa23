import { createServer, type Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import process from 'node:process';

import express, { type Express } from 'express';

import { config, serverVersion } from './config.js';
import { HostnameCache, reverseLookup } from './hostname-cache.js';
import { createStructuredLogEntry } from './log-entry.js';
import { RequestMetrics } from './metrics.js';
import { logInfo } from './observability.js';
import type { LoggedServerOptions } from './options.js';
import { header, jsonBody, textBody } from './response.js';
import {
  abortConnections,
  applyHttpServerTuning,
  drainConnectionsOnShutdown,
} from './server-tuning.js';
import { LoggedServer, type ShutdownResult } from './server.js';

export const PROMETHEUS_CONTENT_TYPE = 'text/plain; version=0.0.4; charset=utf-8';

export interface StartHttpServerOptions {
  readonly host?: string;
  readonly port?: number;
  /** Overrides for the values read from the environment. */
  readonly logged?: LoggedServerOptions;
}

export interface HttpServerHandle {
  readonly host: string;
  readonly port: number;
  readonly logged: LoggedServer;
  readonly metrics: RequestMetrics;
  shutdown(signal: string): Promise<ShutdownResult>;
}

export function serverOptionsFromConfig(): LoggedServerOptions {
  const { shutdown, response, hostnames } = config;
  return {
    shutdownTimeoutMs: shutdown.timeoutMs,
    shutdownPollIntervalMs: shutdown.pollIntervalMs,
    jsonIndented: response.jsonIndented,
    disableCompression: response.disableCompression,
    minCompressBytes: response.minCompressBytes,
    logEntryFactory: createStructuredLogEntry,
    ...(hostnames.enabled
      ? { hostnames: new HostnameCache(reverseLookup, hostnames.maxEntries) }
      : {}),
  };
}

export function createApp(logged: LoggedServer, metrics: RequestMetrics): Express {
  const app = express();
  app.disable('x-powered-by');

  app.get(
    '/health',
    logged.handle('health', () => ({
      body: jsonBody({
        status: 'ok',
        name: config.server.name,
        version: serverVersion,
        uptime: Math.floor(process.uptime()),
        openConnections: logged.gate.openCount(),
      }),
    }))
  );

  app.get(
    '/metrics',
    logged.handle('metrics', () => ({
      headers: [header('Content-Type', PROMETHEUS_CONTENT_TYPE)],
      body: textBody(metrics.render()),
    }))
  );

  app.use(
    logged.handle('not-found', (req) => ({
      status: 404,
      body: jsonBody({ error: 'Not Found', path: req.url ?? '' }),
    }))
  );

  return app;
}

function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      reject(error);
    };
    server.once('error', onError);
    server.listen(port, host, () => {
      server.off('error', onError);
      const address = server.address();
      if (address === null || typeof address === 'string') {
        reject(new Error('HTTP server is not listening on a TCP port'));
        return;
      }
      resolve(address);
    });
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) reject(error);
      else resolve();
    });
  });
}

export async function startHttpServer(
  options: StartHttpServerOptions = {}
): Promise<HttpServerHandle> {
  const host = options.host ?? config.server.host;
  const metrics = new RequestMetrics();
  const logged = new LoggedServer({
    ...serverOptionsFromConfig(),
    ...options.logged,
    metrics,
  });

  const server = createServer(createApp(logged, metrics));
  applyHttpServerTuning(server);

  const address = await listen(server, options.port ?? config.server.port, host);
  logInfo('HTTP server started', { host, port: address.port });

  let stopping: Promise<ShutdownResult> | undefined;
  const stop = async (signal: string): Promise<ShutdownResult> => {
    logInfo('Stopping HTTP server', { signal });
    const result = await logged.shutdown();
    if (result.outcome === 'deadline-exceeded') abortConnections(server);
    else drainConnectionsOnShutdown(server);
    await closeServer(server);
    logInfo('HTTP server closed');
    return result;
  };

  return {
    host,
    port: address.port,
    logged,
    metrics,
    shutdown: (signal) => {
      stopping ??= stop(signal);
      return stopping;
    },
  };
}
