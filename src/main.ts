#!/usr/bin/env node
import process from 'node:process';

import { parseCliArgs, renderCliUsage } from './cli.js';
import { serverVersion } from './config.js';
import { startHttpServer } from './http-server.js';
import { logError } from './observability.js';

const parsed = parseCliArgs(process.argv.slice(2));
if (!parsed.ok) {
  process.stderr.write(`${parsed.message}\n\n${renderCliUsage()}`);
  process.exit(2);
}

const { values } = parsed;
if (values.help) {
  process.stdout.write(renderCliUsage());
  process.exit(0);
}
if (values.version) {
  process.stdout.write(`${serverVersion}\n`);
  process.exit(0);
}

process.on('unhandledRejection', (reason) => {
  const error = reason instanceof Error ? reason : new Error(String(reason));
  logError('Unhandled rejection', error);
});

const server = await startHttpServer({
  ...(values.host !== undefined ? { host: values.host } : {}),
  ...(values.port !== undefined ? { port: values.port } : {}),
}).catch((error: unknown): never => {
  logError(
    'Failed to start server',
    error instanceof Error ? error : { error: String(error) }
  );
  process.exit(1);
});

process.stdout.write(
  `logged-http ${serverVersion} listening on http://${server.host}:${server.port}\n`
);

let exiting = false;
const shutdownOn = (signal: NodeJS.Signals): void => {
  if (exiting) return;
  exiting = true;
  process.stdout.write(`\n${signal} received, draining connections...\n`);

  server
    .shutdown(signal)
    .then((result) => {
      process.exit(result.outcome === 'drained' ? 0 : 1);
    })
    .catch((error: unknown) => {
      logError(
        'Shutdown failed',
        error instanceof Error ? error : { error: String(error) }
      );
      process.exit(1);
    });
};

process.on('SIGINT', () => {
  shutdownOn('SIGINT');
});
process.on('SIGTERM', () => {
  shutdownOn('SIGTERM');
});
