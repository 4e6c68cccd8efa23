import { parseArgs } from 'node:util';

import { getErrorMessage } from './errors.js';

export interface CliValues {
  readonly host?: string;
  readonly port?: number;
  readonly help: boolean;
  readonly version: boolean;
}

interface CliParseSuccess {
  readonly ok: true;
  readonly values: CliValues;
}

interface CliParseFailure {
  readonly ok: false;
  readonly message: string;
}

export type CliParseResult = CliParseSuccess | CliParseFailure;

const usageLines = [
  'Logged HTTP server',
  '',
  'Usage:',
  '  logged-http [--host <addr>] [--port|-p <n>] [--help|-h] [--version|-v]',
  '',
  'Options:',
  '  --host         Address to bind (default: HOST or 127.0.0.1).',
  '  --port, -p     Port to listen on, 0 for any (default: PORT or 3000).',
  '  --help, -h     Show this help message.',
  '  --version, -v  Show server version.',
  '',
] as const;

const optionSchema = {
  host: { type: 'string' },
  port: { type: 'string', short: 'p' },
  help: { type: 'boolean', short: 'h', default: false },
  version: { type: 'boolean', short: 'v', default: false },
} as const;

const PORT_PATTERN = /^\d+$/;
const MAX_PORT = 65_535;

export function renderCliUsage(): string {
  return `${usageLines.join('\n')}\n`;
}

function parsePortOption(value: string): number | undefined {
  if (!PORT_PATTERN.test(value)) return undefined;
  const port = Number.parseInt(value, 10);
  return port <= MAX_PORT ? port : undefined;
}

function readArgs(args: readonly string[]) {
  return parseArgs({
    args: [...args],
    options: optionSchema,
    strict: true,
    allowPositionals: false,
  }).values;
}

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let values: ReturnType<typeof readArgs>;
  try {
    values = readArgs(args);
  } catch (error: unknown) {
    return { ok: false, message: getErrorMessage(error) };
  }

  const host = values.host?.trim();
  if (host === '') {
    return { ok: false, message: 'Option --host must not be empty' };
  }

  let port: number | undefined;
  if (values.port !== undefined) {
    port = parsePortOption(values.port.trim());
    if (port === undefined) {
      return {
        ok: false,
        message: `Invalid port "${values.port}": expected an integer from 0 to ${MAX_PORT}`,
      };
    }
  }

  return {
    ok: true,
    values: {
      ...(host !== undefined ? { host } : {}),
      ...(port !== undefined ? { port } : {}),
      help: values.help,
      version: values.version,
    },
  };
}
