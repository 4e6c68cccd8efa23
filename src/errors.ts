import { inspect } from 'node:util';

import { isError, isNonEmptyString, isObject } from './type-guards.js';

export type Severity = 'info' | 'warn' | 'error';

export interface CallFrame {
  readonly file: string;
  readonly line: number;
  readonly functionName?: string;
}

interface ReportableErrorOptions extends ErrorOptions {
  readonly frames?: readonly CallFrame[];
}

type StackBoundary = (...args: never[]) => unknown;

/**
 * The unit of failure information attached to one request's log record.
 * `frames` is empty unless the error came from a recovered panic or a
 * call-stack was requested when it was built.
 */
export class ReportableError extends Error {
  readonly frames: readonly CallFrame[];

  constructor(message: string, options?: ReportableErrorOptions) {
    super(message, options);
    this.name = 'ReportableError';
    this.frames = options?.frames ?? [];
  }

  static from(
    error: unknown,
    options: { withCallstack?: boolean } = {}
  ): ReportableError {
    if (error instanceof ReportableError && !options.withCallstack) {
      return error;
    }
    const frames = options.withCallstack
      ? framesOf(error, ReportableError.from)
      : [];
    return new ReportableError(getErrorMessage(error), {
      frames,
      cause: error,
    });
  }

  /** Prefixes `error`'s text with what was being done when it failed. */
  static wrap(context: string, error: unknown): ReportableError {
    return new ReportableError(`${context}: ${getErrorMessage(error)}`, {
      frames: framesOf(error, ReportableError.wrap),
      cause: error,
    });
  }

  /** Converts any thrown value into an error carrying a call-stack. */
  static fromPanic(thrown: unknown): ReportableError {
    return new ReportableError(getErrorMessage(thrown), {
      frames: framesOf(thrown, ReportableError.fromPanic),
      cause: thrown,
    });
  }
}

export class SerializationError extends Error {
  override name = 'SerializationError';
}

export function getErrorMessage(error: unknown): string {
  if (isError(error)) return error.message || error.name;
  if (isNonEmptyString(error)) return error;
  if (isErrorWithMessage(error)) return error.message;
  return formatUnknownError(error);
}

function isErrorWithMessage(error: unknown): error is { message: string } {
  if (!isObject(error)) return false;
  const { message } = error;
  return isNonEmptyString(message);
}

function formatUnknownError(error: unknown): string {
  if (error === null || error === undefined) return 'Unknown error';
  try {
    return inspect(error, {
      depth: 2,
      maxStringLength: 200,
      breakLength: Infinity,
      compact: true,
      colors: false,
    });
  } catch {
    return 'Unknown error';
  }
}

/* -------------------------------------------------------------------------------------------------
 * Call-stacks
 * ------------------------------------------------------------------------------------------------- */

const FRAME_PATTERN = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

function isInternalFile(file: string): boolean {
  return file.startsWith('node:') || file.startsWith('internal/');
}

// Keeps the last two path segments, e.g. `src/server.ts`.
function shortenPath(file: string): string {
  const path = file.replace(/^file:\/\//, '');
  const segments = path.split(/[\\/]/);
  return segments.length > 2 ? segments.slice(-2).join('/') : path;
}

export function parseStack(stack: string | undefined): CallFrame[] {
  if (!stack) return [];

  const frames: CallFrame[] = [];
  for (const line of stack.split('\n')) {
    const match = FRAME_PATTERN.exec(line);
    if (!match) continue;

    const [, functionName, file, lineText] = match;
    if (file === undefined || lineText === undefined) continue;
    if (isInternalFile(file)) continue;

    frames.push({
      file: shortenPath(file),
      line: Number.parseInt(lineText, 10),
      ...(functionName ? { functionName } : {}),
    });
  }
  return frames;
}

export function captureCallstack(boundary?: StackBoundary): CallFrame[] {
  const holder: { stack?: string } = {};
  Error.captureStackTrace(holder, boundary ?? captureCallstack);
  return parseStack(holder.stack);
}

function framesOf(value: unknown, boundary: StackBoundary): CallFrame[] {
  if (isError(value)) {
    const frames = parseStack(value.stack);
    if (frames.length > 0) return frames;
  }
  return captureCallstack(boundary);
}

export function formatCallstack(frames: readonly CallFrame[]): string {
  return frames.map((frame) => `${frame.file}:${frame.line}`).join(', ');
}

/* -------------------------------------------------------------------------------------------------
 * Aggregation
 * ------------------------------------------------------------------------------------------------- */

/**
 * Merges two errors reported for the same request. The earlier error's text
 * comes first; the later one's call-stack wins when it has one, since it was
 * captured closer to the fault.
 */
export function combineErrors(
  first: ReportableError | undefined,
  second: ReportableError | undefined
): ReportableError | undefined {
  if (!first) return second;
  if (!second) return first;

  return new ReportableError(`${first.message} - ${second.message}`, {
    frames: second.frames.length > 0 ? second.frames : first.frames,
    cause: second,
  });
}

/** Appends `note`'s text to `error`, keeping `error`'s call-stack. */
export function annotateError(
  error: ReportableError,
  note: ReportableError | undefined
): ReportableError {
  if (!note) return error;
  return new ReportableError(`${error.message} - ${note.message}`, {
    frames: error.frames,
    cause: error,
  });
}

export function severityForStatus(status: number): Severity {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}
