import type { IncomingMessage, ServerResponse } from 'node:http';

import { combineErrors, ReportableError } from './errors.js';
import { applyEncoding, chooseEncoding, type EncodingDecision } from './gzip.js';
import type { HandlerResponse, JsonSerializer, ResponseBody } from './response.js';

const DEFAULT_STATUS = 200;
const TEXT_CONTENT_TYPE = 'text/plain; charset=utf-8';
const JSON_CONTENT_TYPE = 'application/json';

export interface DispatchOptions {
  readonly jsonIndented: boolean;
  readonly disableCompression: boolean;
  readonly minCompressBytes: number;
  readonly serializer: JsonSerializer;
}

export interface DispatchResult {
  readonly status: number;
  /** Bytes handed to the transport, after any compression. */
  readonly bytesSent: number;
  readonly error?: ReportableError | undefined;
}

interface ResolvedBody {
  readonly bytes: Buffer;
  readonly error?: ReportableError;
}

export function normalizeStatus(status: number | undefined): number {
  return status === undefined || status === 0 ? DEFAULT_STATUS : status;
}

function headerValue(res: ServerResponse, name: string): string | undefined {
  const value = res.getHeader(name);
  if (value === undefined) return undefined;
  return Array.isArray(value) ? value.join(', ') : String(value);
}

function addVaryAcceptEncoding(res: ServerResponse): void {
  const vary = headerValue(res, 'vary');
  if (vary?.toLowerCase().includes('accept-encoding')) return;
  res.appendHeader('Vary', 'Accept-Encoding');
}

// Node drops the body of HEAD requests and of 204/304 responses.
function bodyAllowed(method: string | undefined, status: number): boolean {
  if (method === 'HEAD') return false;
  return status !== 204 && status !== 304 && (status < 100 || status >= 200);
}

export function endResponse(res: ServerResponse, body?: Buffer): Promise<void> {
  if (res.destroyed || res.socket?.destroyed === true) {
    return Promise.reject(
      new Error('connection closed before the response was written')
    );
  }

  return new Promise<void>((resolve, reject) => {
    const cleanup = (): void => {
      res.off('finish', onFinish);
      res.off('error', onError);
      res.off('close', onClose);
    };
    const onFinish = (): void => {
      cleanup();
      resolve();
    };
    const onError = (error: Error): void => {
      cleanup();
      reject(error);
    };
    const onClose = (): void => {
      cleanup();
      reject(new Error('connection closed before the response was written'));
    };

    res.once('finish', onFinish);
    res.once('error', onError);
    res.once('close', onClose);

    if (body) res.end(body);
    else res.end();
  });
}

/**
 * Turns a handler response into bytes on the wire: writes the handler's
 * headers, resolves the body, negotiates gzip, then writes the status line
 * once and the body after it.
 */
export class ResponseDispatcher {
  constructor(private readonly options: DispatchOptions) {}

  async dispatch(
    req: IncomingMessage,
    res: ServerResponse,
    response: HandlerResponse
  ): Promise<DispatchResult> {
    let status = normalizeStatus(response.status);

    for (const { name, value } of response.headers ?? []) {
      res.appendHeader(name, value);
    }

    if (!response.body) {
      res.writeHead(status);
      return this.write(res, status, undefined, undefined);
    }

    const resolved = this.resolveBody(res, response.body);
    let { error } = resolved;
    let body = resolved.bytes;
    if (error) status = 500;

    if (body.length > 0) {
      try {
        const encoded = await this.encode(req, res, body);
        body = encoded.bytes;
        error = combineErrors(error, encoded.error);
      } catch (encodeError) {
        error = combineErrors(
          error,
          ReportableError.wrap('encode response body', encodeError)
        );
        res.removeHeader('Content-Encoding');
        status = 500;
        body = Buffer.alloc(0);
      }
    }

    res.setHeader('Content-Length', body.length);
    res.writeHead(status);

    const payload = bodyAllowed(req.method, status) ? body : undefined;
    return this.write(res, status, payload, error);
  }

  private resolveBody(res: ServerResponse, body: ResponseBody): ResolvedBody {
    switch (body.kind) {
      case 'text':
        if (!res.hasHeader('content-type')) {
          res.setHeader('Content-Type', TEXT_CONTENT_TYPE);
        }
        return { bytes: Buffer.from(body.text, 'utf8') };
      case 'bytes':
        return {
          bytes: Buffer.from(
            body.bytes.buffer,
            body.bytes.byteOffset,
            body.bytes.byteLength
          ),
        };
      case 'json':
        return this.serialize(res, body.value);
    }
  }

  private serialize(res: ServerResponse, value: unknown): ResolvedBody {
    let bytes: Buffer;
    try {
      bytes = this.options.serializer(value, this.options.jsonIndented);
    } catch (serializeError) {
      return {
        bytes: Buffer.alloc(0),
        error: ReportableError.wrap('serialize response body', serializeError),
      };
    }

    if (!res.hasHeader('content-type')) {
      res.setHeader('Content-Type', JSON_CONTENT_TYPE);
    }
    return { bytes };
  }

  private async encode(
    req: IncomingMessage,
    res: ServerResponse,
    body: Buffer
  ): Promise<ResolvedBody> {
    const decision: EncodingDecision = chooseEncoding({
      body,
      acceptEncoding: req.headers['accept-encoding'] ?? '',
      contentType: headerValue(res, 'content-type'),
      contentEncoding: headerValue(res, 'content-encoding'),
      compressionDisabled: this.options.disableCompression,
      minCompressBytes: this.options.minCompressBytes,
    });

    if (decision === 'identity') return { bytes: body };

    if (decision === 'decompress') {
      // Bytes that only look like gzip go out untouched.
      let inflated: Buffer;
      try {
        inflated = await applyEncoding(decision, body);
      } catch (inflateError) {
        return {
          bytes: body,
          error: ReportableError.wrap('decompress response body', inflateError),
        };
      }
      res.removeHeader('Content-Encoding');
      addVaryAcceptEncoding(res);
      return { bytes: inflated };
    }

    const encoded = await applyEncoding(decision, body);
    res.setHeader('Content-Encoding', 'gzip');
    addVaryAcceptEncoding(res);
    return { bytes: encoded };
  }

  private async write(
    res: ServerResponse,
    status: number,
    body: Buffer | undefined,
    error: ReportableError | undefined
  ): Promise<DispatchResult> {
    try {
      await endResponse(res, body);
    } catch (writeError) {
      const failure = ReportableError.wrap('write response body', writeError);
      return { status, bytesSent: 0, error: combineErrors(error, failure) };
    }
    return { status, bytesSent: body?.length ?? 0, error };
  }
}
