import { promisify } from 'node:util';
import { gunzip, gzip } from 'node:zlib';

const gzipAsync = promisify(gzip);
const gunzipAsync = promisify(gunzip);

const GZIP_CODING = 'gzip';
const GZIP_MAGIC = [0x1f, 0x8b] as const;
const MAX_DECOMPRESSED_BYTES = 64 * 1024 * 1024;

const NUMERIC_QUALITY = /^\d*\.?\d*$/;
const NONZERO_DIGIT = /[1-9]/;

const COMPRESSIBLE_TYPES: ReadonlySet<string> = new Set([
  'application/javascript',
  'application/json',
  'application/vnd.ms-fontobject',
  'application/x-font-opentype',
  'application/x-font-ttf',
  'application/x-javascript',
  'application/xml',
  'font/eot',
  'font/otf',
  'font/ttf',
  'image/svg+xml',
  'image/vnd.microsoft.icon',
  'image/x-icon',
  'text/css',
  'text/html',
  'text/javascript',
  'text/plain',
  'text/xml',
]);

/* -------------------------------------------------------------------------------------------------
 * Accept-Encoding
 * ------------------------------------------------------------------------------------------------- */

// A q-value is only honoured when it is numeric text; anything else rejects.
function isAcceptedQuality(value: string): boolean {
  if (!NUMERIC_QUALITY.test(value)) return false;
  return NONZERO_DIGIT.test(value);
}

// undefined: the segment names some other coding. A segment too short to
// hold a coding name, or a gzip coding followed by anything but a q-value,
// rejects the whole header.
function gzipSegmentVerdict(segment: string): boolean | undefined {
  const leading = segment.trimStart();
  if (leading.length < GZIP_CODING.length) return false;
  if (!leading.startsWith(GZIP_CODING)) return undefined;

  const [coding = '', firstParam] = leading.split(';');
  if (coding.trim() !== GZIP_CODING) return false;
  if (firstParam === undefined) return true;

  const param = firstParam.trim();
  if (!param.startsWith('q=') || param.length === 2) return false;
  return isAcceptedQuality(param.slice(2).trim());
}

/**
 * Reports whether an `Accept-Encoding` value admits gzip. The coding name is
 * matched case-sensitively and the first `gzip` segment decides; segments
 * are scanned left to right, so a short segment before it rejects.
 */
export function acceptsGzip(headerValue: string): boolean {
  const value = headerValue.trim();
  if (value.length < GZIP_CODING.length) return false;

  for (const segment of value.split(',')) {
    const verdict = gzipSegmentVerdict(segment);
    if (verdict !== undefined) return verdict;
  }
  return false;
}

/* -------------------------------------------------------------------------------------------------
 * Encoding decision
 * ------------------------------------------------------------------------------------------------- */

export function hasGzipMagic(body: Uint8Array): boolean {
  return (
    body.length >= GZIP_MAGIC.length &&
    body[0] === GZIP_MAGIC[0] &&
    body[1] === GZIP_MAGIC[1]
  );
}

export function isCompressibleContentType(
  contentType: string | undefined
): boolean {
  if (!contentType) return false;
  const [mediaType = ''] = contentType.split(';');
  const normalized = mediaType.trim().toLowerCase();
  if (COMPRESSIBLE_TYPES.has(normalized)) return true;
  return normalized.endsWith('+json') || normalized.endsWith('+xml');
}

export type EncodingDecision =
  | 'identity'
  | 'compress'
  | 'decompress'
  | 'passthrough';

export interface EncodingInput {
  readonly body: Uint8Array;
  readonly acceptEncoding: string;
  readonly contentType: string | undefined;
  readonly contentEncoding: string | undefined;
  readonly compressionDisabled: boolean;
  readonly minCompressBytes: number;
}

/**
 * A body that already starts with the gzip magic bytes is sent as-is to
 * clients that accept gzip and inflated for everyone else, whatever its
 * content type. Other bodies are compressed only when the client accepts
 * gzip, the body is larger than the threshold and the type is text-like.
 */
export function chooseEncoding(input: EncodingInput): EncodingDecision {
  if (input.body.length === 0) return 'identity';

  const clientAcceptsGzip = acceptsGzip(input.acceptEncoding);
  if (hasGzipMagic(input.body)) {
    return clientAcceptsGzip ? 'passthrough' : 'decompress';
  }

  if (input.compressionDisabled || input.contentEncoding) return 'identity';
  if (!clientAcceptsGzip) return 'identity';
  if (input.body.length <= input.minCompressBytes) return 'identity';
  return isCompressibleContentType(input.contentType) ? 'compress' : 'identity';
}

export async function applyEncoding(
  decision: EncodingDecision,
  body: Buffer
): Promise<Buffer> {
  switch (decision) {
    case 'compress':
      return gzipAsync(body);
    case 'decompress':
      return gunzipAsync(body, { maxOutputLength: MAX_DECOMPRESSED_BYTES });
    case 'identity':
    case 'passthrough':
      return body;
  }
}
