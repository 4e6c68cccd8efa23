import assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { gunzipSync, gzipSync } from 'node:zlib';

import {
  acceptsGzip,
  applyEncoding,
  chooseEncoding,
  type EncodingInput,
  hasGzipMagic,
  isCompressibleContentType,
} from '../src/gzip.js';

function input(overrides: Partial<EncodingInput>): EncodingInput {
  return {
    body: Buffer.alloc(200, 'a'),
    acceptEncoding: 'gzip',
    contentType: 'application/json',
    contentEncoding: undefined,
    compressionDisabled: false,
    minCompressBytes: 150,
    ...overrides,
  };
}

describe('acceptsGzip', () => {
  it('accepts a bare gzip coding wherever it appears', () => {
    assert.equal(acceptsGzip('gzip'), true);
    assert.equal(acceptsGzip('gzip, deflate'), true);
    assert.equal(acceptsGzip('deflate, gzip'), true);
    assert.equal(acceptsGzip('  gzip  '), true);
  });

  it('rejects empty and gzip-free values', () => {
    assert.equal(acceptsGzip(''), false);
    assert.equal(acceptsGzip('   '), false);
    assert.equal(acceptsGzip('gz'), false);
    assert.equal(acceptsGzip('deflate, br'), false);
  });

  it('matches the coding name exactly and case-sensitively', () => {
    assert.equal(acceptsGzip('gzippy'), false);
    assert.equal(acceptsGzip('x-gzip'), false);
    assert.equal(acceptsGzip('GZIP'), false);
    assert.equal(acceptsGzip('gzi, deflate'), false);
  });

  it('honours non-zero quality values', () => {
    assert.equal(acceptsGzip('gzip;q=0.8'), true);
    assert.equal(acceptsGzip('gzip; q=1'), true);
    assert.equal(acceptsGzip('gzip;q=.5'), true);
    assert.equal(acceptsGzip('br;q=1.0, gzip;q=0.001'), true);
  });

  it('rejects zero quality values', () => {
    assert.equal(acceptsGzip('gzip;q=0'), false);
    assert.equal(acceptsGzip('gzip;q=0.000'), false);
    assert.equal(acceptsGzip('gzip; q=0., deflate'), false);
  });

  it('fails closed on malformed quality values', () => {
    assert.equal(acceptsGzip('gzip;q='), false);
    assert.equal(acceptsGzip('gzip;q=abc'), false);
    assert.equal(acceptsGzip('gzip;q=0.5x'), false);
  });

  it('rejects gzip followed by a parameter other than q', () => {
    assert.equal(acceptsGzip('gzip;level=9'), false);
    assert.equal(acceptsGzip('gzip;level=9;q=1'), false);
    assert.equal(acceptsGzip('gzip q=1, gzip'), false);
  });

  it('rejects the header at a segment shorter than a coding name', () => {
    assert.equal(acceptsGzip('br, gzip'), false);
    assert.equal(acceptsGzip('gzip, br'), true);
    assert.equal(acceptsGzip('br  , gzip'), true);
  });

  it('lets the first gzip segment decide', () => {
    assert.equal(acceptsGzip('gzip;q=0, gzip'), false);
    assert.equal(acceptsGzip('gzip, gzip;q=0'), true);
  });
});

describe('hasGzipMagic', () => {
  it('detects the two-byte gzip header', () => {
    assert.equal(hasGzipMagic(gzipSync('hello')), true);
    assert.equal(hasGzipMagic(Buffer.from([0x1f])), false);
    assert.equal(hasGzipMagic(Buffer.from('{"a":1}')), false);
  });
});

describe('isCompressibleContentType', () => {
  it('accepts text-like types with or without parameters', () => {
    assert.equal(isCompressibleContentType('application/json'), true);
    assert.equal(isCompressibleContentType('text/html; charset=utf-8'), true);
    assert.equal(isCompressibleContentType('Text/CSS'), true);
    assert.equal(isCompressibleContentType('image/svg+xml'), true);
    assert.equal(isCompressibleContentType('application/problem+json'), true);
  });

  it('rejects binary and missing types', () => {
    assert.equal(isCompressibleContentType('image/png'), false);
    assert.equal(isCompressibleContentType('application/octet-stream'), false);
    assert.equal(isCompressibleContentType(undefined), false);
  });
});

describe('chooseEncoding', () => {
  it('leaves an empty body alone', () => {
    assert.equal(chooseEncoding(input({ body: Buffer.alloc(0) })), 'identity');
  });

  it('compresses large text-like bodies for gzip clients', () => {
    assert.equal(chooseEncoding(input({})), 'compress');
  });

  it('does not compress at or below the size threshold', () => {
    assert.equal(chooseEncoding(input({ body: Buffer.alloc(150) })), 'identity');
    assert.equal(chooseEncoding(input({ body: Buffer.alloc(151) })), 'compress');
  });

  it('does not compress for clients without gzip', () => {
    assert.equal(chooseEncoding(input({ acceptEncoding: '' })), 'identity');
  });

  it('does not compress disallowed types', () => {
    assert.equal(
      chooseEncoding(input({ contentType: 'image/png' })),
      'identity'
    );
  });

  it('does not compress when disabled or already encoded', () => {
    assert.equal(
      chooseEncoding(input({ compressionDisabled: true })),
      'identity'
    );
    assert.equal(chooseEncoding(input({ contentEncoding: 'br' })), 'identity');
  });

  it('passes pre-gzipped bodies through to gzip clients', () => {
    const body = gzipSync('{"ok":true}');
    assert.equal(chooseEncoding(input({ body })), 'passthrough');
  });

  it('decompresses pre-gzipped bodies for other clients regardless of type', () => {
    const body = gzipSync('{"ok":true}');
    assert.equal(
      chooseEncoding(
        input({
          body,
          acceptEncoding: '',
          contentType: 'application/octet-stream',
          compressionDisabled: true,
        })
      ),
      'decompress'
    );
  });
});

describe('applyEncoding', () => {
  it('gzips and gunzips bodies', async () => {
    const plain = Buffer.from('x'.repeat(400));
    const compressed = await applyEncoding('compress', plain);
    assert.equal(hasGzipMagic(compressed), true);
    assert.deepEqual(gunzipSync(compressed), plain);

    const restored = await applyEncoding('decompress', compressed);
    assert.deepEqual(restored, plain);
  });

  it('returns the body unchanged for identity and passthrough', async () => {
    const body = Buffer.from('same');
    assert.equal(await applyEncoding('identity', body), body);
    assert.equal(await applyEncoding('passthrough', body), body);
  });

  it('rejects a truncated gzip stream', async () => {
    const truncated = gzipSync('truncated body').subarray(0, 8);
    await assert.rejects(applyEncoding('decompress', truncated));
  });
});
