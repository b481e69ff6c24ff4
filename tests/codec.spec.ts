import { describe, it, expect } from 'vitest';
import { resolveConfig } from '../src/config/resolve.js';
import { EncodingError } from '../src/errors.js';
import { compress, decompress, encodeDocument, jsonEncoder, renderPayload } from '../src/logging/codec.js';
import { buildDocument } from '../src/logging/document.js';
import type { GelfSinkOptions } from '../src/types.js';
import { logEvent } from './helpers/events.js';

const config = (extra: Partial<GelfSinkOptions> = {}) =>
  resolveConfig({ host: '127.0.0.1', hostname: 'test-host', ...extra });

describe('codec', () => {
  it('sends plain JSON without compression', () => {
    const cfg = config({ compression: 'none' });
    const payload = renderPayload(logEvent('plain'), cfg);
    expect(JSON.parse(payload.toString('utf8'))).toEqual(buildDocument(logEvent('plain'), cfg));
  });

  it('gzips by default', () => {
    const payload = renderPayload(logEvent('zipped'), config());
    expect([payload[0], payload[1]]).toEqual([0x1f, 0x8b]);
    expect(JSON.parse(decompress(payload, 'gzip').toString('utf8')).full_message).toBe('zipped');
  });

  it('deflates with zlib framing', () => {
    const payload = renderPayload(logEvent('deflated'), config({ compression: 'zlib' }));
    expect(payload[0]).toBe(0x78);
    expect(JSON.parse(decompress(payload, 'zlib').toString('utf8')).full_message).toBe('deflated');
  });

  it('renders nothing for an empty message', () => {
    expect(renderPayload(logEvent(''), config())).toHaveLength(0);
  });

  it('passes data through for "none"', () => {
    const data = Buffer.from('abc');
    expect(compress(data, 'none')).toBe(data);
  });

  it('wraps encoder failures in EncodingError', () => {
    const doc = buildDocument(logEvent('x'), config());
    const broken = { encode: () => { throw new Error('cannot encode'); } };
    expect(() => encodeDocument(doc, broken)).toThrow(EncodingError);
    expect(() => encodeDocument(doc, broken)).toThrow('unable to encode GELF document: cannot encode');
  });

  it('accepts encoders returning bytes', () => {
    const doc = buildDocument(logEvent('x'), config());
    const bytes = { encode: () => new Uint8Array([1, 2, 3]) };
    expect(Array.from(encodeDocument(doc, bytes))).toEqual([1, 2, 3]);
    expect(encodeDocument(doc, jsonEncoder).toString('utf8')).toBe(JSON.stringify(doc));
  });
});
