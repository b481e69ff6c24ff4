import zlib from 'node:zlib';
import { EncodingError } from '../errors.js';
import { buildDocument } from './document.js';
import type { Compression, GelfConfig, GelfDocument, JsonEncoder, LogEvent } from '../types.js';

export const jsonEncoder: JsonEncoder = {
  encode: (document) => JSON.stringify(document)
};

export function encodeDocument(document: GelfDocument, encoder: JsonEncoder): Buffer {
  let out: string | Uint8Array;
  try {
    out = encoder.encode(document);
  } catch (err) {
    throw new EncodingError(`unable to encode GELF document: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }
  if (typeof out === 'string') return Buffer.from(out, 'utf8');
  return Buffer.from(out.buffer, out.byteOffset, out.byteLength);
}

// gzip is RFC 1952, zlib is RFC 1950; both are what Graylog's UDP input sniffs for.
export function compress(data: Buffer, mode: Compression): Buffer {
  switch (mode) {
    case 'gzip': return zlib.gzipSync(data);
    case 'zlib': return zlib.deflateSync(data);
    case 'none': return data;
  }
}

export function decompress(data: Buffer, mode: Compression): Buffer {
  switch (mode) {
    case 'gzip': return zlib.gunzipSync(data);
    case 'zlib': return zlib.inflateSync(data);
    case 'none': return data;
  }
}

/**
 * Build, encode and compress one event. Returns an empty buffer when the
 * formatted message is empty: the event is skipped and nothing is sent.
 */
export function renderPayload(event: LogEvent, config: GelfConfig): Buffer {
  const document = buildDocument(event, config);
  if (document.full_message === '') return Buffer.alloc(0);
  return compress(encodeDocument(document, config.encoder), config.compression);
}
