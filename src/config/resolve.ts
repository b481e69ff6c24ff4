import os from 'node:os';
import { ConfigError } from '../errors.js';
import { jsonEncoder } from '../logging/codec.js';
import { metadataEntries } from '../logging/document.js';
import { resolveFormatter } from '../logging/formatter.js';
import { normalizeSeverity } from '../logging/levels.js';
import type { Compression, GelfConfig, GelfSinkOptions, MetadataSelection, OversizedPolicy } from '../types.js';

export const DEFAULT_PORT = 12201;

const UNSIGNED = /^\d+$/;

function parseUnsigned(value: number | string, what: string): number {
  if (typeof value === 'number') {
    if (Number.isInteger(value) && value >= 0) return value;
    throw new ConfigError(`${what} must be an unsigned integer, got ${value}`);
  }
  const s = value.trim();
  if (!UNSIGNED.test(s)) throw new ConfigError(`${what} must be an unsigned integer, got "${value}"`);
  return Number(s);
}

/** Numeric or decimal-string port; the string must parse completely. */
export function parsePort(port?: number | string): number {
  if (port === undefined) return DEFAULT_PORT;
  const n = parseUnsigned(port, 'port');
  if (n < 1 || n > 65535) throw new ConfigError(`port out of range: ${n}`);
  return n;
}

export function parsePoolSize(size?: number | string): number {
  if (size === undefined || size === '') throw new ConfigError('GELF pool size is not configured');
  const n = parseUnsigned(size, 'pool size');
  if (n < 1) throw new ConfigError('GELF pool size must be at least 1');
  return n;
}

/** `gzip` when unset, `zlib` on request, anything else disables compression. */
export function normalizeCompression(mode?: string): Compression {
  if (mode === undefined) return 'gzip';
  const m = mode.trim().toLowerCase().replace(/^:/, '');
  return m === 'gzip' || m === 'zlib' ? m : 'none';
}

export function normalizeMetadataKeys(keys?: 'all' | readonly string[]): MetadataSelection {
  if (keys === 'all') return 'all';
  return new Set(keys ?? []);
}

export function normalizeOversizedPolicy(policy?: string): OversizedPolicy {
  return policy?.trim().toLowerCase() === 'error' ? 'error' : 'drop';
}

function normalizeQueueLimit(limit?: number): number {
  if (limit === undefined) return Infinity;
  if (!Number.isInteger(limit) || limit < 1) throw new ConfigError(`queue limit must be a positive integer, got ${limit}`);
  return limit;
}

/** Build the immutable snapshot handed to workers. Throws ConfigError when unusable. */
export function resolveConfig(options: GelfSinkOptions): GelfConfig {
  const host = typeof options.host === 'string' ? options.host.trim() : '';
  if (!host) throw new ConfigError('GELF collector host is not configured');

  return Object.freeze({
    collectorHost: host,
    collectorPort: parsePort(options.port),
    application: options.application ?? '',
    hostname: options.hostname || os.hostname(),
    compression: normalizeCompression(options.compression),
    metadataKeys: normalizeMetadataKeys(options.metadata),
    tags: Object.freeze(Array.from(metadataEntries(options.tags ?? {}))),
    encoder: options.jsonEncoder ?? jsonEncoder,
    formatter: resolveFormatter(options.format),
    minLevel: options.level ? normalizeSeverity(options.level) : undefined,
    oversizedPolicy: normalizeOversizedPolicy(options.oversized),
    queueLimit: normalizeQueueLimit(options.queueLimit)
  });
}
