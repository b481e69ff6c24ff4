import { MongoClient } from 'mongodb';
import type { Document, Filter } from 'mongodb';
import { normalizeDiagnosticLevel } from '../diagnostics.js';
import type { ConfigProvider, DiagnosticsOptions, GelfSinkOptions } from '../types.js';

export interface MongoProviderOptions {
  client?: MongoClient;
  uri?: string;
  dbName: string;
  collection: string;
  query: Filter<Document>;
}

const DEFAULT_OPTIONS: GelfSinkOptions = {
  host: '127.0.0.1',
  port: 12201,
  compression: 'gzip',
  metadata: [],
  tags: {},
};

const str = (v: unknown): string | undefined => (typeof v === 'string' && v !== '' ? v : undefined);

function numberOrString(v: unknown): number | string | undefined {
  return typeof v === 'number' || typeof v === 'string' ? v : undefined;
}

function metadataOf(v: unknown): 'all' | string[] {
  if (v === 'all') return 'all';
  return Array.isArray(v) ? v.filter((k): k is string => typeof k === 'string') : [];
}

function tagsOf(v: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!v || typeof v !== 'object' || Array.isArray(v)) return out;
  for (const [k, val] of Object.entries(v)) out[k] = String(val);
  return out;
}

function diagnosticsOf(d: Document | undefined): DiagnosticsOptions | undefined {
  if (!d || typeof d !== 'object') return undefined;
  return {
    minLevel: normalizeDiagnosticLevel(str(d.minLevel)),
    stderr: { enabled: d.stderr?.enabled !== false, pretty: !!d.stderr?.pretty },
    file: { enabled: !!d.file?.enabled, filePath: String(d.file?.filePath || './logs/gelf-%DATE%.log') },
  };
}

/** Reads sink options from one MongoDB document; loopback defaults when none matches. */
export class MongoConfigProvider implements ConfigProvider {
  constructor(private opts: MongoProviderOptions) {}

  async load(): Promise<GelfSinkOptions> {
    const autoCloseClient = !this.opts.client;
    let client = this.opts.client;
    if (!client) {
      if (!this.opts.uri) throw new Error('MongoConfigProvider needs either a client or a uri');
      client = await MongoClient.connect(this.opts.uri);
    }

    try {
      const doc = await client
        .db(this.opts.dbName)
        .collection(this.opts.collection)
        .findOne(this.opts.query);

      if (!doc) return { ...DEFAULT_OPTIONS };

      return {
        host: str(doc.host) ?? '127.0.0.1',
        port: numberOrString(doc.port) ?? 12201,
        application: str(doc.application),
        hostname: str(doc.hostname),
        compression: str(doc.compression) ?? 'gzip',
        metadata: metadataOf(doc.metadata),
        tags: tagsOf(doc.tags),
        format: str(doc.format),
        level: str(doc.level),
        poolSize: numberOrString(doc.poolSize),
        oversized: str(doc.oversized),
        queueLimit: typeof doc.queueLimit === 'number' ? doc.queueLimit : undefined,
        diagnostics: diagnosticsOf(doc.diagnostics),
      };
    } finally {
      if (autoCloseClient) {
        await client.close();
      }
    }
  }
}
