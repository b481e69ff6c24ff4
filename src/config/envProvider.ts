import type { ConfigProvider, DiagnosticLevel, GelfSinkOptions } from '../types.js';
import { normalizeDiagnosticLevel } from '../diagnostics.js';

const parseList = (s?: string) => (s || '').split(',').map(x => x.trim()).filter(Boolean);

function parseJsonObject(raw: string): object | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  return parsed && typeof parsed === 'object' && !Array.isArray(parsed) ? parsed : undefined;
}

/** Tags as a JSON object or as CSV `key=value` pairs. */
export function parseTags(raw?: string): Record<string, string> {
  const out: Record<string, string> = {};
  if (!raw) return out;
  const json = parseJsonObject(raw);
  if (json) {
    for (const [k, v] of Object.entries(json)) out[k] = String(v);
    return out;
  }
  for (const pair of parseList(raw)) {
    const idx = pair.indexOf('=');
    if (idx > 0) out[pair.slice(0, idx).trim()] = pair.slice(idx + 1).trim();
  }
  return out;
}

export class EnvConfigProvider implements ConfigProvider {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async load(): Promise<GelfSinkOptions> {
    const env = this.env;
    const metadata = env.GELF_METADATA;
    const minLevel: DiagnosticLevel = normalizeDiagnosticLevel(env.GELF_DIAG_LEVEL);
    const queueLimit = env.GELF_QUEUE_LIMIT ? Number(env.GELF_QUEUE_LIMIT) : undefined;

    return {
      host: env.GELF_HOST || '127.0.0.1',
      port: env.GELF_PORT || '12201',
      application: env.GELF_APPLICATION,
      hostname: env.GELF_HOSTNAME || undefined,
      compression: env.GELF_COMPRESSION,
      metadata: metadata === 'all' ? 'all' : parseList(metadata),
      tags: parseTags(env.GELF_TAGS),
      format: env.GELF_FORMAT,
      level: env.GELF_LEVEL || undefined,
      poolSize: env.GELF_POOL_SIZE || undefined,
      oversized: env.GELF_OVERSIZED,
      queueLimit,
      diagnostics: {
        minLevel,
        stderr: {
          enabled: (env.GELF_DIAG_STDERR_ENABLED || 'true') === 'true',
          pretty: (env.GELF_DIAG_STDERR_PRETTY || 'false') === 'true'
        },
        file: {
          enabled: (env.GELF_DIAG_FILE_ENABLED || 'false') === 'true',
          filePath: env.GELF_DIAG_FILE_PATH || './logs/gelf-%DATE%.log'
        }
      }
    };
  }
}
