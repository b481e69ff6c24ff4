import { ConfigError } from '../errors.js';
import { pad, toText } from '../utils/format.js';
import type {
  EventTimestamp,
  FormatOption,
  FormatterCallback,
  Metadata,
  ResolvedFormatter,
  Severity,
  TemplatePart,
  TemplateToken
} from '../types.js';

export const DEFAULT_FORMAT = '$message';

const TOKENS: ReadonlySet<string> = new Set<TemplateToken>(['date', 'time', 'message', 'level', 'levelpad', 'metadata']);
const LEVEL_WIDTH = 'emergency'.length;

function isToken(name: string): name is TemplateToken {
  return TOKENS.has(name);
}

function isFormatterCallback(value: unknown): value is FormatterCallback {
  return typeof value === 'function' && value.length === 4;
}

/** Throws ConfigError on an unknown `$token`. */
export function parseTemplate(source: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  const re = /\$([a-z]+)/g;
  let last = 0;
  let m: RegExpExecArray | null;
  while ((m = re.exec(source)) !== null) {
    const name = m[1];
    if (!isToken(name)) throw new ConfigError(`unknown format token $${name} in "${source}"`);
    if (m.index > last) parts.push({ kind: 'text', text: source.slice(last, m.index) });
    parts.push({ kind: 'token', token: name });
    last = re.lastIndex;
  }
  if (last < source.length) parts.push({ kind: 'text', text: source.slice(last) });
  return parts;
}

export function compileTemplate(source: string): ResolvedFormatter {
  return { kind: 'template', source, parts: parseTemplate(source) };
}

export const DEFAULT_PARTS: readonly TemplatePart[] = parseTemplate(DEFAULT_FORMAT);
export const defaultFormatter: ResolvedFormatter = { kind: 'template', source: DEFAULT_FORMAT, parts: DEFAULT_PARTS };

/**
 * Turn the `format` option into something the builder can run. Templates that
 * do not compile and callbacks that cannot be resolved to a 4-argument
 * function fall back to the default `$message` template.
 */
export function resolveFormatter(format?: FormatOption): ResolvedFormatter {
  if (format === undefined) return defaultFormatter;
  if (typeof format === 'string') {
    try {
      return compileTemplate(format);
    } catch (err) {
      if (err instanceof ConfigError) return defaultFormatter;
      throw err;
    }
  }
  if (typeof format === 'function') {
    return isFormatterCallback(format) ? { kind: 'callback', callback: format } : defaultFormatter;
  }
  const member = format.module[format.function];
  return isFormatterCallback(member) ? { kind: 'callback', callback: member } : defaultFormatter;
}

export function formatDate(ts: EventTimestamp): string {
  return `${pad(ts.year, 4)}-${pad(ts.month)}-${pad(ts.day)}`;
}

export function formatTime(ts: EventTimestamp): string {
  return `${pad(ts.hour)}:${pad(ts.minute)}:${pad(ts.second)}.${pad(ts.millisecond, 3)}`;
}

export function renderTemplate(
  parts: readonly TemplatePart[],
  level: Severity,
  message: string,
  timestamp: EventTimestamp,
  metadata: Metadata
): string {
  let out = '';
  for (const part of parts) {
    if (part.kind === 'text') {
      out += part.text;
      continue;
    }
    switch (part.token) {
      case 'date': out += formatDate(timestamp); break;
      case 'time': out += formatTime(timestamp); break;
      case 'message': out += message; break;
      case 'level': out += level; break;
      case 'levelpad': out += ' '.repeat(Math.max(0, LEVEL_WIDTH - level.length)); break;
      case 'metadata':
        for (const [k, v] of metadata) out += `${k}=${toText(v)} `;
        break;
    }
  }
  return out;
}
