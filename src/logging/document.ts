import { toText } from '../utils/format.js';
import { DEFAULT_PARTS, renderTemplate } from './formatter.js';
import { SYSLOG_LEVELS, isSeverity } from './levels.js';
import type {
  EventTimestamp,
  FormattedEvent,
  GelfConfig,
  GelfDocument,
  LogEvent,
  Metadata,
  MetadataInput,
  MetadataSelection,
  Severity,
  TemplatePart
} from '../types.js';

export const SHORT_MESSAGE_LENGTH = 80;

// Process bookkeeping that never belongs in a GELF document.
const RESERVED_KEYS: ReadonlySet<string> = new Set(['crash_reason', 'ancestors', 'callers']);

function isEntryList(md: MetadataInput): md is Metadata {
  return Array.isArray(md);
}

export function metadataEntries(md: MetadataInput): Metadata {
  return isEntryList(md) ? md : Object.entries(md);
}

/** Keep the configured keys (or everything but the reserved ones). Last value wins on duplicates. */
export function selectMetadata(md: Metadata, keys: MetadataSelection): Metadata {
  const picked = new Map<string, unknown>();
  for (const [k, v] of md) {
    if (keys === 'all' ? RESERVED_KEYS.has(k) : !keys.has(k)) continue;
    picked.set(k, v);
  }
  return Array.from(picked);
}

/** Civil UTC time to Unix seconds with millisecond precision. */
export function toEpochSeconds(ts: EventTimestamp): number {
  const ms = Date.UTC(ts.year, ts.month - 1, ts.day, ts.hour, ts.minute, ts.second, ts.millisecond);
  return Number((ms / 1000).toFixed(3));
}

export function truncateMessage(message: string, length = SHORT_MESSAGE_LENGTH): string {
  const scalars = Array.from(message);
  return scalars.length <= length ? message : scalars.slice(0, length).join('');
}

interface FormattedLine {
  level: Severity;
  text: string;
  timestamp: EventTimestamp;
  metadata: Metadata;
}

function runTemplate(parts: readonly TemplatePart[], event: LogEvent, md: Metadata, keys: MetadataSelection): FormattedLine {
  const text = renderTemplate(parts, event.level, event.message, event.timestamp, selectMetadata(md, keys));
  return { level: event.level, text, timestamp: event.timestamp, metadata: md };
}

function isFormattedEvent(value: unknown): value is FormattedEvent {
  if (!Array.isArray(value) || value.length !== 4) return false;
  const [level, message, timestamp, metadata] = value;
  return typeof level === 'string' && isSeverity(level)
    && typeof message === 'string'
    && typeof timestamp === 'object' && timestamp !== null
    && typeof metadata === 'object' && metadata !== null;
}

/**
 * Run the configured formatter. A callback's message is used verbatim; if it
 * throws or hands back something other than a 4-tuple, the event goes through
 * the default template instead.
 */
export function formatEvent(event: LogEvent, config: GelfConfig): FormattedLine {
  const md = metadataEntries(event.metadata);
  const { formatter, metadataKeys } = config;
  if (formatter.kind === 'template') return runTemplate(formatter.parts, event, md, metadataKeys);

  let out: unknown;
  try {
    out = formatter.callback(event.level, event.message, event.timestamp, md);
  } catch {
    return runTemplate(DEFAULT_PARTS, event, md, metadataKeys);
  }
  if (!isFormattedEvent(out)) return runTemplate(DEFAULT_PARTS, event, md, metadataKeys);
  const [level, message, timestamp, metadata] = out;
  return { level, text: toText(message), timestamp, metadata: metadataEntries(metadata) };
}

export function buildDocument(event: LogEvent, config: GelfConfig): GelfDocument {
  const line = formatEvent(event, config);

  const fields = new Map<string, unknown>(selectMetadata(line.metadata, config.metadataKeys));
  for (const [k, v] of config.tags) fields.set(k, v);

  const doc: GelfDocument = {
    short_message: truncateMessage(line.text),
    full_message: line.text,
    version: '1.1',
    host: config.hostname,
    level: SYSLOG_LEVELS[line.level],
    timestamp: toEpochSeconds(line.timestamp),
    _application: config.application
  };
  for (const [k, v] of fields) {
    if (v === undefined) continue;
    const key: `_${string}` = `_${k}`;
    doc[key] = toText(v);
  }
  return doc;
}
