export type Severity =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical'
  | 'alert'
  | 'emergency';

/** Syslog severity code, 0 = emergency ... 7 = debug. */
export type SyslogLevel = 0 | 1 | 2 | 3 | 4 | 5 | 6 | 7;

/** Civil time, already in UTC. `month` is 1-based. */
export interface EventTimestamp {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
}

export type MetadataEntry = readonly [key: string, value: unknown];
export type Metadata = ReadonlyArray<MetadataEntry>;
/** Ordered pairs, or a plain object read in insertion order. */
export type MetadataInput = Metadata | Readonly<Record<string, unknown>>;

export interface LogEvent {
  readonly level: Severity;
  readonly message: string;
  readonly timestamp: EventTimestamp;
  readonly metadata: MetadataInput;
}

export interface GelfDocument {
  short_message: string;
  full_message: string;
  version: '1.1';
  host: string;
  level: SyslogLevel;
  timestamp: number;
  _application: string;
  [field: `_${string}`]: string;
}

export interface JsonEncoder {
  encode(document: GelfDocument): string | Uint8Array;
}

export type FormattedEvent = readonly [
  level: Severity,
  message: string,
  timestamp: EventTimestamp,
  metadata: Metadata,
];

export type FormatterCallback = (
  level: Severity,
  message: string,
  timestamp: EventTimestamp,
  metadata: Metadata,
) => FormattedEvent;

/** A named member of a module object, looked up when the config is resolved. */
export interface FormatterReference {
  module: Readonly<Record<string, unknown>>;
  function: string;
}

export type FormatOption = string | FormatterCallback | FormatterReference;

export type Compression = 'gzip' | 'zlib' | 'none';
export type OversizedPolicy = 'drop' | 'error';
export type MetadataSelection = 'all' | ReadonlySet<string>;

export type DiagnosticLevel = 'debug' | 'info' | 'warn' | 'error';

export interface DiagnosticsOptions {
  minLevel?: DiagnosticLevel;
  stderr?: { enabled: boolean; pretty?: boolean };
  file?: { enabled: boolean; filePath: string };
}

/** Raw configuration surface, as handed over by the application or a provider. */
export interface GelfSinkOptions {
  host: string;
  port?: number | string;
  application?: string;
  hostname?: string;
  compression?: string;
  metadata?: 'all' | readonly string[];
  tags?: MetadataInput;
  jsonEncoder?: JsonEncoder;
  format?: FormatOption;
  level?: string;
  poolSize?: number | string;
  oversized?: string;
  queueLimit?: number;
  diagnostics?: DiagnosticsOptions;
}

export type TemplatePart =
  | { kind: 'text'; text: string }
  | { kind: 'token'; token: TemplateToken };

export type TemplateToken = 'date' | 'time' | 'message' | 'level' | 'levelpad' | 'metadata';

export type ResolvedFormatter =
  | { kind: 'template'; source: string; parts: readonly TemplatePart[] }
  | { kind: 'callback'; callback: FormatterCallback };

/** Immutable snapshot shared read-only by every worker until the next reconfigure. */
export interface GelfConfig {
  readonly collectorHost: string;
  readonly collectorPort: number;
  readonly application: string;
  readonly hostname: string;
  readonly compression: Compression;
  readonly metadataKeys: MetadataSelection;
  readonly tags: Metadata;
  readonly encoder: JsonEncoder;
  readonly formatter: ResolvedFormatter;
  readonly minLevel?: Severity;
  readonly oversizedPolicy: OversizedPolicy;
  readonly queueLimit: number;
}

export type SendOutcome = 'skipped' | 'dropped' | 'single' | 'chunked';

export interface SinkStats {
  submitted: number;
  filtered: number;
  sent: number;
  chunked: number;
  skipped: number;
  dropped: number;
  failed: number;
  workerExits: number;
}

export interface LogSink {
  submit(event: LogEvent): void;
  reconfigure(options: GelfSinkOptions): void;
  flush(): Promise<void>;
  close(): void;
}

export interface ConfigProvider {
  load(): Promise<GelfSinkOptions>;
}
