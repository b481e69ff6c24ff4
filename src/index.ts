export type {
  Severity,
  SyslogLevel,
  EventTimestamp,
  Metadata,
  MetadataEntry,
  MetadataInput,
  LogEvent,
  GelfDocument,
  JsonEncoder,
  FormattedEvent,
  FormatterCallback,
  FormatterReference,
  FormatOption,
  Compression,
  OversizedPolicy,
  DiagnosticLevel,
  DiagnosticsOptions,
  GelfSinkOptions,
  GelfConfig,
  SendOutcome,
  SinkStats,
  LogSink,
  ConfigProvider
} from './types.js';

export { SYSLOG_LEVELS, normalizeSeverity, timestampFromDate } from './logging/levels.js';
export { buildDocument, formatEvent } from './logging/document.js';
export { jsonEncoder, renderPayload, decompress } from './logging/codec.js';
export { MAX_SIZE, MAX_PACKET_SIZE, MAX_PAYLOAD_SIZE, splitIntoChunks, parseChunk } from './logging/chunks.js';
export type { ChunkFrame } from './logging/chunks.js';
export { GraylogClient, createUdpSocket } from './logging/graylog.js';
export type { DatagramSocket, SocketFactory } from './logging/graylog.js';
export { resolveConfig } from './config/resolve.js';
export { EnvConfigProvider } from './config/envProvider.js';
export { MongoConfigProvider } from './config/mongoProvider.js';
export type { MongoProviderOptions } from './config/mongoProvider.js';
export { GelfError, ConfigError, EncodingError, TransportError, OversizedMessageError } from './errors.js';
export { Diagnostics } from './diagnostics.js';
export { GelfWorker } from './pool/worker.js';
export { GelfPool } from './pool/balancer.js';
export type { DropReason, PoolOptions } from './pool/balancer.js';
export { DirectSink } from './direct.js';
export { createGelfSink, createDirectSink } from './instance.js';
export type { CreateSinkOptions } from './instance.js';
export { startAutoReload } from './reload.js';
