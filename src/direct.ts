import { resolveConfig } from './config/resolve.js';
import { Diagnostics } from './diagnostics.js';
import { toError } from './errors.js';
import { renderPayload } from './logging/codec.js';
import { GraylogClient } from './logging/graylog.js';
import type { SocketFactory } from './logging/graylog.js';
import { meetsMinimum } from './logging/levels.js';
import type { GelfConfig, GelfSinkOptions, LogEvent, LogSink, SendOutcome } from './types.js';

export interface DirectSinkOptions {
  socketFactory?: SocketFactory;
  diagnostics?: Diagnostics;
}

/**
 * Unpooled sink: builds and sends on the caller's path over a single socket.
 * `send` reports encoding, oversize and transport errors to its caller;
 * `submit` only logs them.
 */
export class DirectSink implements LogSink {
  private config: GelfConfig;
  private client: GraylogClient;
  private inflight = new Set<Promise<unknown>>();
  private readonly socketFactory?: SocketFactory;
  private readonly diagnostics: Diagnostics;

  constructor(options: GelfSinkOptions, opts: DirectSinkOptions = {}) {
    this.config = resolveConfig(options);
    this.socketFactory = opts.socketFactory;
    this.diagnostics = opts.diagnostics ?? new Diagnostics(options.diagnostics);
    this.client = this.connect();
  }

  async send(event: LogEvent): Promise<SendOutcome | 'filtered'> {
    if (!meetsMinimum(event.level, this.config.minLevel)) return 'filtered';
    const payload = renderPayload(event, this.config);
    // a socket lost to an earlier failure is reopened for the next event
    if (this.client.closed) this.client = this.connect();
    const outcome = await this.client.send(payload);
    if (outcome === 'dropped') this.diagnostics.warn('GELF event dropped', { reason: 'oversized', size: payload.length });
    return outcome;
  }

  submit(event: LogEvent) {
    const p = this.send(event).catch((err: unknown) => {
      const error = toError(err);
      this.diagnostics.warn('GELF event failed', { error: error.message, name: error.name });
    });
    this.inflight.add(p);
    void p.finally(() => this.inflight.delete(p));
  }

  reconfigure(options: GelfSinkOptions) {
    this.config = resolveConfig(options);
    if (options.diagnostics) this.diagnostics.configure(options.diagnostics);
    this.client.close();
    this.client = this.connect();
  }

  async flush(): Promise<void> {
    await Promise.all(this.inflight);
  }

  close() {
    this.client.close();
    this.diagnostics.close();
  }

  private connect(): GraylogClient {
    return new GraylogClient({
      host: this.config.collectorHost,
      port: this.config.collectorPort,
      oversizedPolicy: this.config.oversizedPolicy,
      socketFactory: this.socketFactory,
      onError: (err) => this.diagnostics.error('GELF socket error', { error: err.message })
    });
  }
}
