import { EventEmitter } from 'node:events';
import { EncodingError, OversizedMessageError, toError } from '../errors.js';
import { renderPayload } from '../logging/codec.js';
import { GraylogClient } from '../logging/graylog.js';
import type { SocketFactory } from '../logging/graylog.js';
import type { GelfConfig, LogEvent } from '../types.js';

export type WorkerState = 'running' | 'stopped' | 'dead';

/**
 * One transport worker: a private UDP socket and a FIFO inbox drained one
 * event at a time, so a chunk sequence is never interleaved with another.
 *
 * Events:
 * - `sent` (outcome, bytes, event) after each handled event
 * - `failed` (event, error) when a single event could not be encoded or was refused
 * - `exit` (error, lost) once, when the worker dies; `lost` counts discarded inbox entries
 */
export class GelfWorker extends EventEmitter {
  readonly id: number;
  private config: GelfConfig;
  private client: GraylogClient;
  private queue: LogEvent[] = [];
  private draining?: Promise<void>;
  private _state: WorkerState = 'running';
  private readonly socketFactory?: SocketFactory;

  constructor(id: number, config: GelfConfig, socketFactory?: SocketFactory) {
    super();
    this.id = id;
    this.config = config;
    this.socketFactory = socketFactory;
    this.client = this.connect(config);
  }

  get state(): WorkerState { return this._state; }
  get pending(): number { return this.queue.length; }

  /** Queue an event. False when the worker is not running or its inbox is full. */
  enqueue(event: LogEvent): boolean {
    if (this._state !== 'running') return false;
    if (this.queue.length >= this.config.queueLimit) return false;
    this.queue.push(event);
    this.schedule();
    return true;
  }

  /** Swap in a new snapshot: the current socket is closed and a fresh one opened. */
  reconfigure(config: GelfConfig) {
    if (this._state !== 'running') return;
    this.config = config;
    this.client.close();
    try {
      this.client = this.connect(config);
    } catch (err) {
      this.fail(toError(err));
    }
  }

  /** Resolves once the inbox is empty and nothing is in flight. */
  async idle(): Promise<void> {
    while (this.draining) await this.draining;
  }

  /** Kill the worker as if its send path had crashed. */
  terminate(reason: Error = new Error(`worker ${this.id} terminated`)) {
    this.fail(reason);
  }

  stop() {
    if (this._state !== 'running') return;
    this._state = 'stopped';
    this.queue = [];
    this.client.close();
  }

  private connect(config: GelfConfig): GraylogClient {
    const client: GraylogClient = new GraylogClient({
      host: config.collectorHost,
      port: config.collectorPort,
      oversizedPolicy: config.oversizedPolicy,
      socketFactory: this.socketFactory,
      onError: (err) => {
        if (client === this.client) this.fail(err);
      }
    });
    return client;
  }

  private fail(error: Error) {
    if (this._state !== 'running') return;
    this._state = 'dead';
    const lost = this.queue.length;
    this.queue = [];
    this.client.close();
    this.emit('exit', error, lost);
  }

  private schedule() {
    if (this.draining) return;
    // start on a later tick so `enqueue` never does encoding work on the caller's stack
    this.draining = Promise.resolve().then(() => this.drain()).finally(() => {
      this.draining = undefined;
      if (this._state === 'running' && this.queue.length > 0) this.schedule();
    });
  }

  private async drain(): Promise<void> {
    while (this._state === 'running') {
      const event = this.queue.shift();
      if (!event) return;
      try {
        await this.handle(event);
      } catch (err) {
        this.fail(toError(err));
      }
    }
  }

  private async handle(event: LogEvent): Promise<void> {
    const { config, client } = this;

    let payload: Buffer;
    try {
      payload = renderPayload(event, config);
    } catch (err) {
      if (err instanceof EncodingError) {
        this.emit('failed', event, err);
        return;
      }
      this.fail(toError(err));
      return;
    }

    try {
      const outcome = await client.send(payload);
      this.emit('sent', outcome, payload.length, event);
    } catch (err) {
      // the event is lost either way; only the live socket's failure kills the worker
      const error = toError(err);
      this.emit('failed', event, error);
      if (err instanceof OversizedMessageError || client !== this.client) return;
      this.fail(error);
    }
  }
}
