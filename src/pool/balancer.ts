import { EventEmitter } from 'node:events';
import { resolveConfig, parsePoolSize } from '../config/resolve.js';
import { Diagnostics } from '../diagnostics.js';
import { toError } from '../errors.js';
import { meetsMinimum } from '../logging/levels.js';
import type { SocketFactory } from '../logging/graylog.js';
import { GelfWorker } from './worker.js';
import type { GelfConfig, GelfSinkOptions, LogEvent, LogSink, SendOutcome, SinkStats } from '../types.js';

export interface PoolOptions {
  socketFactory?: SocketFactory;
  diagnostics?: Diagnostics;
}

export type DropReason = 'oversized' | 'queue-full' | 'no-worker' | 'worker-exit';

/**
 * Fixed-size pool of GELF workers behind a round-robin cursor.
 *
 * A worker that dies is replaced in the same slot, synchronously, with a
 * worker holding the current config, before the slot takes more work.
 *
 * Events: `dropped` ({ reason, count, size? }), `failed` (event, error),
 * `workerExit` ({ slot, workerId, error, lost }), `workerReplaced` ({ slot, workerId }).
 */
export class GelfPool extends EventEmitter implements LogSink {
  readonly size: number;
  private config: GelfConfig;
  private readonly slots: (GelfWorker | null)[];
  private cursor = 0;
  private nextId = 1;
  private closed = false;
  private readonly socketFactory?: SocketFactory;
  private readonly diagnostics: Diagnostics;
  private readonly counters: SinkStats = {
    submitted: 0,
    filtered: 0,
    sent: 0,
    chunked: 0,
    skipped: 0,
    dropped: 0,
    failed: 0,
    workerExits: 0
  };

  constructor(options: GelfSinkOptions, poolOptions: PoolOptions = {}) {
    super();
    this.size = parsePoolSize(options.poolSize);
    this.config = resolveConfig(options);
    this.socketFactory = poolOptions.socketFactory;
    this.diagnostics = poolOptions.diagnostics ?? new Diagnostics(options.diagnostics);
    this.slots = [];
    try {
      for (let slot = 0; slot < this.size; slot++) this.slots.push(this.spawn(slot));
    } catch (err) {
      for (const worker of this.slots) worker?.stop();
      this.diagnostics.close();
      throw err;
    }
    this.diagnostics.debug('GELF pool started', {
      size: this.size,
      collector: `${this.config.collectorHost}:${this.config.collectorPort}`
    });
  }

  get currentConfig(): GelfConfig {
    return this.config;
  }

  /** Live workers in slot order. */
  get workers(): readonly GelfWorker[] {
    return this.slots.filter((w): w is GelfWorker => w !== null && w.state === 'running');
  }

  stats(): SinkStats {
    return { ...this.counters };
  }

  /** Hand the event to the next worker and return at once. */
  submit(event: LogEvent) {
    if (this.closed) return;
    if (!meetsMinimum(event.level, this.config.minLevel)) {
      this.counters.filtered++;
      return;
    }
    this.counters.submitted++;

    const slot = this.cursor;
    this.cursor = (this.cursor + 1) % this.size;
    const worker = this.slots[slot] ?? this.replace(slot);
    if (!worker) {
      this.drop('no-worker', 1);
      return;
    }
    if (!worker.enqueue(event)) this.drop('queue-full', 1);
  }

  reconfigure(options: GelfSinkOptions) {
    const next = resolveConfig(options);
    if (options.poolSize !== undefined && parsePoolSize(options.poolSize) !== this.size) {
      this.diagnostics.warn('pool size is fixed at startup; ignoring new value', { size: this.size });
    }
    this.config = next;
    if (options.diagnostics) this.diagnostics.configure(options.diagnostics);
    for (const worker of this.slots) worker?.reconfigure(next);
  }

  async flush(): Promise<void> {
    await Promise.all(this.slots.map((w) => w?.idle()));
  }

  close() {
    if (this.closed) return;
    this.closed = true;
    for (const worker of this.slots) {
      worker?.removeAllListeners();
      worker?.stop();
    }
    this.diagnostics.close();
  }

  private spawn(slot: number): GelfWorker {
    const worker = new GelfWorker(this.nextId++, this.config, this.socketFactory);
    worker.on('sent', (outcome: SendOutcome, bytes: number) => this.onSent(outcome, bytes));
    worker.on('failed', (event: LogEvent, error: Error) => this.onFailed(event, error));
    worker.once('exit', (error: Error, lost: number) => this.onExit(worker, slot, error, lost));
    return worker;
  }

  private replace(slot: number): GelfWorker | null {
    try {
      const worker = this.spawn(slot);
      this.slots[slot] = worker;
      this.emit('workerReplaced', { slot, workerId: worker.id });
      return worker;
    } catch (err) {
      this.slots[slot] = null;
      this.diagnostics.error('unable to start replacement GELF worker', { slot, error: toError(err).message });
      return null;
    }
  }

  private drop(reason: DropReason, count: number, size?: number) {
    if (count === 0) return;
    this.counters.dropped += count;
    this.emit('dropped', { reason, count, size });
    this.diagnostics.warn('GELF event dropped', { reason, count, size });
  }

  private onSent(outcome: SendOutcome, bytes: number) {
    switch (outcome) {
      case 'single': this.counters.sent++; break;
      case 'chunked': this.counters.sent++; this.counters.chunked++; break;
      case 'skipped': this.counters.skipped++; break;
      case 'dropped': this.drop('oversized', 1, bytes); break;
    }
  }

  private onFailed(event: LogEvent, error: Error) {
    this.counters.failed++;
    this.emit('failed', event, error);
    this.diagnostics.warn('GELF event failed', { error: error.message, name: error.name });
  }

  private onExit(worker: GelfWorker, slot: number, error: Error, lost: number) {
    worker.removeAllListeners();
    if (this.slots[slot] === worker) this.slots[slot] = null;
    this.counters.workerExits++;
    this.emit('workerExit', { slot, workerId: worker.id, error, lost });
    this.diagnostics.error('GELF worker exited', { slot, worker: worker.id, error: error.message, lost });
    this.drop('worker-exit', lost);
    if (!this.closed) this.replace(slot);
  }
}
