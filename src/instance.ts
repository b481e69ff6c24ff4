import { EnvConfigProvider } from './config/envProvider.js';
import { Diagnostics } from './diagnostics.js';
import { DirectSink } from './direct.js';
import type { SocketFactory } from './logging/graylog.js';
import { GelfPool } from './pool/balancer.js';
import type { ConfigProvider, GelfSinkOptions } from './types.js';

export interface CreateSinkOptions {
  /** Used as-is; the provider is not consulted when set. */
  options?: GelfSinkOptions;
  configProvider?: ConfigProvider;
  socketFactory?: SocketFactory;
  /** Shared diagnostics logger; one is built from the loaded options otherwise. */
  diagnostics?: Diagnostics;
}

async function loadOptions(opts: CreateSinkOptions): Promise<GelfSinkOptions> {
  const provider: ConfigProvider = opts.configProvider || new EnvConfigProvider();
  return opts.options || await provider.load();
}

/**
 * Build an isolated pooled sink. Nothing is global: two sinks never share
 * sockets, counters or configuration.
 */
export async function createGelfSink(opts: CreateSinkOptions = {}): Promise<GelfPool> {
  const options = await loadOptions(opts);
  return new GelfPool(options, {
    socketFactory: opts.socketFactory,
    diagnostics: opts.diagnostics ?? new Diagnostics(options.diagnostics)
  });
}

/** Same as createGelfSink, without the pool. `poolSize` is ignored. */
export async function createDirectSink(opts: CreateSinkOptions = {}): Promise<DirectSink> {
  const options = await loadOptions(opts);
  return new DirectSink(options, {
    socketFactory: opts.socketFactory,
    diagnostics: opts.diagnostics ?? new Diagnostics(options.diagnostics)
  });
}
