import type { Diagnostics } from './diagnostics.js';
import { toError } from './errors.js';
import type { ConfigProvider, GelfSinkOptions, LogSink } from './types.js';

function same(a: unknown, b: unknown): boolean {
  try { return JSON.stringify(a) === JSON.stringify(b); } catch { return false; }
}

/**
 * Poll a provider and push changed options into a sink.
 * A failed load or a rejected config leaves the sink on its current snapshot
 * and is retried on the next tick. Returns a stop function.
 */
export function startAutoReload(
  provider: ConfigProvider,
  sink: LogSink,
  intervalMs = 60_000,
  diagnostics?: Diagnostics
): () => void {
  let lastCfg: GelfSinkOptions | null = null;
  let stopped = false;

  async function tick() {
    try {
      const cfg = await provider.load();
      if (stopped || same(cfg, lastCfg)) return;
      sink.reconfigure(cfg);
      lastCfg = cfg;
    } catch (err) {
      diagnostics?.warn('GELF config reload failed', { error: toError(err).message });
    }
  }

  const timer = setInterval(() => void tick(), intervalMs);
  timer.unref();
  // kick off immediately
  void tick();

  return () => {
    stopped = true;
    clearInterval(timer);
  };
}
