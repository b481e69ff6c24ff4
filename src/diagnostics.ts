import { stderrWrite } from './sinks/stderr.js';
import type { LineWriter } from './sinks/stderr.js';
import { FileSink } from './sinks/file.js';
import type { DiagnosticLevel, DiagnosticsOptions } from './types.js';

export const DIAGNOSTIC_LEVELS: Record<DiagnosticLevel, number> = {
  error: 50,
  warn: 40,
  info: 30,
  debug: 20
};

const SCOPE = 'gelf';

export function normalizeDiagnosticLevel(name?: string): DiagnosticLevel {
  const n = (name ?? 'warn').toLowerCase();
  return n === 'error' || n === 'warn' || n === 'info' || n === 'debug' ? n : 'warn';
}

/**
 * The library's own log: dropped payloads, worker crashes, replacements.
 * Goes to stderr (pretty in development, JSON lines otherwise) and,
 * optionally, to a rotating JSON-lines file.
 */
export class Diagnostics {
  private minLevel: DiagnosticLevel = 'warn';
  private stderr = { enabled: true, pretty: false };
  private fileSink?: FileSink;
  private readonly out?: LineWriter;

  constructor(opts: DiagnosticsOptions = {}, out?: LineWriter) {
    this.out = out;
    this.configure(opts);
  }

  configure(opts: DiagnosticsOptions = {}) {
    this.minLevel = normalizeDiagnosticLevel(opts.minLevel);
    this.stderr = { enabled: opts.stderr?.enabled ?? true, pretty: !!opts.stderr?.pretty };

    const filePath = opts.file?.enabled ? opts.file.filePath : undefined;
    if (this.fileSink?.filePath !== filePath) {
      this.fileSink?.close();
      this.fileSink = filePath ? new FileSink(filePath) : undefined;
    }
  }

  log(level: DiagnosticLevel, msg: string, data: Record<string, unknown> = {}) {
    if (DIAGNOSTIC_LEVELS[level] < DIAGNOSTIC_LEVELS[this.minLevel]) return;

    if (this.stderr.enabled) {
      const devPretty = this.stderr.pretty && process.env.NODE_ENV === 'development';
      stderrWrite(devPretty, SCOPE, level, msg, data, this.out);
    }
    if (this.fileSink) {
      const base = { ts: Math.floor(Date.now() / 1000), level, scope: SCOPE, msg, ...data };
      this.fileSink.write(JSON.stringify(base) + '\n');
    }
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }

  close() {
    this.fileSink?.close();
    this.fileSink = undefined;
  }
}
