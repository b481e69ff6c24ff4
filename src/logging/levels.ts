import type { EventTimestamp, Severity, SyslogLevel } from '../types.js';

export const SYSLOG_LEVELS: Record<Severity, SyslogLevel> = {
  emergency: 0,
  alert: 1,
  critical: 2,
  error: 3,
  warning: 4,
  notice: 5,
  info: 6,
  debug: 7
};

const ALIASES: Record<string, Severity> = {
  warn: 'warning',
  crit: 'critical',
  emerg: 'emergency',
  err: 'error'
};

export function isSeverity(name: string): name is Severity {
  return Object.prototype.hasOwnProperty.call(SYSLOG_LEVELS, name);
}

/** Lower-cases, resolves aliases such as `warn`, and falls back to `info`. */
export function normalizeSeverity(name?: string): Severity {
  const n = (name ?? 'info').trim().toLowerCase().replace(/^:/, '');
  if (isSeverity(n)) return n;
  return ALIASES[n] ?? 'info';
}

/** True when `level` is at least as severe as `min` (no minimum lets everything through). */
export function meetsMinimum(level: Severity, min?: Severity): boolean {
  if (!min) return true;
  return SYSLOG_LEVELS[level] <= SYSLOG_LEVELS[min];
}

export function timestampFromDate(d: Date = new Date()): EventTimestamp {
  return {
    year: d.getUTCFullYear(),
    month: d.getUTCMonth() + 1,
    day: d.getUTCDate(),
    hour: d.getUTCHours(),
    minute: d.getUTCMinutes(),
    second: d.getUTCSeconds(),
    millisecond: d.getUTCMilliseconds()
  };
}
