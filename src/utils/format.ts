import { inspect } from 'node:util';

export const pad = (n: number, width = 2) => String(n).padStart(width, '0');

export function humanDate(d: Date = new Date()): string {
  const yyyy = d.getFullYear();
  const mm = pad(d.getMonth() + 1);
  const dd = pad(d.getDate());
  const hh = pad(d.getHours());
  const mi = pad(d.getMinutes());
  const ss = pad(d.getSeconds());
  return `${yyyy}-${mm}-${dd} ${hh}:${mi}:${ss}`;
}

/**
 * Render any value as text. Scalars use their plain string form; lists, maps
 * and everything else without one get a single-line inspection string so the
 * encoder never sees a nested value.
 */
export function toText(value: unknown): string {
  switch (typeof value) {
    case 'string':
      return value;
    case 'number':
    case 'boolean':
    case 'bigint':
      return String(value);
    case 'symbol':
      return value.toString();
    default:
      break;
  }
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value.toISOString();
  return inspect(value, { depth: 4, breakLength: Infinity });
}
