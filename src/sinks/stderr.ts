import chalk from 'chalk';
import prettyjson from 'prettyjson';
import { humanDate } from '../utils/format.js';
import type { DiagnosticLevel } from '../types.js';

export interface LineWriter {
  write(chunk: string): boolean;
}

/** Field block drawn as a branch under the header line. */
function treeify(input: string): string {
  const lines = input.split(/\r?\n/).filter((l) => l.trim());
  const last = lines.length - 1;
  return lines
    .map((line, i) => `  ${last === 0 ? '─' : i === 0 ? '┌' : i === last ? '└' : '├'} ${line}`)
    .join('\n');
}

const LEVEL_COLORS: Record<DiagnosticLevel, (text: string) => string> = {
  error: chalk.red,
  warn: chalk.yellow,
  info: chalk.green,
  debug: chalk.blue
};

export function formatPretty(scope: string, level: DiagnosticLevel, msg: string, data: Record<string, unknown>): string {
  const head = `${humanDate()} ${chalk.cyan(`[${scope}]`)} ${LEVEL_COLORS[level](level.toUpperCase())} ${msg}`;
  if (Object.keys(data).length === 0) return `${head}\n`;
  return `${head}\n${treeify(prettyjson.render(data))}\n`;
}

export function formatJson(scope: string, level: DiagnosticLevel, msg: string, data: Record<string, unknown>): string {
  return JSON.stringify({ ts: Math.floor(Date.now() / 1000), level, scope, msg, ...data }) + '\n';
}

/** Write one diagnostic line; returns what was written. */
export function stderrWrite(
  devPretty: boolean,
  scope: string,
  level: DiagnosticLevel,
  msg: string,
  data: Record<string, unknown>,
  out: LineWriter = process.stderr
): string {
  const block = devPretty ? formatPretty(scope, level, msg, data) : formatJson(scope, level, msg, data);
  out.write(block);
  return block;
}
