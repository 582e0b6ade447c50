/**
 * Terminal formatting for command output
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

export interface Column {
  header: string;
  key: string;
  align?: Alignment;
}

export type Row = Record<string, string | number | null | undefined>;

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

function visibleLength(text: string): number {
  return text.replace(ANSI_PATTERN, '').length;
}

function pad(text: string, width: number, align: Alignment): string {
  const padding = ' '.repeat(Math.max(0, width - visibleLength(text)));
  return align === 'right' ? padding + text : text + padding;
}

function cell(row: Row, key: string): string {
  const value = row[key];
  return value == null ? '' : String(value);
}

/**
 * Box-drawn table:
 *
 * ┌───────┬────────┐
 * │ Name  │ Chunks │
 * ├───────┼────────┤
 * │ alpha │     12 │
 * └───────┴────────┘
 */
export function formatTable(columns: Column[], rows: Row[]): string {
  if (columns.length === 0) return '';

  const widths = columns.map((col) =>
    Math.max(col.header.length, ...rows.map((row) => visibleLength(cell(row, col.key))))
  );
  const rule = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;
  const line = (values: string[], header = false): string =>
    '│' +
    columns
      .map((col, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    rule('┌', '┬', '┐'),
    line(columns.map((c) => c.header), true),
    rule('├', '┼', '┤'),
    ...rows.map((row) => line(columns.map((col) => cell(row, col.key)))),
    rule('└', '┴', '┘'),
  ].join('\n');
}

/**
 * "Just now", "3 hours ago", falling back to the date after a month.
 */
export function formatRelativeTime(isoString: string | null, now: Date = new Date()): string {
  if (!isoString) return 'Never';

  const date = new Date(isoString);
  const seconds = Math.floor((now.getTime() - date.getTime()) / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);
  const days = Math.floor(hours / 24);
  const ago = (n: number, unit: string): string => `${n} ${unit}${n === 1 ? '' : 's'} ago`;

  if (seconds < 60) return 'Just now';
  if (minutes < 60) return ago(minutes, 'minute');
  if (hours < 24) return ago(hours, 'hour');
  if (days < 30) return ago(days, 'day');
  return date.toISOString().slice(0, 10);
}

export function pluralize(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Collapse whitespace and cut to `max` characters for one-line previews.
 */
export function preview(text: string, max = 160): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 1)}…` : flat;
}
