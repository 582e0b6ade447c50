import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';

import { formatRelativeTime, formatTable, pluralize, preview } from '../format.js';

describe('formatTable', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('sizes columns to their widest cell and right-aligns numbers', () => {
    const table = formatTable(
      [
        { header: 'Project', key: 'name' },
        { header: 'N', key: 'count', align: 'right' },
      ],
      [
        { name: 'alpha', count: 12 },
        { name: 'b', count: null },
      ]
    );

    expect(table.split('\n')).toEqual([
      '┌─────────┬────┐',
      '│ Project │ N  │',
      '├─────────┼────┤',
      '│ alpha   │ 12 │',
      '│ b       │    │',
      '└─────────┴────┘',
    ]);
  });

  it('returns an empty string without columns', () => {
    expect(formatTable([], [])).toBe('');
  });
});

describe('formatRelativeTime', () => {
  const now = new Date('2026-03-10T12:00:00.000Z');

  it.each([
    [null, 'Never'],
    ['2026-03-10T11:59:30.000Z', 'Just now'],
    ['2026-03-10T11:59:00.000Z', '1 minute ago'],
    ['2026-03-10T09:00:00.000Z', '3 hours ago'],
    ['2026-03-08T12:00:00.000Z', '2 days ago'],
    ['2026-01-01T08:00:00.000Z', '2026-01-01'],
  ])('formats %s as %s', (iso, expected) => {
    expect(formatRelativeTime(iso, now)).toBe(expected);
  });
});

describe('pluralize', () => {
  it('adds an s except for one', () => {
    expect(pluralize(1, 'chunk')).toBe('1 chunk');
    expect(pluralize(0, 'chunk')).toBe('0 chunks');
  });
});

describe('preview', () => {
  it('flattens whitespace', () => {
    expect(preview('File: a.txt\n\n  Budget')).toBe('File: a.txt Budget');
  });

  it('truncates with an ellipsis', () => {
    expect(preview('abcdefgh', 5)).toBe('abcd…');
  });
});
