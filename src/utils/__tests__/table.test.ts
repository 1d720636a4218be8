/**
 * Tests for table formatting utility
 */

import { describe, it, expect } from 'vitest';
import chalk from 'chalk';
import { formatTable, visibleLength, type Column } from '../table.js';

interface Check {
  name: string;
  ms: number;
}

const columns: Column<Check>[] = [
  { header: 'Check', value: (r) => r.name },
  { header: 'Ms', value: (r) => String(r.ms), align: 'right' },
];

describe('formatTable', () => {
  it('renders borders sized to the widest cell', () => {
    const lines = formatTable(columns, [
      { name: 'Backend', ms: 12 },
      { name: 'Store', ms: 3 },
    ]).split('\n');

    expect(lines).toHaveLength(6);
    expect(lines[0]).toBe('┌─────────┬────┐');
    expect(lines[2]).toBe('├─────────┼────┤');
    expect(lines[5]).toBe('└─────────┴────┘');
  });

  it('aligns left by default and right on request', () => {
    const lines = formatTable(columns, [
      { name: 'Backend', ms: 12 },
      { name: 'Store', ms: 3 },
    ]).split('\n');

    expect(lines[3]).toBe('│ Backend │ 12 │');
    expect(lines[4]).toBe('│ Store   │  3 │');
  });

  it('renders only the header when there are no rows', () => {
    const lines = formatTable(columns, []).split('\n');

    expect(lines).toHaveLength(4);
    expect(lines[0]).toBe('┌───────┬────┐');
  });

  it('returns empty string when no columns', () => {
    expect(formatTable<Check>([], [{ name: 'x', ms: 1 }])).toBe('');
  });

  it('ignores colour codes when measuring', () => {
    const coloured: Column<Check>[] = [{ header: 'Status', value: (r) => chalk.green(r.name) }];
    const lines = formatTable(coloured, [{ name: 'ok', ms: 0 }]).split('\n');

    expect(lines[0]).toBe('┌────────┐');
  });
});

describe('visibleLength', () => {
  it('strips ANSI escapes', () => {
    expect(visibleLength('\x1B[32mok\x1B[39m')).toBe(2);
    expect(visibleLength('plain')).toBe(5);
  });
});
