/**
 * Table Formatting Utility
 *
 * Box-drawn tables for `docent health` and `docent eval` output.
 */

import chalk from 'chalk';

export type Alignment = 'left' | 'right';

/**
 * Column definition. `value` renders a cell from a typed row, so callers
 * never index rows by string key.
 */
export interface Column<T> {
  header: string;
  value: (row: T) => string;
  align?: Alignment;
}

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\x1B\[[0-9;]*m/g;

/**
 * Visible width of a string, ignoring colour codes.
 */
export function visibleLength(str: string): number {
  return str.replace(ANSI_PATTERN, '').length;
}

function pad(str: string, width: number, align: Alignment): string {
  const padding = width - visibleLength(str);
  if (padding <= 0) return str;
  return align === 'right' ? ' '.repeat(padding) + str : str + ' '.repeat(padding);
}

/**
 * Format rows as a table:
 *
 * ```
 * ┌─────────┬─────────┐
 * │ Check   │ Status  │
 * ├─────────┼─────────┤
 * │ Backend │ ok      │
 * └─────────┴─────────┘
 * ```
 */
export function formatTable<T>(columns: Column<T>[], rows: T[]): string {
  if (columns.length === 0) return '';

  const cells = rows.map((row) => columns.map((col) => col.value(row)));
  const widths = columns.map((col, i) =>
    Math.max(visibleLength(col.header), ...cells.map((rowCells) => visibleLength(rowCells[i] ?? '')))
  );

  const hline = (left: string, middle: string, right: string): string =>
    left + widths.map((w) => '─'.repeat(w + 2)).join(middle) + right;

  const line = (values: string[], header: boolean): string =>
    '│' +
    columns
      .map((col, i) => {
        const padded = pad(values[i] ?? '', widths[i] ?? 0, col.align ?? 'left');
        return ` ${header ? chalk.bold(padded) : padded} `;
      })
      .join('│') +
    '│';

  return [
    hline('┌', '┬', '┐'),
    line(
      columns.map((c) => c.header),
      true
    ),
    hline('├', '┼', '┤'),
    ...cells.map((values) => line(values, false)),
    hline('└', '┴', '┘'),
  ].join('\n');
}
