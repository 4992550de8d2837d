/**
 * Human-readable table sink.
 *
 * Styles:
 *   ascii     +------+-----+ borders
 *   markdown  GitHub pipe table
 *   plain     space-aligned columns, no borders
 */

import type { Row } from '../row.js';
import type { OutputDestination } from '../destination.js';
import { formatValue } from '../value.js';
import { BufferedSink } from './types.js';

export const TABLE_STYLES = ['ascii', 'markdown', 'plain'] as const;
export type TableStyle = (typeof TABLE_STYLES)[number];

export interface TableSinkOptions {
  style?: TableStyle;
  /** Longer cells are truncated with '...'. 0 disables truncation. */
  maxColumnWidth?: number;
  /** Bold header row (ascii and plain styles). */
  color?: boolean;
  /** Column order; otherwise the union of row fields in first-seen order. */
  columns?: readonly string[];
}

const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

/** Length in code points, so surrogate pairs count once. */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

/** Cell text: single line, truncated to `max` code points. */
export function cellText(text: string, max: number): string {
  const line = text.replace(/\r?\n|\r/g, ' ');
  const chars = Array.from(line);
  if (max <= 0 || chars.length <= max) return line;
  return chars.slice(0, Math.max(0, max - 3)).join('') + '...';
}

export class TableSink extends BufferedSink {
  readonly format = 'table';
  private readonly style: TableStyle;
  private readonly maxColumnWidth: number;
  private readonly color: boolean;
  private readonly columns?: readonly string[];

  constructor(destination: OutputDestination, options: TableSinkOptions = {}) {
    super(destination);
    this.style = options.style ?? 'ascii';
    this.maxColumnWidth = options.maxColumnWidth ?? 40;
    this.color = options.color ?? false;
    this.columns = options.columns && options.columns.length > 0 ? options.columns : undefined;
  }

  protected render(rows: readonly Row[]): string {
    const columns = this.columns ?? unionColumns(rows);
    if (columns.length === 0) return '';

    const escape = this.style === 'markdown'
      ? (s: string) => s.replace(/\|/g, '\\|')
      : (s: string) => s;
    const header = columns.map(c => escape(cellText(c, this.maxColumnWidth)));
    const body = rows.map(row =>
      columns.map(c => escape(cellText(formatValue(row.lookup(c)), this.maxColumnWidth))),
    );

    const minWidth = this.style === 'markdown' ? 3 : 0;
    const widths = header.map((h, i) =>
      Math.max(minWidth, textWidth(h), ...body.map(cells => textWidth(cells[i] ?? ''))),
    );
    const pad = (cells: readonly string[]): string[] =>
      cells.map((c, i) => c + ' '.repeat(Math.max(0, (widths[i] ?? 0) - textWidth(c))));
    // Markdown headers stay plain text.
    const useBold = this.color && this.style !== 'markdown';
    const bold = (cells: string[]): string[] => (useBold ? cells.map(c => `${BOLD}${c}${RESET}`) : cells);

    const lines: string[] = [];
    switch (this.style) {
      case 'ascii': {
        const rule = '+' + widths.map(w => '-'.repeat(w + 2)).join('+') + '+';
        const line = (cells: string[]) => '| ' + cells.join(' | ') + ' |';
        lines.push(rule, line(bold(pad(header))), rule);
        for (const cells of body) lines.push(line(pad(cells)));
        if (body.length > 0) lines.push(rule);
        break;
      }
      case 'markdown': {
        const line = (cells: string[]) => '| ' + cells.join(' | ') + ' |';
        lines.push(line(bold(pad(header))), line(widths.map(w => '-'.repeat(w))));
        for (const cells of body) lines.push(line(pad(cells)));
        break;
      }
      case 'plain': {
        const line = (cells: string[]) => cells.join('  ').trimEnd();
        lines.push(line(bold(pad(header))));
        for (const cells of body) lines.push(line(pad(cells)));
        break;
      }
    }
    return lines.join('\n') + '\n';
  }
}

export function unionColumns(rows: readonly Row[]): string[] {
  const seen = new Set<string>();
  for (const row of rows) {
    for (const name of row.names()) seen.add(name);
  }
  return [...seen];
}
