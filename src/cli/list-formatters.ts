/**
 * Column layout for `ignorepick list`
 */

import terminalKit from 'terminal-kit';
import { isBrokenPipeError } from '../tui/errors.js';
import { DEFAULT_TERMINAL_SIZE } from '../tui/layout.js';
import { cyanText, greenText } from './terminal.js';

const COLUMN_GAP = 2;

export interface ColumnLayout {
  columns: number;
  columnWidth: number;
  rows: number;
}

export function calculateColumnLayout(
  items: readonly string[],
  termWidth: number = DEFAULT_TERMINAL_SIZE.width
): ColumnLayout {
  const widest = items.reduce((max, item) => Math.max(max, terminalKit.stringWidth(item)), 0);
  const columnWidth = widest + COLUMN_GAP;
  const columns = Math.max(1, Math.floor(termWidth / columnWidth));
  const rows = Math.ceil(items.length / columns);
  return { columns, columnWidth, rows };
}

function padEndByWidth(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - terminalKit.stringWidth(text)));
}

/** Row-major lines; with `color` the cells alternate cyan and green. */
export function formatColumnarList(
  items: readonly string[],
  layout: ColumnLayout,
  options: { color: boolean }
): string[] {
  const lines: string[] = [];
  for (let row = 0; row < layout.rows; row++) {
    let line = '';
    for (let col = 0; col < layout.columns; col++) {
      const idx = row * layout.columns + col;
      const item = items[idx];
      if (item === undefined) break;
      const cell = padEndByWidth(item, layout.columnWidth);
      if (!options.color) line += cell;
      else line += idx % 2 === 0 ? cyanText(cell) : greenText(cell);
    }
    lines.push(line);
  }
  return lines;
}

/**
 * Writes `lines` to `stream`. Once the reader goes away (EPIPE) the remaining lines are dropped
 * and the function returns normally.
 */
export function writeLines(lines: readonly string[], stream: NodeJS.WritableStream): void {
  let closed = false;
  const onError = (error: Error): void => {
    if (!isBrokenPipeError(error)) throw error;
    closed = true;
  };
  stream.on('error', onError);

  for (const line of lines) {
    if (closed) return;
    try {
      stream.write(`${line}\n`);
    } catch (error) {
      if (isBrokenPipeError(error)) return;
      throw error;
    }
  }
}
