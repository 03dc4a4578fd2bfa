import type { TabWriter, TabWriterOptions, TextSink } from './types.js';

interface Cell {
  text: string;
  /** Width in code points. */
  width: number;
}

interface Row {
  cells: Cell[];
  /** False only for an unterminated line emitted by `flush()`. */
  newline: boolean;
}

/**
 * Layout used for llvm-mca input: 18-column minimum, 8-column tabs, padded with tabs.
 */
export const MCA_TAB_LAYOUT: TabWriterOptions = { minWidth: 18, tabWidth: 8, padding: 1 };

function tabPadding(textWidth: number, cellWidth: number, tabWidth: number): string {
  if (tabWidth <= 0) return '';
  const stop = Math.ceil(cellWidth / tabWidth) * tabWidth;
  return '\t'.repeat(Math.ceil((stop - textWidth) / tabWidth));
}

/**
 * Number of cells of `row` that belong to a column; the last cell of a line never does.
 */
function columnCells(rows: Row[], index: number): number {
  return (rows[index]?.cells.length ?? 0) - 1;
}

function renderRows(
  rows: Row[],
  widths: number[],
  from: number,
  to: number,
  tabWidth: number,
  out: string[],
): void {
  for (const row of rows.slice(from, to)) {
    row.cells.forEach((cell, j) => {
      out.push(cell.text);
      const width = widths[j];
      if (width !== undefined) out.push(tabPadding(cell.width, width, tabWidth));
    });
    if (row.newline) out.push('\n');
  }
}

/**
 * Lay out `rows[from..to)` given the widths already fixed for columns left of `widths.length`.
 *
 * A column block is a maximal run of adjacent rows that all have a cell in the current column; every
 * block gets its own width, and the columns to its right are laid out recursively within it.
 */
function formatRows(
  rows: Row[],
  widths: number[],
  from: number,
  to: number,
  options: TabWriterOptions,
  out: string[],
): void {
  const column = widths.length;
  let pending = from;
  for (let row = from; row < to; row++) {
    if (column >= columnCells(rows, row)) continue;

    renderRows(rows, widths, pending, row, options.tabWidth, out);
    pending = row;

    let width = options.minWidth;
    for (; row < to; row++) {
      if (column >= columnCells(rows, row)) break;
      const cell = rows[row]?.cells[column];
      if (cell) width = Math.max(width, cell.width + options.padding);
    }

    widths.push(width);
    formatRows(rows, widths, pending, row, options, out);
    widths.pop();
    pending = row;
  }
  renderRows(rows, widths, pending, to, options.tabWidth, out);
}

/**
 * Create a {@link TabWriter} that emits formatted text into `sink`.
 *
 * Text is buffered until a line with a single cell ends (it cannot affect later columns) or until
 * `flush()`. Output is a pure function of the written text.
 *
 * Only `\t` ends a cell and only `\n` ends a line. Vertical tabs and form feeds are ordinary cell
 * text: rendered lines never contain them as separators.
 */
export function createTabWriter(sink: TextSink, options: TabWriterOptions): TabWriter {
  let rows: Row[] = [];
  let line: Cell[] = [];
  let cell = '';

  const terminateCell = (): number => {
    line.push({ text: cell, width: [...cell].length });
    cell = '';
    return line.length;
  };

  const emit = (): void => {
    const out: string[] = [];
    formatRows(rows, [], 0, rows.length, options, out);
    rows = [];
    const text = out.join('');
    if (text.length > 0) sink.write(text);
  };

  return {
    write(text: string): void {
      let start = 0;
      for (let i = 0; i < text.length; i++) {
        const ch = text.charAt(i);
        if (ch !== '\t' && ch !== '\n') continue;
        cell += text.slice(start, i);
        start = i + 1;
        const cells = terminateCell();
        if (ch === '\n') {
          rows.push({ cells: line, newline: true });
          line = [];
          if (cells === 1) emit();
        }
      }
      cell += text.slice(start);
    },

    flush(): void {
      if (cell.length > 0) terminateCell();
      if (line.length > 0) {
        rows.push({ cells: line, newline: false });
        line = [];
      }
      emit();
    },
  };
}
