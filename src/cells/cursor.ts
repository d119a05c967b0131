/**
 * Position model for rendered Quarto markdown.
 *
 * A document is addressed as a flat list of lines. Positions are `(line, col)`
 * pairs, both 0-based. Ranges are half-open: a range ending at column 0 of a
 * line contributes nothing from that line.
 */
export class Cursor {
  readonly line: number;
  readonly col: number;

  constructor(line: number, col = 0) {
    this.line = line;
    this.col = col;
  }

  /**
   * Lexicographic `(line, col)` comparison: negative, zero or positive.
   */
  compare(other: Cursor): number {
    if (this.line !== other.line) return this.line - other.line;
    return this.col - other.col;
  }

  isBefore(other: Cursor): boolean {
    return this.compare(other) < 0;
  }

  equals(other: Cursor): boolean {
    return this.compare(other) === 0;
  }

  /** True once the cursor has moved beyond the last line of `table`. */
  isPastEnd(table: LineTable): boolean {
    return this.line > table.length - 1;
  }

  /** Move `lines` lines down (or up, when negative). Block boundaries are whole lines, so the column resets. */
  advanceLine(lines = 1): Cursor {
    return new Cursor(this.line + lines, 0);
  }

  advanceCol(cols: number): Cursor {
    return new Cursor(this.line, this.col + cols);
  }

  copy(): Cursor {
    return new Cursor(this.line, this.col);
  }

  toString(): string {
    return `${this.line}:${this.col}`;
  }
}

/**
 * Read-only view over the lines of one document.
 */
export class LineTable {
  private readonly lines: readonly string[];

  constructor(lines: readonly string[]) {
    this.lines = lines;
  }

  get length(): number {
    return this.lines.length;
  }

  /** The whole line at `index`, or `''` outside the table. */
  line(index: number): string {
    return this.lines[index] ?? '';
  }

  /** The line under `cursor`, starting at its column. */
  lineAt(cursor: Cursor): string {
    return this.line(cursor.line).slice(cursor.col);
  }

  /** Cursor at column 0 of the first line. */
  start(): Cursor {
    return new Cursor(0, 0);
  }

  /** Cursor at column 0 of the (non-existent) line after the last one. */
  end(): Cursor {
    return new Cursor(this.lines.length, 0);
  }

  /**
   * Text of the half-open range `[start, end)` as a list of line fragments.
   *
   * - Same line: the single substring `[start.col, end.col)`.
   * - Otherwise: the tail of the start line, every line strictly between, and
   *   the head of the end line when `end.col > 0`.
   */
  between(start: Cursor, end: Cursor): string[] {
    if (!start.isBefore(end)) return [];

    if (start.line === end.line) {
      return [this.line(start.line).slice(start.col, end.col)];
    }

    const out = [this.line(start.line).slice(start.col)];
    for (let index = start.line + 1; index < end.line && index < this.lines.length; index += 1) {
      out.push(this.line(index));
    }
    if (end.col > 0 && end.line < this.lines.length) {
      out.push(this.line(end.line).slice(0, end.col));
    }
    return out;
  }
}
