import type { Position } from "./state.js";

export class LineBuffer {
  private lines: string[] = [""];
  dirty = false;

  replace(lines: readonly string[]) {
    this.lines = lines.length === 0 ? [""] : [...lines];
    this.dirty = false;
  }

  markClean() {
    this.dirty = false;
  }

  insertLine(at: number, content: string) {
    if (at < 0 || at > this.lines.length) return;
    this.lines.splice(at, 0, content);
    this.dirty = true;
  }

  deleteLine(at: number) {
    if (at < 0 || at >= this.lines.length) return;
    this.lines.splice(at, 1);
    this.dirty = true;
    if (this.lines.length === 0) this.insertLine(0, "");
  }

  insertCharAt(row: number, col: number, ch: string): Position {
    if (!this.hasRow(row) || !isPrintable(ch)) return { row, col };
    const line = this.lineAt(row);
    const at = clamp(col, 0, line.length);
    this.lines[row] = line.slice(0, at) + ch + line.slice(at);
    this.dirty = true;
    return { row, col: at + 1 };
  }

  deleteCharBefore(row: number, col: number): Position {
    if (!this.hasRow(row)) return { row, col };
    const line = this.lineAt(row);
    const at = clamp(col, 0, line.length);

    // Start of line: join onto the previous one
    if (at === 0) {
      if (row === 0) return { row, col: 0 };
      const prev = this.lineAt(row - 1);
      this.lines[row - 1] = prev + line;
      this.lines.splice(row, 1);
      this.dirty = true;
      return { row: row - 1, col: prev.length };
    }

    this.lines[row] = line.slice(0, at - 1) + line.slice(at);
    this.dirty = true;
    return { row, col: at - 1 };
  }

  /**
   * Line-break handling. On the last line a new empty line is appended;
   * anywhere else the cursor only moves down to the existing next line and
   * content is left as it is.
   */
  splitLine(row: number, col: number): Position {
    if (!this.hasRow(row)) return { row, col };
    if (row === this.lines.length - 1) {
      this.insertLine(this.lines.length, "");
      return { row: row + 1, col: 0 };
    }
    return { row: row + 1, col: clamp(col, 0, this.lineAt(row + 1).length) };
  }

  lineCount() {
    return this.lines.length;
  }

  lineAt(row: number) {
    return this.lines[row] ?? "";
  }

  toLines(): string[] {
    return [...this.lines];
  }

  private hasRow(row: number) {
    return Number.isInteger(row) && row >= 0 && row < this.lines.length;
  }
}

// One byte in 0x20-0x7e; lines never carry terminators or control bytes
export function isPrintable(ch: string) {
  return /^[\x20-\x7e]$/.test(ch);
}

export function clamp(n: number, min: number, max: number) {
  return Math.max(min, Math.min(n, max));
}
