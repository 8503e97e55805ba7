import { clamp, type LineBuffer } from "./buffer.js";
import type { Direction, Position } from "./state.js";

export class Cursor {
  row = 0;
  col = 0;

  position(): Position {
    return { row: this.row, col: this.col };
  }

  set(pos: Position, buf: LineBuffer) {
    this.row = pos.row;
    this.col = pos.col;
    this.clamp(buf);
  }

  clamp(buf: LineBuffer) {
    this.row = clamp(this.row, 0, buf.lineCount() - 1);
    this.col = clamp(this.col, 0, buf.lineAt(this.row).length);
  }

  move(dir: Direction, buf: LineBuffer) {
    const last = buf.lineCount() - 1;
    switch (dir) {
      case "up":
        if (this.row > 0) this.row--;
        break;
      case "down":
        if (this.row < last) this.row++;
        break;
      case "left":
        if (this.col > 0) {
          this.col--;
        } else if (this.row > 0) {
          this.row--;
          this.col = buf.lineAt(this.row).length;
        }
        break;
      case "right":
        if (this.col < buf.lineAt(this.row).length) {
          this.col++;
        } else if (this.row < last) {
          this.row++;
          this.col = 0;
        }
        break;
    }
    this.clamp(buf);
  }
}
