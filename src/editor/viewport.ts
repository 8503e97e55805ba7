import type { Position } from "./state.js";

export class Viewport {
  top = 0;
  left = 0;
  rows: number;
  cols: number;

  constructor(rows: number, cols: number) {
    this.rows = Math.max(1, rows);
    this.cols = Math.max(1, cols);
  }

  // Scroll just far enough that the cursor cell is on screen.
  recompute(cursor: Position) {
    if (cursor.row < this.top) this.top = cursor.row;
    if (cursor.row >= this.top + this.rows)
      this.top = cursor.row - this.rows + 1;

    if (cursor.col < this.left) this.left = cursor.col;
    if (cursor.col >= this.left + this.cols)
      this.left = cursor.col - this.cols + 1;
  }

  resize(rows: number, cols: number, cursor: Position) {
    this.rows = Math.max(1, rows);
    this.cols = Math.max(1, cols);
    this.recompute(cursor);
  }

  reset() {
    this.top = 0;
    this.left = 0;
  }
}
