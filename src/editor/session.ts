import { LineBuffer } from "./buffer.js";
import { Cursor } from "./cursor.js";
import { Viewport } from "./viewport.js";
import { fileStorage, type Storage } from "./storage.js";
import type { Direction, Result } from "./state.js";

export const HELP_MESSAGE = "HELP: Ctrl+O = Save | Ctrl+X = Exit";
export const EXIT_PROMPT =
  "File modified. Ctrl+O to save, Ctrl+X to exit without saving.";

export type SessionOptions = {
  screenRows: number;
  screenCols: number;
  defaultFilename?: string;
  storage?: Storage;
};

export class EditSession {
  readonly buffer = new LineBuffer();
  readonly cursor = new Cursor();
  readonly viewport: Viewport;

  filename: string | null = null;
  statusMessage = HELP_MESSAGE;
  pendingExit = false;

  private readonly storage: Storage;
  private readonly defaultFilename: string;

  constructor(opts: SessionOptions) {
    this.viewport = new Viewport(opts.screenRows, opts.screenCols);
    this.storage = opts.storage ?? fileStorage;
    this.defaultFilename = opts.defaultFilename ?? "untitled.txt";
  }

  get modified() {
    return this.buffer.dirty;
  }

  load(lines: readonly string[], filename: string | null) {
    this.buffer.replace(lines);
    this.filename = filename;
    this.cursor.set({ row: 0, col: 0 }, this.buffer);
    this.viewport.reset();
    this.pendingExit = false;
  }

  open(path: string): Result {
    const loaded = this.storage.readLines(path);
    switch (loaded.kind) {
      case "loaded":
        this.load(loaded.lines, path);
        this.statusMessage = `Opened ${path}`;
        return { kind: "ok", message: this.statusMessage };
      case "missing":
        this.load([], path);
        this.statusMessage = `New file: ${path}`;
        return { kind: "recovered", message: this.statusMessage };
      case "error":
        this.load([], path);
        this.statusMessage = "Error opening file.";
        return {
          kind: "failed",
          message: this.statusMessage,
          error: loaded.error,
        };
    }
  }

  save(): Result {
    if (this.filename === null) this.filename = this.defaultFilename;
    const result = this.storage.writeLines(
      this.filename,
      this.buffer.toLines(),
    );
    if (result.kind === "ok") this.buffer.markClean();
    this.statusMessage = result.message;
    return result;
  }

  insertPrintable(ch: string) {
    const { row, col } = this.cursor;
    this.cursor.set(this.buffer.insertCharAt(row, col, ch), this.buffer);
    this.scroll();
  }

  backspace() {
    const { row, col } = this.cursor;
    this.cursor.set(this.buffer.deleteCharBefore(row, col), this.buffer);
    this.scroll();
  }

  enter() {
    const { row, col } = this.cursor;
    this.cursor.set(this.buffer.splitLine(row, col), this.buffer);
    this.scroll();
  }

  move(dir: Direction) {
    this.cursor.move(dir, this.buffer);
    this.scroll();
  }

  insertLine(at: number, content: string) {
    this.buffer.insertLine(at, content);
    this.cursor.clamp(this.buffer);
    this.scroll();
  }

  deleteLine(at: number) {
    this.buffer.deleteLine(at);
    this.cursor.clamp(this.buffer);
    this.scroll();
  }

  resize(rows: number, cols: number) {
    this.viewport.resize(rows, cols, this.cursor.position());
  }

  /** True when the caller may exit now. */
  requestExit(): boolean {
    if (!this.modified || this.pendingExit) return true;
    this.pendingExit = true;
    this.statusMessage = EXIT_PROMPT;
    return false;
  }

  cancelExit() {
    this.pendingExit = false;
    this.statusMessage = HELP_MESSAGE;
  }

  private scroll() {
    this.viewport.recompute(this.cursor.position());
  }
}
