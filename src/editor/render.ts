import { describeBindings } from "./keymap.js";
import type { EditSession } from "./session.js";

export type View = {
  lines: string[];
  status: string;
  message: string;
  help: string;
  cursor: { x: number; y: number };
};

export function statusText(session: EditSession) {
  const name = session.filename ?? "(No Name)";
  return `File: ${name} ${session.modified ? "(modified)" : ""}`;
}

export function renderView(session: EditSession): View {
  const { buffer, cursor, viewport } = session;
  const { top, left, rows, cols } = viewport;

  const lines: string[] = [];
  for (let y = 0; y < rows; y++) {
    const row = top + y;
    lines.push(
      row < buffer.lineCount()
        ? buffer.lineAt(row).slice(left, left + cols)
        : "",
    );
  }

  return {
    lines,
    status: statusText(session).slice(0, cols).padEnd(cols, " "),
    message: session.statusMessage,
    help: describeBindings(),
    cursor: { x: cursor.col - left, y: cursor.row - top },
  };
}
