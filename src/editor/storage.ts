import fs from "node:fs";

import { toError, type Result } from "./state.js";

export type LoadOutcome =
  | { kind: "loaded"; lines: string[] }
  | { kind: "missing" }
  | { kind: "error"; error: Error };

export type Storage = {
  readLines(path: string): LoadOutcome;
  writeLines(path: string, lines: readonly string[]): Result;
};

export function splitLines(data: string): string[] {
  if (data === "") return [];
  const lines = data.replace(/\r\n/g, "\n").split("\n");
  // A final terminator ends the last line rather than starting a new one
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function joinLines(lines: readonly string[]): string {
  return lines.map((line) => line + "\n").join("");
}

// latin1: one byte per character, so columns count bytes
export function readLines(path: string): LoadOutcome {
  try {
    return { kind: "loaded", lines: splitLines(fs.readFileSync(path, "latin1")) };
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") return { kind: "missing" };
    return { kind: "error", error: toError(err) };
  }
}

export function writeLines(path: string, lines: readonly string[]): Result {
  try {
    fs.writeFileSync(path, joinLines(lines), "latin1");
    return { kind: "ok", message: "File saved successfully!" };
  } catch (err) {
    return {
      kind: "failed",
      message: "Error: Cannot open file for writing!",
      error: toError(err),
    };
  }
}

export const fileStorage: Storage = { readLines, writeLines };

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
