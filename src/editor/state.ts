export type Position = { row: number; col: number };

export type Direction = "up" | "down" | "left" | "right";

export type Result =
  | { kind: "ok"; message: string }
  // handled locally, e.g. opening a path that does not exist yet
  | { kind: "recovered"; message: string }
  | { kind: "failed"; message: string; error: Error };

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
