import { describe, it, expect } from "vitest";
import { LineBuffer } from "../src/editor/buffer.js";
import { Cursor } from "../src/editor/cursor.js";

function setup(lines: string[], row: number, col: number) {
  const buf = new LineBuffer();
  buf.replace(lines);
  const cursor = new Cursor();
  cursor.set({ row, col }, buf);
  return { buf, cursor };
}

describe("Cursor", () => {
  it("clamps a position set outside the buffer", () => {
    const { cursor } = setup(["abc", "d"], 9, 9);
    expect(cursor.position()).toEqual({ row: 1, col: 1 });
  });

  describe("up/down", () => {
    it("clamps the column to the shorter destination line", () => {
      const { buf, cursor } = setup(["abcdef", "xy"], 0, 5);
      cursor.move("down", buf);
      expect(cursor.position()).toEqual({ row: 1, col: 2 });
    });

    it("stays put at the boundaries", () => {
      const { buf, cursor } = setup(["abc", "de"], 0, 2);
      cursor.move("up", buf);
      expect(cursor.position()).toEqual({ row: 0, col: 2 });

      cursor.move("down", buf);
      cursor.move("down", buf);
      expect(cursor.position()).toEqual({ row: 1, col: 2 });
    });
  });

  describe("left", () => {
    it("moves one column back", () => {
      const { buf, cursor } = setup(["abc"], 0, 2);
      cursor.move("left", buf);
      expect(cursor.position()).toEqual({ row: 0, col: 1 });
    });

    it("wraps to the end of the previous line", () => {
      const { buf, cursor } = setup(["abc", "de"], 1, 0);
      cursor.move("left", buf);
      expect(cursor.position()).toEqual({ row: 0, col: 3 });
    });

    it("does nothing at the start of the document", () => {
      const { buf, cursor } = setup(["abc"], 0, 0);
      cursor.move("left", buf);
      expect(cursor.position()).toEqual({ row: 0, col: 0 });
    });
  });

  describe("right", () => {
    it("may stop after the last character", () => {
      const { buf, cursor } = setup(["ab", "c"], 0, 1);
      cursor.move("right", buf);
      expect(cursor.position()).toEqual({ row: 0, col: 2 });
    });

    it("wraps to the start of the next line", () => {
      const { buf, cursor } = setup(["ab", "c"], 0, 2);
      cursor.move("right", buf);
      expect(cursor.position()).toEqual({ row: 1, col: 0 });
    });

    it("does nothing at the end of the document", () => {
      const { buf, cursor } = setup(["ab", "c"], 1, 1);
      cursor.move("right", buf);
      expect(cursor.position()).toEqual({ row: 1, col: 1 });
    });
  });

  it("stays inside the buffer over a long walk", () => {
    const { buf, cursor } = setup(["hello", "", "wide line here", "x"], 0, 0);
    const moves = ["right", "down", "down", "right", "right", "up", "left",
      "left", "down", "down", "down", "right", "right", "up"] as const;
    for (const dir of moves) {
      cursor.move(dir, buf);
      expect(cursor.row).toBeGreaterThanOrEqual(0);
      expect(cursor.row).toBeLessThan(buf.lineCount());
      expect(cursor.col).toBeGreaterThanOrEqual(0);
      expect(cursor.col).toBeLessThanOrEqual(buf.lineAt(cursor.row).length);
    }
  });
});
