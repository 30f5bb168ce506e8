import { describe, test, expect } from "vitest";
import { computeLineStarts, positionAtOffset } from "@itl/compiler";

describe("computeLineStarts", () => {
  test("handles LF, CRLF and lone CR", () => {
    expect(computeLineStarts("ab\ncd\r\nef\rg")).toEqual([0, 3, 7, 10]);
    expect(computeLineStarts("")).toEqual([0]);
    expect(computeLineStarts("x\n")).toEqual([0, 2]);
  });
});

describe("positionAtOffset", () => {
  const text = "ab\ncd\r\nef";

  test.each([
    [0, 0, 0],
    [2, 0, 2],
    [3, 1, 0],
    [5, 1, 2],
    [7, 2, 0],
    [9, 2, 2],
  ])("offset %i -> %i:%i", (offset, line, character) => {
    expect(positionAtOffset(text, offset)).toEqual({ line, character });
  });

  test("clamps out-of-range offsets", () => {
    expect(positionAtOffset(text, -4)).toEqual({ line: 0, character: 0 });
    expect(positionAtOffset(text, 100)).toEqual({ line: 2, character: 2 });
  });
});
