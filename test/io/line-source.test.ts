import { describe, expect, test } from "vitest";
import {
  ArrayLineSource,
  iterateLines,
  lineSourceFromString,
  splitLines,
  stripByteOrderMark,
} from "../../src/io/line-source";

describe("splitLines", () => {
  test("splits on every line ending style", () => {
    expect(splitLines("a\nb\r\nc\rd")).toEqual(["a", "b", "c", "d"]);
  });

  test("does not start a line after a final terminator", () => {
    expect(splitLines("a\n")).toEqual(["a"]);
    expect(splitLines("a\n\n")).toEqual(["a", ""]);
    expect(splitLines("\n")).toEqual([""]);
  });

  test("returns no lines for empty text", () => {
    expect(splitLines("")).toEqual([]);
    expect(splitLines("\uFEFF")).toEqual([]);
  });

  test("drops a leading byte-order mark", () => {
    expect(splitLines("\uFEFF# STOCKHOLM 1.0\ns1 ACGU\n")).toEqual(["# STOCKHOLM 1.0", "s1 ACGU"]);
  });
});

describe("stripByteOrderMark", () => {
  test("removes only a leading mark", () => {
    expect(stripByteOrderMark("\uFEFFabc")).toBe("abc");
    expect(stripByteOrderMark("a\uFEFFbc")).toBe("a\uFEFFbc");
    expect(stripByteOrderMark("abc")).toBe("abc");
  });
});

describe("ArrayLineSource", () => {
  test("hands out lines until exhausted", () => {
    const source = new ArrayLineSource(["one", "two"]);

    expect(source.next()).toBe("one");
    expect(source.next()).toBe("two");
    expect(source.next()).toBeUndefined();
    expect(source.lineCount).toBe(2);
  });

  test("rewinds to the first line", () => {
    const source = lineSourceFromString("one\ntwo\n");

    expect([...iterateLines(source)]).toEqual(["one", "two"]);
    source.rewind();
    expect([...iterateLines(source)]).toEqual(["one", "two"]);
  });

  test("iterateLines continues from the current position", () => {
    const source = lineSourceFromString("one\ntwo\nthree");
    source.next();

    expect([...iterateLines(source)]).toEqual(["two", "three"]);
  });
});
