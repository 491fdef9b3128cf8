import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFontFixtureDir, type FontFixtureDir } from "../test/fontFixtures";
import { FontReadError, readFontFile } from "./FontFileReader";

describe("readFontFile", () => {
  let fixtures: FontFixtureDir;

  beforeEach(() => {
    fixtures = createFontFixtureDir();
  });

  afterEach(() => {
    fixtures.cleanup();
  });

  it("returns the exact file bytes with face index 0", () => {
    const path = fixtures.write("sans.ttf", [0, 1, 0, 0, 42]);
    const data = readFontFile(path);
    expect(Array.from(data.bytes)).toEqual([0, 1, 0, 0, 42]);
    expect(data.index).toBe(0);
  });

  it("owns a buffer holding only the file", () => {
    const data = readFontFile(fixtures.write("tiny.ttf", [1, 2, 3]));
    expect(data.bytes.byteOffset).toBe(0);
    expect(data.bytes.buffer.byteLength).toBe(data.bytes.byteLength);
    expect(Array.from(new Uint8Array(data.bytes.buffer))).toEqual([1, 2, 3]);
  });

  it("wraps a missing file in FontReadError", () => {
    const path = fixtures.missing("nope.ttf");
    try {
      readFontFile(path);
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(FontReadError);
      if (!(e instanceof FontReadError)) return;
      expect(e.path).toBe(path);
      expect(e.message).toBe(`ENOENT: no such file or directory, open '${path}'`);
    }
  });

  it("wraps a directory path in FontReadError", () => {
    expect(() => readFontFile(fixtures.dir)).toThrow(FontReadError);
  });
});
