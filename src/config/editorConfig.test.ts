import { describe, expect, it } from "vitest";
import { EditorConfigError, parseEditorConfig } from "./editorConfig";

describe("parseEditorConfig", () => {
  it("fills defaults", () => {
    expect(parseEditorConfig()).toEqual({
      maxWidth: 300,
      windowTitle: "Font definitions",
      errorColor: "#8b0000",
    });
  });

  it("keeps provided values", () => {
    const config = parseEditorConfig({ maxWidth: 420, errorColor: "#f00" });
    expect(config.maxWidth).toBe(420);
    expect(config.errorColor).toBe("#f00");
    expect(config.windowTitle).toBe("Font definitions");
  });

  it("rejects a non-positive width", () => {
    expect(() => parseEditorConfig({ maxWidth: 0 })).toThrow(EditorConfigError);
  });

  it("lists the offending field", () => {
    try {
      parseEditorConfig({ errorColor: "red" });
      expect.unreachable();
    } catch (e) {
      expect(e).toBeInstanceOf(EditorConfigError);
      expect(e instanceof Error ? e.message : "").toBe(
        "Invalid editor config: errorColor: Expected a hex colour like #8b0000"
      );
    }
  });
});
