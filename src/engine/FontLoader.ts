/**
 * Loads custom fonts recorded in a CustomFontPaths registry into a font data table.
 * Meant to run once at host startup, before the first frame.
 */

import type { CustomFontPaths, FontData } from "../types/fontConfig.types";
import { logger } from "../utils/logger";
import type { FontFileReader } from "./FontFileReader";
import { FontReadError, readFontFile } from "./FontFileReader";

export type LoadCustomFontsResult =
  | { ok: true; loaded: string[] }
  | { ok: false; loaded: string[]; identifier: string; path: string; error: FontReadError };

/**
 * Read every registry entry into `fontData`, overwriting existing identifiers.
 *
 * Stops at the first unreadable file. Fonts inserted before the failure stay
 * in the table.
 */
export function loadCustomFonts(
  custom: CustomFontPaths,
  fontData: Map<string, FontData>,
  readFile: FontFileReader = readFontFile
): LoadCustomFontsResult {
  const loaded: string[] = [];
  for (const [identifier, path] of custom) {
    let data: FontData;
    try {
      data = readFile(path);
    } catch (error) {
      if (!(error instanceof FontReadError)) throw error;
      logger.error("CustomFontLoader", "Load failed", { identifier, path, error: error.message });
      return { ok: false, loaded, identifier, path, error };
    }
    fontData.set(identifier, data);
    loaded.push(identifier);
  }
  logger.info("CustomFontLoader", "Custom fonts loaded", { count: loaded.length });
  return { ok: true, loaded };
}
