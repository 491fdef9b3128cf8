/**
 * Constructors and copy helpers for FontDefinitions.
 */

import type { FontData, FontDefinitions } from "../types/fontConfig.types";
import { MONOSPACE_FAMILY, PROPORTIONAL_FAMILY } from "../types/fontConfig.types";

export function fontDataFromBytes(bytes: Uint8Array, index = 0): FontData {
  return { bytes, index };
}

export function createFontDefinitions(): FontDefinitions {
  return { fontData: new Map(), families: new Map() };
}

/**
 * Definitions with the two well-known families and no fonts.
 */
export function createDefaultFontDefinitions(): FontDefinitions {
  const defs = createFontDefinitions();
  defs.families.set(PROPORTIONAL_FAMILY, []);
  defs.families.set(MONOSPACE_FAMILY, []);
  return defs;
}

export function cloneFontDefinitions(defs: FontDefinitions): FontDefinitions {
  const fontData = new Map<string, FontData>();
  for (const [name, data] of defs.fontData) {
    fontData.set(name, { bytes: data.bytes.slice(), index: data.index });
  }
  const families = new Map<string, string[]>();
  for (const [family, fonts] of defs.families) {
    families.set(family, [...fonts]);
  }
  return { fontData, families };
}
