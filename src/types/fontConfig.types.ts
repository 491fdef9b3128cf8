/**
 * Font configuration data model: font data table, family fallback table,
 * custom font path registry and the editor's result message.
 */

export interface FontData {
  bytes: Uint8Array;
  index: number; // Face index inside a collection file (.ttc/.otc)
}

/** Family names every toolkit-backed configuration starts with */
export const PROPORTIONAL_FAMILY = "Proportional";
export const MONOSPACE_FAMILY = "Monospace";

export interface FontDefinitions {
  /** Font identifier -> raw font file bytes */
  fontData: Map<string, FontData>;
  /** Family name -> ordered fallback list of font identifiers (duplicates allowed) */
  families: Map<string, string[]>;
}

/**
 * Custom font paths added by the user through the editor.
 * Key is the font identifier, value is the path the font was read from.
 */
export type CustomFontPaths = Map<string, string>;

/** Message returned by the editor each frame */
export type FontConfigMsg = "none" | "saveRequest";

/**
 * Host rendering context. Receives a full copy of the definitions on Apply.
 */
export interface FontContext {
  setFonts(defs: FontDefinitions): void;
  fonts(): FontDefinitions | null;
}
