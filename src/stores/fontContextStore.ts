/**
 * Host rendering context: the font definitions currently live.
 * The editor only writes here on Apply.
 */

import { create } from "zustand";
import { cloneFontDefinitions } from "../lib/fontDefinitions";
import type { FontContext, FontDefinitions } from "../types/fontConfig.types";

interface FontContextState {
  activeDefinitions: FontDefinitions | null;
  setFonts: (defs: FontDefinitions) => void;
  reset: () => void;
}

export const useFontContextStore = create<FontContextState>((set) => ({
  activeDefinitions: null,

  setFonts: (defs) => set({ activeDefinitions: cloneFontDefinitions(defs) }),

  reset: () => set({ activeDefinitions: null }),
}));

export const fontContext: FontContext = {
  setFonts: (defs) => useFontContextStore.getState().setFonts(defs),
  fonts: () => useFontContextStore.getState().activeDefinitions,
};
