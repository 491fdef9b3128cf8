export { FontCfgUi } from "./editor/FontCfgUi";
export type { FontCfgUiOptions, FontCfgUiState } from "./editor/FontCfgUi";
export { FontCfgWindow } from "./editor/FontCfgWindow";
export { loadCustomFonts } from "./engine/FontLoader";
export type { LoadCustomFontsResult } from "./engine/FontLoader";
export { FontReadError, readFontFile } from "./engine/FontFileReader";
export type { FontFileReader } from "./engine/FontFileReader";
export {
  cloneFontDefinitions,
  createDefaultFontDefinitions,
  createFontDefinitions,
  fontDataFromBytes,
} from "./lib/fontDefinitions";
export { EMPTY_INPUT, FrameUi, runFrame } from "./lib/frameUi";
export { EditorConfigError, EditorConfigSchema, parseEditorConfig } from "./config/editorConfig";
export type { EditorConfig, EditorConfigInput } from "./config/editorConfig";
export { fontContext, useFontContextStore } from "./stores/fontContextStore";
export { default as ImmediateView } from "./components/ImmediateView/ImmediateView";
export { default as FontConfigPanel } from "./components/FontConfigPanel/FontConfigPanel";
export { logger } from "./utils/logger";
export type { LogEntry, LogLevel } from "./utils/logger";
export * from "./types/fontConfig.types";
export type * from "./types/immediate.types";
