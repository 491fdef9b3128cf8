/**
 * Font table editor: add and remove font files, edit family fallback lists,
 * apply the result to the host rendering context and signal save requests.
 */

import { v4 as uuidv4 } from "uuid";
import type { EditorConfig, EditorConfigInput } from "../config/editorConfig";
import { parseEditorConfig } from "../config/editorConfig";
import type { FontFileReader } from "../engine/FontFileReader";
import { FontReadError, readFontFile } from "../engine/FontFileReader";
import { cloneFontDefinitions } from "../lib/fontDefinitions";
import type {
  CustomFontPaths,
  FontConfigMsg,
  FontDefinitions,
} from "../types/fontConfig.types";
import type { Ui } from "../types/immediate.types";
import { logger } from "../utils/logger";

export interface FontCfgUiState {
  nameBuf: string;
  pathBuf: string;
  errMsg: string;
  addNew: boolean;
}

export interface FontCfgUiOptions {
  config?: EditorConfigInput;
  readFile?: FontFileReader;
}

const SCOPE = "FontCfgUi";

export class FontCfgUi {
  /** Id salt keeping widget ids of separate editors apart */
  readonly id: string = uuidv4();
  readonly config: EditorConfig;
  private readonly readFile: FontFileReader;
  private state: FontCfgUiState = { nameBuf: "", pathBuf: "", errMsg: "", addNew: false };

  constructor(options: FontCfgUiOptions = {}) {
    this.config = parseEditorConfig(options.config);
    this.readFile = options.readFile ?? readFontFile;
  }

  getState(): Readonly<FontCfgUiState> {
    return { ...this.state };
  }

  /**
   * Show the editor for one frame, applying the user's edits to `defs` (and
   * `custom`, when given) before returning.
   *
   * @param custom - Receives the paths of fonts added through the editor
   */
  show(ui: Ui, defs: FontDefinitions, custom?: CustomFontPaths): FontConfigMsg {
    return ui.pushId(this.id, (ui) => this.showInner(ui, defs, custom));
  }

  private showInner(ui: Ui, defs: FontDefinitions, custom?: CustomFontPaths): FontConfigMsg {
    ui.setMaxWidth(this.config.maxWidth);

    ui.horizontal((ui) => {
      ui.heading("Fonts");
      if (ui.button("+").clicked) {
        this.state.addNew = true;
        this.state.errMsg = "";
      }
    });

    if (this.state.addNew) {
      this.state.nameBuf = ui.textEditSingleline(this.state.nameBuf, {
        hintText: "Identifier for new font",
      });
      this.state.pathBuf = ui.textEditSingleline(this.state.pathBuf, {
        hintText: "Path to new font",
      });
      if (ui.button("Add new font").clicked) {
        this.addFont(defs, custom);
      }
    }

    if (this.state.errMsg) {
      ui.label(this.state.errMsg, { color: this.config.errorColor });
    }

    for (const name of [...defs.fontData.keys()]) {
      ui.pushId(`font:${name}`, (ui) =>
        ui.horizontal((ui) => {
          ui.label(name);
          if (ui.button("-").clicked) {
            defs.fontData.delete(name);
            custom?.delete(name);
            logger.info(SCOPE, "Font removed", { name });
          }
        })
      );
    }

    ui.separator();
    ui.heading("Families");

    // Appending is deferred until every family has been drawn.
    let pushNewTo: string | null = null;
    for (const [family, fonts] of [...defs.families]) {
      const appendRequested = ui.pushId(`family:${family}`, (ui) =>
        this.showFamily(ui, defs, family, fonts)
      );
      if (appendRequested) {
        pushNewTo = family;
      }
    }

    if (pushNewTo !== null) {
      const target = defs.families.get(pushNewTo);
      if (target) {
        target.push("");
      } else {
        logger.warn(SCOPE, "Append skipped, family removed this frame", { family: pushNewTo });
      }
    }

    ui.separator();
    return ui.horizontal((ui): FontConfigMsg => {
      if (ui.button("✅ Apply").clicked) {
        ui.ctx.setFonts(cloneFontDefinitions(defs));
        logger.info(SCOPE, "Applied font definitions", {
          fonts: defs.fontData.size,
          families: defs.families.size,
        });
      }
      if (ui.button("💾 Save").clicked) {
        logger.info(SCOPE, "Save requested");
        return "saveRequest";
      }
      return "none";
    });
  }

  /**
   * Family row plus one editable row per fallback slot.
   * Returns whether an empty slot was requested for this family.
   */
  private showFamily(ui: Ui, defs: FontDefinitions, family: string, fonts: string[]): boolean {
    const appendRequested = ui.horizontal((ui) => {
      ui.label(family);
      const plus = ui.button("+").clicked;
      if (ui.button("-").clicked) {
        defs.families.delete(family);
        logger.info(SCOPE, "Family removed", { family });
      }
      return plus;
    });

    const kept: string[] = [];
    fonts.forEach((fontName, index) => {
      ui.pushId(String(index), (ui) =>
        ui.horizontal((ui) => {
          const edited = ui.textEditSingleline(fontName);
          if (!ui.button("-").clicked) {
            kept.push(edited);
          }
        })
      );
    });
    fonts.splice(0, fonts.length, ...kept);
    return appendRequested;
  }

  private addFont(defs: FontDefinitions, custom?: CustomFontPaths): void {
    const { nameBuf, pathBuf } = this.state;
    try {
      defs.fontData.set(nameBuf, this.readFile(pathBuf));
    } catch (error) {
      if (!(error instanceof FontReadError)) throw error;
      this.state.errMsg = error.message;
      logger.warn(SCOPE, "Font add failed", { name: nameBuf, path: pathBuf, error: error.message });
      return;
    }
    custom?.set(nameBuf, pathBuf);
    logger.info(SCOPE, "Font added", { name: nameBuf, path: pathBuf });
    this.state = { nameBuf: "", pathBuf: "", errMsg: "", addNew: false };
  }
}
