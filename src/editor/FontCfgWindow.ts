/**
 * Convenience wrapper showing a FontCfgUi inside a closable window.
 */

import type { CustomFontPaths, FontConfigMsg, FontDefinitions } from "../types/fontConfig.types";
import type { Ui } from "../types/immediate.types";
import type { FontCfgUiOptions } from "./FontCfgUi";
import { FontCfgUi } from "./FontCfgUi";

export class FontCfgWindow {
  readonly editor: FontCfgUi;
  /** Whether the window should be open */
  open = false;

  constructor(options: FontCfgUiOptions = {}) {
    this.editor = new FontCfgUi(options);
  }

  show(ui: Ui, defs: FontDefinitions, custom?: CustomFontPaths): FontConfigMsg {
    let msg: FontConfigMsg = "none";
    this.open = ui.pushId(this.editor.id, (ui) =>
      ui.window(this.editor.config.windowTitle, this.open, (ui) => {
        msg = this.editor.show(ui, defs, custom);
      })
    );
    return msg;
  }
}
