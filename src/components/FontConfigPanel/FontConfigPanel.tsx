/**
 * Example host: owns a FontCfgWindow, feeds it the host's definitions every
 * frame and hands save requests back to the caller.
 *
 * The default font reader uses node:fs. A browser host must pass
 * `options.readFile` and have its bundler stub the node:fs import.
 */

import { useCallback, useState } from "react";
import type { FontCfgUiOptions } from "../../editor/FontCfgUi";
import { FontCfgWindow } from "../../editor/FontCfgWindow";
import { fontContext, useFontContextStore } from "../../stores/fontContextStore";
import type { CustomFontPaths, FontDefinitions } from "../../types/fontConfig.types";
import type { Ui } from "../../types/immediate.types";
import ImmediateView from "../ImmediateView/ImmediateView";
import styles from "./FontConfigPanel.module.css";

interface FontConfigPanelProps {
  definitions: FontDefinitions;
  customPaths?: CustomFontPaths;
  options?: FontCfgUiOptions;
  initiallyOpen?: boolean;
  onSaveRequest: (definitions: FontDefinitions, customPaths?: CustomFontPaths) => void;
}

function FontConfigPanel({
  definitions,
  customPaths,
  options,
  initiallyOpen = false,
  onSaveRequest,
}: FontConfigPanelProps) {
  const [cfgWindow] = useState(() => {
    const win = new FontCfgWindow(options);
    win.open = initiallyOpen;
    return win;
  });
  const [isOpen, setIsOpen] = useState(cfgWindow.open);
  const activeDefinitions = useFontContextStore((s) => s.activeDefinitions);

  const run = useCallback(
    (ui: Ui) => {
      if (cfgWindow.show(ui, definitions, customPaths) === "saveRequest") {
        onSaveRequest(definitions, customPaths);
      }
    },
    [cfgWindow, definitions, customPaths, onSaveRequest]
  );

  const handleInteraction = useCallback(() => setIsOpen(cfgWindow.open), [cfgWindow]);

  const handleOpen = () => {
    cfgWindow.open = true;
    setIsOpen(true);
  };

  const status = activeDefinitions
    ? `${activeDefinitions.fontData.size} fonts, ${activeDefinitions.families.size} families applied`
    : "Not applied";

  return (
    <div className={styles.panel}>
      {!isOpen && (
        <button type="button" onClick={handleOpen}>
          Font settings
        </button>
      )}
      <ImmediateView
        ctx={fontContext}
        run={run}
        repaintKey={isOpen}
        onInteraction={handleInteraction}
      />
      <footer className={styles.statusbar}>
        <span
          className={styles.sbDot}
          style={{ background: activeDefinitions ? "#2e7d32" : "#9e9e9e" }}
          aria-hidden
        />
        {status}
      </footer>
    </div>
  );
}

export default FontConfigPanel;
