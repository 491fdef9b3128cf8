/**
 * Renders an immediate-mode frame as React elements.
 * A click or edit runs one frame carrying that interaction, then the view
 * re-renders from a fresh frame with no input.
 */

import type { ReactNode } from "react";
import { useCallback, useMemo, useState } from "react";
import { clickInput, editInput, EMPTY_INPUT, runFrame } from "../../lib/frameUi";
import type { FontContext } from "../../types/fontConfig.types";
import type { FrameInput, Ui, WidgetNode } from "../../types/immediate.types";
import styles from "./ImmediateView.module.css";

interface ImmediateViewProps {
  ctx: FontContext;
  run: (ui: Ui) => void;
  /** Change to force a repaint after host state changed outside the frame */
  repaintKey?: string | number | boolean;
  onInteraction?: () => void;
}

function renderNode(node: WidgetNode, dispatch: (input: FrameInput) => void): ReactNode {
  switch (node.kind) {
    case "heading":
      return (
        <h3 key={node.id} className={styles.heading}>
          {node.text}
        </h3>
      );
    case "label":
      return (
        <span
          key={node.id}
          className={styles.label}
          style={node.color ? { color: node.color } : undefined}
        >
          {node.text}
        </span>
      );
    case "button":
      return (
        <button key={node.id} type="button" onClick={() => dispatch(clickInput(node.id))}>
          {node.text}
        </button>
      );
    case "textEdit":
      return (
        <input
          key={node.id}
          type="text"
          className={styles.input}
          value={node.value}
          placeholder={node.hintText}
          onChange={(e) => dispatch(editInput(node.id, e.target.value))}
        />
      );
    case "separator":
      return <hr key={node.id} className={styles.separator} />;
    case "horizontal":
      return (
        <div key={node.id} className={styles.row}>
          {node.children.map((child) => renderNode(child, dispatch))}
        </div>
      );
    case "window":
      return (
        <section
          key={node.id}
          className={styles.window}
          style={node.maxWidth !== null ? { maxWidth: node.maxWidth } : undefined}
          aria-label={node.title}
        >
          <header className={styles.windowHeader}>
            <span>{node.title}</span>
            <button
              type="button"
              aria-label="Close"
              onClick={() => dispatch(clickInput(node.closeId))}
            >
              ×
            </button>
          </header>
          <div className={styles.windowBody}>
            {node.children.map((child) => renderNode(child, dispatch))}
          </div>
        </section>
      );
  }
}

function ImmediateView({ ctx, run, repaintKey, onInteraction }: ImmediateViewProps) {
  const [revision, setRevision] = useState(0);

  // An empty-input frame leaves host state untouched.
  const output = useMemo(
    () => runFrame(EMPTY_INPUT, ctx, run),
    [ctx, run, revision, repaintKey]
  );

  const dispatch = useCallback(
    (input: FrameInput) => {
      runFrame(input, ctx, run);
      setRevision((r) => r + 1);
      onInteraction?.();
    },
    [ctx, run, onInteraction]
  );

  return (
    <div
      className={styles.frame}
      style={output.maxWidth !== null ? { maxWidth: output.maxWidth } : undefined}
    >
      {output.nodes.map((node) => renderNode(node, dispatch))}
    </div>
  );
}

export default ImmediateView;
