/**
 * Immediate-mode UI types. One frame records a widget tree; interactions
 * from the previous frame are replayed as FrameInput.
 */

import type { FontContext } from "./fontConfig.types";

export type WidgetId = string;

export interface LabelStyle {
  color?: string;
}

export type WidgetNode =
  | { kind: "heading"; id: WidgetId; text: string }
  | { kind: "label"; id: WidgetId; text: string; color?: string }
  | { kind: "button"; id: WidgetId; text: string }
  | { kind: "textEdit"; id: WidgetId; value: string; hintText?: string }
  | { kind: "separator"; id: WidgetId }
  | { kind: "horizontal"; id: WidgetId; children: WidgetNode[] }
  | {
      kind: "window";
      id: WidgetId;
      title: string;
      closeId: WidgetId;
      maxWidth: number | null;
      children: WidgetNode[];
    };

export interface FrameInput {
  clicks: ReadonlySet<WidgetId>;
  edits: ReadonlyMap<WidgetId, string>;
}

export interface FrameOutput {
  nodes: WidgetNode[];
  maxWidth: number | null;
}

export interface Response {
  id: WidgetId;
  clicked: boolean;
}

export interface TextEditOptions {
  hintText?: string;
}

/**
 * Immediate-mode UI surface the editor draws on.
 */
export interface Ui {
  readonly ctx: FontContext;
  setMaxWidth(width: number): void;
  heading(text: string): void;
  label(text: string, style?: LabelStyle): void;
  button(text: string): Response;
  /** Returns the value after this frame's edit; write it back to bind in place. */
  textEditSingleline(value: string, options?: TextEditOptions): string;
  separator(): void;
  horizontal<T>(body: (ui: Ui) => T): T;
  pushId<T>(salt: string, body: (ui: Ui) => T): T;
  /** Returns the next open state. The body does not run while closed. */
  window(title: string, open: boolean, body: (ui: Ui) => void): boolean;
}
