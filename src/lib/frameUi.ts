/**
 * Recording implementation of the immediate-mode Ui.
 *
 * Each widget gets an id from its scope path plus a per-scope counter, so a
 * frame with the same structure as the previous one reproduces the same ids
 * and the previous frame's clicks and edits land on the right widgets.
 */

import type { FontContext } from "../types/fontConfig.types";
import type {
  FrameInput,
  FrameOutput,
  LabelStyle,
  Response,
  TextEditOptions,
  Ui,
  WidgetId,
  WidgetNode,
} from "../types/immediate.types";

export const EMPTY_INPUT: FrameInput = { clicks: new Set(), edits: new Map() };

type WindowNode = Extract<WidgetNode, { kind: "window" }>;

interface WidthContainer {
  maxWidth: number | null;
}

export class FrameUi implements Ui {
  readonly ctx: FontContext;
  private readonly input: FrameInput;
  private readonly scope: string;
  private readonly nodes: WidgetNode[];
  private readonly container: WidthContainer;
  private counter = 0;

  constructor(
    ctx: FontContext,
    input: FrameInput,
    scope: string,
    nodes: WidgetNode[],
    container: WidthContainer
  ) {
    this.ctx = ctx;
    this.input = input;
    this.scope = scope;
    this.nodes = nodes;
    this.container = container;
  }

  private nextId(kind: WidgetNode["kind"]): WidgetId {
    return `${this.scope}/${kind}${this.counter++}`;
  }

  private child(scope: string, nodes: WidgetNode[], container = this.container): FrameUi {
    return new FrameUi(this.ctx, this.input, scope, nodes, container);
  }

  setMaxWidth(width: number): void {
    this.container.maxWidth = width;
  }

  heading(text: string): void {
    this.nodes.push({ kind: "heading", id: this.nextId("heading"), text });
  }

  label(text: string, style?: LabelStyle): void {
    this.nodes.push({
      kind: "label",
      id: this.nextId("label"),
      text,
      ...(style?.color ? { color: style.color } : {}),
    });
  }

  button(text: string): Response {
    const id = this.nextId("button");
    this.nodes.push({ kind: "button", id, text });
    return { id, clicked: this.input.clicks.has(id) };
  }

  textEditSingleline(value: string, options?: TextEditOptions): string {
    const id = this.nextId("textEdit");
    const next = this.input.edits.get(id) ?? value;
    this.nodes.push({
      kind: "textEdit",
      id,
      value: next,
      ...(options?.hintText ? { hintText: options.hintText } : {}),
    });
    return next;
  }

  separator(): void {
    this.nodes.push({ kind: "separator", id: this.nextId("separator") });
  }

  horizontal<T>(body: (ui: Ui) => T): T {
    const id = this.nextId("horizontal");
    const children: WidgetNode[] = [];
    this.nodes.push({ kind: "horizontal", id, children });
    return body(this.child(id, children));
  }

  pushId<T>(salt: string, body: (ui: Ui) => T): T {
    return body(this.child(`${this.scope}/${encodeURIComponent(salt)}`, this.nodes));
  }

  window(title: string, open: boolean, body: (ui: Ui) => void): boolean {
    if (!open) return false;
    const id = `${this.scope}/window:${encodeURIComponent(title)}`;
    const closeId = `${id}/close`;
    if (this.input.clicks.has(closeId)) return false;

    const children: WidgetNode[] = [];
    const node: WindowNode = { kind: "window", id, title, closeId, maxWidth: null, children };
    this.nodes.push(node);
    body(this.child(id, children, node));
    return true;
  }
}

/**
 * Run one frame of `body` against `input`, returning the recorded widget tree.
 */
export function runFrame(
  input: FrameInput,
  ctx: FontContext,
  body: (ui: Ui) => void
): FrameOutput {
  const nodes: WidgetNode[] = [];
  const root: WidthContainer = { maxWidth: null };
  body(new FrameUi(ctx, input, "root", nodes, root));
  return { nodes, maxWidth: root.maxWidth };
}

export function clickInput(id: WidgetId): FrameInput {
  return { clicks: new Set([id]), edits: new Map() };
}

export function editInput(id: WidgetId, value: string): FrameInput {
  return { clicks: new Set(), edits: new Map([[id, value]]) };
}
