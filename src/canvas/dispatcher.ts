import { displayText, elementAt, hitRegion, pointInBBox } from "./geometry";
import { log } from "./logger";
import type { EditorSession } from "./session";
import { resizeFont, styleOf, toggleStyleFlag, withFontFamily } from "./styles";
import type { Gesture, Point, StyleFlag, TextElement, TextStyle } from "./types";

/**
 * Turns gestures into document changes and history records. Gestures run
 * one at a time; one dispatched from inside a subscriber is queued until the
 * current gesture has finished.
 */
export class InteractionDispatcher {
  private queue: Gesture[] = [];
  private running = false;
  private dragging: number | null = null;

  constructor(private readonly session: EditorSession) {}

  dispatch(gesture: Gesture): void {
    this.queue.push(gesture);
    if (this.running) return;
    this.running = true;
    try {
      let next: Gesture | undefined;
      while ((next = this.queue.shift())) {
        this.handle(next);
        this.session.notify();
      }
    } finally {
      this.running = false;
      this.queue = [];
    }
  }

  private handle(g: Gesture): void {
    switch (g.type) {
      case "tap":
        this.tap(g.point);
        break;
      case "tapBackground":
        this.tapBackground(g.point);
        break;
      case "tapElement":
        this.tapElement(g.id);
        break;
      case "dragStart":
        this.dragStart(g.id);
        break;
      case "dragMove":
        this.dragMove(g.id, g.delta);
        break;
      case "dragEnd":
        this.dragEnd(g.id);
        break;
      case "textBufferChanged":
        this.textBufferChanged(g.text);
        break;
      case "textSubmitted":
        this.textSubmitted();
        break;
      case "cancelEdit":
        this.session.selection.cancelEdit();
        break;
      case "toggleBold":
        this.toggle("bold");
        break;
      case "toggleItalic":
        this.toggle("italic");
        break;
      case "toggleUnderline":
        this.toggle("underline");
        break;
      case "changeFontFamily":
        this.changeFontFamily(g.name);
        break;
      case "changeFontSize":
        this.changeFontSize(g.delta);
        break;
      case "addText":
        this.addText();
        break;
      case "undo":
        this.session.undo();
        break;
      case "redo":
        this.session.redo();
        break;
    }
  }

  // ─── Taps ───────────────────────────────────────────────────────────────────

  private tap(point: Point): void {
    const { store, selection, config, measure } = this.session;
    const editing = selection.editSession;
    const id = elementAt(point, store.all(), {
      measure,
      padding: config.hitPadding,
      placeholder: config.placeholderText,
      textFor: (el) => (editing?.elementId === el.id ? editing.bufferText : el.text),
    });
    if (id === null) this.tapBackground(point);
    else this.tapElement(id);
  }

  private tapBackground(point: Point): void {
    const { selection } = this.session;
    if (selection.isEditing() && this.insideEditRegion(point)) return;
    selection.deselect();
    this.session.recordCoalescing();
  }

  private insideEditRegion(point: Point): boolean {
    const { store, selection, config, measure } = this.session;
    const editing = selection.editSession;
    if (!editing) return false;
    const el = store.findById(editing.elementId);
    if (!el) return false;
    const text = displayText(editing.bufferText, config.placeholderText);
    return pointInBBox(point, hitRegion(el, text, measure, config.hitPadding));
  }

  private tapElement(id: number): void {
    const { store, selection } = this.session;
    if (!store.has(id)) {
      log.debug(`tapElement: element ${id} not found`);
      return;
    }
    if (selection.selectedElementId === id) {
      if (!selection.isEditing(id)) selection.beginEdit(id);
      return;
    }
    selection.commitEdit();
    selection.select(id);
    this.session.recordCoalescing();
  }

  // ─── Dragging ───────────────────────────────────────────────────────────────

  private dragStart(id: number): void {
    this.dragging = this.session.store.has(id) ? id : null;
  }

  private dragMove(id: number, delta: Point): void {
    const { store, selection } = this.session;
    if (selection.isEditing(id)) return;
    if (!store.moveBy(id, delta)) log.debug(`dragMove: element ${id} not found`);
  }

  private dragEnd(id: number): void {
    if (this.dragging !== null && this.dragging !== id) {
      log.debug(`dragEnd: ${id} does not match drag target ${this.dragging}`);
    }
    this.dragging = null;
    this.session.recordCoalescing();
  }

  // ─── Text editing ───────────────────────────────────────────────────────────

  private textBufferChanged(text: string): void {
    if (!this.session.selection.updateBuffer(text)) return;
    if (this.session.config.textHistory === "keystroke") this.session.recordCoalescing();
  }

  private textSubmitted(): void {
    if (!this.session.selection.commitEdit()) return;
    this.session.recordCoalescing();
  }

  private addText(): void {
    const { store, selection } = this.session;
    const el = store.create();
    selection.select(el.id);
    selection.beginEdit(el.id);
    this.session.recordCoalescing();
  }

  // ─── Styling ────────────────────────────────────────────────────────────────

  private selectedElement(action: string): TextElement | null {
    const { store, selection } = this.session;
    const id = selection.selectedElementId;
    if (id === null) {
      log.debug(`${action}: nothing selected`);
      return null;
    }
    const el = store.findById(id);
    if (!el) {
      log.debug(`${action}: selected element ${id} not found`);
      return null;
    }
    return el;
  }

  private applyStyle(el: TextElement, style: TextStyle): void {
    this.session.store.setStyle(el.id, style);
    this.session.recordForced();
  }

  private toggle(flag: StyleFlag): void {
    const el = this.selectedElement(`toggle ${flag}`);
    if (el) this.applyStyle(el, toggleStyleFlag(styleOf(el), flag));
  }

  private changeFontFamily(name: string): void {
    const el = this.selectedElement("changeFontFamily");
    if (!el) return;
    const next = withFontFamily(styleOf(el), name, this.session.config.fontFamilies);
    if (!next) {
      log.debug(`changeFontFamily: "${name}" is not an allowed font`);
      return;
    }
    this.applyStyle(el, next);
  }

  private changeFontSize(delta: number): void {
    const el = this.selectedElement("changeFontSize");
    if (el) this.applyStyle(el, resizeFont(styleOf(el), delta, this.session.config.fontSizeBounds));
  }
}
