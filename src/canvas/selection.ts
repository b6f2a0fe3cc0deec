import type { ElementStore } from "./elements";
import { log } from "./logger";
import type { EditSession } from "./types";

export type EditSignals = {
  onEditBegin(elementId: number, text: string): void;
  onEditCommit(elementId: number, text: string): void;
  onEditDiscard(elementId: number): void;
};

/**
 * Selection and the (at most one) text-edit session. The session keeps its
 * own buffer; the element's committed text changes only on commit.
 */
export class SelectionController {
  private selected: number | null = null;
  private session: EditSession | null = null;

  constructor(
    private readonly store: ElementStore,
    private readonly signals: EditSignals,
  ) {}

  get selectedElementId(): number | null {
    return this.selected;
  }

  get editSession(): Readonly<EditSession> | null {
    return this.session;
  }

  isEditing(id?: number): boolean {
    if (!this.session) return false;
    return id === undefined || this.session.elementId === id;
  }

  select(id: number): void {
    this.selected = id;
  }

  /** Deselecting ends any edit session by committing it. */
  deselect(): void {
    this.commitEdit();
    this.selected = null;
  }

  beginEdit(id: number): boolean {
    const el = this.store.findById(id);
    if (!el) {
      log.debug(`beginEdit: element ${id} not found`);
      return false;
    }
    if (this.session?.elementId === id) {
      this.selected = id;
      return true;
    }
    this.commitEdit();
    this.session = { elementId: id, bufferText: el.text };
    this.selected = id;
    this.signals.onEditBegin(id, el.text);
    return true;
  }

  updateBuffer(text: string): boolean {
    if (!this.session) return false;
    this.session.bufferText = text;
    return true;
  }

  commitEdit(): boolean {
    const session = this.session;
    if (!session) return false;
    this.session = null;
    if (!this.store.setText(session.elementId, session.bufferText)) {
      log.debug(`commitEdit: element ${session.elementId} is gone, discarding buffer`);
      this.signals.onEditDiscard(session.elementId);
      return false;
    }
    this.signals.onEditCommit(session.elementId, session.bufferText);
    return true;
  }

  cancelEdit(): boolean {
    const session = this.session;
    if (!session) return false;
    this.session = null;
    this.signals.onEditDiscard(session.elementId);
    return true;
  }

  /** Selection as stored in a snapshot; the session is reconciled separately. */
  restoreSelection(id: number | null): void {
    this.selected = id;
  }

  /** Refresh the buffer from the restored element, or drop the session if the element no longer exists. */
  syncAfterRestore(): void {
    const session = this.session;
    if (!session) return;
    const el = this.store.findById(session.elementId);
    if (el) {
      session.bufferText = el.text;
      return;
    }
    log.debug(`restore removed element ${session.elementId}, ending its edit session`);
    this.session = null;
    this.signals.onEditDiscard(session.elementId);
  }
}
