import { resolveEditorConfig } from "./config";
import type { EditorConfig } from "./config";
import { ElementStore } from "./elements";
import { createSnapshot, EMPTY_SNAPSHOT, HistoryManager } from "./history";
import { SelectionController } from "./selection";
import type {
  DocumentSnapshot,
  EditorEvent,
  EditorView,
  TextElement,
  TextHistoryMode,
  TextMeasurer,
} from "./types";

export type EditorListener = (event: EditorEvent) => void;

export type EditorSessionOptions = {
  measure: TextMeasurer;
  config?: Partial<EditorConfig>;
};

/**
 * One open document: element store, selection/edit controller and history,
 * wired together. The dispatcher drives it; views read `getView()` and
 * `subscribe()` for changes.
 */
export class EditorSession {
  readonly config: EditorConfig;
  readonly measure: TextMeasurer;
  readonly store: ElementStore;
  readonly selection: SelectionController;
  readonly history: HistoryManager;

  private listeners = new Set<EditorListener>();
  private view: EditorView | null = null;

  constructor(options: EditorSessionOptions) {
    this.config = resolveEditorConfig(options.config);
    this.measure = options.measure;
    this.store = new ElementStore(this.config.defaultElement);
    this.selection = new SelectionController(this.store, {
      onEditBegin: (elementId, text) => this.emit({ type: "edit-begin", elementId, text }),
      onEditCommit: (elementId, text) => this.emit({ type: "edit-commit", elementId, text }),
      onEditDiscard: (elementId) => this.emit({ type: "edit-discard", elementId }),
    });
    this.history = new HistoryManager(EMPTY_SNAPSHOT, {
      capacity: this.config.historyCapacity,
      isEditing: () => this.selection.isEditing(),
      restore: (snapshot) => this.restore(snapshot),
    });
  }

  // ─── Snapshots ──────────────────────────────────────────────────────────────

  /**
   * Under the "keystroke" policy the element being edited is captured with
   * its live buffer, so each buffer change is its own undo step.
   */
  snapshot = (): DocumentSnapshot => {
    const session = this.selection.editSession;
    if (this.config.textHistory === "keystroke" && session) {
      const live = this.store.all().map((el): Readonly<TextElement> =>
        el.id === session.elementId ? { ...el, text: session.bufferText } : el,
      );
      return createSnapshot(live, this.selection.selectedElementId);
    }
    return createSnapshot(this.store, this.selection.selectedElementId);
  };

  restore(snapshot: DocumentSnapshot): void {
    this.store.replaceAll(snapshot.elements);
    this.selection.restoreSelection(snapshot.selectedElementId);
    this.selection.syncAfterRestore();
  }

  /** Takes effect from the next record; existing history entries are kept. */
  setTextHistory(mode: TextHistoryMode): void {
    this.config.textHistory = mode;
  }

  recordCoalescing(): boolean {
    return this.history.recordCoalescing(this.snapshot);
  }

  recordForced(): boolean {
    return this.history.recordForced(this.snapshot);
  }

  undo(): boolean {
    return this.history.undo();
  }

  redo(): boolean {
    return this.history.redo();
  }

  // ─── View & subscriptions ───────────────────────────────────────────────────

  getView = (): EditorView => {
    if (!this.view) this.view = this.buildView();
    return this.view;
  };

  subscribe = (listener: EditorListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  /** Drop the cached view and tell subscribers the document may have changed. */
  notify(): void {
    this.view = null;
    this.emit({ type: "change", view: this.getView() });
  }

  private emit(event: EditorEvent): void {
    for (const listener of [...this.listeners]) listener(event);
  }

  private buildView(): EditorView {
    const elements = createSnapshot(this.store, null).elements;
    const selectedElementId = this.selection.selectedElementId;
    const session = this.selection.editSession;
    return Object.freeze({
      elements,
      selectedElementId,
      selectedElement: elements.find((el) => el.id === selectedElementId) ?? null,
      editSession: session ? Object.freeze({ ...session }) : null,
      canUndo: this.history.canUndo,
      canRedo: this.history.canRedo,
    });
  }
}
