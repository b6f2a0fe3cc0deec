import { cloneElement } from "./elements";
import type { DocumentSnapshot, TextElement } from "./types";

// ─── Snapshots ────────────────────────────────────────────────────────────────

export function createSnapshot(
  elements: Iterable<Readonly<TextElement>>,
  selectedElementId: number | null,
): DocumentSnapshot {
  const copies = Array.from(elements, (el) => {
    const copy = cloneElement(el);
    Object.freeze(copy.position);
    return Object.freeze(copy);
  });
  return Object.freeze({ elements: Object.freeze(copies), selectedElementId });
}

export const EMPTY_SNAPSHOT: DocumentSnapshot = createSnapshot([], null);

export function elementsEqual(a: Readonly<TextElement>, b: Readonly<TextElement>): boolean {
  return (
    a.id === b.id &&
    a.text === b.text &&
    a.position.x === b.position.x &&
    a.position.y === b.position.y &&
    a.fontFamily === b.fontFamily &&
    a.fontSize === b.fontSize &&
    a.bold === b.bold &&
    a.italic === b.italic &&
    a.underline === b.underline
  );
}

export function snapshotsEqual(a: DocumentSnapshot, b: DocumentSnapshot): boolean {
  if (a === b) return true;
  if (a.selectedElementId !== b.selectedElementId) return false;
  if (a.elements.length !== b.elements.length) return false;
  return a.elements.every((el, i) => elementsEqual(el, b.elements[i]));
}

// ─── History manager ──────────────────────────────────────────────────────────

export type HistoryOptions = {
  capacity: number;
  /** While true, coalescing records always push. */
  isEditing: () => boolean;
  /** Applies a snapshot to the live document. */
  restore: (snapshot: DocumentSnapshot) => void;
};

/**
 * Undo/redo over whole-document snapshots. The top of the undo stack is the
 * current state; the bottom entry is the floor that undo never passes.
 */
export class HistoryManager {
  private undoStack: DocumentSnapshot[];
  private redoStack: DocumentSnapshot[] = [];

  constructor(initial: DocumentSnapshot, private readonly options: HistoryOptions) {
    this.undoStack = [initial];
  }

  get current(): DocumentSnapshot {
    return this.undoStack[this.undoStack.length - 1];
  }

  get undoDepth(): number {
    return this.undoStack.length;
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  get canUndo(): boolean {
    return this.undoStack.length > 1;
  }

  get canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /** Returns true if the snapshot was pushed, false if it matched the current state. */
  recordCoalescing(take: () => DocumentSnapshot): boolean {
    const candidate = take();
    if (!this.options.isEditing() && snapshotsEqual(candidate, this.current)) {
      return false;
    }
    this.push(candidate);
    return true;
  }

  recordForced(take: () => DocumentSnapshot): boolean {
    this.push(take());
    return true;
  }

  undo(): boolean {
    if (this.undoStack.length <= 1) return false;
    const top = this.undoStack.pop();
    if (top) this.redoStack.push(top);
    this.options.restore(this.current);
    return true;
  }

  redo(): boolean {
    const next = this.redoStack.pop();
    if (!next) return false;
    this.undoStack.push(next);
    this.options.restore(next);
    return true;
  }

  reset(initial: DocumentSnapshot): void {
    this.undoStack = [initial];
    this.redoStack = [];
  }

  private push(snapshot: DocumentSnapshot): void {
    this.undoStack.push(snapshot);
    this.redoStack = [];
    const overflow = this.undoStack.length - this.options.capacity;
    if (overflow > 0) this.undoStack.splice(0, overflow);
  }
}
