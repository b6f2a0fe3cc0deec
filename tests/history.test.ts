import { describe, it, expect, vi } from "vitest";
import { DEFAULT_EDITOR_CONFIG } from "../src/canvas/config";
import { ElementStore } from "../src/canvas/elements";
import {
  EMPTY_SNAPSHOT,
  HistoryManager,
  createSnapshot,
  snapshotsEqual,
} from "../src/canvas/history";
import type { DocumentSnapshot } from "../src/canvas/types";

function setup(capacity = 50) {
  const store = new ElementStore(DEFAULT_EDITOR_CONFIG.defaultElement);
  let selected: number | null = null;
  let editing = false;
  const restore = vi.fn((s: DocumentSnapshot) => {
    store.replaceAll(s.elements);
    selected = s.selectedElementId;
  });
  const history = new HistoryManager(EMPTY_SNAPSHOT, {
    capacity,
    isEditing: () => editing,
    restore,
  });
  const take = () => createSnapshot(store, selected);
  return {
    store,
    history,
    take,
    restore,
    select: (id: number | null) => (selected = id),
    setEditing: (v: boolean) => (editing = v),
  };
}

describe("snapshots", () => {
  it("are frozen copies of the store", () => {
    const store = new ElementStore(DEFAULT_EDITOR_CONFIG.defaultElement);
    const el = store.create();
    const snap = createSnapshot(store, 0);

    el.text = "later";

    expect(snap.elements[0].text).toBe("Tap to Edit");
    expect(Object.isFrozen(snap.elements[0])).toBe(true);
    expect(Object.isFrozen(snap.elements[0].position)).toBe(true);
  });

  it("compare selection as well as elements", () => {
    const store = new ElementStore(DEFAULT_EDITOR_CONFIG.defaultElement);
    store.create();

    expect(snapshotsEqual(createSnapshot(store, 0), createSnapshot(store, 0))).toBe(true);
    expect(snapshotsEqual(createSnapshot(store, 0), createSnapshot(store, null))).toBe(false);
  });

  it("compare every element field", () => {
    const store = new ElementStore(DEFAULT_EDITOR_CONFIG.defaultElement);
    const el = store.create();
    const before = createSnapshot(store, null);
    el.underline = true;

    expect(snapshotsEqual(before, createSnapshot(store, null))).toBe(false);
  });
});

describe("HistoryManager", () => {
  it("starts at the floor", () => {
    const { history } = setup();

    expect(history.undoDepth).toBe(1);
    expect(history.canUndo).toBe(false);
    expect(history.canRedo).toBe(false);
  });

  it("does not undo past the initial state", () => {
    const { history, restore } = setup();

    expect(history.undo()).toBe(false);
    expect(history.current).toBe(EMPTY_SNAPSHOT);
    expect(restore).not.toHaveBeenCalled();
  });

  it("skips a coalescing record that matches the current state", () => {
    const { store, history, take } = setup();
    store.create();

    expect(history.recordCoalescing(take)).toBe(true);
    expect(history.recordCoalescing(take)).toBe(false);
    expect(history.undoDepth).toBe(2);
  });

  it("always pushes while editing", () => {
    const { store, history, take, setEditing } = setup();
    store.create();
    history.recordCoalescing(take);
    setEditing(true);

    expect(history.recordCoalescing(take)).toBe(true);
    expect(history.undoDepth).toBe(3);
  });

  it("always pushes forced records", () => {
    const { history, take } = setup();

    history.recordForced(take);
    history.recordForced(take);

    expect(history.undoDepth).toBe(3);
  });

  it("undoes and redoes through the restore callback", () => {
    const { store, history, take, select } = setup();
    store.create();
    select(0);
    history.recordCoalescing(take);

    expect(history.undo()).toBe(true);
    expect(store.size).toBe(0);
    expect(history.canRedo).toBe(true);

    expect(history.redo()).toBe(true);
    expect(store.size).toBe(1);
    expect(history.current.selectedElementId).toBe(0);
    expect(history.canRedo).toBe(false);
  });

  it("returns false from redo when there is nothing to redo", () => {
    const { history } = setup();

    expect(history.redo()).toBe(false);
  });

  it("clears redo on a new push", () => {
    const { store, history, take } = setup();
    store.create();
    history.recordCoalescing(take);
    history.undo();
    store.create();

    history.recordCoalescing(take);

    expect(history.redoDepth).toBe(0);
  });

  it("keeps redo when a coalescing record is skipped", () => {
    const { store, history, take } = setup();
    store.create();
    history.recordCoalescing(take);
    history.undo();

    expect(history.recordCoalescing(take)).toBe(false);
    expect(history.redoDepth).toBe(1);
  });

  it("evicts the oldest entries past capacity", () => {
    const { store, history, take } = setup(3);
    for (let i = 0; i < 5; i++) {
      store.create();
      history.recordCoalescing(take);
    }

    expect(history.undoDepth).toBe(3);
    history.undo();
    history.undo();
    expect(history.undo()).toBe(false);
    expect(store.size).toBe(3);
  });

  it("resets to a new floor", () => {
    const { store, history, take } = setup();
    store.create();
    history.recordCoalescing(take);
    history.undo();

    const floor = take();
    history.reset(floor);

    expect(history.current).toBe(floor);
    expect(history.undoDepth).toBe(1);
    expect(history.redoDepth).toBe(0);
  });
});
