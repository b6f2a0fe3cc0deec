import { describe, it, expect, vi } from "vitest";
import { approximateMeasure } from "../src/canvas/geometry";
import { EditorSession } from "../src/canvas/session";

function makeSession() {
  return new EditorSession({ measure: approximateMeasure });
}

describe("EditorSession", () => {
  it("starts empty with the default config", () => {
    const session = makeSession();
    const view = session.getView();

    expect(view.elements).toEqual([]);
    expect(view.selectedElementId).toBeNull();
    expect(view.selectedElement).toBeNull();
    expect(view.editSession).toBeNull();
    expect(view.canUndo).toBe(false);
    expect(view.canRedo).toBe(false);
    expect(session.config.historyCapacity).toBe(50);
  });

  it("returns the same view until notified", () => {
    const session = makeSession();
    const first = session.getView();

    expect(session.getView()).toBe(first);
    session.store.create();
    expect(session.getView()).toBe(first);

    session.notify();
    expect(session.getView()).not.toBe(first);
    expect(session.getView().elements).toHaveLength(1);
  });

  it("hands out frozen copies in the view", () => {
    const session = makeSession();
    const el = session.store.create();
    session.selection.beginEdit(el.id);
    session.notify();
    const view = session.getView();

    el.text = "mutated";

    expect(Object.isFrozen(view)).toBe(true);
    expect(view.elements[0].text).toBe("Tap to Edit");
    expect(view.selectedElement?.id).toBe(0);
    expect(view.editSession).toEqual({ elementId: 0, bufferText: "Tap to Edit" });
  });

  it("notifies subscribers until they unsubscribe", () => {
    const session = makeSession();
    const listener = vi.fn();
    const unsubscribe = session.subscribe(listener);

    session.notify();
    unsubscribe();
    session.notify();

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith({ type: "change", view: expect.anything() });
  });

  it("captures committed text in snapshots under the commit policy", () => {
    const session = makeSession();
    const el = session.store.create();
    session.selection.beginEdit(el.id);
    session.selection.updateBuffer("draft");

    expect(session.snapshot().elements[0].text).toBe("Tap to Edit");
  });

  it("captures the live buffer in snapshots under the keystroke policy", () => {
    const session = makeSession();
    session.setTextHistory("keystroke");
    const el = session.store.create();
    session.selection.beginEdit(el.id);
    session.selection.updateBuffer("draft");

    expect(session.snapshot().elements[0].text).toBe("draft");
    expect(el.text).toBe("Tap to Edit");
  });

  it("does not share config between sessions", () => {
    const a = makeSession();
    const b = makeSession();

    a.setTextHistory("keystroke");

    expect(b.config.textHistory).toBe("commit");
  });

  it("rejects an invalid config", () => {
    expect(() => new EditorSession({ measure: approximateMeasure, config: { historyCapacity: 0 } })).toThrow(
      "Invalid config: historyCapacity must be a positive integer",
    );
  });
});
