import { describe, it, expect } from "vitest";
import { resolveShortcut } from "../src/hooks/useKeyboardShortcuts";
import type { ShortcutKey } from "../src/hooks/useKeyboardShortcuts";

function key(k: string, mods: Partial<Omit<ShortcutKey, "key">> = {}): ShortcutKey {
  return { key: k, metaKey: false, ctrlKey: false, shiftKey: false, altKey: false, ...mods };
}

const idle = { editing: false, fontSizeStep: 2 };
const editing = { editing: true, fontSizeStep: 2 };

describe("resolveShortcut", () => {
  it("maps undo and redo", () => {
    expect(resolveShortcut(key("z", { metaKey: true }), idle)).toEqual({ type: "undo" });
    expect(resolveShortcut(key("Z", { metaKey: true, shiftKey: true }), idle)).toEqual({ type: "redo" });
    expect(resolveShortcut(key("y", { ctrlKey: true }), idle)).toEqual({ type: "redo" });
  });

  it("maps style toggles", () => {
    expect(resolveShortcut(key("b", { ctrlKey: true }), editing)).toEqual({ type: "toggleBold" });
    expect(resolveShortcut(key("i", { ctrlKey: true }), editing)).toEqual({ type: "toggleItalic" });
    expect(resolveShortcut(key("u", { ctrlKey: true }), editing)).toEqual({ type: "toggleUnderline" });
  });

  it("resizes by the configured step", () => {
    expect(resolveShortcut(key("=", { metaKey: true }), { editing: false, fontSizeStep: 4 })).toEqual({
      type: "changeFontSize",
      delta: 4,
    });
    expect(resolveShortcut(key("-", { metaKey: true }), idle)).toEqual({ type: "changeFontSize", delta: -2 });
  });

  it("submits and cancels only while editing", () => {
    expect(resolveShortcut(key("Enter", { metaKey: true }), editing)).toEqual({ type: "textSubmitted" });
    expect(resolveShortcut(key("Enter", { metaKey: true }), idle)).toBeNull();
    expect(resolveShortcut(key("Escape"), editing)).toEqual({ type: "cancelEdit" });
    expect(resolveShortcut(key("Escape"), idle)).toBeNull();
  });

  it("adds text with T only outside an edit", () => {
    expect(resolveShortcut(key("t"), idle)).toEqual({ type: "addText" });
    expect(resolveShortcut(key("t"), editing)).toBeNull();
    expect(resolveShortcut(key("T", { shiftKey: true }), idle)).toBeNull();
  });

  it("ignores alt chords and plain letters", () => {
    expect(resolveShortcut(key("z", { metaKey: true, altKey: true }), idle)).toBeNull();
    expect(resolveShortcut(key("b"), idle)).toBeNull();
  });
});
