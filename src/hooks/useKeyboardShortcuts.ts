import { useEffect, useRef } from "react";
import type { Gesture } from "../canvas/types";

// ─── Platform ─────────────────────────────────────────────────────────────────

export function isMacPlatform(): boolean {
  return typeof navigator !== "undefined" && navigator.platform.toUpperCase().includes("MAC");
}

export function cmdKey(e: { metaKey: boolean; ctrlKey: boolean }) {
  return e.metaKey || e.ctrlKey;
}

// ─── Key mapping ──────────────────────────────────────────────────────────────

export type ShortcutKey = {
  key: string;
  metaKey: boolean;
  ctrlKey: boolean;
  shiftKey: boolean;
  altKey: boolean;
};

export type ShortcutContext = {
  editing: boolean;
  fontSizeStep: number;
};

export function resolveShortcut(e: ShortcutKey, ctx: ShortcutContext): Gesture | null {
  const key = e.key.toLowerCase();

  if (cmdKey(e) && !e.altKey) {
    switch (key) {
      case "z":
        return e.shiftKey ? { type: "redo" } : { type: "undo" };
      case "y":
        return { type: "redo" };
      case "b":
        return { type: "toggleBold" };
      case "i":
        return { type: "toggleItalic" };
      case "u":
        return { type: "toggleUnderline" };
      case "=":
      case "+":
        return { type: "changeFontSize", delta: ctx.fontSizeStep };
      case "-":
      case "_":
        return { type: "changeFontSize", delta: -ctx.fontSizeStep };
      case "enter":
        return ctx.editing ? { type: "textSubmitted" } : null;
    }
    return null;
  }

  if (key === "escape") return ctx.editing ? { type: "cancelEdit" } : null;
  // Plain letters belong to the text field while editing
  if (!ctx.editing && key === "t" && !e.shiftKey && !e.altKey) return { type: "addText" };
  return null;
}

// ─── Hook ─────────────────────────────────────────────────────────────────────

export function useKeyboardShortcuts(
  dispatch: (gesture: Gesture) => void,
  ctx: ShortcutContext,
) {
  const ctxRef = useRef(ctx);
  ctxRef.current = ctx;

  useEffect(() => {
    const onKeyDown = (e: KeyboardEvent) => {
      if (e.isComposing) return;
      const target = e.target;
      // Letters typed into the toolbar's controls are not shortcuts
      if (!ctxRef.current.editing && !cmdKey(e) && target instanceof HTMLSelectElement) return;
      const gesture = resolveShortcut(e, ctxRef.current);
      if (!gesture) return;
      e.preventDefault();
      dispatch(gesture);
    };
    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [dispatch]);
}
