import type { CSSProperties } from "react";
import type { Theme } from "../hooks/useSettings";
import { getFontCss, LINE_HEIGHT } from "./geometry";
import type { TextStyle } from "./types";

// ─── Theme helpers ────────────────────────────────────────────────────────────

export function isDarkTheme(theme: Theme): boolean {
  return theme === "dark" || theme === "midnight";
}

export function getBackgroundColor(theme: Theme): string {
  if (theme === "midnight") return "#1a1a2e";
  if (theme === "dark") return "#06060e";
  if (theme === "journal") return "#f5e2b8";
  return "#e5e7eb";
}

export function getInkColor(theme: Theme): string {
  return isDarkTheme(theme) ? "#f5f5f0" : "#111111";
}

// ─── Element styles ───────────────────────────────────────────────────────────

/** CSS for an element's text, shared by the display span and the edit textarea. */
export function textCss(style: TextStyle, color: string): CSSProperties {
  return {
    fontFamily: getFontCss(style.fontFamily),
    fontSize: `${style.fontSize}px`,
    lineHeight: LINE_HEIGHT,
    fontWeight: style.bold ? 700 : 400,
    fontStyle: style.italic ? "italic" : "normal",
    textDecoration: style.underline ? "underline" : "none",
    color,
    whiteSpace: "pre",
  };
}

/** Frame drawn around an element; `padding` keeps the text where hit-testing expects it. */
export function frameCss(
  x: number,
  y: number,
  padding: number,
  state: "idle" | "selected" | "editing",
): CSSProperties {
  const border = Math.min(2, padding);
  return {
    position: "absolute",
    left: `${x - padding}px`,
    top: `${y - padding}px`,
    padding: `${padding - border}px`,
    border: `${border}px solid ${state === "idle" ? "transparent" : "#3b82f6"}`,
    cursor: state === "idle" ? "grab" : "text",
  };
}
