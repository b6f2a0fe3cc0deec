import type { FontSizeBounds } from "./config";
import type { StyleFlag, TextElement, TextStyle } from "./types";

// Pure style transforms. Each returns a fresh TextStyle; nothing is shared
// between the input and the output, or between elements.

export function styleOf(el: Readonly<TextElement>): TextStyle {
  return {
    fontFamily: el.fontFamily,
    fontSize: el.fontSize,
    bold: el.bold,
    italic: el.italic,
    underline: el.underline,
  };
}

export function toggleStyleFlag(style: TextStyle, flag: StyleFlag): TextStyle {
  const next = { ...style };
  next[flag] = !style[flag];
  return next;
}

export function clampFontSize(size: number, bounds: FontSizeBounds): number {
  if (Number.isNaN(size)) return bounds.min;
  return Math.min(bounds.max, Math.max(bounds.min, size));
}

export function resizeFont(style: TextStyle, delta: number, bounds: FontSizeBounds): TextStyle {
  return { ...style, fontSize: clampFontSize(style.fontSize + delta, bounds) };
}

/** `null` when `family` is not one of the allowed families. */
export function withFontFamily(
  style: TextStyle,
  family: string,
  allowed: readonly string[],
): TextStyle | null {
  if (!allowed.includes(family)) return null;
  return { ...style, fontFamily: family };
}
