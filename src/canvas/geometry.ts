import type { BBox, Point, TextElement, TextExtent, TextMeasurer, TextStyle } from "./types";

// ─── Coordinate utilities ─────────────────────────────────────────────────────

export function clientToCanvas(
  clientX: number,
  clientY: number,
  rect: { left: number; top: number },
): Point {
  return { x: clientX - rect.left, y: clientY - rect.top };
}

// ─── Font utilities ───────────────────────────────────────────────────────────

export const LINE_HEIGHT = 1.2;

export function getFontCss(family: string): string {
  return `'${family}', system-ui, sans-serif`;
}

export function buildFont(style: TextStyle): string {
  const italic = style.italic ? "italic " : "";
  const weight = style.bold ? "700 " : "400 ";
  return `${italic}${weight}${style.fontSize}px ${getFontCss(style.fontFamily)}`;
}

export function displayText(text: string, placeholder: string): string {
  return text === "" ? placeholder : text;
}

// ─── Text measurement ─────────────────────────────────────────────────────────

/** Monospace estimate used where no canvas is available. */
export const approximateMeasure: TextMeasurer = (text, style) => {
  const lines = text.split("\n");
  const widest = Math.max(...lines.map((l) => l.length));
  return {
    width: widest * style.fontSize * 0.6,
    height: style.fontSize * LINE_HEIGHT * lines.length,
  };
};

let _measureCtx: CanvasRenderingContext2D | null | undefined;
function getMeasureCtx(): CanvasRenderingContext2D | null {
  if (_measureCtx === undefined) {
    _measureCtx = typeof document === "undefined"
      ? null
      : document.createElement("canvas").getContext("2d");
  }
  return _measureCtx;
}

export function createCanvasMeasurer(): TextMeasurer {
  return (text, style): TextExtent => {
    const ctx = getMeasureCtx();
    if (!ctx) return approximateMeasure(text, style);
    ctx.font = buildFont(style);
    const lines = text.split("\n");
    return {
      width: Math.max(...lines.map((l) => ctx.measureText(l).width)),
      height: style.fontSize * LINE_HEIGHT * lines.length,
    };
  };
}

// ─── Bounding boxes & hit testing ─────────────────────────────────────────────

export function textBBox(el: Readonly<TextElement>, text: string, measure: TextMeasurer): BBox {
  const { width, height } = measure(text, el);
  return { x: el.position.x, y: el.position.y, w: width, h: height };
}

export function expandBBox(bb: BBox, pad: number): BBox {
  return { x: bb.x - pad, y: bb.y - pad, w: bb.w + pad * 2, h: bb.h + pad * 2 };
}

/** Edges count as inside. */
export function pointInBBox(p: Point, bb: BBox): boolean {
  return p.x >= bb.x && p.x <= bb.x + bb.w && p.y >= bb.y && p.y <= bb.y + bb.h;
}

export function hitRegion(
  el: Readonly<TextElement>,
  text: string,
  measure: TextMeasurer,
  padding: number,
): BBox {
  return expandBBox(textBBox(el, text, measure), padding);
}

export type HitTestOptions = {
  measure: TextMeasurer;
  padding: number;
  placeholder: string;
  /** Text to measure for an element; defaults to its committed text. */
  textFor?: (el: Readonly<TextElement>) => string;
};

/** Topmost element whose hit region contains `p`, or null. Later elements paint on top. */
export function elementAt(
  p: Point,
  elements: readonly Readonly<TextElement>[],
  opts: HitTestOptions,
): number | null {
  for (let i = elements.length - 1; i >= 0; i--) {
    const el = elements[i];
    const text = displayText(opts.textFor?.(el) ?? el.text, opts.placeholder);
    if (pointInBBox(p, hitRegion(el, text, opts.measure, opts.padding))) return el.id;
  }
  return null;
}
