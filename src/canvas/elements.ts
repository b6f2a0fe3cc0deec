import type { ElementDefaults } from "./config";
import type { Point, TextElement, TextStyle } from "./types";

export function cloneElement(el: Readonly<TextElement>): TextElement {
  return { ...el, position: { ...el.position } };
}

/**
 * Owns the canvas's text elements in insertion order, which is also paint
 * order (back to front). Ids come from a counter that only moves forward.
 */
export class ElementStore implements Iterable<TextElement> {
  private elements: TextElement[] = [];
  private counter = 0;

  constructor(private readonly defaults: ElementDefaults) {}

  get nextId(): number {
    return this.counter;
  }

  get size(): number {
    return this.elements.length;
  }

  create(): TextElement {
    const d = this.defaults;
    const el: TextElement = {
      id: this.counter++,
      text: d.text,
      position: { ...d.position },
      fontFamily: d.fontFamily,
      fontSize: d.fontSize,
      bold: false,
      italic: false,
      underline: false,
    };
    this.elements.push(el);
    return el;
  }

  findById(id: number): TextElement | undefined {
    return this.elements.find((el) => el.id === id);
  }

  has(id: number): boolean {
    return this.findById(id) !== undefined;
  }

  moveBy(id: number, delta: Point): boolean {
    const el = this.findById(id);
    if (!el) return false;
    el.position = { x: el.position.x + delta.x, y: el.position.y + delta.y };
    return true;
  }

  setText(id: number, text: string): boolean {
    const el = this.findById(id);
    if (!el) return false;
    el.text = text;
    return true;
  }

  setStyle(id: number, style: TextStyle): boolean {
    const el = this.findById(id);
    if (!el) return false;
    el.fontFamily = style.fontFamily;
    el.fontSize = style.fontSize;
    el.bold = style.bold;
    el.italic = style.italic;
    el.underline = style.underline;
    return true;
  }

  /** Swap in copies of `elements`. The id counter is left alone so ids are never handed out twice. */
  replaceAll(elements: Iterable<Readonly<TextElement>>): void {
    this.elements = Array.from(elements, cloneElement);
    for (const el of this.elements) {
      if (el.id >= this.counter) this.counter = el.id + 1;
    }
  }

  all(): readonly TextElement[] {
    return this.elements;
  }

  [Symbol.iterator](): Iterator<TextElement> {
    return this.elements[Symbol.iterator]();
  }
}
