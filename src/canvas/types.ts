// ─── Core types ───────────────────────────────────────────────────────────────

export type Point = { x: number; y: number };

export type TextElement = {
  id: number;
  text: string;
  position: Point;
  fontFamily: string;
  fontSize: number;
  bold: boolean;
  italic: boolean;
  underline: boolean;
};

export type TextStyle = Pick<TextElement, "fontFamily" | "fontSize" | "bold" | "italic" | "underline">;

export type StyleFlag = "bold" | "italic" | "underline";

export type BBox = { x: number; y: number; w: number; h: number };

export type TextExtent = { width: number; height: number };

/** Supplied by whatever renders the text; must be synchronous and side-effect free. */
export type TextMeasurer = (text: string, style: TextStyle) => TextExtent;

export type DocumentSnapshot = {
  readonly elements: readonly Readonly<TextElement>[];
  readonly selectedElementId: number | null;
};

export type EditSession = {
  elementId: number;
  bufferText: string;
};

// ─── Gestures ─────────────────────────────────────────────────────────────────

export type Gesture =
  | { type: "tap"; point: Point }
  | { type: "tapBackground"; point: Point }
  | { type: "tapElement"; id: number }
  | { type: "dragStart"; id: number }
  | { type: "dragMove"; id: number; delta: Point }
  | { type: "dragEnd"; id: number }
  | { type: "textBufferChanged"; text: string }
  | { type: "textSubmitted" }
  | { type: "cancelEdit" }
  | { type: "toggleBold" }
  | { type: "toggleItalic" }
  | { type: "toggleUnderline" }
  | { type: "changeFontFamily"; name: string }
  | { type: "changeFontSize"; delta: number }
  | { type: "addText" }
  | { type: "undo" }
  | { type: "redo" };

export type GestureType = Gesture["type"];

// ─── Render view ──────────────────────────────────────────────────────────────

export type EditorView = {
  readonly elements: readonly Readonly<TextElement>[];
  readonly selectedElementId: number | null;
  readonly selectedElement: Readonly<TextElement> | null;
  readonly editSession: Readonly<EditSession> | null;
  readonly canUndo: boolean;
  readonly canRedo: boolean;
};

export type EditorEvent =
  | { type: "change"; view: EditorView }
  | { type: "edit-begin"; elementId: number; text: string }
  | { type: "edit-commit"; elementId: number; text: string }
  | { type: "edit-discard"; elementId: number };

export type TextHistoryMode = "commit" | "keystroke";
