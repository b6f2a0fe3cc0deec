import { useRef, useCallback, useMemo, memo } from "react";
import type { EditorConfig } from "../canvas/config";
import { clientToCanvas, createCanvasMeasurer, displayText } from "../canvas/geometry";
import { frameCss, getBackgroundColor, getInkColor, textCss } from "../canvas/rendering";
import type { EditSession, EditorView, Gesture, Point, TextElement } from "../canvas/types";
import type { Theme } from "../hooks/useSettings";

// Pointer travel (px) before a press on an element becomes a drag
const DRAG_THRESHOLD = 3;

type Props = {
  view: EditorView;
  config: EditorConfig;
  theme: Theme;
  dispatch: (gesture: Gesture) => void;
};

type PressState = {
  id: number;
  start: Point;
  last: Point;
  dragging: boolean;
};

function Canvas({ view, config, theme, dispatch }: Props) {
  const containerRef = useRef<HTMLDivElement>(null);
  const pressRef = useRef<PressState | null>(null);
  const measure = useMemo(createCanvasMeasurer, []);
  const ink = getInkColor(theme);

  const toCanvas = useCallback((e: { clientX: number; clientY: number }): Point => {
    const rect = containerRef.current?.getBoundingClientRect() ?? { left: 0, top: 0 };
    return clientToCanvas(e.clientX, e.clientY, rect);
  }, []);

  // ─── Background ─────────────────────────────────────────────────────────────

  const onBackgroundPointerDown = useCallback(
    (e: React.PointerEvent<HTMLDivElement>) => {
      if (e.target !== e.currentTarget) return;
      dispatch({ type: "tapBackground", point: toCanvas(e) });
    },
    [dispatch, toCanvas],
  );

  // ─── Element press / drag ───────────────────────────────────────────────────

  const onElementPointerDown = useCallback(
    (e: React.PointerEvent<HTMLDivElement>, id: number) => {
      e.stopPropagation();
      e.currentTarget.setPointerCapture(e.pointerId);
      const p = toCanvas(e);
      pressRef.current = { id, start: p, last: p, dragging: false };
    },
    [toCanvas],
  );

  const onElementPointerMove = useCallback(
    (e: React.PointerEvent<HTMLDivElement>) => {
      const press = pressRef.current;
      if (!press) return;
      const p = toCanvas(e);
      if (!press.dragging) {
        if (Math.hypot(p.x - press.start.x, p.y - press.start.y) < DRAG_THRESHOLD) return;
        press.dragging = true;
        dispatch({ type: "dragStart", id: press.id });
      }
      dispatch({ type: "dragMove", id: press.id, delta: { x: p.x - press.last.x, y: p.y - press.last.y } });
      press.last = p;
    },
    [dispatch, toCanvas],
  );

  const onElementPointerUp = useCallback(
    (e: React.PointerEvent<HTMLDivElement>) => {
      const press = pressRef.current;
      pressRef.current = null;
      if (!press) return;
      e.stopPropagation();
      if (press.dragging) dispatch({ type: "dragEnd", id: press.id });
      else dispatch({ type: "tapElement", id: press.id });
    },
    [dispatch],
  );

  // ─── Rendering ──────────────────────────────────────────────────────────────

  const renderEditing = (el: Readonly<TextElement>, session: Readonly<EditSession>) => {
    const extent = measure(displayText(session.bufferText, config.placeholderText), el);
    return (
      <div
        key={el.id}
        style={frameCss(el.position.x, el.position.y, config.hitPadding, "editing")}
        onPointerDown={(e) => e.stopPropagation()}
      >
        <textarea
          autoFocus
          value={session.bufferText}
          placeholder={config.placeholderText}
          spellCheck={false}
          onChange={(e) => dispatch({ type: "textBufferChanged", text: e.target.value })}
          className="block resize-none overflow-hidden bg-transparent p-0 outline-none"
          style={{
            ...textCss(el, ink),
            width: `${Math.ceil(extent.width) + 4}px`,
            height: `${Math.ceil(extent.height)}px`,
          }}
        />
      </div>
    );
  };

  const renderElement = (el: Readonly<TextElement>) => {
    const session = view.editSession;
    if (session?.elementId === el.id) return renderEditing(el, session);
    const state = el.id === view.selectedElementId ? "selected" : "idle";
    return (
      <div
        key={el.id}
        className="select-none touch-none"
        style={frameCss(el.position.x, el.position.y, config.hitPadding, state)}
        onPointerDown={(e) => onElementPointerDown(e, el.id)}
        onPointerMove={onElementPointerMove}
        onPointerUp={onElementPointerUp}
        onPointerCancel={() => (pressRef.current = null)}
      >
        <span style={textCss(el, ink)}>{displayText(el.text, config.placeholderText)}</span>
      </div>
    );
  };

  return (
    <div
      ref={containerRef}
      role="application"
      aria-label="Text canvas"
      className="relative h-full w-full overflow-hidden touch-none"
      style={{ background: getBackgroundColor(theme) }}
      onPointerDown={onBackgroundPointerDown}
      onContextMenu={(e) => e.preventDefault()}
    >
      {view.elements.map(renderElement)}
    </div>
  );
}

export default memo(Canvas);
