import type { ReactNode } from "react";
import type { EditorConfig } from "../canvas/config";
import type { EditorView, Gesture } from "../canvas/types";

type Props = {
  view: EditorView;
  config: EditorConfig;
  isDark: boolean;
  dispatch: (gesture: Gesture) => void;
};

export default function Toolbar({ view, config, isDark, dispatch }: Props) {
  const el = view.selectedElement;
  const noSelection = el === null;

  const button = (
    label: string,
    content: ReactNode,
    gesture: Gesture,
    opts: { disabled?: boolean; pressed?: boolean } = {},
  ) => (
    <button
      key={label}
      aria-label={label}
      title={label}
      aria-pressed={opts.pressed}
      disabled={opts.disabled}
      // Keep focus in the text field while editing
      onMouseDown={(e) => e.preventDefault()}
      onClick={() => dispatch(gesture)}
      className={`min-w-8 h-8 px-2 flex items-center justify-center rounded text-sm transition-colors disabled:opacity-30 disabled:pointer-events-none ${
        opts.pressed
          ? isDark
            ? "bg-white/20 text-white"
            : "bg-black/20 text-black"
          : isDark
            ? "text-white/70 hover:bg-white/10 hover:text-white"
            : "text-black/70 hover:bg-black/10 hover:text-black"
      }`}
    >
      {content}
    </button>
  );

  const divider = <div className={`w-px h-5 mx-1 ${isDark ? "bg-white/15" : "bg-black/15"}`} />;

  return (
    <nav aria-label="Text tools" className="fixed bottom-4 left-0 right-0 z-50 flex items-center justify-center px-1">
      <div
        className="flex items-center gap-0.5 p-1 rounded-lg border backdrop-blur-sm"
        style={{
          background: isDark ? "rgba(0,0,0,0.7)" : "rgba(255,255,255,0.7)",
          borderColor: isDark ? "rgba(255,255,255,0.15)" : "rgba(0,0,0,0.15)",
        }}
      >
        {button("Add text", "T+", { type: "addText" })}
        {divider}
        <select
          aria-label="Font"
          disabled={noSelection}
          value={el?.fontFamily ?? config.fontFamilies[0]}
          onChange={(e) => dispatch({ type: "changeFontFamily", name: e.target.value })}
          className={`h-8 px-1 rounded text-sm bg-transparent outline-none disabled:opacity-30 ${isDark ? "text-white/80" : "text-black/80"}`}
        >
          {config.fontFamilies.map((family) => (
            <option key={family} value={family} className="text-black">
              {family}
            </option>
          ))}
        </select>
        {button("Smaller", "−", { type: "changeFontSize", delta: -config.fontSizeStep }, { disabled: noSelection })}
        <span className={`w-8 text-center text-sm tabular-nums ${isDark ? "text-white/60" : "text-black/60"}`}>
          {el?.fontSize ?? config.defaultElement.fontSize}
        </span>
        {button("Bigger", "+", { type: "changeFontSize", delta: config.fontSizeStep }, { disabled: noSelection })}
        {divider}
        {button("Bold", <b>B</b>, { type: "toggleBold" }, { disabled: noSelection, pressed: el?.bold })}
        {button("Italic", <i>I</i>, { type: "toggleItalic" }, { disabled: noSelection, pressed: el?.italic })}
        {button("Underline", <u>U</u>, { type: "toggleUnderline" }, { disabled: noSelection, pressed: el?.underline })}
        {divider}
        {button("Undo", "↶", { type: "undo" }, { disabled: !view.canUndo })}
        {button("Redo", "↷", { type: "redo" }, { disabled: !view.canRedo })}
      </div>
    </nav>
  );
}
