import { isMacPlatform } from "../hooks/useKeyboardShortcuts";

const mod = isMacPlatform() ? "⌘" : "Ctrl";

const SECTIONS: { title: string; rows: [string, string][] }[] = [
  {
    title: "Text",
    rows: [
      ["Add text", "T"],
      ["Finish editing", `${mod} + Enter`],
      ["Discard edit", "Esc"],
    ],
  },
  {
    title: "Style",
    rows: [
      ["Bold", `${mod} + B`],
      ["Italic", `${mod} + I`],
      ["Underline", `${mod} + U`],
      ["Bigger / smaller", `${mod} + = / ${mod} + -`],
    ],
  },
  {
    title: "History",
    rows: [
      ["Undo", `${mod} + Z`],
      ["Redo", `${mod} + Shift + Z`],
    ],
  },
];

export default function ShortcutsPanel({ isDark }: { isDark: boolean }) {
  return (
    <div className={`text-xs ${isDark ? "text-white/60" : "text-black/60"}`}>
      {SECTIONS.map((section, i) => (
        <div key={section.title}>
          <div
            className={`text-[10px] font-medium uppercase tracking-wider ${i === 0 ? "mb-1" : "mt-2.5 mb-1"} ${isDark ? "text-white/30" : "text-black/30"}`}
          >
            {section.title}
          </div>
          <div className="space-y-1">
            {section.rows.map(([label, keys]) => (
              <div key={label} className="flex justify-between gap-4">
                <span>{label}</span>
                <kbd className={isDark ? "text-white/40" : "text-black/40"}>{keys}</kbd>
              </div>
            ))}
          </div>
        </div>
      ))}
    </div>
  );
}
