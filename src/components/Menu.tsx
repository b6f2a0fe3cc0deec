import { useState, useRef, useEffect } from "react";
import type { Settings, Theme } from "../hooks/useSettings";
import type { TextHistoryMode } from "../canvas/types";
import ShortcutsPanel from "./ShortcutsPanel";

type Props = {
  settings: Settings;
  updateSettings: (partial: Partial<Settings>) => void;
  isDark: boolean;
};

const THEMES: { key: Theme; label: string }[] = [
  { key: "light", label: "Light" },
  { key: "journal", label: "Journal" },
  { key: "dark", label: "Dark" },
  { key: "midnight", label: "Midnight" },
];

const TEXT_HISTORY: { key: TextHistoryMode; label: string }[] = [
  { key: "commit", label: "Per edit" },
  { key: "keystroke", label: "Per keystroke" },
];

export default function Menu({ settings, updateSettings, isDark }: Props) {
  const [open, setOpen] = useState(false);
  const menuRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    if (!open) return;

    const onKey = (e: KeyboardEvent) => {
      if (e.key === "Escape") setOpen(false);
    };

    const onClick = (e: MouseEvent) => {
      if (menuRef.current && e.target instanceof Node && !menuRef.current.contains(e.target)) {
        setOpen(false);
      }
    };

    window.addEventListener("keydown", onKey);
    window.addEventListener("mousedown", onClick);
    return () => {
      window.removeEventListener("keydown", onKey);
      window.removeEventListener("mousedown", onClick);
    };
  }, [open]);

  const chip = (active: boolean) =>
    `flex-1 py-1 rounded text-xs transition-colors ${
      active
        ? isDark
          ? "bg-white/20 text-white"
          : "bg-black/20 text-black"
        : isDark
          ? "bg-white/5 text-white/60 hover:bg-white/10"
          : "bg-black/5 text-black/60 hover:bg-black/10"
    }`;

  return (
    <div ref={menuRef} className="fixed top-4 right-4 z-50 flex flex-col items-end">
      <button
        onClick={() => setOpen((o) => !o)}
        aria-label="Menu"
        className={`w-8 h-8 flex items-center justify-center rounded border transition-colors ${isDark ? "bg-white/10 border-white/20 text-white/70 hover:text-white hover:bg-white/20" : "bg-black/10 border-black/20 text-black/70 hover:text-black hover:bg-black/20"}`}
      >
        <svg width="16" height="16" viewBox="0 0 16 16" fill="currentColor">
          <circle cx="8" cy="2.5" r="1" />
          <circle cx="8" cy="8" r="1" />
          <circle cx="8" cy="13.5" r="1" />
        </svg>
      </button>

      {open && (
        <div
          className={`mt-2 p-3 rounded-lg border backdrop-blur-sm min-w-56 overflow-y-auto max-h-[calc(100vh-5rem)] ${isDark ? "bg-black/70 border-white/15 text-white/80" : "bg-white/70 border-black/15 text-black/80"}`}
        >
          <div className="text-sm">Theme</div>
          <div className="flex gap-1 mt-1.5">
            {THEMES.map((t) => (
              <button key={t.key} onClick={() => updateSettings({ theme: t.key })} className={chip(settings.theme === t.key)}>
                {t.label}
              </button>
            ))}
          </div>

          <div className="mt-3 text-sm">Undo typing</div>
          <div className="flex gap-1 mt-1.5">
            {TEXT_HISTORY.map((m) => (
              <button
                key={m.key}
                onClick={() => updateSettings({ textHistory: m.key })}
                className={chip(settings.textHistory === m.key)}
              >
                {m.label}
              </button>
            ))}
          </div>

          <label className="mt-3 flex items-center justify-between text-sm cursor-pointer">
            <span>Keyboard shortcuts</span>
            <input
              type="checkbox"
              checked={settings.showShortcuts}
              onChange={(e) => updateSettings({ showShortcuts: e.target.checked })}
              className={isDark ? "accent-white/70" : "accent-black/70"}
            />
          </label>

          {settings.showShortcuts && (
            <div className="mt-3">
              <ShortcutsPanel isDark={isDark} />
            </div>
          )}
        </div>
      )}
    </div>
  );
}
