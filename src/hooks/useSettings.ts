import { useState, useCallback, useEffect, useRef } from "react";
import { SETTINGS_KEY, loadJson, saveJson } from "../canvas/storage";
import type { TextHistoryMode } from "../canvas/types";

export type Theme = "light" | "journal" | "dark" | "midnight";

export type Settings = {
  theme: Theme;
  textHistory: TextHistoryMode;
  showShortcuts: boolean;
};

const THEMES = new Set<string>(["light", "journal", "dark", "midnight"]);
const TEXT_HISTORY_MODES = new Set<string>(["commit", "keystroke"]);

function getSystemTheme(): Theme {
  if (typeof window === "undefined" || !window.matchMedia) return "light";
  return window.matchMedia("(prefers-color-scheme: dark)").matches
    ? "dark"
    : "light";
}

export function getDefaults(theme: Theme = "light"): Settings {
  return {
    theme,
    textHistory: "commit",
    showShortcuts: false,
  };
}

function isTheme(v: unknown): v is Theme {
  return typeof v === "string" && THEMES.has(v);
}

function isTextHistoryMode(v: unknown): v is TextHistoryMode {
  return typeof v === "string" && TEXT_HISTORY_MODES.has(v);
}

/** Keep the recognised, well-typed fields of stored data; everything else falls back to `defaults`. */
export function normalizeSettings(raw: unknown, defaults: Settings): Settings {
  if (typeof raw !== "object" || raw === null) return defaults;
  const next = { ...defaults };
  if ("theme" in raw && isTheme(raw.theme)) next.theme = raw.theme;
  if ("textHistory" in raw && isTextHistoryMode(raw.textHistory)) next.textHistory = raw.textHistory;
  if ("showShortcuts" in raw && typeof raw.showShortcuts === "boolean") next.showShortcuts = raw.showShortcuts;
  return next;
}

function load(): Settings {
  return normalizeSettings(loadJson(SETTINGS_KEY), getDefaults(getSystemTheme()));
}

export default function useSettings() {
  const [settings, setSettings] = useState<Settings>(load);
  const pendingRef = useRef<Settings | null>(null);
  const timerRef = useRef<ReturnType<typeof setTimeout> | null>(null);

  const flush = useCallback(() => {
    if (timerRef.current) {
      clearTimeout(timerRef.current);
      timerRef.current = null;
    }
    if (pendingRef.current) {
      saveJson(SETTINGS_KEY, pendingRef.current);
      pendingRef.current = null;
    }
  }, []);

  const updateSettings = useCallback((partial: Partial<Settings>) => {
    setSettings((prev) => {
      const next = { ...prev, ...partial };
      pendingRef.current = next;
      if (timerRef.current) clearTimeout(timerRef.current);
      timerRef.current = setTimeout(flush, 300);
      return next;
    });
  }, [flush]);

  // Flush on unmount
  useEffect(() => flush, [flush]);

  // Flush on beforeunload
  useEffect(() => {
    const onBeforeUnload = () => flush();
    window.addEventListener("beforeunload", onBeforeUnload);
    return () => window.removeEventListener("beforeunload", onBeforeUnload);
  }, [flush]);

  return [settings, updateSettings] as const;
}
