import { log } from "./logger";

// ─── Storage keys ─────────────────────────────────────────────────────────────

export const SETTINGS_KEY = "textcanvas-settings";

// ─── Preferences persistence ──────────────────────────────────────────────────
// Only user preferences are stored; documents live for the page's lifetime.

export function loadJson(key: string): unknown {
  try {
    const raw = localStorage.getItem(key);
    if (raw) return JSON.parse(raw);
  } catch (err) {
    log.swallow(`read ${key}`, err);
  }
  return null;
}

export function saveJson(key: string, value: unknown): void {
  try {
    localStorage.setItem(key, JSON.stringify(value));
  } catch (err) {
    log.swallow(`write ${key}`, err);
  }
}
