import type { Point, TextHistoryMode } from "./types";

// ─── Editor configuration ─────────────────────────────────────────────────────

export type FontSizeBounds = { min: number; max: number };

export type ElementDefaults = {
  text: string;
  position: Point;
  fontFamily: string;
  fontSize: number;
};

export type EditorConfig = {
  /** Allowed font families, in the order the toolbar lists them. */
  fontFamilies: readonly string[];
  fontSizeBounds: FontSizeBounds;
  fontSizeStep: number;
  historyCapacity: number;
  /** Margin added around the edited element before deciding a tap is outside it. */
  hitPadding: number;
  /** Shown (and measured) in place of empty text. */
  placeholderText: string;
  defaultElement: ElementDefaults;
  textHistory: TextHistoryMode;
};

export const FONT_FAMILIES: readonly string[] = [
  "Roboto",
  "Lato",
  "Montserrat",
  "Oswald",
  "Playfair Display",
  "Source Sans 3",
];

export const DEFAULT_EDITOR_CONFIG: EditorConfig = {
  fontFamilies: FONT_FAMILIES,
  fontSizeBounds: { min: 8, max: 100 },
  fontSizeStep: 2,
  historyCapacity: 50,
  // 8px frame padding + 2px border around the element being edited
  hitPadding: 10,
  placeholderText: "Tap to Edit",
  defaultElement: {
    text: "Tap to Edit",
    position: { x: 100, y: 100 },
    fontFamily: "Roboto",
    fontSize: 20,
  },
  textHistory: "commit",
};

const VALID_TEXT_HISTORY = new Set<string>(["commit", "keystroke"]);

function isFiniteNumber(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v);
}

/** Merge overrides onto the defaults and validate the result. Throws on failure. */
export function resolveEditorConfig(overrides: Partial<EditorConfig> = {}): EditorConfig {
  const config: EditorConfig = {
    ...DEFAULT_EDITOR_CONFIG,
    ...overrides,
    fontSizeBounds: { ...DEFAULT_EDITOR_CONFIG.fontSizeBounds, ...overrides.fontSizeBounds },
    defaultElement: { ...DEFAULT_EDITOR_CONFIG.defaultElement, ...overrides.defaultElement },
  };
  config.fontFamilies = [...config.fontFamilies];
  config.defaultElement.position = { ...config.defaultElement.position };

  if (config.fontFamilies.length === 0)
    throw new Error("Invalid config: fontFamilies is empty");
  if (new Set(config.fontFamilies).size !== config.fontFamilies.length)
    throw new Error("Invalid config: fontFamilies has duplicates");

  const { min, max } = config.fontSizeBounds;
  if (!isFiniteNumber(min) || !isFiniteNumber(max) || min <= 0 || min > max)
    throw new Error(`Invalid config: fontSizeBounds [${min}, ${max}]`);
  if (!isFiniteNumber(config.fontSizeStep) || config.fontSizeStep <= 0)
    throw new Error("Invalid config: fontSizeStep must be positive");
  if (!Number.isInteger(config.historyCapacity) || config.historyCapacity < 1)
    throw new Error("Invalid config: historyCapacity must be a positive integer");
  if (!isFiniteNumber(config.hitPadding) || config.hitPadding < 0)
    throw new Error("Invalid config: hitPadding must be >= 0");
  if (!VALID_TEXT_HISTORY.has(config.textHistory))
    throw new Error(`Invalid config: unknown textHistory "${config.textHistory}"`);

  const d = config.defaultElement;
  if (!config.fontFamilies.includes(d.fontFamily))
    throw new Error(`Invalid config: default font "${d.fontFamily}" is not in fontFamilies`);
  if (!isFiniteNumber(d.fontSize) || d.fontSize < min || d.fontSize > max)
    throw new Error(`Invalid config: default font size ${d.fontSize} is outside [${min}, ${max}]`);
  if (!isFiniteNumber(d.position.x) || !isFiniteNumber(d.position.y))
    throw new Error("Invalid config: default position must be finite");

  return config;
}
