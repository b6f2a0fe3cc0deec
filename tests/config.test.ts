import { describe, it, expect } from "vitest";
import { DEFAULT_EDITOR_CONFIG, FONT_FAMILIES, resolveEditorConfig } from "../src/canvas/config";

describe("resolveEditorConfig", () => {
  it("returns the defaults when given nothing", () => {
    const config = resolveEditorConfig();

    expect(config).toEqual(DEFAULT_EDITOR_CONFIG);
    expect(config.fontFamilies).not.toBe(FONT_FAMILIES);
    expect(config.defaultElement.position).not.toBe(DEFAULT_EDITOR_CONFIG.defaultElement.position);
  });

  it("merges nested overrides", () => {
    const config = resolveEditorConfig({
      fontSizeBounds: { min: 10, max: 40 },
      defaultElement: { ...DEFAULT_EDITOR_CONFIG.defaultElement, text: "New text" },
    });

    expect(config.fontSizeBounds).toEqual({ min: 10, max: 40 });
    expect(config.defaultElement.text).toBe("New text");
    expect(config.defaultElement.fontSize).toBe(20);
  });

  it("rejects an empty or duplicated font list", () => {
    expect(() => resolveEditorConfig({ fontFamilies: [] })).toThrow("Invalid config: fontFamilies is empty");
    expect(() => resolveEditorConfig({ fontFamilies: ["Roboto", "Roboto"] })).toThrow(
      "Invalid config: fontFamilies has duplicates",
    );
  });

  it("rejects inverted font size bounds", () => {
    expect(() => resolveEditorConfig({ fontSizeBounds: { min: 50, max: 10 } })).toThrow(
      "Invalid config: fontSizeBounds [50, 10]",
    );
  });

  it("rejects a non-positive step", () => {
    expect(() => resolveEditorConfig({ fontSizeStep: 0 })).toThrow("Invalid config: fontSizeStep must be positive");
  });

  it("rejects a negative hit padding", () => {
    expect(() => resolveEditorConfig({ hitPadding: -1 })).toThrow("Invalid config: hitPadding must be >= 0");
  });

  it("rejects a default font that is not allowed", () => {
    expect(() => resolveEditorConfig({ fontFamilies: ["Lato"] })).toThrow(
      'Invalid config: default font "Roboto" is not in fontFamilies',
    );
  });

  it("rejects a default size outside the bounds", () => {
    expect(() => resolveEditorConfig({ fontSizeBounds: { min: 30, max: 60 } })).toThrow(
      "Invalid config: default font size 20 is outside [30, 60]",
    );
  });
});
