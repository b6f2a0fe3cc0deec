import { describe, it, expect } from "vitest";
import { frameCss, isDarkTheme, textCss } from "../src/canvas/rendering";

describe("frameCss", () => {
  it("offsets the frame so the text sits at the element position", () => {
    expect(frameCss(100, 100, 10, "editing")).toEqual({
      position: "absolute",
      left: "90px",
      top: "90px",
      padding: "8px",
      border: "2px solid #3b82f6",
      cursor: "text",
    });
  });

  it("shrinks the border to fit small paddings", () => {
    const css = frameCss(0, 0, 1, "idle");

    expect(css.border).toBe("1px solid transparent");
    expect(css.padding).toBe("0px");
    expect(css.cursor).toBe("grab");
  });
});

describe("textCss", () => {
  it("maps style flags to CSS", () => {
    const css = textCss({ fontFamily: "Lato", fontSize: 24, bold: true, italic: true, underline: true }, "#111111");

    expect(css.fontFamily).toBe("'Lato', system-ui, sans-serif");
    expect(css.fontSize).toBe("24px");
    expect(css.fontWeight).toBe(700);
    expect(css.fontStyle).toBe("italic");
    expect(css.textDecoration).toBe("underline");
  });
});

describe("isDarkTheme", () => {
  it("treats dark and midnight as dark", () => {
    expect(isDarkTheme("dark")).toBe(true);
    expect(isDarkTheme("midnight")).toBe(true);
    expect(isDarkTheme("journal")).toBe(false);
  });
});
