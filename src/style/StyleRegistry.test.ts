import { describe, it, expect } from "vitest";
import { StyleRegistry } from "./StyleRegistry";
import { isWidgetError } from "../ui/errors";
import type { VisualState } from "../ui/types";

const hovered: VisualState = { kind: "button", state: "hovered", hovered: true, focused: false };

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    return isWidgetError(error) ? error.code : "other";
  }
}

describe("StyleRegistry", () => {
  it("seeds a style per kind and the named screen styles", () => {
    const styles = new StyleRegistry();
    for (const name of ["button", "slider", "tabContainer", "progressBar", "menu button", "settings panel", "settings section", "hud"]) {
      expect(styles.has(name)).toBe(true);
    }
    const menuButton = styles.get("menu button");
    expect(menuButton.background).toEqual([0.2, 0.2, 0.4, 1.0]);
    expect(menuButton.width).toBe(250);
    expect(menuButton.height).toBe(65);
    // Unset fields come from the default theme
    expect(menuButton.hoverBackground).toEqual([0.25, 0.25, 0.35, 1.0]);
  });

  it("can start empty", () => {
    expect(new StyleRegistry({ builtins: false }).names()).toEqual([]);
  });

  it("fails lookups of unknown names with NotFound", () => {
    const styles = new StyleRegistry();
    expect(errorCode(() => styles.get("nope"))).toBe("NotFound");
    expect(errorCode(() => styles.resolve("nope", hovered))).toBe("NotFound");
  });

  it("memoizes resolutions per name and visual state", () => {
    const styles = new StyleRegistry();
    const first = styles.resolve("button", hovered);
    expect(styles.resolve("button", { ...hovered })).toBe(first);
  });

  it("drops memoized resolutions when a style is replaced", () => {
    const styles = new StyleRegistry();
    const before = styles.resolve("button", hovered);
    styles.register("button", { hoverBackground: [1, 0, 0, 1] });
    const after = styles.resolve("button", hovered);
    expect(after).not.toBe(before);
    expect(after.background).toEqual([1, 0, 0, 1]);
  });

  it("rejects colors outside [0, 1] and unknown fields", () => {
    const styles = new StyleRegistry();
    expect(errorCode(() => styles.register("bad", { background: [2, 0, 0, 1] }))).toBe("InvalidArgument");
    expect(errorCode(() => styles.loadStyleSheet({ bad: { glow: 3 } }))).toBe("InvalidArgument");
    expect(errorCode(() => styles.register("", {}))).toBe("InvalidArgument");
    expect(styles.has("bad")).toBe(false);
  });

  it("registers nothing from a sheet with an invalid entry", () => {
    const styles = new StyleRegistry({ builtins: false });
    expect(errorCode(() => styles.loadStyleSheet({ good: { padding: 4 }, bad: { padding: -1 } }))).toBe(
      "InvalidArgument"
    );
    expect(styles.names()).toEqual([]);
  });

  it("loads a sheet in order", () => {
    const styles = new StyleRegistry({ builtins: false });
    expect(styles.loadStyleSheet({ title: { fontSize: 48 }, body: { fontSize: 14 } })).toEqual(["title", "body"]);
    expect(styles.get("title").fontSize).toBe(48);
  });
});
