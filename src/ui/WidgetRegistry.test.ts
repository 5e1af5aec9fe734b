import { describe, it, expect, beforeEach } from "vitest";
import { WidgetRegistry } from "./WidgetRegistry";
import { isWidgetError } from "./errors";

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
    return null;
  } catch (error) {
    return isWidgetError(error) ? error.code : "other";
  }
}

describe("WidgetRegistry", () => {
  let registry: WidgetRegistry;

  beforeEach(() => {
    registry = new WidgetRegistry();
  });

  describe("create", () => {
    it("names the placement in InvalidParent errors", () => {
      const slider = registry.create({ kind: "slider" });
      expect(() => registry.create({ kind: "panel", parent: slider })).toThrow(
        'A panel cannot be placed under slider "slider-1"'
      );
      expect(() => registry.create({ kind: "tooltip", text: "Pick one" })).toThrow("A tooltip cannot be placed under the root");
    });

    it("defaults the base style to the kind", () => {
      const button = registry.create({ kind: "button" });
      const styled = registry.create({ kind: "button", baseStyle: "menu button" });
      expect(registry.get(button).baseStyle).toBe("button");
      expect(registry.get(styled).baseStyle).toBe("menu button");
    });

    it("counts buttons added to a dropdown as options", () => {
      const dropdown = registry.create({ kind: "dropdown", options: ["A"] });
      registry.create({ kind: "button", label: "B", parent: dropdown });
      registry.create({ kind: "tooltip", text: "Pick one", parent: dropdown });
      expect(registry.setValue(dropdown, 5)).toEqual({ value: 1, requested: 5, clamped: true });
      registry.checkIntegrity();
    });

    it("does not announce the first tab", () => {
      const container = registry.create({ kind: "tabContainer" });
      registry.create({ kind: "tab", parent: container });
      expect(registry.getValue(container)).toBe(0);
      expect(registry.takeNotifications()).toEqual([]);
    });
  });

  describe("dispatch", () => {
    it("drops events for unknown widgets", () => {
      registry.dispatch({ type: "pointerEnter", target: "button-99" });
      expect(registry.takeDirty()).toEqual([]);
    });

    it("ignores starting events on hidden widgets", () => {
      const panel = registry.create({ kind: "panel", collapsible: true, collapsed: true });
      const box = registry.create({ kind: "checkbox", parent: panel });
      registry.dispatch({ type: "pointerDown", target: box, x: 0, y: 0 });
      registry.dispatch({ type: "pointerUp", target: box, x: 0, y: 0, inside: true });
      expect(registry.getValue(box)).toBe(false);
    });

    it("leaves a scroll without a scrollable ancestor with the widget", () => {
      const button = registry.create({ kind: "button" });
      registry.takeDirty();
      registry.dispatch({ type: "scroll", target: button, dx: 0, dy: 40 });
      expect(registry.takeDirty()).toEqual([]);
      expect(registry.takeNotifications()).toEqual([]);
    });

    it("tracks focus flags", () => {
      const button = registry.create({ kind: "button" });
      registry.dispatch({ type: "focusGained", target: button });
      expect(registry.getVisualState(button).focused).toBe(true);
      registry.dispatch({ type: "focusLost", target: button });
      expect(registry.getVisualState(button).focused).toBe(false);
    });

    it("highlights the dropdown option under the pointer", () => {
      const dropdown = registry.create({ kind: "dropdown", options: ["A", "B"] });
      registry.dispatch({ type: "pointerDown", target: dropdown, x: 0, y: 0 });
      registry.dispatch({ type: "pointerUp", target: dropdown, x: 0, y: 0, inside: true });
      registry.dispatch({ type: "pointerEnter", target: "button-3" });
      expect(registry.getVisualState(dropdown)).toEqual({
        kind: "dropdown",
        state: "open",
        highlighted: 1,
        hovered: true,
        focused: false,
      });
    });
  });

  describe("dismissOutside", () => {
    it("keeps a dropdown open for presses on its options", () => {
      const dropdown = registry.create({ kind: "dropdown", options: ["A"] });
      registry.dispatch({ type: "pointerDown", target: dropdown, x: 0, y: 0 });
      registry.dispatch({ type: "pointerUp", target: dropdown, x: 0, y: 0, inside: true });

      registry.dismissOutside("button-2");
      expect(registry.getVisualState(dropdown).state).toBe("open");
      registry.dismissOutside(null);
      expect(registry.getVisualState(dropdown).state).toBe("closed");
    });
  });

  describe("setValue", () => {
    it("rejects values of the wrong type", () => {
      const slider = registry.create({ kind: "slider" });
      const box = registry.create({ kind: "checkbox" });
      const button = registry.create({ kind: "button" });
      expect(errorCode(() => registry.setValue(slider, true))).toBe("InvalidArgument");
      expect(errorCode(() => registry.setValue(box, 1))).toBe("InvalidArgument");
      expect(errorCode(() => registry.setValue(button, 1))).toBe("InvalidArgument");
      expect(errorCode(() => registry.getValue(button))).toBe("InvalidArgument");
    });

    it("snaps slider values to the step", () => {
      const slider = registry.create({ kind: "slider", min: 0, max: 1, step: 0.25 });
      expect(registry.setValue(slider, 0.3)).toEqual({ value: 0.25, requested: 0.3, clamped: false });
    });

    it("keeps an empty tab container at -1", () => {
      const container = registry.create({ kind: "tabContainer" });
      expect(registry.setValue(container, 2)).toEqual({ value: -1, requested: 2, clamped: true });
      expect(registry.setValue(container, -1)).toEqual({ value: -1, requested: -1, clamped: false });
    });

    it("announces radio siblings it unchecks", () => {
      const first = registry.create({ kind: "checkbox", variant: "radio", checked: true });
      const second = registry.create({ kind: "checkbox", variant: "radio" });
      registry.setValue(second, true);
      expect(registry.getValue(first)).toBe(false);
      expect(registry.takeNotifications()).toEqual([
        { type: "valueChanged", id: first, kind: "checkbox", value: false },
      ]);
    });
  });

  describe("focus order", () => {
    it("walks focusable widgets in tree order", () => {
      const panel = registry.create({ kind: "panel" });
      const a = registry.create({ kind: "button", parent: panel });
      const disabled = registry.create({ kind: "checkbox", enabled: false, parent: panel });
      const b = registry.create({ kind: "slider" });

      expect(registry.canFocus(disabled)).toBe(false);
      expect(registry.nextFocusable(null, false)).toBe(a);
      expect(registry.nextFocusable(a, false)).toBe(b);
      expect(registry.nextFocusable(b, false)).toBe(a);
      expect(registry.nextFocusable(null, true)).toBe(b);
    });

    it("returns null when nothing can take focus", () => {
      registry.create({ kind: "panel" });
      expect(registry.nextFocusable(null, false)).toBeNull();
    });
  });

  describe("text", () => {
    it("uses the panel title over the label", () => {
      const panel = registry.create({ kind: "panel", title: "Audio", label: "ignored" });
      const plain = registry.create({ kind: "panel", label: "Video" });
      expect(registry.textOf(panel)).toBe("Audio");
      expect(registry.textOf(plain)).toBe("Video");
    });

    it("shows the selected option on the dropdown header", () => {
      const dropdown = registry.create({ kind: "dropdown", label: "Quality", options: ["Low", "High"] });
      expect(registry.textOf(dropdown)).toBe("Quality");
      registry.setValue(dropdown, 1);
      expect(registry.textOf(dropdown)).toBe("High");
      registry.setLabel("button-3", "Ultra");
      expect(registry.textOf(dropdown)).toBe("Ultra");
    });
  });

  describe("checkIntegrity", () => {
    it("passes for a composed tree", () => {
      const panel = registry.create({ kind: "panel" });
      const container = registry.create({ kind: "tabContainer", parent: panel });
      const tab = registry.create({ kind: "tab", parent: container });
      registry.create({ kind: "slider", parent: tab });
      registry.create({ kind: "dropdown", options: ["A", "B"], selected: 1, parent: tab });
      expect(() => registry.checkIntegrity()).not.toThrow();
    });

    it("detects a broken parent link", () => {
      const panel = registry.create({ kind: "panel" });
      const button = registry.create({ kind: "button", parent: panel });
      registry.get(panel).children = [];
      expect(() => registry.checkIntegrity()).toThrow(
        `[WidgetRegistry] Integrity violation: "${button}" is missing from the children of "${panel}"`
      );
    });

    it("detects two active tabs", () => {
      const container = registry.create({ kind: "tabContainer" });
      registry.create({ kind: "tab", parent: container });
      const second = registry.create({ kind: "tab", parent: container });
      const record = registry.get(second);
      if (record.model.kind === "tab") record.model = { ...record.model, isActive: true };
      expect(() => registry.checkIntegrity()).toThrow("does not have exactly one active tab at index 0");
    });
  });

  describe("destroy", () => {
    it("returns the subtree parent first and forgets it", () => {
      const panel = registry.create({ kind: "panel" });
      const inner = registry.create({ kind: "panel", parent: panel });
      const button = registry.create({ kind: "button", parent: inner });
      const slider = registry.create({ kind: "slider", parent: panel });

      expect(registry.destroy(panel)).toEqual([panel, inner, button, slider]);
      expect(registry.size).toBe(0);
      expect(registry.takeDestroyed()).toEqual([panel, inner, button, slider]);
      expect(errorCode(() => registry.destroy(panel))).toBe("NotFound");
    });

    it("clears a container's active index when its last tab goes", () => {
      const container = registry.create({ kind: "tabContainer" });
      const tab = registry.create({ kind: "tab", parent: container });
      registry.destroy(tab);
      expect(registry.getValue(container)).toBe(-1);
      expect(registry.takeNotifications()).toEqual([
        { type: "valueChanged", id: container, kind: "tabContainer", value: -1 },
      ]);
      registry.checkIntegrity();
    });
  });
});
