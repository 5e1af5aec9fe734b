import { describe, it, expect } from "vitest";
import type { WidgetEvent } from "../events";
import { NO_MODIFIERS } from "../events";
import {
  clampSelection,
  createDropdown,
  dropdownTransition,
  removeOption,
  selectOption,
  type DropdownModel,
} from "./Dropdown";

const click: WidgetEvent[] = [
  { type: "pointerDown", target: "d", x: 0, y: 0 },
  { type: "pointerUp", target: "d", x: 0, y: 0, inside: true },
];
const key = (k: string): WidgetEvent => ({ type: "keyPress", target: "d", key: k, modifiers: NO_MODIFIERS });

function run(model: DropdownModel, events: WidgetEvent[]): DropdownModel {
  return events.reduce((m, e) => dropdownTransition(m, e).model, model);
}

const threeOptions = (selected: number | null = null): DropdownModel =>
  createDropdown({ kind: "dropdown", options: ["Low", "Medium", "High"], selected });

describe("Dropdown", () => {
  describe("clampSelection", () => {
    it("keeps valid indices", () => {
      expect(clampSelection(1, 3)).toEqual({ value: 1, clamped: false });
      expect(clampSelection(null, 3)).toEqual({ value: null, clamped: false });
    });

    it("clamps out-of-range and fractional indices", () => {
      expect(clampSelection(7, 3)).toEqual({ value: 2, clamped: true });
      expect(clampSelection(-1, 3)).toEqual({ value: 0, clamped: true });
      expect(clampSelection(1.4, 3)).toEqual({ value: 1, clamped: true });
    });

    it("only holds null without options", () => {
      expect(clampSelection(0, 0)).toEqual({ value: null, clamped: true });
    });
  });

  it("opens on a header click and closes on the next", () => {
    const open = run(threeOptions(2), click);
    expect(open.isOpen).toBe(true);
    expect(open.highlighted).toBe(2);
    expect(run(open, click).isOpen).toBe(false);
  });

  it("closes on Escape without changing the selection", () => {
    const model = run(threeOptions(1), [...click, key("Escape")]);
    expect(model.isOpen).toBe(false);
    expect(model.selected).toBe(1);
  });

  it("selects the highlighted option from the keyboard", () => {
    const model = run(threeOptions(), [key("ArrowDown"), key("ArrowDown"), key("ArrowDown"), key("Enter")]);
    // First ArrowDown opens, the next two highlight options 0 then 1
    expect(model.isOpen).toBe(false);
    expect(model.selected).toBe(1);
  });

  it("stops the highlight at the last option", () => {
    const model = run(threeOptions(2), [...click, key("ArrowDown"), key("ArrowDown")]);
    expect(model.highlighted).toBe(2);
  });

  it("reports a change only when a different option is selected", () => {
    const open = run(threeOptions(1), click);
    expect(selectOption(open, 1).valueChanged).toBeFalsy();
    const changed = selectOption(open, 0);
    expect(changed.valueChanged).toBe(true);
    expect(changed.model).toMatchObject({ isOpen: false, selected: 0 });
  });

  describe("removeOption", () => {
    it("shifts a later selection down", () => {
      const outcome = removeOption(threeOptions(2), 0);
      expect(outcome.model.selected).toBe(1);
      expect(outcome.model.optionCount).toBe(2);
      expect(outcome.valueChanged).toBe(true);
    });

    it("clears a removed selection", () => {
      expect(removeOption(threeOptions(1), 1).model.selected).toBeNull();
    });

    it("keeps an earlier selection", () => {
      const outcome = removeOption(threeOptions(0), 2);
      expect(outcome.model.selected).toBe(0);
      expect(outcome.valueChanged).toBe(false);
    });
  });
});
