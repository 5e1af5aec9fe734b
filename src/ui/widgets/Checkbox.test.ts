import { describe, it, expect } from "vitest";
import type { WidgetEvent } from "../events";
import { NO_MODIFIERS } from "../events";
import { checkboxTransition, checkboxVisual, createCheckbox, setChecked, type CheckboxModel } from "./Checkbox";

const enter: WidgetEvent = { type: "pointerEnter", target: "c" };
const leave: WidgetEvent = { type: "pointerLeave", target: "c" };
const down: WidgetEvent = { type: "pointerDown", target: "c", x: 0, y: 0 };
const upInside: WidgetEvent = { type: "pointerUp", target: "c", x: 0, y: 0, inside: true };
const upOutside: WidgetEvent = { type: "pointerUp", target: "c", x: 0, y: 0, inside: false };

function runCheckbox(model: CheckboxModel, events: WidgetEvent[]): CheckboxModel {
  return events.reduce((m, e) => checkboxTransition(m, e).model, model);
}

describe("Checkbox", () => {
  it("toggles exactly once per click", () => {
    const model = runCheckbox(createCheckbox({ kind: "checkbox" }), [enter, down, upInside]);
    expect(model.checked).toBe(true);
  });

  it("reports the toggle as a value change", () => {
    const pressed = runCheckbox(createCheckbox({ kind: "checkbox" }), [enter, down]);
    expect(checkboxTransition(pressed, upInside).valueChanged).toBe(true);
  });

  it("keeps its value when released outside", () => {
    const model = runCheckbox(createCheckbox({ kind: "checkbox" }), [enter, down, leave, upOutside]);
    expect(model.checked).toBe(false);
  });

  it("keeps a checked radio checked", () => {
    const pressed = runCheckbox(createCheckbox({ kind: "checkbox", variant: "radio", checked: true }), [
      enter,
      down,
    ]);
    const outcome = checkboxTransition(pressed, upInside);
    expect(outcome.model.checked).toBe(true);
    expect(outcome.clicked).toBe(true);
    expect(outcome.valueChanged).toBeFalsy();
  });

  it("toggles from the keyboard", () => {
    const space: WidgetEvent = { type: "keyPress", target: "c", key: " ", modifiers: NO_MODIFIERS };
    const outcome = checkboxTransition(createCheckbox({ kind: "checkbox", checked: true }), space);
    expect(outcome.model.checked).toBe(false);
    expect(outcome.valueChanged).toBe(true);
  });

  it("keeps the model when set to its current value", () => {
    const model = createCheckbox({ kind: "checkbox" });
    expect(setChecked(model, false)).toBe(model);
  });

  it("shows disabled over checked", () => {
    const model = createCheckbox({ kind: "checkbox", checked: true });
    expect(checkboxVisual(model, false, false)).toEqual({
      kind: "checkbox",
      state: "disabled",
      checked: true,
      hovered: false,
      focused: false,
    });
  });
});
