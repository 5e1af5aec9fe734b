import { describe, it, expect } from "vitest";
import type { WidgetEvent } from "../events";
import { NO_MODIFIERS } from "../events";
import { buttonTransition, buttonVisual, createButton, type ButtonModel } from "./Button";

const enter: WidgetEvent = { type: "pointerEnter", target: "b" };
const leave: WidgetEvent = { type: "pointerLeave", target: "b" };
const down: WidgetEvent = { type: "pointerDown", target: "b", x: 0, y: 0 };
const upInside: WidgetEvent = { type: "pointerUp", target: "b", x: 0, y: 0, inside: true };
const upOutside: WidgetEvent = { type: "pointerUp", target: "b", x: 0, y: 0, inside: false };

function runButton(events: WidgetEvent[]): { model: ButtonModel; clicks: number } {
  let model = createButton();
  let clicks = 0;
  for (const event of events) {
    const outcome = buttonTransition(model, event);
    model = outcome.model;
    if (outcome.clicked) clicks++;
  }
  return { model, clicks };
}

describe("Button", () => {
  it("walks normal, hovered, pressed and back with one click", () => {
    const { model, clicks } = runButton([enter, down, upInside]);
    expect(clicks).toBe(1);
    expect(buttonVisual(model, true, false).state).toBe("hovered");
  });

  it("returns to normal after any balanced hover sequence", () => {
    const { model } = runButton([enter, leave, enter, leave, enter, leave]);
    expect(buttonVisual(model, true, false).state).toBe("normal");
  });

  it("stays pressed but not hovered after dragging out", () => {
    const { model } = runButton([enter, down, leave]);
    expect(buttonVisual(model, true, false)).toEqual({
      kind: "button",
      state: "pressed",
      hovered: false,
      focused: false,
    });
  });

  it("does not click when released outside", () => {
    const { model, clicks } = runButton([enter, down, leave, upOutside]);
    expect(clicks).toBe(0);
    expect(buttonVisual(model, true, false).state).toBe("normal");
  });

  it("commits when the press returns before release", () => {
    expect(runButton([enter, down, leave, enter, upInside]).clicks).toBe(1);
  });

  it("clicks on an activation key", () => {
    const key: WidgetEvent = { type: "keyPress", target: "b", key: "Enter", modifiers: NO_MODIFIERS };
    expect(buttonTransition(createButton(), key).clicked).toBe(true);
  });

  it("shows disabled over every other state", () => {
    const { model } = runButton([enter, down]);
    expect(buttonVisual(model, false, true).state).toBe("disabled");
  });
});
