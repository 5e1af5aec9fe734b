import { describe, it, expect } from "vitest";
import type { WidgetEvent } from "../events";
import { advanceTooltip, createTooltip, tooltipOwnerEvent, tooltipVisual, type TooltipModel } from "./Tooltip";

const enter: WidgetEvent = { type: "pointerEnter", target: "owner" };
const leave: WidgetEvent = { type: "pointerLeave", target: "owner" };

function frames(model: TooltipModel, count: number, deltaTime: number): TooltipModel {
  let next = model;
  for (let i = 0; i < count; i++) next = advanceTooltip(next, deltaTime);
  return next;
}

describe("Tooltip", () => {
  it("defaults to a half-second delay", () => {
    expect(createTooltip({ kind: "tooltip", text: "Hint" }).showDelay).toBe(0.5);
  });

  it("enters pending on owner hover", () => {
    const model = tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model;
    expect(model.phase).toEqual({ status: "pendingShow", elapsed: 0, armed: false });
  });

  it("does not count the frame the owner was entered", () => {
    const pending = tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model;
    expect(advanceTooltip(pending, 0.125).phase).toEqual({ status: "pendingShow", elapsed: 0, armed: true });
  });

  it("shows once the delay has elapsed", () => {
    const pending = tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model;
    expect(frames(pending, 4, 0.125).phase).toEqual({ status: "pendingShow", elapsed: 0.375, armed: true });
    expect(frames(pending, 5, 0.125).phase).toEqual({ status: "shown" });
  });

  it("hides immediately on leave", () => {
    const pending = tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model;
    const shown = frames(pending, 5, 0.125);
    const hidden = tooltipOwnerEvent(shown, leave).model;
    expect(hidden.phase).toEqual({ status: "hidden" });
    expect(advanceTooltip(hidden, 1).phase).toEqual({ status: "hidden" });
  });

  it("hides on a press on the owner", () => {
    const shown = frames(tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model, 5, 0.125);
    const pressed = tooltipOwnerEvent(shown, { type: "pointerDown", target: "owner", x: 0, y: 0 }).model;
    expect(pressed.phase.status).toBe("hidden");
  });

  it("keeps the timer when entered again while pending", () => {
    const pending = frames(tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model, 2, 0.125);
    expect(tooltipOwnerEvent(pending, enter).model).toBe(pending);
  });

  it("reports elapsed time in the visual state", () => {
    const pending = frames(tooltipOwnerEvent(createTooltip({ kind: "tooltip", text: "Hint" }), enter).model, 3, 0.125);
    expect(tooltipVisual(pending, true, false)).toEqual({
      kind: "tooltip",
      state: "pendingShow",
      elapsed: 0.25,
      hovered: false,
      focused: false,
    });
  });
});
