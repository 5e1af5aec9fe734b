import { describe, it, expect } from "vitest";
import type { WidgetEvent } from "../events";
import { NO_MODIFIERS } from "../events";
import {
  activeIndexAfterRemoval,
  createTab,
  setTabActive,
  stepTabIndex,
  tabTransition,
  tabVisual,
} from "./TabContainer";

const down: WidgetEvent = { type: "pointerDown", target: "t", x: 0, y: 0 };
const up: WidgetEvent = { type: "pointerUp", target: "t", x: 0, y: 0, inside: true };

describe("Tab", () => {
  it("clicks when inactive", () => {
    const pressed = tabTransition(createTab(), down).model;
    expect(tabTransition(pressed, up).clicked).toBe(true);
  });

  it("ignores clicks when already active", () => {
    const pressed = tabTransition(setTabActive(createTab(), true), down).model;
    expect(tabTransition(pressed, up).clicked).toBe(false);
  });

  it("asks for the neighbouring tab on arrow keys", () => {
    const left: WidgetEvent = { type: "keyPress", target: "t", key: "ArrowLeft", modifiers: NO_MODIFIERS };
    const right: WidgetEvent = { type: "keyPress", target: "t", key: "ArrowRight", modifiers: NO_MODIFIERS };
    expect(tabTransition(createTab(), left).siblingStep).toBe(-1);
    expect(tabTransition(createTab(), right).siblingStep).toBe(1);
  });

  it("shows active over hovered", () => {
    const hovered = tabTransition(createTab(), { type: "pointerEnter", target: "t" }).model;
    expect(tabVisual(hovered, true, false).state).toBe("hovered");
    expect(tabVisual(setTabActive(hovered, true), true, false).state).toBe("active");
    expect(tabVisual(setTabActive(hovered, true), false, false).state).toBe("disabled");
  });
});

describe("stepTabIndex", () => {
  it("moves without wrapping", () => {
    expect(stepTabIndex(1, 3, 1)).toBe(2);
    expect(stepTabIndex(2, 3, 1)).toBe(2);
    expect(stepTabIndex(0, 3, -1)).toBe(0);
  });

  it("has nothing to step to without tabs", () => {
    expect(stepTabIndex(0, 0, 1)).toBe(-1);
  });
});

describe("activeIndexAfterRemoval", () => {
  it("hands activation to the tab sliding into the slot", () => {
    expect(activeIndexAfterRemoval(1, 1, 3)).toBe(1);
  });

  it("falls back to the new last tab", () => {
    expect(activeIndexAfterRemoval(2, 2, 3)).toBe(1);
  });

  it("follows the active tab when an earlier one goes", () => {
    expect(activeIndexAfterRemoval(2, 0, 3)).toBe(1);
  });

  it("keeps the index when a later tab goes", () => {
    expect(activeIndexAfterRemoval(0, 2, 3)).toBe(0);
  });

  it("reports -1 when the last tab goes", () => {
    expect(activeIndexAfterRemoval(0, 0, 1)).toBe(-1);
  });
});
