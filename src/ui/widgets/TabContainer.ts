/**
 * Tab Container Widget
 *
 * Tabs and their container. Exclusivity (one active tab per container) is
 * enforced by the registry, which owns the sibling list.
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { IDLE_PRESSABLE, pressable, trackHover, type PressableState } from "./interaction";

/** Tab configuration. Children of a tab are its page. */
export interface TabOptions extends CommonOptions {
  kind: "tab";
}

/** Tab container configuration */
export interface TabContainerOptions extends CommonOptions {
  kind: "tabContainer";
  onChange?: (activeIndex: number, id: WidgetId) => void;
}

export interface TabModel {
  kind: "tab";
  press: PressableState;
  isActive: boolean;
}

export interface TabContainerModel {
  kind: "tabContainer";
  isHovered: boolean;
  /** Index among the container's tab children, -1 while it has none */
  activeIndex: number;
}

export type TabStatus = "inactive" | "active" | "hovered" | "disabled";
export type TabContainerStatus = "normal" | "disabled";

export interface TabVisual extends VisualFlags {
  kind: "tab";
  state: TabStatus;
}

export interface TabContainerVisual extends VisualFlags {
  kind: "tabContainer";
  state: TabContainerStatus;
}

export function createTab(): TabModel {
  return { kind: "tab", press: IDLE_PRESSABLE, isActive: false };
}

export function createTabContainer(): TabContainerModel {
  return { kind: "tabContainer", isHovered: false, activeIndex: -1 };
}

/**
 * A click only counts when it would change something: clicking the active
 * tab is a no-op.
 */
export function tabTransition(model: TabModel, event: WidgetEvent): Outcome<TabModel> {
  if (event.type === "keyPress" && (event.key === "ArrowLeft" || event.key === "ArrowRight")) {
    return { model, siblingStep: event.key === "ArrowLeft" ? -1 : 1 };
  }
  const { state, clicked } = pressable(model.press, event);
  const next = state === model.press ? model : { ...model, press: state };
  return { model: next, clicked: clicked && !model.isActive };
}

export function setTabActive(model: TabModel, isActive: boolean): TabModel {
  if (model.isActive === isActive) return model;
  return { ...model, isActive };
}

export function tabContainerTransition(
  model: TabContainerModel,
  event: WidgetEvent
): Outcome<TabContainerModel> {
  const isHovered = trackHover(model.isHovered, event);
  if (isHovered === model.isHovered) return { model };
  return { model: { ...model, isHovered } };
}

/** Move an index by one without wrapping */
export function stepTabIndex(current: number, count: number, step: -1 | 1): number {
  if (count <= 0) return -1;
  const clamped = Math.max(0, Math.min(count - 1, current));
  return Math.max(0, Math.min(count - 1, clamped + step));
}

/**
 * Active index after the tab at `removed` is taken out of a list that had
 * `count` tabs. Removing the active tab hands activation to the tab that
 * slides into its slot, or the new last tab.
 */
export function activeIndexAfterRemoval(active: number, removed: number, count: number): number {
  const remaining = count - 1;
  if (remaining <= 0) return -1;
  if (removed < active) return active - 1;
  if (removed === active) return Math.min(active, remaining - 1);
  return active;
}

export function tabVisual(model: TabModel, enabled: boolean, focused: boolean): TabVisual {
  let state: TabStatus = "inactive";
  if (!enabled) {
    state = "disabled";
  } else if (model.isActive) {
    state = "active";
  } else if (model.press.isHovered) {
    state = "hovered";
  }
  return { kind: "tab", state, hovered: model.press.isHovered, focused };
}

export function tabContainerVisual(
  model: TabContainerModel,
  enabled: boolean,
  focused: boolean
): TabContainerVisual {
  return {
    kind: "tabContainer",
    state: enabled ? "normal" : "disabled",
    hovered: model.isHovered,
    focused,
  };
}
