/**
 * Widget Dispatch
 *
 * Uniform entry points over the closed set of widget kinds. Each function
 * switches on `kind` and hands off to that kind's state machine.
 */

import type { WidgetEvent } from "../events";
import type {
  CreateOptions,
  Outcome,
  VisualState,
  WidgetKind,
  WidgetModel,
  WidgetValue,
} from "../types";
import { IDLE_PRESSABLE } from "./interaction";
import { buttonTransition, buttonVisual, createButton } from "./Button";
import { checkboxTransition, checkboxVisual, createCheckbox } from "./Checkbox";
import { cancelSliderDrag, createSlider, sliderTransition, sliderVisual } from "./Slider";
import { closeDropdown, createDropdown, dropdownTransition, dropdownVisual } from "./Dropdown";
import { createTooltip, hideTooltip, tooltipTransition, tooltipVisual } from "./Tooltip";
import { createScrollable, scrollableTransition, scrollableVisual } from "./Scrollable";
import {
  createTab,
  createTabContainer,
  tabContainerTransition,
  tabContainerVisual,
  tabTransition,
  tabVisual,
} from "./TabContainer";
import { createPanel, panelTransition, panelVisual } from "./Panel";
import { createProgressBar, progressBarTransition, progressBarVisual } from "./ProgressBar";

function unreachable(value: never): never {
  throw new Error(`Unhandled widget kind: ${JSON.stringify(value)}`);
}

export function createModel(options: CreateOptions): WidgetModel {
  switch (options.kind) {
    case "button":
      return createButton();
    case "checkbox":
      return createCheckbox(options);
    case "slider":
      return createSlider(options);
    case "dropdown":
      return createDropdown(options);
    case "tooltip":
      return createTooltip(options);
    case "scrollable":
      return createScrollable(options);
    case "tab":
      return createTab();
    case "tabContainer":
      return createTabContainer();
    case "panel":
      return createPanel(options);
    case "progressBar":
      return createProgressBar(options);
    default:
      return unreachable(options);
  }
}

/** Feed one canonical event to the widget's own state machine */
export function applyEvent(model: WidgetModel, event: WidgetEvent): Outcome<WidgetModel> {
  switch (model.kind) {
    case "button":
      return buttonTransition(model, event);
    case "checkbox":
      return checkboxTransition(model, event);
    case "slider":
      return sliderTransition(model, event);
    case "dropdown":
      return dropdownTransition(model, event);
    case "tooltip":
      return tooltipTransition(model, event);
    case "scrollable":
      return scrollableTransition(model, event);
    case "tab":
      return tabTransition(model, event);
    case "tabContainer":
      return tabContainerTransition(model, event);
    case "panel":
      return panelTransition(model, event);
    case "progressBar":
      return progressBarTransition(model, event);
    default:
      return unreachable(model);
  }
}

/**
 * Drop hover and any in-flight gesture. Used when a widget is disabled.
 * Only a slider drag can move the committed value (it reverts).
 */
export function resetModel(model: WidgetModel): Outcome<WidgetModel> {
  switch (model.kind) {
    case "button":
    case "checkbox":
    case "tab":
      return { model: { ...model, press: IDLE_PRESSABLE } };
    case "dropdown":
      return { model: closeDropdown({ ...model, press: IDLE_PRESSABLE }) };
    case "slider":
      return cancelSliderDrag(model);
    case "tooltip":
      return { model: hideTooltip(model) };
    case "scrollable":
      return { model: { ...model, isHovered: false, isDragging: false } };
    case "tabContainer":
    case "panel":
    case "progressBar":
      return { model: { ...model, isHovered: false } };
    default:
      return unreachable(model);
  }
}

export function visualOf(model: WidgetModel, enabled: boolean, focused: boolean): VisualState {
  switch (model.kind) {
    case "button":
      return buttonVisual(model, enabled, focused);
    case "checkbox":
      return checkboxVisual(model, enabled, focused);
    case "slider":
      return sliderVisual(model, enabled, focused);
    case "dropdown":
      return dropdownVisual(model, enabled, focused);
    case "tooltip":
      return tooltipVisual(model, enabled, focused);
    case "scrollable":
      return scrollableVisual(model, enabled, focused);
    case "tab":
      return tabVisual(model, enabled, focused);
    case "tabContainer":
      return tabContainerVisual(model, enabled, focused);
    case "panel":
      return panelVisual(model, enabled, focused);
    case "progressBar":
      return progressBarVisual(model, enabled, focused);
    default:
      return unreachable(model);
  }
}

/** Committed value, or undefined for kinds that carry none */
export function valueOf(model: WidgetModel): WidgetValue | undefined {
  switch (model.kind) {
    case "checkbox":
      return model.checked;
    case "slider":
      return model.value;
    case "dropdown":
      return model.selected;
    case "scrollable":
      return model.offset;
    case "tabContainer":
      return model.activeIndex;
    case "panel":
      return model.isCollapsed;
    case "progressBar":
      return model.value;
    case "button":
    case "tooltip":
    case "tab":
      return undefined;
    default:
      return unreachable(model);
  }
}

/** Whether the widget currently lets its (non-tooltip) children show */
export function showsChildren(model: WidgetModel): boolean {
  switch (model.kind) {
    case "dropdown":
      return model.isOpen;
    case "tab":
      return model.isActive;
    case "panel":
      return !model.isCollapsed;
    default:
      return true;
  }
}

const FOCUSABLE_KINDS: ReadonlySet<WidgetKind> = new Set([
  "button",
  "checkbox",
  "slider",
  "dropdown",
  "tab",
]);

/** Kinds that take keyboard focus from a press or Tab traversal */
export function isFocusableKind(kind: WidgetKind): boolean {
  return FOCUSABLE_KINDS.has(kind);
}

/**
 * Composition rules. `parent` is null for a root widget.
 */
export function canHost(parent: WidgetKind | null, child: WidgetKind): boolean {
  switch (parent) {
    case null:
      return child !== "tab" && child !== "tooltip";
    case "panel":
    case "scrollable":
    case "tab":
      return child !== "tab";
    case "tabContainer":
      return child === "tab" || child === "tooltip";
    case "dropdown":
      return child === "button" || child === "tooltip";
    case "button":
    case "checkbox":
    case "slider":
    case "progressBar":
      return child === "tooltip";
    case "tooltip":
      return false;
    default:
      return unreachable(parent);
  }
}
