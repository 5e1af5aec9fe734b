/**
 * Checkbox Widget
 *
 * On/off toggle, or a radio button when grouped under a common parent.
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { IDLE_PRESSABLE, pressable, type PressableState } from "./interaction";

/** "toggle" flips on every click; "radio" only ever turns on */
export type CheckboxVariant = "toggle" | "radio";

/** Checkbox configuration */
export interface CheckboxOptions extends CommonOptions {
  kind: "checkbox";
  checked?: boolean; // default: false
  variant?: CheckboxVariant; // default: "toggle"
  onChange?: (checked: boolean, id: WidgetId) => void;
}

export interface CheckboxModel {
  kind: "checkbox";
  press: PressableState;
  checked: boolean;
  variant: CheckboxVariant;
}

export type CheckboxStatus = "unchecked" | "checked" | "disabled";

export interface CheckboxVisual extends VisualFlags {
  kind: "checkbox";
  state: CheckboxStatus;
  checked: boolean;
}

export function createCheckbox(options: CheckboxOptions): CheckboxModel {
  return {
    kind: "checkbox",
    press: IDLE_PRESSABLE,
    checked: options.checked ?? false,
    variant: options.variant ?? "toggle",
  };
}

export function checkboxTransition(
  model: CheckboxModel,
  event: WidgetEvent
): Outcome<CheckboxModel> {
  const { state, clicked } = pressable(model.press, event);
  const next = state === model.press ? model : { ...model, press: state };

  if (!clicked) return { model: next };

  // A checked radio stays checked; siblings are what change.
  if (model.variant === "radio" && model.checked) {
    return { model: next, clicked };
  }
  return { model: { ...next, checked: !model.checked }, clicked, valueChanged: true };
}

export function setChecked(model: CheckboxModel, checked: boolean): CheckboxModel {
  if (model.checked === checked) return model;
  return { ...model, checked };
}

export function checkboxVisual(
  model: CheckboxModel,
  enabled: boolean,
  focused: boolean
): CheckboxVisual {
  let state: CheckboxStatus = model.checked ? "checked" : "unchecked";
  if (!enabled) state = "disabled";
  return { kind: "checkbox", state, checked: model.checked, hovered: model.press.isHovered, focused };
}
