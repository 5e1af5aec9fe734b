/**
 * Button Widget
 *
 * Clickable button state machine. Also used for dropdown options.
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { IDLE_PRESSABLE, pressable, type PressableState } from "./interaction";

/** Button configuration */
export interface ButtonOptions extends CommonOptions {
  kind: "button";
  /** Called once for every committed click */
  onClick?: (id: WidgetId) => void;
}

export interface ButtonModel {
  kind: "button";
  press: PressableState;
}

export type ButtonStatus = "normal" | "hovered" | "pressed" | "disabled";

export interface ButtonVisual extends VisualFlags {
  kind: "button";
  state: ButtonStatus;
}

export function createButton(): ButtonModel {
  return { kind: "button", press: IDLE_PRESSABLE };
}

export function buttonTransition(model: ButtonModel, event: WidgetEvent): Outcome<ButtonModel> {
  const { state, clicked } = pressable(model.press, event);
  if (state === model.press) return { model, clicked };
  return { model: { ...model, press: state }, clicked };
}

/**
 * Pressed wins over hovered for the whole gesture, including while the
 * pointer is dragged outside before release.
 */
export function buttonVisual(model: ButtonModel, enabled: boolean, focused: boolean): ButtonVisual {
  let state: ButtonStatus = "normal";
  if (!enabled) {
    state = "disabled";
  } else if (model.press.isPressed) {
    state = "pressed";
  } else if (model.press.isHovered) {
    state = "hovered";
  }
  return { kind: "button", state, hovered: model.press.isHovered, focused };
}
