import type { WidgetEvent } from "../events";

export interface PressableState {
  isHovered: boolean;
  isPressed: boolean;
}

export interface PressableResult {
  state: PressableState;
  clicked: boolean;
}

export const IDLE_PRESSABLE: PressableState = { isHovered: false, isPressed: false };

/** Keys that activate a focused pressable widget */
export const ACTIVATION_KEYS: ReadonlySet<string> = new Set(["Enter", " "]);

export function isActivationKey(event: WidgetEvent): boolean {
  return event.type === "keyPress" && ACTIVATION_KEYS.has(event.key);
}

/**
 * Hover/press/click reducer shared by every clickable widget.
 *
 * A press survives the pointer leaving; the click commits only when the
 * release lands back on the widget that took the press.
 */
export function pressable(state: PressableState, event: WidgetEvent): PressableResult {
  switch (event.type) {
    case "pointerEnter":
      return { state: { ...state, isHovered: true }, clicked: false };
    case "pointerLeave":
      return { state: { ...state, isHovered: false }, clicked: false };
    case "pointerDown":
      return { state: { isHovered: true, isPressed: true }, clicked: false };
    case "pointerUp":
      if (!state.isPressed) return { state, clicked: false };
      return { state: { isHovered: event.inside, isPressed: false }, clicked: event.inside };
    case "keyPress":
      return { state, clicked: isActivationKey(event) };
    default:
      return { state, clicked: false };
  }
}

/** Hover-only tracking for widgets that never take a press */
export function trackHover(isHovered: boolean, event: WidgetEvent): boolean {
  if (event.type === "pointerEnter") return true;
  if (event.type === "pointerLeave") return false;
  return isHovered;
}
