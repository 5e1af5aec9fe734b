/**
 * Input Layer
 *
 * Turns raw host input into canonical events, each addressed to one widget.
 * Tracks which widget is hovered, which holds pointer capture and which
 * holds keyboard focus; holds no widget state.
 */

import {
  NO_MODIFIERS,
  type Modifiers,
  type RawInput,
  type WidgetEvent,
  type WidgetId,
} from "./events";

/** Pixels scrolled per wheel "line" */
export const WHEEL_LINE_HEIGHT = 20;

/** Primary (left) pointer button */
const PRIMARY_BUTTON = 0;

export interface InputLayerHooks {
  /** Whether a pressed widget takes keyboard focus (default: always) */
  canFocus?: (id: WidgetId) => boolean;
  /** Focus traversal for Tab / Shift+Tab (default: focus stays put) */
  nextFocus?: (current: WidgetId | null, backwards: boolean) => WidgetId | null;
}

interface PointerPosition {
  x: number;
  y: number;
}

/**
 * Normalizes input for the widget registry.
 */
export class InputLayer {
  private hovered: WidgetId | null = null;
  private captured: WidgetId | null = null;
  private focused: WidgetId | null = null;
  private position: PointerPosition | null = null;
  private hooks: InputLayerHooks;

  constructor(hooks: InputLayerHooks = {}) {
    this.hooks = hooks;
  }

  /** Widget under the pointer */
  getHovered(): WidgetId | null {
    return this.hovered;
  }

  /** Widget that took the current press, if any */
  getCaptured(): WidgetId | null {
    return this.captured;
  }

  getFocused(): WidgetId | null {
    return this.focused;
  }

  /**
   * Process one raw input record.
   *
   * @returns Canonical events in the order they must be applied
   */
  feed(input: RawInput): WidgetEvent[] {
    const events: WidgetEvent[] = [];

    switch (input.type) {
      case "pointerMove": {
        this.hover(input.hit, events);
        const { dx, dy } = this.moveTo(input.x, input.y);
        const target = this.captured ?? this.hovered;
        if (target !== null) {
          events.push({ type: "pointerMove", target, x: input.x, y: input.y, dx, dy });
        }
        break;
      }

      case "pointerDown": {
        this.hover(input.hit, events);
        this.moveTo(input.x, input.y);
        if ((input.button ?? PRIMARY_BUTTON) !== PRIMARY_BUTTON) break;
        if (this.captured !== null) break;

        const canFocus = this.hooks.canFocus;
        const focusTarget = input.hit !== null && (!canFocus || canFocus(input.hit)) ? input.hit : null;
        this.moveFocus(focusTarget, events);

        if (input.hit !== null) {
          this.captured = input.hit;
          events.push({ type: "pointerDown", target: input.hit, x: input.x, y: input.y });
        }
        break;
      }

      case "pointerUp": {
        this.hover(input.hit, events);
        this.moveTo(input.x, input.y);
        if ((input.button ?? PRIMARY_BUTTON) !== PRIMARY_BUTTON) break;
        const target = this.captured;
        if (target === null) break;

        this.captured = null;
        events.push({
          type: "pointerUp",
          target,
          x: input.x,
          y: input.y,
          inside: input.hit === target,
        });
        break;
      }

      case "pointerExit":
        this.hover(null, events);
        this.position = null;
        break;

      case "wheel": {
        this.hover(input.hit, events);
        if (this.hovered === null) break;
        const scale = input.unit === "line" ? WHEEL_LINE_HEIGHT : 1;
        events.push({
          type: "scroll",
          target: this.hovered,
          dx: (input.deltaX ?? 0) * scale,
          dy: input.deltaY * scale,
        });
        break;
      }

      case "keyDown": {
        const modifiers: Modifiers = { ...NO_MODIFIERS, ...input.modifiers };
        if (input.key === "Tab" && !modifiers.ctrl && !modifiers.alt && !modifiers.meta) {
          const next = this.hooks.nextFocus?.(this.focused, modifiers.shift) ?? this.focused;
          this.moveFocus(next, events);
          break;
        }
        if (this.focused !== null) {
          events.push({ type: "keyPress", target: this.focused, key: input.key, modifiers });
        }
        break;
      }

      case "focus": {
        const canFocus = this.hooks.canFocus;
        const target = input.target !== null && (!canFocus || canFocus(input.target)) ? input.target : null;
        this.moveFocus(target, events);
        break;
      }

      case "blur":
        this.moveFocus(null, events);
        break;
    }

    return events;
  }

  /**
   * Programmatic focus change.
   */
  setFocus(id: WidgetId | null): WidgetEvent[] {
    const events: WidgetEvent[] = [];
    this.moveFocus(id, events);
    return events;
  }

  /**
   * Drop every reference to a widget that no longer exists. No events are
   * emitted for it.
   */
  forget(id: WidgetId): void {
    if (this.hovered === id) this.hovered = null;
    if (this.captured === id) this.captured = null;
    if (this.focused === id) this.focused = null;
  }

  /** Release capture without a pointerUp (the captured widget was disabled) */
  releaseCapture(id: WidgetId): void {
    if (this.captured === id) this.captured = null;
  }

  private hover(hit: WidgetId | null, events: WidgetEvent[]): void {
    if (hit === this.hovered) return;
    if (this.hovered !== null) events.push({ type: "pointerLeave", target: this.hovered });
    this.hovered = hit;
    if (hit !== null) events.push({ type: "pointerEnter", target: hit });
  }

  private moveFocus(next: WidgetId | null, events: WidgetEvent[]): void {
    if (next === this.focused) return;
    if (this.focused !== null) events.push({ type: "focusLost", target: this.focused });
    this.focused = next;
    if (next !== null) events.push({ type: "focusGained", target: next });
  }

  private moveTo(x: number, y: number): { dx: number; dy: number } {
    const previous = this.position;
    this.position = { x, y };
    if (!previous) return { dx: 0, dy: 0 };
    return { dx: x - previous.x, dy: y - previous.y };
  }
}
