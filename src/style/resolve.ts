/**
 * Style Resolution
 *
 * Pure mapping from a base style and a widget's visual state to the
 * descriptor the host applies. Identical inputs always give equal output.
 */

import type { VisualState } from "../ui/types";
import type { BaseStyle, Color, StyleDescriptor } from "./types";
import { DISABLED_OPACITY } from "./theme";

/** Which background slot a visual state draws from */
export type Emphasis = "normal" | "hovered" | "pressed" | "accent" | "disabled";

export function emphasisOf(visual: VisualState): Emphasis {
  if (visual.state === "disabled") return "disabled";

  switch (visual.kind) {
    case "button":
      if (visual.state === "pressed") return "pressed";
      return visual.state === "hovered" ? "hovered" : "normal";
    case "checkbox":
      if (visual.checked) return "accent";
      return visual.hovered ? "hovered" : "normal";
    case "slider":
      if (visual.state === "dragging") return "pressed";
      return visual.hovered ? "hovered" : "normal";
    case "dropdown":
      if (visual.state === "open") return "pressed";
      return visual.hovered ? "hovered" : "normal";
    case "tab":
      if (visual.state === "active") return "accent";
      return visual.state === "hovered" ? "hovered" : "normal";
    case "tooltip":
    case "scrollable":
    case "tabContainer":
    case "panel":
    case "progressBar":
      return "normal";
    default: {
      const unreachable: never = visual;
      return unreachable;
    }
  }
}

function backgroundFor(base: BaseStyle, emphasis: Emphasis): Color {
  switch (emphasis) {
    case "disabled":
      return base.disabledBackground;
    case "pressed":
      return base.pressedBackground;
    case "accent":
      return base.accentColor;
    case "hovered":
      return base.hoverBackground;
    case "normal":
      return base.background;
  }
}

function fillOf(visual: VisualState): number | null {
  if (visual.kind === "slider" || visual.kind === "progressBar") return visual.fill;
  return null;
}

export function resolveStyle(base: BaseStyle, visual: VisualState): StyleDescriptor {
  const emphasis = emphasisOf(visual);
  const disabled = emphasis === "disabled";

  return Object.freeze({
    background: backgroundFor(base, emphasis),
    borderColor: visual.focused && !disabled ? base.focusBorderColor : base.borderColor,
    borderWidth: base.borderWidth,
    borderRadius: base.borderRadius,
    textColor: disabled ? base.disabledTextColor : base.textColor,
    fontSize: base.fontSize,
    padding: base.padding,
    accentColor: base.accentColor,
    scale: emphasis === "pressed" ? base.pressedScale : 1,
    opacity: disabled ? DISABLED_OPACITY : 1,
    fill: fillOf(visual),
    width: base.width,
    height: base.height,
  });
}
