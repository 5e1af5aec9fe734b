/**
 * Style Theme
 *
 * Fallback values for every base-style field, and the merge that fills a
 * partial base style from them.
 */

import type { BaseStyle } from "./types";

/** Dark theme every named style starts from */
export const DEFAULT_BASE_STYLE: BaseStyle = {
  background: [0.15, 0.15, 0.15, 1.0],
  hoverBackground: [0.25, 0.25, 0.35, 1.0],
  pressedBackground: [0.35, 0.35, 0.45, 1.0],
  disabledBackground: [0.3, 0.3, 0.3, 1.0],
  accentColor: [0.3, 0.6, 1.0, 1.0],
  borderColor: [0.4, 0.4, 0.4, 0.5],
  focusBorderColor: [0.3, 0.6, 1.0, 1.0],
  borderWidth: 1,
  textColor: [0.9, 0.9, 0.9, 1.0],
  disabledTextColor: [0.5, 0.5, 0.5, 1.0],
  fontSize: 14,
  padding: 8,
  borderRadius: 4,
  pressedScale: 1,
  width: null,
  height: null,
};

/** Opacity multiplier applied to disabled widgets */
export const DISABLED_OPACITY = 0.6;

/** Fill a partial base style from the defaults */
export function mergeBaseStyle(partial: Partial<BaseStyle>): BaseStyle {
  const d = DEFAULT_BASE_STYLE;
  return {
    background: partial.background ?? d.background,
    hoverBackground: partial.hoverBackground ?? d.hoverBackground,
    pressedBackground: partial.pressedBackground ?? d.pressedBackground,
    disabledBackground: partial.disabledBackground ?? d.disabledBackground,
    accentColor: partial.accentColor ?? d.accentColor,
    borderColor: partial.borderColor ?? d.borderColor,
    focusBorderColor: partial.focusBorderColor ?? d.focusBorderColor,
    borderWidth: partial.borderWidth ?? d.borderWidth,
    textColor: partial.textColor ?? d.textColor,
    disabledTextColor: partial.disabledTextColor ?? d.disabledTextColor,
    fontSize: partial.fontSize ?? d.fontSize,
    padding: partial.padding ?? d.padding,
    borderRadius: partial.borderRadius ?? d.borderRadius,
    pressedScale: partial.pressedScale ?? d.pressedScale,
    width: partial.width ?? d.width,
    height: partial.height ?? d.height,
  };
}
