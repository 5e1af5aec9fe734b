/**
 * Style System Types
 *
 * Base styles (named, application-supplied) and the resolved descriptors
 * handed to the host renderer. All colors are RGBA in 0-1 range.
 */

/** RGBA color in 0-1 range */
export type Color = readonly [number, number, number, number];

/**
 * Named base style. Every interaction state picks its colors from here.
 */
export interface BaseStyle {
  /** Idle background */
  background: Color;
  hoverBackground: Color;
  /** Background while pressed, dragged or open */
  pressedBackground: Color;
  disabledBackground: Color;
  /** Checked checkbox, active tab, slider and progress fill */
  accentColor: Color;
  borderColor: Color;
  /** Border color while the widget holds keyboard focus */
  focusBorderColor: Color;
  borderWidth: number;
  textColor: Color;
  disabledTextColor: Color;
  fontSize: number;
  padding: number;
  borderRadius: number;
  /** Scale applied while pressed (default: 1) */
  pressedScale: number;
  /** Size hints for the host layout (null: layout decides) */
  width: number | null;
  height: number | null;
}

/**
 * Resolved style for one widget in one visual state. Frozen; a new
 * descriptor is produced whenever anything changes.
 */
export interface StyleDescriptor {
  readonly background: Color;
  readonly borderColor: Color;
  readonly borderWidth: number;
  readonly borderRadius: number;
  readonly textColor: Color;
  readonly fontSize: number;
  readonly padding: number;
  readonly accentColor: Color;
  readonly scale: number;
  /** Overall opacity multiplier 0-1 */
  readonly opacity: number;
  /** Filled share of the track for sliders and progress bars */
  readonly fill: number | null;
  readonly width: number | null;
  readonly height: number | null;
}

function sameColor(a: Color, b: Color): boolean {
  return a[0] === b[0] && a[1] === b[1] && a[2] === b[2] && a[3] === b[3];
}

/** Field-wise equality of two descriptors */
export function sameStyle(a: StyleDescriptor, b: StyleDescriptor): boolean {
  if (a === b) return true;
  return (
    sameColor(a.background, b.background) &&
    sameColor(a.borderColor, b.borderColor) &&
    sameColor(a.textColor, b.textColor) &&
    sameColor(a.accentColor, b.accentColor) &&
    a.borderWidth === b.borderWidth &&
    a.borderRadius === b.borderRadius &&
    a.fontSize === b.fontSize &&
    a.padding === b.padding &&
    a.scale === b.scale &&
    a.opacity === b.opacity &&
    a.fill === b.fill &&
    a.width === b.width &&
    a.height === b.height
  );
}

/**
 * Compute effective color with opacity applied.
 *
 * @param baseColor - Base RGBA color
 * @param opacity - Overall opacity multiplier
 * @returns Color with combined opacity
 */
export function computeEffectiveColor(baseColor: Color, opacity: number): Color {
  const effectiveAlpha = baseColor[3] * opacity;
  return [baseColor[0], baseColor[1], baseColor[2], effectiveAlpha];
}
