/**
 * Style System Module
 *
 * Named base styles, state-driven resolution and the style registry.
 */

export type { BaseStyle, Color, StyleDescriptor } from "./types";
export { computeEffectiveColor, sameStyle } from "./types";
export { DEFAULT_BASE_STYLE, DISABLED_OPACITY, mergeBaseStyle } from "./theme";
export { emphasisOf, resolveStyle, type Emphasis } from "./resolve";
export { StyleRegistry, type StyleRegistryOptions } from "./StyleRegistry";
export {
  baseStyleSchema,
  colorSchema,
  partialBaseStyleSchema,
  styleSheetSchema,
  type BaseStyleInput,
  type StyleSheet,
} from "./schema";
