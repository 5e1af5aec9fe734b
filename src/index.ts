/**
 * Widgetry - frame-driven interaction state for UI widgets
 */

export const VERSION = "0.1.0";

export * from "./ui";
export * from "./style";
export * from "./host";
export { clamp, ratio } from "./math/scalar";
