/**
 * Host Integration
 *
 * Boundary between frame output and the embedding application's renderer.
 */

export { HostShim, scaleRect } from "./HostShim";
export type { LayoutSource, Rect, RenderHost, TextStyle } from "./RenderHost";
