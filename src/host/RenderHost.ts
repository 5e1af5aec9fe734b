/**
 * Render Host
 *
 * Drawing and layout capabilities the embedding application provides.
 */

import type { WidgetId } from "../ui/events";
import type { Color } from "../style/types";

/** Rectangle in host pixels */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TextStyle {
  color: Color;
  fontSize: number;
  align: "left" | "center" | "right";
}

/**
 * Minimal drawing surface: filled and stroked rectangles plus text.
 */
export interface RenderHost {
  fillRect(rect: Rect, color: Color): void;
  strokeRect(rect: Rect, color: Color, lineWidth: number): void;
  label(text: string, x: number, y: number, style: TextStyle): void;
}

/** Layout boxes computed by the host; null when a widget has no box */
export interface LayoutSource {
  getRect(id: WidgetId): Rect | null;
}
