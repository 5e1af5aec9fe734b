/**
 * Scrollable Widget
 *
 * Scroll container: wheel deltas and drag gestures move a single-axis
 * offset kept within [0, contentExtent - viewportExtent].
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { clamp, isFiniteNumber } from "../../math/scalar";
import { trackHover } from "./interaction";

export type ScrollAxis = "vertical" | "horizontal";

/** Scrollable configuration */
export interface ScrollableOptions extends CommonOptions {
  kind: "scrollable";
  contentExtent?: number; // default: 0
  viewportExtent?: number; // default: 0
  offset?: number; // default: 0
  /** Multiplier applied to wheel deltas (default: 1) */
  sensitivity?: number;
  axis?: ScrollAxis; // default: "vertical"
  onScroll?: (offset: number, id: WidgetId) => void;
}

export interface ScrollableModel {
  kind: "scrollable";
  isHovered: boolean;
  axis: ScrollAxis;
  offset: number;
  contentExtent: number;
  viewportExtent: number;
  sensitivity: number;
  isDragging: boolean;
}

export type ScrollableStatus = "idle" | "disabled";

export interface ScrollableVisual extends VisualFlags {
  kind: "scrollable";
  state: ScrollableStatus;
  offset: number;
}

function extent(value: number | undefined): number {
  return isFiniteNumber(value) ? Math.max(0, value) : 0;
}

export function maxScrollOffset(model: Pick<ScrollableModel, "contentExtent" | "viewportExtent">): number {
  return Math.max(0, model.contentExtent - model.viewportExtent);
}

export function createScrollable(options: ScrollableOptions): ScrollableModel {
  const model: ScrollableModel = {
    kind: "scrollable",
    isHovered: false,
    axis: options.axis ?? "vertical",
    offset: 0,
    contentExtent: extent(options.contentExtent),
    viewportExtent: extent(options.viewportExtent),
    sensitivity: isFiniteNumber(options.sensitivity) ? options.sensitivity : 1,
    isDragging: false,
  };
  return { ...model, offset: clamp(options.offset ?? 0, 0, maxScrollOffset(model)) };
}

function scrollTo(model: ScrollableModel, offset: number): Outcome<ScrollableModel> {
  const clamped = clamp(offset, 0, maxScrollOffset(model));
  if (clamped === model.offset) return { model };
  return { model: { ...model, offset: clamped }, valueChanged: true };
}

export function scrollableTransition(
  model: ScrollableModel,
  event: WidgetEvent
): Outcome<ScrollableModel> {
  switch (event.type) {
    case "pointerEnter":
    case "pointerLeave":
      return { model: { ...model, isHovered: trackHover(model.isHovered, event) } };

    case "scroll": {
      const delta = model.axis === "vertical" ? event.dy : event.dx;
      return scrollTo(model, model.offset + delta * model.sensitivity);
    }

    case "pointerDown":
      return { model: { ...model, isDragging: true } };

    case "pointerMove": {
      if (!model.isDragging) return { model };
      // Content follows the pointer
      const delta = model.axis === "vertical" ? event.dy : event.dx;
      return scrollTo(model, model.offset - delta);
    }

    case "pointerUp":
      return { model: model.isDragging ? { ...model, isDragging: false } : model };

    default:
      return { model };
  }
}

export function setScrollOffset(
  model: ScrollableModel,
  requested: number
): { model: ScrollableModel; clamped: boolean } {
  const max = maxScrollOffset(model);
  const clamped = !Number.isFinite(requested) || requested < 0 || requested > max;
  const offset = clamp(requested, 0, max);
  return { model: offset === model.offset ? model : { ...model, offset }, clamped };
}

/**
 * Replace the extents (host layout changed) and pull the offset back
 * into the new bounds.
 */
export function setScrollExtents(
  model: ScrollableModel,
  contentExtent: number,
  viewportExtent: number
): Outcome<ScrollableModel> {
  const resized = {
    ...model,
    contentExtent: extent(contentExtent),
    viewportExtent: extent(viewportExtent),
  };
  return scrollTo(resized, resized.offset);
}

export function scrollableVisual(
  model: ScrollableModel,
  enabled: boolean,
  focused: boolean
): ScrollableVisual {
  return {
    kind: "scrollable",
    state: enabled ? "idle" : "disabled",
    offset: model.offset,
    hovered: model.isHovered,
    focused,
  };
}
