/**
 * Tooltip Widget
 *
 * Hover-delayed hint attached to its owner (the parent widget). Driven by
 * the owner's pointer events and advanced by per-frame delta time.
 */

import type { WidgetEvent } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { isFiniteNumber } from "../../math/scalar";

/** Seconds of continuous hover before the tooltip shows */
export const DEFAULT_SHOW_DELAY = 0.5;

/** Tooltip configuration */
export interface TooltipOptions extends CommonOptions {
  kind: "tooltip";
  text: string;
  showDelay?: number;
}

export type TooltipPhase =
  | { status: "hidden" }
  /** `armed` is false during the frame the owner was entered */
  | { status: "pendingShow"; elapsed: number; armed: boolean }
  | { status: "shown" };

export interface TooltipModel {
  kind: "tooltip";
  text: string;
  showDelay: number;
  phase: TooltipPhase;
}

export type TooltipStatus = "hidden" | "pendingShow" | "shown" | "disabled";

export interface TooltipVisual extends VisualFlags {
  kind: "tooltip";
  state: TooltipStatus;
  elapsed: number;
}

const HIDDEN: TooltipPhase = { status: "hidden" };

export function createTooltip(options: TooltipOptions): TooltipModel {
  return {
    kind: "tooltip",
    text: options.text,
    showDelay: isFiniteNumber(options.showDelay) ? Math.max(0, options.showDelay) : DEFAULT_SHOW_DELAY,
    phase: HIDDEN,
  };
}

export function hideTooltip(model: TooltipModel): TooltipModel {
  if (model.phase.status === "hidden") return model;
  return { ...model, phase: HIDDEN };
}

/**
 * React to an event addressed to the owner widget.
 */
export function tooltipOwnerEvent(model: TooltipModel, event: WidgetEvent): Outcome<TooltipModel> {
  switch (event.type) {
    case "pointerEnter":
      if (model.phase.status !== "hidden") return { model };
      return { model: { ...model, phase: { status: "pendingShow", elapsed: 0, armed: false } } };
    case "pointerLeave":
    case "pointerDown":
      return { model: hideTooltip(model) };
    default:
      return { model };
  }
}

/** Events aimed at the tooltip itself change nothing */
export function tooltipTransition(model: TooltipModel, _event: WidgetEvent): Outcome<TooltipModel> {
  return { model };
}

/**
 * Advance a pending tooltip by one frame. The frame in which the owner was
 * entered does not count towards the delay.
 */
export function advanceTooltip(model: TooltipModel, deltaTime: number): TooltipModel {
  const phase = model.phase;
  if (phase.status !== "pendingShow") return model;

  const elapsed = phase.armed ? phase.elapsed + deltaTime : phase.elapsed;
  if (elapsed >= model.showDelay) {
    return { ...model, phase: { status: "shown" } };
  }
  return { ...model, phase: { status: "pendingShow", elapsed, armed: true } };
}

export function isTooltipShown(model: TooltipModel): boolean {
  return model.phase.status === "shown";
}

export function tooltipVisual(model: TooltipModel, enabled: boolean, focused: boolean): TooltipVisual {
  const state: TooltipStatus = enabled ? model.phase.status : "disabled";
  const elapsed = model.phase.status === "pendingShow" ? model.phase.elapsed : 0;
  return { kind: "tooltip", state, elapsed, hovered: false, focused };
}
