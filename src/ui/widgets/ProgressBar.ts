/**
 * Progress Bar Widget
 *
 * Display-only fill. The value is set programmatically; input only tracks
 * hover for style.
 */

import type { WidgetEvent } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { clamp } from "../../math/scalar";
import { trackHover } from "./interaction";

/** Progress bar configuration */
export interface ProgressBarOptions extends CommonOptions {
  kind: "progressBar";
  value?: number; // default: 0, clamped to [0, 1]
  /** Show the value as a percentage instead of the label */
  showText?: boolean;
}

export interface ProgressBarModel {
  kind: "progressBar";
  isHovered: boolean;
  value: number;
  showText: boolean;
}

export type ProgressBarStatus = "normal" | "disabled";

export interface ProgressBarVisual extends VisualFlags {
  kind: "progressBar";
  state: ProgressBarStatus;
  fill: number;
}

export function createProgressBar(options: ProgressBarOptions): ProgressBarModel {
  return {
    kind: "progressBar",
    isHovered: false,
    value: clamp(options.value ?? 0, 0, 1),
    showText: options.showText ?? false,
  };
}

export function progressBarTransition(
  model: ProgressBarModel,
  event: WidgetEvent
): Outcome<ProgressBarModel> {
  const isHovered = trackHover(model.isHovered, event);
  if (isHovered === model.isHovered) return { model };
  return { model: { ...model, isHovered } };
}

export function setProgress(
  model: ProgressBarModel,
  requested: number
): { model: ProgressBarModel; clamped: boolean } {
  const clamped = !Number.isFinite(requested) || requested < 0 || requested > 1;
  const value = clamp(requested, 0, 1);
  return { model: value === model.value ? model : { ...model, value }, clamped };
}

/** Percentage label, e.g. 0.426 -> "43%" */
export function progressText(model: ProgressBarModel): string {
  return `${Math.round(model.value * 100)}%`;
}

export function progressBarVisual(
  model: ProgressBarModel,
  enabled: boolean,
  focused: boolean
): ProgressBarVisual {
  return {
    kind: "progressBar",
    state: enabled ? "normal" : "disabled",
    fill: model.value,
    hovered: model.isHovered,
    focused,
  };
}
