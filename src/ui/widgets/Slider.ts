/**
 * Slider Widget
 *
 * Horizontal value slider with a draggable handle, optional step
 * quantization and keyboard adjustment.
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { clamp, decimalPlaces, isFiniteNumber, ratio, roundToPrecision } from "../../math/scalar";
import { trackHover } from "./interaction";

export const DEFAULT_SLIDER_MIN = 0;
export const DEFAULT_SLIDER_MAX = 100;
export const DEFAULT_HANDLE_WIDTH = 16;
export const DEFAULT_SLIDER_TRACK: SliderTrack = { start: 0, width: 200 };

/** Keyboard step as a fraction of the range when no step is configured */
const KEYBOARD_FRACTION = 0.01;
const PAGE_STEPS = 10;

/** Horizontal track geometry, in the same units as pointer x */
export interface SliderTrack {
  start: number;
  width: number;
}

/** Slider configuration */
export interface SliderOptions extends CommonOptions {
  kind: "slider";
  min?: number; // default: 0
  max?: number; // default: 100
  /** Quantization step (default: none, continuous) */
  step?: number;
  value?: number; // default: min
  track?: SliderTrack;
  handleWidth?: number; // default: 16
  onChange?: (value: number, id: WidgetId) => void;
}

/** In-flight drag gesture */
export interface SliderDrag {
  /** Pointer x minus handle center at press time */
  grabOffset: number;
  /** Value before the gesture started */
  startValue: number;
}

export interface SliderModel {
  kind: "slider";
  isHovered: boolean;
  min: number;
  max: number;
  step: number | null;
  value: number;
  track: SliderTrack;
  handleWidth: number;
  drag: SliderDrag | null;
}

export type SliderStatus = "idle" | "dragging" | "disabled";

export interface SliderVisual extends VisualFlags {
  kind: "slider";
  state: SliderStatus;
  /** Handle position as a 0-1 ratio of the track */
  fill: number;
}

type SliderRange = Pick<SliderModel, "min" | "max" | "step">;

function normalizeStep(step: number | undefined, min: number, max: number): number | null {
  if (!isFiniteNumber(step) || step === 0) return null;
  const span = max - min;
  if (span <= 0) return null;
  return Math.min(Math.abs(step), span);
}

function normalizeTrack(track: SliderTrack | undefined): SliderTrack {
  if (!track || !isFiniteNumber(track.start) || !isFiniteNumber(track.width)) {
    return DEFAULT_SLIDER_TRACK;
  }
  return { start: track.start, width: Math.max(0, track.width) };
}

/**
 * Snap to the nearest multiple of step counted from min.
 * The range ends are always reachable even when not a multiple.
 */
export function quantizeSliderValue(value: number, range: SliderRange): number {
  const clamped = clamp(value, range.min, range.max);
  if (range.step === null) return clamped;
  if (clamped === range.min || clamped === range.max) return clamped;

  const snapped = range.min + Math.round((clamped - range.min) / range.step) * range.step;
  const precision = Math.min(
    8,
    Math.max(decimalPlaces(range.min), decimalPlaces(range.max), decimalPlaces(range.step))
  );
  return clamp(roundToPrecision(snapped, precision), range.min, range.max);
}

export function createSlider(options: SliderOptions): SliderModel {
  let min = isFiniteNumber(options.min) ? options.min : DEFAULT_SLIDER_MIN;
  let max = isFiniteNumber(options.max) ? options.max : DEFAULT_SLIDER_MAX;
  if (min > max) [min, max] = [max, min];

  const range: SliderRange = { min, max, step: normalizeStep(options.step, min, max) };
  const initial = isFiniteNumber(options.value) ? options.value : min;

  return {
    kind: "slider",
    isHovered: false,
    ...range,
    value: quantizeSliderValue(initial, range),
    track: normalizeTrack(options.track),
    handleWidth: isFiniteNumber(options.handleWidth)
      ? Math.max(0, options.handleWidth)
      : DEFAULT_HANDLE_WIDTH,
    drag: null,
  };
}

export function sliderFill(model: SliderModel): number {
  return ratio(model.value, model.min, model.max);
}

function handleCenter(model: SliderModel): number {
  return model.track.start + sliderFill(model) * model.track.width;
}

/** Value under pointer x, clamped and quantized */
export function sliderValueAt(model: SliderModel, x: number): number {
  if (model.track.width <= 0) return model.min;
  const raw = model.min + ((x - model.track.start) / model.track.width) * (model.max - model.min);
  return quantizeSliderValue(raw, model);
}

/** Value moved by delta, rounded to the digits of its operands */
function nudge(model: SliderModel, delta: number): number {
  const precision = Math.min(
    8,
    Math.max(
      decimalPlaces(model.min),
      decimalPlaces(model.max),
      decimalPlaces(model.value),
      decimalPlaces(delta)
    )
  );
  return quantizeSliderValue(roundToPrecision(model.value + delta, precision), model);
}

function keyboardValue(model: SliderModel, key: string): number | null {
  const unit = model.step ?? (model.max - model.min) * KEYBOARD_FRACTION;
  switch (key) {
    case "ArrowLeft":
    case "ArrowDown":
      return nudge(model, -unit);
    case "ArrowRight":
    case "ArrowUp":
      return nudge(model, unit);
    case "PageDown":
      return nudge(model, -unit * PAGE_STEPS);
    case "PageUp":
      return nudge(model, unit * PAGE_STEPS);
    case "Home":
      return model.min;
    case "End":
      return model.max;
    default:
      return null;
  }
}

function withValue(model: SliderModel, value: number): Outcome<SliderModel> {
  if (value === model.value) return { model };
  return { model: { ...model, value }, valueChanged: true };
}

export function sliderTransition(model: SliderModel, event: WidgetEvent): Outcome<SliderModel> {
  switch (event.type) {
    case "pointerEnter":
    case "pointerLeave":
      return { model: { ...model, isHovered: trackHover(model.isHovered, event) } };

    case "pointerDown": {
      // Grabbing the handle keeps its offset; pressing the bare track jumps there
      const center = handleCenter(model);
      const onHandle = Math.abs(event.x - center) <= model.handleWidth / 2;
      const drag: SliderDrag = {
        grabOffset: onHandle ? event.x - center : 0,
        startValue: model.value,
      };
      const value = onHandle ? model.value : sliderValueAt(model, event.x);
      return withValue({ ...model, isHovered: true, drag }, value);
    }

    case "pointerMove":
      if (!model.drag) return { model };
      return withValue(model, sliderValueAt(model, event.x - model.drag.grabOffset));

    case "pointerUp":
      if (!model.drag) return { model };
      return { model: { ...model, drag: null } };

    case "keyPress": {
      const value = keyboardValue(model, event.key);
      if (value === null) return { model };
      return withValue(model, value);
    }

    default:
      return { model };
  }
}

/**
 * Abandon an in-flight drag, restoring the value it started from.
 */
export function cancelSliderDrag(model: SliderModel): Outcome<SliderModel> {
  const idle = { ...model, isHovered: false, drag: null };
  if (!model.drag) return { model: idle };
  return withValue(idle, model.drag.startValue);
}

export function setSliderValue(
  model: SliderModel,
  requested: number
): { model: SliderModel; clamped: boolean } {
  const clamped = !Number.isFinite(requested) || requested < model.min || requested > model.max;
  const value = quantizeSliderValue(requested, model);
  return { model: value === model.value ? model : { ...model, value }, clamped };
}

export function setSliderTrack(model: SliderModel, track: SliderTrack): SliderModel {
  return { ...model, track: normalizeTrack(track) };
}

export function sliderVisual(model: SliderModel, enabled: boolean, focused: boolean): SliderVisual {
  let state: SliderStatus = model.drag ? "dragging" : "idle";
  if (!enabled) state = "disabled";
  return { kind: "slider", state, fill: sliderFill(model), hovered: model.isHovered, focused };
}
