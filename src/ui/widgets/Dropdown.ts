/**
 * Dropdown Widget
 *
 * Header that opens an option list. Options are child button widgets owned
 * by the registry; this model only tracks counts and indices.
 */

import type { WidgetEvent, WidgetId } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { IDLE_PRESSABLE, pressable, type PressableState } from "./interaction";

/** Dropdown configuration */
export interface DropdownOptions extends CommonOptions {
  kind: "dropdown";
  /** Option labels, created as child buttons in order */
  options?: string[];
  selected?: number | null; // default: null
  onChange?: (selected: number | null, id: WidgetId) => void;
}

export interface DropdownModel {
  kind: "dropdown";
  press: PressableState;
  isOpen: boolean;
  selected: number | null;
  /** Option under hover or keyboard cursor while open */
  highlighted: number | null;
  optionCount: number;
}

export type DropdownStatus = "closed" | "open" | "disabled";

export interface DropdownVisual extends VisualFlags {
  kind: "dropdown";
  state: DropdownStatus;
  highlighted: number | null;
}

/**
 * Clamp an option index into the list. An empty list only holds null.
 */
export function clampSelection(
  index: number | null,
  count: number
): { value: number | null; clamped: boolean } {
  if (index === null) return { value: null, clamped: false };
  if (count <= 0) return { value: null, clamped: true };
  if (!Number.isInteger(index)) {
    const rounded = Number.isFinite(index) ? Math.round(index) : 0;
    return { value: Math.max(0, Math.min(count - 1, rounded)), clamped: true };
  }
  if (index < 0) return { value: 0, clamped: true };
  if (index >= count) return { value: count - 1, clamped: true };
  return { value: index, clamped: false };
}

export function createDropdown(options: DropdownOptions): DropdownModel {
  const optionCount = options.options?.length ?? 0;
  return {
    kind: "dropdown",
    press: IDLE_PRESSABLE,
    isOpen: false,
    selected: clampSelection(options.selected ?? null, optionCount).value,
    highlighted: null,
    optionCount,
  };
}

export function openDropdown(model: DropdownModel): DropdownModel {
  if (model.isOpen) return model;
  return { ...model, isOpen: true, highlighted: model.selected };
}

export function closeDropdown(model: DropdownModel): DropdownModel {
  if (!model.isOpen && model.highlighted === null) return model;
  return { ...model, isOpen: false, highlighted: null };
}

/** Commit an option and close the list */
export function selectOption(model: DropdownModel, index: number): Outcome<DropdownModel> {
  const closed = closeDropdown(model);
  if (model.selected === index) return { model: closed };
  return { model: { ...closed, selected: index }, valueChanged: true };
}

export function highlightOption(model: DropdownModel, index: number | null): DropdownModel {
  if (!model.isOpen || model.highlighted === index) return model;
  return { ...model, highlighted: index };
}

function moveHighlight(model: DropdownModel, step: 1 | -1): DropdownModel {
  if (model.optionCount === 0) return model;
  if (model.highlighted === null) {
    return highlightOption(model, step === 1 ? 0 : model.optionCount - 1);
  }
  const next = Math.max(0, Math.min(model.optionCount - 1, model.highlighted + step));
  return highlightOption(model, next);
}

function openListKeys(model: DropdownModel, key: string): Outcome<DropdownModel> | null {
  switch (key) {
    case "Escape":
      return { model: closeDropdown(model) };
    case "ArrowDown":
      return { model: moveHighlight(model, 1) };
    case "ArrowUp":
      return { model: moveHighlight(model, -1) };
    case "Enter":
    case " ":
      if (model.highlighted === null) return { model: closeDropdown(model) };
      return selectOption(model, model.highlighted);
    default:
      return null;
  }
}

export function dropdownTransition(
  model: DropdownModel,
  event: WidgetEvent
): Outcome<DropdownModel> {
  if (event.type === "keyPress") {
    if (model.isOpen) return openListKeys(model, event.key) ?? { model };
    if (event.key === "ArrowDown") return { model: openDropdown(model) };
  }

  const { state, clicked } = pressable(model.press, event);
  const next = state === model.press ? model : { ...model, press: state };
  if (!clicked) return { model: next };
  return { model: next.isOpen ? closeDropdown(next) : openDropdown(next) };
}

/**
 * Adjust indices after the option at `removed` left the list.
 */
export function removeOption(model: DropdownModel, removed: number): Outcome<DropdownModel> {
  const optionCount = Math.max(0, model.optionCount - 1);
  const shift = (index: number | null): number | null => {
    if (index === null || index === removed) return null;
    return index > removed ? index - 1 : index;
  };
  const selected = shift(model.selected);
  return {
    model: { ...model, optionCount, selected, highlighted: shift(model.highlighted) },
    valueChanged: selected !== model.selected,
  };
}

export function addOption(model: DropdownModel): DropdownModel {
  return { ...model, optionCount: model.optionCount + 1 };
}

export function dropdownVisual(
  model: DropdownModel,
  enabled: boolean,
  focused: boolean
): DropdownVisual {
  let state: DropdownStatus = model.isOpen ? "open" : "closed";
  if (!enabled) state = "disabled";
  return {
    kind: "dropdown",
    state,
    highlighted: enabled ? model.highlighted : null,
    hovered: model.press.isHovered,
    focused,
  };
}
