/**
 * Panel Widget
 *
 * Grouping container. A collapsible panel hides its children while collapsed.
 */

import type { WidgetEvent } from "../events";
import type { CommonOptions, Outcome, VisualFlags } from "../types";
import { trackHover } from "./interaction";

/** Panel configuration */
export interface PanelOptions extends CommonOptions {
  kind: "panel";
  title?: string;
  collapsible?: boolean; // default: false
  collapsed?: boolean; // default: false, ignored unless collapsible
}

export interface PanelModel {
  kind: "panel";
  isHovered: boolean;
  title: string | null;
  collapsible: boolean;
  isCollapsed: boolean;
}

export type PanelStatus = "expanded" | "collapsed" | "disabled";

export interface PanelVisual extends VisualFlags {
  kind: "panel";
  state: PanelStatus;
}

export function createPanel(options: PanelOptions): PanelModel {
  const collapsible = options.collapsible ?? false;
  return {
    kind: "panel",
    isHovered: false,
    title: options.title ?? null,
    collapsible,
    isCollapsed: collapsible && (options.collapsed ?? false),
  };
}

export function panelTransition(model: PanelModel, event: WidgetEvent): Outcome<PanelModel> {
  const isHovered = trackHover(model.isHovered, event);
  if (isHovered === model.isHovered) return { model };
  return { model: { ...model, isHovered } };
}

export function setCollapsed(model: PanelModel, isCollapsed: boolean): PanelModel {
  if (model.isCollapsed === isCollapsed) return model;
  return { ...model, isCollapsed };
}

export function panelVisual(model: PanelModel, enabled: boolean, focused: boolean): PanelVisual {
  let state: PanelStatus = model.isCollapsed ? "collapsed" : "expanded";
  if (!enabled) state = "disabled";
  return { kind: "panel", state, hovered: model.isHovered, focused };
}
