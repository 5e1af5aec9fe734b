/**
 * Widget Types
 *
 * Kinds, values, visual states, creation options and frame output shared by
 * the registry, the state machines and the frame driver.
 */

import type { WidgetId } from "./events";
import type { StyleDescriptor } from "../style/types";
import type { ButtonModel, ButtonOptions, ButtonVisual } from "./widgets/Button";
import type { CheckboxModel, CheckboxOptions, CheckboxVisual } from "./widgets/Checkbox";
import type { SliderModel, SliderOptions, SliderVisual } from "./widgets/Slider";
import type { DropdownModel, DropdownOptions, DropdownVisual } from "./widgets/Dropdown";
import type { TooltipModel, TooltipOptions, TooltipVisual } from "./widgets/Tooltip";
import type { ScrollableModel, ScrollableOptions, ScrollableVisual } from "./widgets/Scrollable";
import type {
  TabModel,
  TabOptions,
  TabVisual,
  TabContainerModel,
  TabContainerOptions,
  TabContainerVisual,
} from "./widgets/TabContainer";
import type { PanelModel, PanelOptions, PanelVisual } from "./widgets/Panel";
import type { ProgressBarModel, ProgressBarOptions, ProgressBarVisual } from "./widgets/ProgressBar";

export type { WidgetId } from "./events";

export type WidgetKind =
  | "button"
  | "checkbox"
  | "slider"
  | "dropdown"
  | "tooltip"
  | "scrollable"
  | "tab"
  | "tabContainer"
  | "panel"
  | "progressBar";

export const WIDGET_KINDS: readonly WidgetKind[] = [
  "button",
  "checkbox",
  "slider",
  "dropdown",
  "tooltip",
  "scrollable",
  "tab",
  "tabContainer",
  "panel",
  "progressBar",
];

/**
 * Committed value of a value-bearing widget: checkbox and panel (collapsed)
 * hold booleans, dropdown holds an option index or null, the rest numbers.
 */
export type WidgetValue = boolean | number | null;

/** Interaction flags every visual state carries for style purposes */
export interface VisualFlags {
  hovered: boolean;
  focused: boolean;
}

/** Fields accepted by every kind's creation options */
export interface CommonOptions {
  /** Owning container (default: none, a root widget) */
  parent?: WidgetId | null;
  /** Named base style (default: the kind name, e.g. "slider") */
  baseStyle?: string;
  /** Initial enabled flag (default: true) */
  enabled?: boolean;
  /** Display text (default: "") */
  label?: string;
}

export type CreateOptions =
  | ButtonOptions
  | CheckboxOptions
  | SliderOptions
  | DropdownOptions
  | TooltipOptions
  | ScrollableOptions
  | TabOptions
  | TabContainerOptions
  | PanelOptions
  | ProgressBarOptions;

export type WidgetModel =
  | ButtonModel
  | CheckboxModel
  | SliderModel
  | DropdownModel
  | TooltipModel
  | ScrollableModel
  | TabModel
  | TabContainerModel
  | PanelModel
  | ProgressBarModel;

export type VisualState =
  | ButtonVisual
  | CheckboxVisual
  | SliderVisual
  | DropdownVisual
  | TooltipVisual
  | ScrollableVisual
  | TabVisual
  | TabContainerVisual
  | PanelVisual
  | ProgressBarVisual;

/** Result of feeding one event (or a reset) to a state machine */
export interface Outcome<M> {
  model: M;
  /** A press was committed as a click */
  clicked?: boolean;
  /** The committed value moved */
  valueChanged?: boolean;
  /** The widget asks its container to activate the previous/next sibling */
  siblingStep?: -1 | 1;
}

export type Notification =
  | { type: "click"; id: WidgetId }
  | { type: "valueChanged"; id: WidgetId; kind: WidgetKind; value: WidgetValue }
  | { type: "scrollChanged"; id: WidgetId; offset: number };

/** Outcome of a programmatic value assignment */
export interface SetValueResult {
  /** Value actually stored */
  value: WidgetValue;
  requested: WidgetValue;
  /** The requested value lay outside the widget's bounds and was clamped */
  clamped: boolean;
}

/** Style, visibility and content directive for one widget */
export interface StyleUpdate {
  id: WidgetId;
  kind: WidgetKind;
  style: StyleDescriptor;
  visible: boolean;
  text: string;
}

/** Everything the host needs to apply after one frame */
export interface FrameResult {
  /** Widgets whose style, visibility or content changed */
  styles: StyleUpdate[];
  notifications: Notification[];
  /** Widgets destroyed since the previous frame */
  destroyed: WidgetId[];
}
