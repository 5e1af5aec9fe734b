/**
 * UI Widgets
 *
 * Per-kind interaction state machines and the dispatch over them.
 */

export {
  applyEvent,
  canHost,
  createModel,
  isFocusableKind,
  resetModel,
  showsChildren,
  valueOf,
  visualOf,
} from "./dispatch";
export {
  pressable,
  trackHover,
  isActivationKey,
  IDLE_PRESSABLE,
  type PressableState,
  type PressableResult,
} from "./interaction";
export type { ButtonOptions, ButtonModel, ButtonStatus, ButtonVisual } from "./Button";
export type {
  CheckboxOptions,
  CheckboxModel,
  CheckboxStatus,
  CheckboxVariant,
  CheckboxVisual,
} from "./Checkbox";
export {
  DEFAULT_SLIDER_MIN,
  DEFAULT_SLIDER_MAX,
  DEFAULT_HANDLE_WIDTH,
  DEFAULT_SLIDER_TRACK,
  quantizeSliderValue,
  type SliderOptions,
  type SliderModel,
  type SliderStatus,
  type SliderTrack,
  type SliderVisual,
} from "./Slider";
export type { DropdownOptions, DropdownModel, DropdownStatus, DropdownVisual } from "./Dropdown";
export {
  DEFAULT_SHOW_DELAY,
  type TooltipOptions,
  type TooltipModel,
  type TooltipPhase,
  type TooltipStatus,
  type TooltipVisual,
} from "./Tooltip";
export {
  maxScrollOffset,
  type ScrollAxis,
  type ScrollableOptions,
  type ScrollableModel,
  type ScrollableStatus,
  type ScrollableVisual,
} from "./Scrollable";
export type {
  TabOptions,
  TabModel,
  TabStatus,
  TabVisual,
  TabContainerOptions,
  TabContainerModel,
  TabContainerStatus,
  TabContainerVisual,
} from "./TabContainer";
export type { PanelOptions, PanelModel, PanelStatus, PanelVisual } from "./Panel";
export {
  progressText,
  type ProgressBarOptions,
  type ProgressBarModel,
  type ProgressBarStatus,
  type ProgressBarVisual,
} from "./ProgressBar";
