/**
 * Widget Interaction System
 *
 * Frame-driven widget state machines, composition and input normalization.
 */

// Core
export { UIContext, type UIContextOptions, type FrameInput } from "./UIContext";
export { WidgetRegistry, type WidgetRecord, type WidgetHandlers } from "./WidgetRegistry";
export { InputLayer, WHEEL_LINE_HEIGHT, type InputLayerHooks } from "./InputLayer";
export { WidgetError, isWidgetError, type WidgetErrorCode } from "./errors";

// Events
export {
  rawInputSchema,
  NO_MODIFIERS,
  type RawInput,
  type WidgetEvent,
  type WidgetEventType,
  type WidgetId,
  type Modifiers,
} from "./events";

// Types
export {
  WIDGET_KINDS,
  type WidgetKind,
  type WidgetValue,
  type WidgetModel,
  type VisualState,
  type VisualFlags,
  type CommonOptions,
  type CreateOptions,
  type Outcome,
  type Notification,
  type SetValueResult,
  type StyleUpdate,
  type FrameResult,
} from "./types";

// Widgets
export * from "./widgets";
