/**
 * Widget Errors
 *
 * Recoverable failures of the programmatic API. These are thrown to the
 * caller; nothing in the frame pass throws them.
 */

import type { WidgetId } from "./events";

export type WidgetErrorCode =
  /** Unknown widget id or base-style name */
  | "NotFound"
  /** The parent cannot host a child of the requested kind */
  | "InvalidParent"
  /** The value or configuration does not fit the widget */
  | "InvalidArgument";

export class WidgetError extends Error {
  readonly code: WidgetErrorCode;
  readonly widgetId: WidgetId | null;

  constructor(code: WidgetErrorCode, message: string, widgetId: WidgetId | null = null) {
    super(message);
    this.name = "WidgetError";
    this.code = code;
    this.widgetId = widgetId;
  }
}

export function isWidgetError(error: unknown, code?: WidgetErrorCode): error is WidgetError {
  return error instanceof WidgetError && (code === undefined || error.code === code);
}

export function widgetNotFound(id: WidgetId): WidgetError {
  return new WidgetError("NotFound", `Widget "${id}" does not exist`, id);
}
