/**
 * UI Context
 *
 * Main entry point. Owns the widget registry, the style registry and the
 * input layer, processes one frame of host input per tick() and reports
 * what the host must apply.
 */

import { rawInputSchema, type RawInput, type WidgetId } from "./events";
import { WidgetError } from "./errors";
import { InputLayer } from "./InputLayer";
import { WidgetRegistry } from "./WidgetRegistry";
import type {
  CreateOptions,
  FrameResult,
  Notification,
  SetValueResult,
  StyleUpdate,
  VisualState,
  WidgetValue,
} from "./types";
import type { SliderTrack } from "./widgets/Slider";
import { StyleRegistry } from "../style/StyleRegistry";
import { sameStyle, type BaseStyle, type StyleDescriptor } from "../style/types";
import { formatIssues } from "../style/schema";

/** One frame of host input */
export interface FrameInput {
  /** Raw input in arrival order; invalid records are dropped */
  events: readonly RawInput[];
  /** Seconds since the previous frame */
  deltaTime: number;
}

export interface UIContextOptions {
  /** Extra named base styles, registered after the built-ins */
  styles?: Record<string, Partial<BaseStyle>>;
  /** Seed the style table with the built-in styles (default: true) */
  builtinStyles?: boolean;
  /** Log a one-line summary per frame (default: false) */
  debug?: boolean;
}

function sameUpdate(a: StyleUpdate, b: StyleUpdate): boolean {
  return a.visible === b.visible && a.text === b.text && sameStyle(a.style, b.style);
}

/**
 * Frame-driven widget system.
 *
 * Programmatic calls between frames take effect immediately; their style
 * consequences are reported by the next tick().
 */
export class UIContext {
  private registry: WidgetRegistry;
  private styles: StyleRegistry;
  private input: InputLayer;
  private debug: boolean;

  // Frame state
  private inFrame: boolean = false;
  private frameCount: number = 0;
  private reported = new Map<WidgetId, StyleUpdate>();

  constructor(options: UIContextOptions = {}) {
    this.registry = new WidgetRegistry();
    this.styles = new StyleRegistry({ builtins: options.builtinStyles ?? true });
    if (options.styles) this.styles.loadStyleSheet(options.styles);
    this.debug = options.debug ?? false;
    this.input = new InputLayer({
      canFocus: (id) => this.registry.canFocus(id),
      nextFocus: (current, backwards) => this.registry.nextFocusable(current, backwards),
    });
  }

  // ==================== Frame Lifecycle ====================

  /**
   * Process one frame: apply the raw input in order, advance tooltip
   * timers, then report changed styles and notifications. Creation-option
   * callbacks run last, in notification order.
   */
  tick(frame: FrameInput): FrameResult {
    if (this.inFrame) {
      throw new Error("Already in UI frame - tick() cannot be called from a callback");
    }

    this.inFrame = true;
    try {
      const result = this.processFrame(frame);
      this.runCallbacks(result.notifications);
      return result;
    } finally {
      this.inFrame = false;
    }
  }

  private processFrame(frame: FrameInput): FrameResult {
    this.frameCount++;

    let dropped = 0;
    for (const raw of frame.events) {
      const parsed = rawInputSchema.safeParse(raw);
      if (!parsed.success) {
        dropped++;
        console.warn(`[UIContext] Dropped invalid input: ${formatIssues(parsed.error)}`);
        continue;
      }

      const input = parsed.data;
      if (input.type === "pointerDown" && (input.button ?? 0) === 0) {
        this.registry.dismissOutside(input.hit);
      }
      for (const event of this.input.feed(input)) {
        this.registry.dispatch(event);
      }
    }

    const deltaTime = Number.isFinite(frame.deltaTime) ? Math.max(0, frame.deltaTime) : 0;
    this.registry.advanceTimers(deltaTime);

    const destroyed = this.registry.takeDestroyed();
    for (const id of destroyed) this.reported.delete(id);

    const styles = this.collectStyles();
    const notifications = this.registry
      .takeNotifications()
      .filter((notification) => this.registry.has(notification.id));

    if (this.debug) {
      console.log(
        `[UIContext] frame=${this.frameCount} events=${frame.events.length} dropped=${dropped} ` +
          `styles=${styles.length} notifications=${notifications.length} destroyed=${destroyed.length}`
      );
    }

    return { styles, notifications, destroyed };
  }

  private collectStyles(): StyleUpdate[] {
    const updates: StyleUpdate[] = [];
    for (const id of this.registry.takeDirty()) {
      if (!this.registry.has(id)) continue;
      const update = this.describe(id);
      const previous = this.reported.get(id);
      if (previous && sameUpdate(previous, update)) continue;
      this.reported.set(id, update);
      updates.push(update);
    }
    return updates;
  }

  private describe(id: WidgetId): StyleUpdate {
    const record = this.registry.get(id);
    return {
      id,
      kind: record.kind,
      style: this.styles.resolve(record.baseStyle, this.registry.getVisualState(id)),
      visible: this.registry.isVisible(id),
      text: this.registry.textOf(id),
    };
  }

  private runCallbacks(notifications: Notification[]): void {
    for (const notification of notifications) {
      // An earlier callback may have destroyed the widget
      if (!this.registry.has(notification.id)) continue;
      const handlers = this.registry.get(notification.id).handlers;
      switch (notification.type) {
        case "click":
          handlers.onClick?.(notification.id);
          break;
        case "valueChanged":
          handlers.onChange?.(notification.value, notification.id);
          break;
        case "scrollChanged":
          handlers.onScroll?.(notification.offset, notification.id);
          break;
      }
    }
  }

  // ==================== Widgets ====================

  /**
   * Create a widget.
   *
   * @throws WidgetError NotFound for an unknown parent or base style,
   * InvalidParent when the parent cannot host the kind
   */
  create(options: CreateOptions): WidgetId {
    // Unknown style names throw before anything is created
    this.styles.get(options.baseStyle ?? options.kind);
    if (options.kind === "dropdown" && (options.options?.length ?? 0) > 0) {
      this.styles.get("button");
    }
    return this.registry.create(options);
  }

  /** Destroy a widget and its subtree */
  destroy(id: WidgetId): void {
    for (const removed of this.registry.destroy(id)) {
      this.input.forget(removed);
    }
  }

  /**
   * Enable or disable a widget and, through it, its subtree. Disabling
   * drops focus and pointer capture held inside the subtree.
   */
  setEnabled(id: WidgetId, enabled: boolean): void {
    this.registry.setEnabled(id, enabled);
    if (enabled) return;

    const captured = this.input.getCaptured();
    if (captured !== null && !this.registry.isEffectivelyEnabled(captured)) {
      this.input.releaseCapture(captured);
    }
    const focused = this.input.getFocused();
    if (focused !== null && !this.registry.isEffectivelyEnabled(focused)) {
      for (const event of this.input.setFocus(null)) this.registry.dispatch(event);
    }
  }

  /**
   * Assign a value, bypassing any gesture. Out-of-range values are clamped
   * and reported in the result.
   */
  setValue(id: WidgetId, value: WidgetValue): SetValueResult {
    const result = this.registry.setValue(id, value);
    if (result.clamped) {
      console.warn(
        `[UIContext] Value ${JSON.stringify(value)} for "${id}" clamped to ${JSON.stringify(result.value)}`
      );
    }
    return result;
  }

  getValue(id: WidgetId): WidgetValue {
    return this.registry.getValue(id);
  }

  getVisualState(id: WidgetId): VisualState {
    return this.registry.getVisualState(id);
  }

  /** Style the widget resolves to right now */
  getStyle(id: WidgetId): StyleDescriptor {
    const record = this.registry.get(id);
    return this.styles.resolve(record.baseStyle, this.registry.getVisualState(id));
  }

  isVisible(id: WidgetId): boolean {
    return this.registry.isVisible(id);
  }

  getChildren(id: WidgetId): WidgetId[] {
    return this.registry.getChildren(id);
  }

  getParent(id: WidgetId): WidgetId | null {
    return this.registry.getParent(id);
  }

  setLabel(id: WidgetId, label: string): void {
    this.registry.setLabel(id, label);
  }

  setSliderTrack(id: WidgetId, track: SliderTrack): void {
    this.registry.setSliderTrack(id, track);
  }

  setScrollExtents(id: WidgetId, contentExtent: number, viewportExtent: number): void {
    this.registry.setScrollExtents(id, contentExtent, viewportExtent);
  }

  // ==================== Focus ====================

  /**
   * Move keyboard focus (null clears it).
   *
   * @throws WidgetError InvalidArgument when the widget cannot take focus
   */
  focus(id: WidgetId | null): void {
    if (id !== null) {
      this.registry.get(id);
      if (!this.registry.canFocus(id)) {
        throw new WidgetError("InvalidArgument", `Widget "${id}" cannot take focus`, id);
      }
    }
    for (const event of this.input.setFocus(id)) this.registry.dispatch(event);
  }

  getFocused(): WidgetId | null {
    return this.input.getFocused();
  }

  // ==================== Styles ====================

  /** Register or replace a named base style */
  registerBaseStyle(name: string, style: Partial<BaseStyle>): void {
    this.styles.register(name, style);
    this.registry.markStyleDirty(name);
  }

  /** Register every style of a parsed style sheet */
  loadStyleSheet(sheet: unknown): string[] {
    const names = this.styles.loadStyleSheet(sheet);
    for (const name of names) this.registry.markStyleDirty(name);
    return names;
  }

  // ==================== Accessors ====================

  /** Get the style registry */
  getStyles(): StyleRegistry {
    return this.styles;
  }

  /** Get the widget registry */
  getRegistry(): WidgetRegistry {
    return this.registry;
  }
}
