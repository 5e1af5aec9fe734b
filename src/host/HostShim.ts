/**
 * Host Shim
 *
 * Retains the latest style directive per widget and replays the visible
 * ones onto a RenderHost. Tooltips are drawn after everything else.
 */

import type { WidgetId } from "../ui/events";
import type { FrameResult, StyleUpdate } from "../ui/types";
import { computeEffectiveColor } from "../style/types";
import type { LayoutSource, Rect, RenderHost } from "./RenderHost";

/** Shrink or grow a rectangle about its center */
export function scaleRect(rect: Rect, scale: number): Rect {
  if (scale === 1) return rect;
  const width = rect.width * scale;
  const height = rect.height * scale;
  return {
    x: rect.x + (rect.width - width) / 2,
    y: rect.y + (rect.height - height) / 2,
    width,
    height,
  };
}

export class HostShim {
  private retained = new Map<WidgetId, StyleUpdate>();

  /** Take one frame's output */
  apply(frame: FrameResult): void {
    for (const id of frame.destroyed) this.retained.delete(id);
    for (const update of frame.styles) this.retained.set(update.id, update);
  }

  get(id: WidgetId): StyleUpdate | undefined {
    return this.retained.get(id);
  }

  get size(): number {
    return this.retained.size;
  }

  /**
   * Draw every visible widget that has a layout box.
   *
   * @returns Number of widgets drawn
   */
  draw(host: RenderHost, layout: LayoutSource): number {
    const visible = [...this.retained.values()].filter((update) => update.visible);
    const ordered = [
      ...visible.filter((update) => update.kind !== "tooltip"),
      ...visible.filter((update) => update.kind === "tooltip"),
    ];

    let drawn = 0;
    for (const update of ordered) {
      const rect = layout.getRect(update.id);
      if (!rect) continue;
      this.drawWidget(host, scaleRect(rect, update.style.scale), update);
      drawn++;
    }
    return drawn;
  }

  private drawWidget(host: RenderHost, rect: Rect, update: StyleUpdate): void {
    const { style } = update;

    // Render background
    const background = computeEffectiveColor(style.background, style.opacity);
    if (background[3] > 0) host.fillRect(rect, background);

    // Render fill bar
    if (style.fill !== null && style.fill > 0) {
      host.fillRect(
        { x: rect.x, y: rect.y, width: rect.width * style.fill, height: rect.height },
        computeEffectiveColor(style.accentColor, style.opacity)
      );
    }

    // Render border
    if (style.borderWidth > 0) {
      host.strokeRect(rect, computeEffectiveColor(style.borderColor, style.opacity), style.borderWidth);
    }

    // Render centered label
    // Offset by 0.1 * fontSize to account for visual weight being above geometric center
    if (update.text.length > 0) {
      host.label(update.text, rect.x + rect.width / 2, rect.y + rect.height / 2 + style.fontSize * 0.1, {
        color: computeEffectiveColor(style.textColor, style.opacity),
        fontSize: style.fontSize,
        align: "center",
      });
    }
  }
}
