/**
 * Input Events
 *
 * Raw host input (what the embedding application observes each frame) and the
 * canonical per-widget events the input layer derives from it.
 */

import { z } from "zod";

export type WidgetId = string;

/** Modifier keys held during a key press */
export interface Modifiers {
  shift: boolean;
  ctrl: boolean;
  alt: boolean;
  meta: boolean;
}

export const NO_MODIFIERS: Modifiers = { shift: false, ctrl: false, alt: false, meta: false };

const hitSchema = z.string().min(1).nullable();
const coordSchema = z.number().finite();

const modifiersSchema = z
  .object({
    shift: z.boolean().optional(),
    ctrl: z.boolean().optional(),
    alt: z.boolean().optional(),
    meta: z.boolean().optional(),
  })
  .optional();

/**
 * Raw input record supplied by the host.
 *
 * Pointer records carry `hit`: the topmost widget under that pointer position,
 * as determined by the host's own hit testing (null when over nothing).
 */
export const rawInputSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("pointerMove"), x: coordSchema, y: coordSchema, hit: hitSchema }),
  z.object({
    type: z.literal("pointerDown"),
    x: coordSchema,
    y: coordSchema,
    hit: hitSchema,
    button: z.number().int().nonnegative().optional(),
  }),
  z.object({
    type: z.literal("pointerUp"),
    x: coordSchema,
    y: coordSchema,
    hit: hitSchema,
    button: z.number().int().nonnegative().optional(),
  }),
  z.object({ type: z.literal("pointerExit") }),
  z.object({
    type: z.literal("wheel"),
    deltaX: coordSchema.optional(),
    deltaY: coordSchema,
    unit: z.enum(["line", "pixel"]).optional(),
    hit: hitSchema,
  }),
  z.object({ type: z.literal("keyDown"), key: z.string().min(1), modifiers: modifiersSchema }),
  z.object({ type: z.literal("focus"), target: hitSchema }),
  z.object({ type: z.literal("blur") }),
]);

export type RawInput = z.infer<typeof rawInputSchema>;

/** Canonical event addressed to exactly one widget */
export type WidgetEvent =
  | { type: "pointerEnter"; target: WidgetId }
  | { type: "pointerLeave"; target: WidgetId }
  | { type: "pointerDown"; target: WidgetId; x: number; y: number }
  | { type: "pointerUp"; target: WidgetId; x: number; y: number; inside: boolean }
  | { type: "pointerMove"; target: WidgetId; x: number; y: number; dx: number; dy: number }
  | { type: "scroll"; target: WidgetId; dx: number; dy: number }
  | { type: "keyPress"; target: WidgetId; key: string; modifiers: Modifiers }
  | { type: "focusGained"; target: WidgetId }
  | { type: "focusLost"; target: WidgetId };

export type WidgetEventType = WidgetEvent["type"];
