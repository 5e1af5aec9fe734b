/**
 * Style Schemas
 *
 * Runtime validation for base styles registered by the application or
 * loaded from a style sheet.
 */

import { z } from "zod";

const channel = z.number().min(0).max(1);
const size = z.number().finite().nonnegative();

export const colorSchema = z.tuple([channel, channel, channel, channel]);

export const baseStyleSchema = z
  .object({
    background: colorSchema,
    hoverBackground: colorSchema,
    pressedBackground: colorSchema,
    disabledBackground: colorSchema,
    accentColor: colorSchema,
    borderColor: colorSchema,
    focusBorderColor: colorSchema,
    borderWidth: size,
    textColor: colorSchema,
    disabledTextColor: colorSchema,
    fontSize: size,
    padding: size,
    borderRadius: size,
    pressedScale: z.number().finite().positive(),
    width: size.nullable(),
    height: size.nullable(),
  })
  .strict();

/** Any subset of base-style fields; unknown fields are rejected */
export const partialBaseStyleSchema = baseStyleSchema.partial();

/** Named table of partial base styles */
export const styleSheetSchema = z.record(z.string().min(1), partialBaseStyleSchema);

export type BaseStyleInput = z.input<typeof partialBaseStyleSchema>;
export type StyleSheet = z.infer<typeof styleSheetSchema>;

/** One line per issue, e.g. `background.3: Number must be less than or equal to 1` */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
