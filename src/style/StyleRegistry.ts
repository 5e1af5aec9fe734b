/**
 * Style Registry
 *
 * Table of named base styles plus a memo of resolved descriptors keyed by
 * (style name, visual state). Owned by a UIContext; there is no global table.
 */

import type { VisualState } from "../ui/types";
import { WidgetError } from "../ui/errors";
import type { BaseStyle, StyleDescriptor } from "./types";
import { mergeBaseStyle } from "./theme";
import { resolveStyle } from "./resolve";
import { formatIssues, partialBaseStyleSchema, styleSheetSchema } from "./schema";
import builtinStyles from "./builtin-styles.json";

/** Resolutions remembered per style before that style's memo is dropped */
const MAX_MEMO_PER_STYLE = 256;

export interface StyleRegistryOptions {
  /** Seed the table with the built-in styles (default: true) */
  builtins?: boolean;
}

export class StyleRegistry {
  private styles = new Map<string, BaseStyle>();
  private memo = new Map<string, Map<string, StyleDescriptor>>();

  constructor(options: StyleRegistryOptions = {}) {
    if (options.builtins ?? true) {
      this.loadStyleSheet(builtinStyles);
    }
  }

  /**
   * Register (or replace) a named base style. Missing fields come from the
   * default theme.
   */
  register(name: string, style: Partial<BaseStyle>): BaseStyle {
    if (name.length === 0) {
      throw new WidgetError("InvalidArgument", "Base style name must not be empty");
    }
    const parsed = partialBaseStyleSchema.safeParse(style);
    if (!parsed.success) {
      throw new WidgetError(
        "InvalidArgument",
        `Invalid base style "${name}": ${formatIssues(parsed.error)}`
      );
    }
    return this.store(name, parsed.data);
  }

  /**
   * Register every entry of a parsed style sheet (`{ name: partialStyle }`).
   * Nothing is registered when any entry is invalid.
   *
   * @returns Registered names in sheet order
   */
  loadStyleSheet(sheet: unknown): string[] {
    const parsed = styleSheetSchema.safeParse(sheet);
    if (!parsed.success) {
      throw new WidgetError("InvalidArgument", `Invalid style sheet: ${formatIssues(parsed.error)}`);
    }
    const names = Object.keys(parsed.data);
    for (const name of names) {
      const style = parsed.data[name];
      if (style) this.store(name, style);
    }
    return names;
  }

  has(name: string): boolean {
    return this.styles.has(name);
  }

  names(): string[] {
    return [...this.styles.keys()];
  }

  get(name: string): BaseStyle {
    const style = this.styles.get(name);
    if (!style) {
      throw new WidgetError("NotFound", `Base style "${name}" is not registered`);
    }
    return style;
  }

  /** Resolve a visual state against a named base style, memoized */
  resolve(name: string, visual: VisualState): StyleDescriptor {
    const base = this.get(name);

    let entries = this.memo.get(name);
    if (!entries) {
      entries = new Map();
      this.memo.set(name, entries);
    }

    const key = JSON.stringify(visual);
    const cached = entries.get(key);
    if (cached) return cached;

    if (entries.size >= MAX_MEMO_PER_STYLE) entries.clear();
    const descriptor = resolveStyle(base, visual);
    entries.set(key, descriptor);
    return descriptor;
  }

  private store(name: string, partial: Partial<BaseStyle>): BaseStyle {
    const style = mergeBaseStyle(partial);
    this.styles.set(name, style);
    this.memo.delete(name);
    return style;
  }
}
