/**
 * Template rendering for campaign emails.
 *
 * Replaces {{variableName}} (whitespace inside the braces is allowed) with
 * values from the render context. Unlike a lenient interpolation, a
 * placeholder with no value or a malformed tag fails the render, so a
 * recipient never receives a half-filled email.
 */

import { RenderError } from "../errors.js";

export type RenderContext = Record<string, string | undefined>;

export interface RenderOptions {
  /** Escape HTML-significant characters in substituted values */
  escapeHtml?: boolean;
}

const TAG_PATTERN = /\{\{([^{}]*)\}\}/g;
const IDENTIFIER = /^\s*(\w+)\s*$/;

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * @throws RenderError on a malformed tag or a variable missing from `context`
 */
export function renderTemplate(
  template: string,
  context: RenderContext,
  options: RenderOptions = {}
): string {
  const missing = new Set<string>();

  const rendered = template.replace(TAG_PATTERN, (tag: string, inner: string) => {
    const match = IDENTIFIER.exec(inner);
    if (!match) {
      throw new RenderError(`Malformed template tag ${tag}`);
    }

    const [, key = ""] = match;
    const value = context[key];
    if (value === undefined) {
      missing.add(key);
      return tag;
    }

    return options.escapeHtml ? escapeHtml(value) : value;
  });

  if (missing.size > 0) {
    throw new RenderError(`Missing template variable(s): ${[...missing].join(", ")}`);
  }

  // Whatever braces survived the substitution never formed a complete tag
  const stripped = template.replace(TAG_PATTERN, "");
  if (stripped.includes("{{") || stripped.includes("}}")) {
    throw new RenderError("Unclosed template tag");
  }

  return rendered;
}

export function titleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[\s\-'])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

/**
 * Resolve the name a recipient is greeted with.
 *
 * Blank names, and names equal to the fallback in any casing (imports often
 * carry the placeholder itself), become the fallback verbatim.
 */
export function resolveDisplayName(
  name: string | null | undefined,
  fallback: string,
  options: { titleCase?: boolean } = {}
): string {
  const trimmed = name?.trim() ?? "";

  if (trimmed === "" || trimmed.toLowerCase() === fallback.trim().toLowerCase()) {
    return fallback;
  }

  return options.titleCase ? titleCase(trimmed) : trimmed;
}
