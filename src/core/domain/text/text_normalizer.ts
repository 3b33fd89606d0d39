/**
 * Text normalization for values placed in the tree and for serialized XML.
 *
 * Canonicalization and signature verification compare bytes, so both passes here
 * are exact about which characters get escaped and where:
 *
 *   - sanitize(value)     control characters out, predefined entities folded back to
 *                         literals, then only `&` pre-escaped
 *   - fixEntities(xml)    `'` / `"` escaped inside text content, never inside tags or
 *                         attribute literals
 */

import { asSanitized, type SanitizedText } from "../../shared/types.ts";

/* ────────────────────────────── sanitize ────────────────────────────── */

const NUMERIC = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

const CONTROL_CHARS = /[\x00-\x1F\x7F]/g;

// Replacement order matters: `&amp;lt;` ends up as `<`.
const PREDEFINED_ENTITIES: ReadonlyArray<readonly [string, string]> = [
  ["&amp;", "&"],
  ["&#38;", "&"],
  ["&lt;", "<"],
  ["&#60;", "<"],
  ["&gt;", ">"],
  ["&#62;", ">"],
  ["&quot;", '"'],
  ["&#34;", '"'],
  ["&apos;", "'"],
  ["&#39;", "'"],
];

export function isNumeric(value: string): boolean {
  return NUMERIC.test(value);
}

export function sanitize(value: string): SanitizedText {
  if (!value || isNumeric(value)) return asSanitized(value);

  let out = value.replace(CONTROL_CHARS, "");
  for (const [entity, literal] of PREDEFINED_ENTITIES) {
    out = out.split(entity).join(literal);
  }
  return asSanitized(out.split("&").join("&amp;"));
}

/**
 * Literal text for the DOM text setter. The tree serializer escapes `&` and `<` on
 * its own, so the ampersands pre-escaped by `sanitize()` are folded back here.
 */
export function unescapeSanitized(value: SanitizedText): string {
  return value.split("&amp;").join("&");
}

/* ───────────────────────────── fixEntities ───────────────────────────── */

/**
 * Escape quotes left literal in text content of serialized XML.
 *
 * Scanner state: `inContent` flips on `>` / `<`; `quote` is set while inside an
 * attribute literal (entered by `=` directly followed by a quote while in a tag).
 * Malformed input is scanned as far as it goes; nothing throws.
 */
export function fixEntities(xml: string): string {
  let out = "";
  let inContent = false;
  let quote: string | null = null;

  for (let i = 0; i < xml.length; i++) {
    const ch = xml.charAt(i);

    if (!inContent && quote === null && ch === "=") {
      const next = xml.charAt(i + 1);
      if (next === '"' || next === "'") {
        quote = next;
        out += ch + next;
        i++;
        continue;
      }
    }

    if (quote !== null && ch === quote) {
      quote = null;
      out += ch;
      continue;
    }

    if (ch === ">") inContent = true;
    if (ch === "<") inContent = false;

    if (inContent && quote === null) {
      out += ch === "'" ? "&apos;" : ch === '"' ? "&quot;" : ch;
    } else {
      out += ch;
    }
  }

  return out;
}

/** Drop whitespace between adjacent tags. */
export function flattenXml(xml: string): string {
  return xml.replace(/>\s+</g, "><");
}
