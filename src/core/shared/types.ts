// Cross-layer, small, dependency-free types & branded strings.

/** Generic nominal brand helper */
export type Brand<T, B extends string> = T & { readonly __brand: B };

/**
 * Text that went through `sanitize()`: control characters removed and every `&`
 * written as `&amp;`. Only this kind of string reaches the tree's text setter.
 */
export type SanitizedText = Brand<string, "SanitizedText">;

/** Values that can sit at a leaf of the array side. */
export type XmlScalar = string | number | boolean | null | undefined;

/**
 * Array side of the codec. Arrays are sequences of sibling elements sharing one
 * tag; plain objects are element records. Reserved record keys:
 *
 * - `@attributes` flat name → scalar map for the enclosing element
 * - `@value`      text of the enclosing element when it also has attributes
 */
export type StructuredValue = XmlScalar | StructuredValue[] | StructuredMapping;

export interface StructuredMapping {
  [key: string]: StructuredValue;
}

/** What decoding and XPath projection give back. */
export type DecodedValue = string | null | DecodedValue[] | DecodedMapping;

export interface DecodedMapping {
  [key: string]: DecodedValue;
}

/** `[uri, prefix]` applied to every element the encoder creates. */
export type XmlNamespace = readonly [uri: string, prefix: string];

/** XPath placeholder values, keyed by name without the leading colon. */
export type QueryParams = Readonly<Record<string, string | number>>;

export const ATTRIBUTES_KEY = "@attributes";
export const VALUE_KEY = "@value";

export function isStructuredMapping(v: StructuredValue): v is StructuredMapping {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function isDecodedMapping(v: DecodedValue | undefined): v is DecodedMapping {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/* Small factory helper to apply the brand (no validation here). */

export const asSanitized = (v: string): SanitizedText => v as SanitizedText;
