// xml_decoder.ts
// DOM → structured data, the inverse of the encoder's conventions.
import {
  ATTRIBUTES_KEY,
  VALUE_KEY,
  type DecodedMapping,
  type DecodedValue,
} from "../../shared/types.ts";
import { attributesOf, childNodes, viewOf } from "../parse/dom_xml.ts";

export interface DecodableDocument {
  getDomDocument(): Document;
}

export type DecodedContent = string | null | DecodedMapping;

export class XmlDecoder {
  /**
   * `{ [tagName]: content }` for the element (or the document's root). With
   * `twinsAsArray` the content mapping itself is returned, without the tag wrapper.
   * A document without a root decodes to `{}`.
   */
  decode(source: Element | DecodableDocument, twinsAsArray = false): DecodedMapping {
    const el = "nodeType" in source ? source : source.getDomDocument().documentElement;
    if (!el) return {};

    const content = decodeContent(el);
    if (!twinsAsArray) return { [el.tagName]: content };
    if (content === null) return {};
    return typeof content === "string" ? { [VALUE_KEY]: content } : content;
  }
}

/**
 * Content of one element:
 * - no attributes and a single text child → that text
 * - no attributes, no elements, no text   → null
 * - otherwise a mapping with `@attributes`, `@value` and one key per child tag;
 *   tags repeated among siblings collect into a list in document order
 */
export function decodeContent(el: Element): DecodedContent {
  const attrs = attributesOf(el).filter((a) => !isNamespaceDeclaration(a));
  const views = childNodes(el).map(viewOf);

  const texts: string[] = [];
  const elements: Element[] = [];
  for (const v of views) {
    if (v.kind === "element") elements.push(v.node);
    else if (v.kind === "text" && v.value.trim() !== "") texts.push(v.value.trim());
  }

  if (attrs.length === 0 && elements.length === 0) {
    if (texts.length === 0) return null;
    if (views.length === 1 && texts[0] !== undefined) return texts[0];
  }

  const content: DecodedMapping = {};
  if (attrs.length > 0) {
    content[ATTRIBUTES_KEY] = Object.fromEntries(attrs.map((a) => [a.name, a.value]));
  }
  if (texts.length > 0) {
    content[VALUE_KEY] = texts.join(" ");
  }

  const counts = countTags(elements);
  for (const child of elements) {
    const tag = child.tagName;
    const decoded: DecodedValue = decodeContent(child);
    if ((counts.get(tag) ?? 0) < 2) {
      content[tag] = decoded;
      continue;
    }
    const list = content[tag];
    if (Array.isArray(list)) list.push(decoded);
    else content[tag] = [decoded];
  }

  return content;
}

function isNamespaceDeclaration(a: Attr): boolean {
  return a.name === "xmlns" || a.name.startsWith("xmlns:");
}

function countTags(elements: readonly Element[]): Map<string, number> {
  const counts = new Map<string, number>();
  for (const el of elements) counts.set(el.tagName, (counts.get(el.tagName) ?? 0) + 1);
  return counts;
}
