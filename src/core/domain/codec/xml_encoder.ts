// xml_encoder.ts
// Structured data → DOM. Arrays are sequences of same-named siblings, objects are
// element records; `@attributes` / `@value` attach to the enclosing element.
import { XmlError } from "../../shared/errors.ts";
import { silentLogger, type XmlLogger } from "../../shared/log.ts";
import {
  ATTRIBUTES_KEY,
  VALUE_KEY,
  isStructuredMapping,
  type StructuredMapping,
  type StructuredValue,
  type XmlNamespace,
  type XmlScalar,
} from "../../shared/types.ts";
import { isDocument } from "../parse/dom_xml.ts";
import { sanitize, unescapeSanitized } from "../text/text_normalizer.ts";

/* ────────────────────────────── Types ────────────────────────────── */

/** What the encoder needs from a document: its tree, and a way to drop derived state. */
export interface EncodableDocument {
  getDomDocument(): Document;
  invalidate(): void;
}

type Parent = Document | Element;

/* ───────────────────────── Skip rules ───────────────────────── */

/** null, undefined, false, [] and {} produce nothing. "" and true produce an empty element. */
export function isSkipped(value: StructuredValue): boolean {
  if (value === null || value === undefined || value === false) return true;
  if (Array.isArray(value)) return value.length === 0;
  if (isStructuredMapping(value)) return Object.keys(value).length === 0;
  return false;
}

type EmittableScalar = Exclude<XmlScalar, null | undefined | false>;

function isEmittable(value: StructuredValue): value is EmittableScalar {
  return typeof value === "string" || typeof value === "number" || value === true;
}

function scalarText(value: EmittableScalar): string {
  return value === true ? "" : String(value);
}

/* ───────────────────────── Encoder ───────────────────────── */

export class XmlEncoder<TDoc extends EncodableDocument> {
  constructor(
    private readonly createDocument: () => TDoc,
    private readonly logger: XmlLogger = silentLogger,
  ) {}

  /**
   * Write `data` into `doc` (a new one when absent) under `parent` (the document node
   * when absent). The first top-level key becomes the root element.
   */
  encode(
    data: StructuredMapping,
    namespace: XmlNamespace | null = null,
    parent: Parent | null = null,
    doc: TDoc | null = null,
  ): TDoc {
    const target = doc ?? this.createDocument();
    this.encodeInto(data, namespace, parent ?? target.getDomDocument());
    target.invalidate();
    return target;
  }

  private encodeInto(data: StructuredMapping, namespace: XmlNamespace | null, parent: Parent): void {
    for (const [key, value] of Object.entries(data)) {
      if (key === ATTRIBUTES_KEY) {
        // No element yet on the first level: nothing to attach to.
        if (isStructuredMapping(value) && !isDocument(parent)) this.addAttributes(parent, value);
      } else if (key === VALUE_KEY) {
        if (!isSkipped(value) && !isDocument(parent)) this.setValue(parent, value, key);
      } else if (Array.isArray(value) || isStructuredMapping(value)) {
        if (!isSkipped(value)) this.addChildren(parent, key, value, namespace);
      } else if (isEmittable(value)) {
        this.addValue(parent, key, value, namespace);
      }
    }
  }

  private addAttributes(el: Element, attributes: StructuredMapping): void {
    for (const [name, value] of Object.entries(attributes)) {
      if (Array.isArray(value) || isStructuredMapping(value)) {
        throw new XmlError(
          "InvalidStructure",
          `The value of attribute "${name}" of node "${el.tagName}" cannot be an array or object. The value is: ${JSON.stringify(value)}`,
        );
      }
      if (!isEmittable(value)) continue;
      el.setAttribute(name, scalarText(value));
    }
  }

  private setValue(el: Element, value: StructuredValue, key: string): void {
    if (Array.isArray(value) || isStructuredMapping(value)) {
      throw new XmlError("InvalidStructure", `The "${key}" of node "${el.tagName}" must be a scalar.`);
    }
    if (!isEmittable(value)) return;
    while (el.firstChild) el.removeChild(el.firstChild);
    el.appendChild(ownerOf(el).createTextNode(literal(scalarText(value))));
  }

  private addChildren(
    parent: Parent,
    tagName: string,
    value: StructuredValue[] | StructuredMapping,
    namespace: XmlNamespace | null,
  ): void {
    const items: StructuredValue[] = Array.isArray(value) ? value : [value];

    for (const item of items) {
      if (isSkipped(item)) continue;

      if (Array.isArray(item)) {
        throw new XmlError(
          "InvalidStructure",
          `The node "${tagName}" allows arrays only of other nodes. The current value is incorrect: ${JSON.stringify(item)}`,
        );
      }

      if (isStructuredMapping(item)) {
        const el = this.createElement(parent, tagName, namespace);
        this.append(parent, el);
        this.encodeInto(item, namespace, el);
      } else if (isEmittable(item)) {
        this.addValue(parent, tagName, item, namespace);
      }
    }
  }

  private addValue(
    parent: Parent,
    tagName: string,
    value: EmittableScalar,
    namespace: XmlNamespace | null,
  ): void {
    const el = this.createElement(parent, tagName, namespace);
    // An empty text child keeps the element serialized as <k></k>.
    el.appendChild(ownerOf(parent).createTextNode(literal(scalarText(value))));
    this.append(parent, el);
  }

  private createElement(parent: Parent, tagName: string, namespace: XmlNamespace | null): Element {
    const dom = ownerOf(parent);
    if (namespace === null) return dom.createElement(tagName);
    const [uri, prefix] = namespace;
    return dom.createElementNS(uri, `${prefix}:${tagName}`);
  }

  private append(parent: Parent, el: Element): void {
    if (isDocument(parent) && parent.documentElement) {
      this.logger.error(`Rejected second root element <${el.tagName}>`);
      throw new XmlError(
        "InvalidStructure",
        `The document already has the root element "${parent.documentElement.tagName}"; "${el.tagName}" cannot be a second root.`,
      );
    }
    parent.appendChild(el);
  }
}

/* ───────────────────────── Helpers ───────────────────────── */

function ownerOf(node: Parent): Document {
  return isDocument(node) ? node : node.ownerDocument;
}

/** Sanitized text as the literal characters the DOM text setter expects. */
function literal(text: string): string {
  return unescapeSanitized(sanitize(text));
}
