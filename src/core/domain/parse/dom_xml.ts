// dom_xml.ts
// The mutable tree: parsing into a DOM, node kinds, serialization with indentation,
// and canonical XML. Thin layer over @xmldom/xmldom and xml-crypto.
import { DOMImplementation, DOMParser, XMLSerializer } from "@xmldom/xmldom";
import {
  C14nCanonicalization,
  C14nCanonicalizationWithComments,
  ExclusiveCanonicalization,
  ExclusiveCanonicalizationWithComments,
} from "xml-crypto";
import { XmlError, type XmlDiagnostic, type DiagnosticSeverity } from "../../shared/errors.ts";
import { stripBom } from "../text/encoding.ts";
import { parseXmlToXast, type XmlParseOptions } from "./xast_xml.ts";

/* ────────────────────────────── Node kinds ────────────────────────────── */

export const ELEMENT_NODE = 1;
export const TEXT_NODE = 3;
export const CDATA_SECTION_NODE = 4;
export const PROCESSING_INSTRUCTION_NODE = 7;
export const COMMENT_NODE = 8;
export const DOCUMENT_NODE = 9;

export type NodeView =
  | { kind: "element"; node: Element }
  | { kind: "text"; node: Text; value: string }
  | { kind: "other"; node: Node };

export function isElement(n: Node): n is Element {
  return n.nodeType === ELEMENT_NODE;
}

export function isText(n: Node): n is Text {
  return n.nodeType === TEXT_NODE || n.nodeType === CDATA_SECTION_NODE;
}

export function isDocument(n: Node): n is Document {
  return n.nodeType === DOCUMENT_NODE;
}

/** The `<?xml ...?>` declaration, which xmldom keeps as a processing instruction. */
export function isXmlDeclaration(n: Node): boolean {
  return n.nodeType === PROCESSING_INSTRUCTION_NODE && n.nodeName.toLowerCase() === "xml";
}

export function viewOf(node: Node): NodeView {
  if (isElement(node)) return { kind: "element", node };
  if (isText(node)) return { kind: "text", node, value: node.data };
  return { kind: "other", node };
}

/** Children of `node`; attribute and character nodes have none. */
export function childNodes(node: Node): Node[] {
  return isElement(node) || isDocument(node) ? Array.from(node.childNodes) : [];
}

export function elementChildren(node: Node): Element[] {
  return childNodes(node).filter(isElement);
}

export function attributesOf(el: Element): Attr[] {
  return Array.from(el.attributes);
}

/** `textContent` with the DOM's null cases folded to "". */
export function textContentOf(node: Node): string {
  return node.textContent ?? "";
}

/* ────────────────────────────── Parsing ────────────────────────────── */

export function createEmptyDocument(): Document {
  return new DOMImplementation().createDocument(null, null, null);
}

/**
 * Parse text into a DOM. The strict xast parse runs first so malformed input fails
 * with a positioned diagnostic; xmldom's own complaints are collected as well.
 */
export function parseXmlToDom(source: string, opts: XmlParseOptions = {}): Document {
  const xml = stripBom(source);
  parseXmlToXast(xml, opts);

  const collected: XmlDiagnostic[] = [];
  const collect = (severity: DiagnosticSeverity) => (msg: unknown) => {
    collected.push(domDiagnostic(severity, String(msg)));
  };

  let doc: Document;
  try {
    doc = new DOMParser({
      locator: {},
      errorHandler: {
        warning: collect("warning"),
        error: collect("error"),
        fatalError: collect("fatal"),
      },
    }).parseFromString(xml, "text/xml");
  } catch (err: unknown) {
    throw new XmlError(opts.errorCode ?? "MalformedXml", "Error loading the XML.", [
      ...collected,
      domDiagnostic("fatal", err instanceof Error ? err.message : String(err)),
    ], { cause: err });
  }

  const failures = collected.filter((d) => d.severity !== "warning");
  for (const w of collected.filter((d) => d.severity === "warning")) {
    opts.logger?.debug(`xmldom warning: ${w.message}`);
  }
  if (failures.length > 0 || !doc.documentElement) {
    opts.logger?.error(`XML parse error: ${failures[0]?.message ?? "no root element"}`);
    throw new XmlError(opts.errorCode ?? "MalformedXml", "Error loading the XML.", failures);
  }
  return doc;
}

function domDiagnostic(severity: DiagnosticSeverity, raw: string): XmlDiagnostic {
  const message = raw.replace(/^\[xmldom \w+\]\s*/, "").replace(/\n@.*$/s, "").trim();
  const m = raw.match(/#\[line:(\d+),col:(\d+)\]/);
  if (m?.[1] !== undefined && m[2] !== undefined) {
    return { severity, message, line: Number(m[1]), column: Number(m[2]) };
  }
  return { severity, message };
}

/* ─────────────────────────── Serialization ─────────────────────────── */

export interface SerializeOptions {
  /** Two-space indentation for elements whose children are all elements/comments. */
  format?: boolean;
}

export function serializeNode(node: Node, opts: SerializeOptions = {}): string {
  const serializer = new XMLSerializer();
  if (!opts.format || !isElement(node)) return serializer.serializeToString(node);

  const copy = node.cloneNode(true);
  indentTree(copy, 0);
  return serializer.serializeToString(copy);
}

function indentTree(node: Node, depth: number): void {
  const kids = childNodes(node);
  if (kids.length === 0) return;
  if (!kids.every((k) => isElement(k) || k.nodeType === COMMENT_NODE)) return;

  const doc = node.ownerDocument;
  if (!doc) return;
  const pad = (d: number) => "\n" + "  ".repeat(d);

  for (const kid of kids) {
    node.insertBefore(doc.createTextNode(pad(depth + 1)), kid);
    indentTree(kid, depth + 1);
  }
  node.appendChild(doc.createTextNode(pad(depth)));
}

/* ─────────────────────────── Canonical XML ─────────────────────────── */

export interface CanonicalizeOptions {
  exclusive?: boolean; // default false (inclusive C14N 1.0)
  withComments?: boolean; // default false
  /** Exclusive C14N only: prefixes treated as inclusive. */
  inclusivePrefixes?: string[];
}

type NamespacePrefix = { prefix: string; namespaceURI: string };

/**
 * Canonical form of an element. Output is a Unicode string; callers pick the bytes.
 * Works on a copy: zero-length text nodes are dropped (C14N already writes every
 * element as a start/end tag pair) and the document is never touched.
 */
export function canonicalize(el: Element, opts: CanonicalizeOptions = {}): string {
  const node = canonicalCopy(el);
  const inScope = ancestorNamespaces(el);

  if (opts.exclusive) {
    const algo = opts.withComments
      ? new ExclusiveCanonicalizationWithComments()
      : new ExclusiveCanonicalization();
    return algo.process(node, {
      inclusiveNamespacesPrefixList: opts.inclusivePrefixes ?? [],
      ancestorNamespaces: inScope,
    });
  }

  const algo = opts.withComments
    ? new C14nCanonicalizationWithComments()
    : new C14nCanonicalization();
  return algo.process(node, { ancestorNamespaces: inScope });
}

function canonicalCopy(el: Element): Element {
  const copy = el.cloneNode(true);
  if (!isElement(copy)) return el;
  dropEmptyText(copy);
  return copy;
}

function dropEmptyText(node: Node): void {
  for (const kid of childNodes(node)) {
    if (isText(kid) && kid.data === "") node.removeChild(kid);
    else dropEmptyText(kid);
  }
}

/** Prefixed namespace declarations in scope from the ancestors of `el`. */
function ancestorNamespaces(el: Element): NamespacePrefix[] {
  const seen = new Set<string>();
  const out: NamespacePrefix[] = [];
  let cur = el.parentNode;
  while (cur && isElement(cur)) {
    for (const a of attributesOf(cur)) {
      if (a.name.startsWith("xmlns:")) {
        const prefix = a.name.slice("xmlns:".length);
        if (!seen.has(prefix)) {
          seen.add(prefix);
          out.push({ prefix, namespaceURI: a.value });
        }
      }
    }
    cur = cur.parentNode;
  }
  return out;
}
