// xpath_query.ts
// Parameterized XPath over one DOM document, with namespace-optional matching and
// projection of matched nodes into nested data.
import xpath from "xpath";
import { XmlError, errorMessage, isXmlError } from "../../shared/errors.ts";
import type { XmlLogger } from "../../shared/log.ts";
import type { DecodedMapping, DecodedValue, QueryParams } from "../../shared/types.ts";
import { elementChildren, isDocument, isElement, parseXmlToDom, textContentOf } from "../parse/dom_xml.ts";

/* ────────────────────────────── Types ────────────────────────────── */

export type NamespaceMap = Readonly<Record<string, string>>;

export type XPathScalar = string | number | boolean;

/** What a single matched node projects to. */
export type ProjectedNode = string | DecodedMapping;

export interface XPathQueryOptions {
  logger?: XmlLogger;
}

/* ───────────────────────── Query text ───────────────────────── */

// A string literal (kept as is), or a bare step name at the start of the query or
// right after "/". Function calls, axes ("child::") and prefixed names ("ns:el")
// are left alone.
const BARE_STEP = /('[^']*'|"[^"]*")|(?<=\/|^)([A-Za-z_][\w.-]*)(?![\w.:-]|\s*\()/g;

// ":name" not glued to a preceding name: skips "ns:el" and the "::" of axes.
const PLACEHOLDER = /(?<![\w.:-]):([A-Za-z_]\w*)/g;

/** Rewrite every bare step outside string literals to a local-name() test. */
export function toLocalNameQuery(query: string): string {
  return query.replace(BARE_STEP, (whole, literal: string | undefined, name: string | undefined) =>
    literal !== undefined || name === undefined ? whole : `*[local-name()="${name}"]`);
}

/** An XPath 1.0 string literal for any value, falling back to concat() when both quote kinds occur. */
export function quoteXPathLiteral(value: string): string {
  if (!value.includes("'")) return `'${value}'`;
  if (!value.includes('"')) return `"${value}"`;
  return `concat('${value.split("'").join(`',"'",'`)}')`;
}

/** Replace `:name` placeholders in one pass; placeholders without a param stay as written. */
export function resolvePlaceholders(query: string, params: QueryParams = {}): string {
  return query.replace(PLACEHOLDER, (whole, name: string) => {
    const value = Object.prototype.hasOwnProperty.call(params, name) ? params[name] : undefined;
    return value === undefined ? whole : quoteXPathLiteral(String(value));
  });
}

/* ───────────────────────── Engine ───────────────────────── */

export class XPathQuery {
  private readonly dom: Document;
  private readonly namespaces: NamespaceMap;
  private readonly namespaceAware: boolean;
  private readonly logger?: XmlLogger;

  constructor(source: string | Document, namespaces: NamespaceMap = {}, opts: XPathQueryOptions = {}) {
    this.logger = opts.logger;
    this.dom = typeof source === "string" ? loadDocument(source, opts.logger) : source;
    this.namespaces = { ...namespaces };
    this.namespaceAware = Object.keys(namespaces).length > 0;
  }

  getDomDocument(): Document {
    return this.dom;
  }

  /** Final query text: local-name rewrite (namespaces disabled) then placeholders. */
  resolveQuery(query: string, params: QueryParams = {}): string {
    const q = this.namespaceAware ? query : toLocalNameQuery(query);
    return resolvePlaceholders(q, params);
  }

  /** null for no match, the projected node for one, a list for several. */
  get(query: string, params: QueryParams = {}, contextNode?: Node): DecodedValue {
    const nodes = this.getNodes(query, params, contextNode);
    const [first] = nodes;
    if (first === undefined) return null;
    if (nodes.length === 1) return this.projectNode(first);
    return nodes.map((n) => this.projectNode(n));
  }

  getValues(query: string, params: QueryParams = {}, contextNode?: Node): string[] {
    return this.getNodes(query, params, contextNode).map(textContentOf);
  }

  getValue(query: string, params: QueryParams = {}, contextNode?: Node): string | null {
    const [first] = this.getNodes(query, params, contextNode);
    return first === undefined ? null : textContentOf(first);
  }

  getNodes(query: string, params: QueryParams = {}, contextNode?: Node): Node[] {
    const resolved = this.resolveQuery(query, params);
    const result = this.run(resolved, contextNode);
    if (!Array.isArray(result)) {
      throw this.failure(resolved, `The expression does not evaluate to a node-set (got ${typeof result}).`);
    }
    return result;
  }

  /**
   * Scalar evaluation, e.g. `count(//item)` or `string(//a/@id)`. A node-set
   * result yields the string value of its first node.
   */
  evaluate(query: string, params: QueryParams = {}, contextNode?: Node): XPathScalar {
    const resolved = this.resolveQuery(query, params);
    const result = this.run(resolved, contextNode);
    if (Array.isArray(result)) {
      const [first] = result;
      return first === undefined ? "" : textContentOf(first);
    }
    if (typeof result === "object") {
      return result === null ? "" : textContentOf(result);
    }
    return result;
  }

  /**
   * Text for nodes without element children (attributes and text nodes included);
   * otherwise a mapping keyed by child tag, where a tag seen twice or more becomes
   * a list in document order.
   */
  projectNode(node: Node): ProjectedNode {
    if (!isElement(node) && !isDocument(node)) return textContentOf(node);

    const children: DecodedMapping = {};
    const counts = new Map<string, number>();

    for (const child of elementChildren(node)) {
      const name = child.nodeName;
      const n = (counts.get(name) ?? 0) + 1;
      counts.set(name, n);

      const value = this.projectNode(child);
      const prev = children[name];
      if (n === 1 || prev === undefined) children[name] = value;
      else if (Array.isArray(prev)) prev.push(value);
      else children[name] = [prev, value];
    }

    return counts.size > 0 ? children : textContentOf(node);
  }

  private run(resolved: string, contextNode?: Node) {
    const node = contextNode ?? this.dom;
    try {
      return this.namespaceAware
        ? xpath.useNamespaces({ ...this.namespaces })(resolved, node)
        : xpath.select(resolved, node);
    } catch (err: unknown) {
      throw this.failure(resolved, errorMessage(err), err);
    }
  }

  private failure(query: string, reason: string, cause?: unknown): XmlError {
    this.logger?.debug(`XPath failure for ${query}: ${reason}`);
    return new XmlError(
      "InvalidXPath",
      `An error occurred while executing the XPath expression: ${query}.`,
      [{ severity: "error", message: reason }],
      cause === undefined ? undefined : { cause },
    );
  }
}

/** One-shot selection over text or a DOM document. */
export function selectNodes(xml: string | Document, expression: string, params: QueryParams = {}): Node[] {
  return new XPathQuery(xml).getNodes(expression, params);
}

function loadDocument(xml: string, logger?: XmlLogger): Document {
  try {
    return parseXmlToDom(xml, logger ? { logger } : {});
  } catch (err: unknown) {
    if (isXmlError(err)) {
      throw new XmlError("InvalidXml", "The provided XML is not valid.", err.diagnostics, { cause: err });
    }
    throw err;
  }
}
