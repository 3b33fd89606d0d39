// xml_document.ts
// One XML document: load/save lifecycle, canonical forms with the working encoding,
// XPath access and a memoized projection for dot-path lookups.
import { basename } from "node:path";
import { resolveOptions, type SchemaSource, type XmlDocumentOptions } from "../shared/config.ts";
import { XmlError, errorMessage, isXmlError, type XmlDiagnostic } from "../shared/errors.ts";
import type { XmlLogger } from "../shared/log.ts";
import { isDecodedMapping, type DecodedMapping, type DecodedValue, type QueryParams } from "../shared/types.ts";
import type { EncodableDocument } from "../domain/codec/xml_encoder.ts";
import type { DecodableDocument } from "../domain/codec/xml_decoder.ts";
import {
  canonicalize,
  childNodes,
  createEmptyDocument,
  isElement,
  isText,
  isXmlDeclaration,
  parseXmlToDom,
  serializeNode,
  type CanonicalizeOptions,
} from "../domain/parse/dom_xml.ts";
import { getRootElement, parseXmlToXast } from "../domain/parse/xast_xml.ts";
import { buildXsdIndex, type XsdIndex } from "../domain/parse/xsd_index.ts";
import { validateAgainstXsd } from "../domain/parse/xsd_validator.ts";
import { XPathQuery } from "../domain/query/xpath_query.ts";
import { assertSupportedEncoding, encodeText, formatDeclaration, prepareSource } from "../domain/text/encoding.ts";
import { fixEntities, flattenXml } from "../domain/text/text_normalizer.ts";
import type { ISchemaValidatable } from "../ports/ports.ts";

/* ────────────────────────────── Types ────────────────────────────── */

export interface C14nOptions extends CanonicalizeOptions {
  /** Canonicalize the first element this XPath selects instead of the root. */
  xpath?: string;
}

const DECLARATION_PREFIX = /<\?xml\s+version="1\.0"\s+encoding="[^"]+"\s*\?>/i;

/* ───────────────────────── Document ───────────────────────── */

export class XmlDocument implements EncodableDocument, DecodableDocument, ISchemaValidatable {
  readonly version: string;
  readonly encoding: string;
  formatOutput: boolean;

  private readonly options: XmlDocumentOptions;
  private dom: Document;
  private xPathQuery: XPathQuery | null = null;
  private projection: DecodedMapping | null = null;

  constructor(options: Partial<XmlDocumentOptions> = {}) {
    this.options = resolveOptions(options);
    assertSupportedEncoding(this.options.encoding);
    this.version = this.options.version;
    this.encoding = this.options.encoding;
    this.formatOutput = this.options.formatOutput;
    this.dom = createEmptyDocument();
  }

  get logger(): XmlLogger {
    return this.options.logger;
  }

  get schemaSource(): SchemaSource {
    return this.options.schemaSource;
  }

  getDomDocument(): Document {
    return this.dom;
  }

  getDocumentElement(): Element | null {
    return this.dom.documentElement ?? null;
  }

  /* ───── Load / save ───── */

  /**
   * Replace the tree with the parsed source. UTF-8 sources are narrowed to the
   * working encoding; a missing declaration is synthesized.
   */
  loadXml(source: string | Uint8Array): true {
    const prepared = prepareSource(source, this.encoding);
    if (prepared.narrowed) {
      this.logger.debug(`Narrowed UTF-8 source to ${this.encoding}`);
    }

    this.dom = parseXmlToDom(prepared.text, { logger: this.logger });
    this.xPathQuery = null;
    this.invalidate();
    return true;
  }

  /**
   * The whole document (declaration, top-level nodes one per line) or a single
   * node, with quotes in text content escaped.
   */
  saveXml(node?: Node): string {
    const format = { format: this.formatOutput };
    if (node) return fixEntities(serializeNode(node, format));

    let xml = `${formatDeclaration(this.version, this.encoding)}\n`;
    for (const child of childNodes(this.dom)) {
      if (isXmlDeclaration(child) || isText(child)) continue;
      xml += `${serializeNode(child, format)}\n`;
    }
    return fixEntities(xml);
  }

  /** `saveXml()` as bytes in the working encoding. */
  saveXmlBytes(): Buffer {
    return encodeText(this.saveXml(), this.encoding);
  }

  /** `saveXml()` without the declaration. */
  getXml(): string {
    return this.saveXml().replace(DECLARATION_PREFIX, "").trim();
  }

  /* ───── Introspection ───── */

  getName(): string {
    return this.requireRoot().tagName;
  }

  getNamespace(): string | null {
    const root = this.getDocumentElement();
    if (!root) return null;
    const declared = root.getAttribute("xmlns");
    if (declared) return declared;
    return root.prefix === null && root.namespaceURI ? root.namespaceURI : null;
  }

  /** Location part of the root's `xsi:schemaLocation` ("namespace location"). */
  getSchema(): string | null {
    const value = this.getDocumentElement()?.getAttribute("xsi:schemaLocation")?.trim() ?? "";
    const location = value.split(/\s+/)[1];
    return location === undefined || location === "" ? null : location;
  }

  getSchemaLocationHint(): string | null {
    return this.getSchema();
  }

  /* ───── Canonical forms ───── */

  /** Canonical XML of the root, or of the first element `opts.xpath` selects. */
  c14n(opts: C14nOptions = {}): string {
    const { xpath, ...algo } = opts;
    const el = xpath === undefined ? this.requireRoot() : this.selectElement(xpath);
    return canonicalize(el, algo);
  }

  /** Canonical XML with text-content quotes escaped, as bytes in the working encoding. */
  c14nWithEncoding(xpath?: string): Buffer {
    return encodeText(this.canonicalText(xpath), this.encoding);
  }

  /** As `c14nWithEncoding`, with whitespace between tags removed. */
  c14nWithEncodingFlattened(xpath?: string): Buffer {
    return encodeText(flattenXml(this.canonicalText(xpath)), this.encoding);
  }

  /** Canonical `/<root>/Signature`, or null when the document is unsigned. */
  getSignatureNodeXml(): string | null {
    const [signature] = this.getNodes(`/${this.requireRoot().localName}/Signature`);
    return signature && isElement(signature) ? canonicalize(signature) : null;
  }

  private canonicalText(xpath?: string): string {
    return fixEntities(xpath === undefined ? this.c14n() : this.c14n({ xpath }));
  }

  private selectElement(xpath: string): Element {
    const [node] = this.getNodes(xpath);
    if (!node || !isElement(node)) {
      throw new XmlError("XPathNodeNotFound", `It was not possible to get the node with the XPath ${xpath}.`);
    }
    return node;
  }

  private requireRoot(): Element {
    const root = this.getDocumentElement();
    if (!root) throw new XmlError("EmptyDocument", "The XML document has no root element.");
    return root;
  }

  /* ───── Queries & projection ───── */

  query(query: string, params: QueryParams = {}): DecodedValue {
    return this.queryEngine().get(query, params);
  }

  getNodes(query: string, params: QueryParams = {}): Node[] {
    return this.queryEngine().getNodes(query, params);
  }

  /** Projection of the document node (`{ rootTag: ... }`), computed once until invalidated. */
  toArray(): DecodedMapping {
    if (this.projection === null) {
      const projected = this.query("/");
      this.projection = isDecodedMapping(projected) ? projected : {};
    }
    return this.projection;
  }

  /** Dot-path lookup into `toArray()`; list items are addressed by index ("a.b.0"). */
  get(selector: string, defaultValue: DecodedValue = null): DecodedValue {
    let current: DecodedValue = this.toArray();
    for (const key of selector.split(".")) {
      const next = childAt(current, key);
      if (next === undefined) return defaultValue;
      current = next;
    }
    return current;
  }

  toJSON(): DecodedMapping {
    return this.toArray();
  }

  /** Drop the memoized projection. Needed after editing the tree through DOM handles. */
  invalidate(): void {
    this.projection = null;
  }

  private queryEngine(): XPathQuery {
    this.xPathQuery ??= new XPathQuery(this.dom, {}, { logger: this.logger });
    return this.xPathQuery;
  }

  /* ───── Schema ───── */

  /**
   * Validate against the XSD at `path`. Problems are appended to `diagnostics`;
   * an unreadable or unparsable schema counts as a failed validation.
   */
  schemaValidate(path: string, diagnostics: XmlDiagnostic[] = []): boolean {
    const index = this.loadSchema(path, diagnostics);
    if (index === null) return false;

    const root = getRootElement(parseXmlToXast(this.getXml(), { logger: this.logger }));
    const ok = validateAgainstXsd(root, index, diagnostics);
    if (!ok) this.logger.warn(`Schema validation against ${basename(path)} failed`);
    return ok;
  }

  private loadSchema(path: string, diagnostics: XmlDiagnostic[]): XsdIndex | null {
    try {
      return buildXsdIndex(this.schemaSource.readText(path));
    } catch (err: unknown) {
      const detail = isXmlError(err) ? err.diagnostics : [];
      diagnostics.push(
        { severity: "fatal", message: `Failed to load the schema ${basename(path)}: ${errorMessage(err)}` },
        ...detail,
      );
      this.logger.warn(`Schema ${path} could not be loaded`);
      return null;
    }
  }
}

function childAt(value: DecodedValue, key: string): DecodedValue | undefined {
  if (Array.isArray(value)) return /^\d+$/.test(key) ? value[Number(key)] : undefined;
  if (isDecodedMapping(value) && Object.prototype.hasOwnProperty.call(value, key)) return value[key];
  return undefined;
}
