/**
 * XML → xast utilities.
 * - Strict well-formedness check with positioned diagnostics
 * - xast tree for schema validation (positions kept for line numbers)
 *
 * Public surface:
 *   - parseXmlToXast(xml, options?)
 *   - parseDiagnostic(err)
 *   - getRootElement, localName, getAttr, childElements, firstChild, textOf
 */

import { fromXml } from "xast-util-from-xml";
import type { Element as XEl, Root, RootContent, ElementContent } from "xast";
import { XmlError, errorMessage, type XmlDiagnostic, type XmlErrorCode } from "../../shared/errors.ts";
import type { XmlLogger } from "../../shared/log.ts";
import { stripBom } from "../text/encoding.ts";

/* ────────────────────────────── Types ────────────────────────────── */

export interface XmlParseOptions {
  logger?: XmlLogger;
  /** Error code raised on failure. */
  errorCode?: XmlErrorCode; // default "MalformedXml"
}

/* ───────────────────────── Parse & diagnostics ───────────────────────── */

export function parseXmlToXast(xml: string, opts: XmlParseOptions = {}): Root {
  try {
    return fromXml(stripBom(xml));
  } catch (err: unknown) {
    const diagnostic = parseDiagnostic(err);
    const where = diagnostic.line !== undefined
      ? ` (at line ${diagnostic.line}, column ${diagnostic.column ?? 0})`
      : "";
    opts.logger?.error(`XML parse error${where}: ${diagnostic.message}`);
    throw new XmlError(opts.errorCode ?? "MalformedXml", "Error loading the XML.", [diagnostic], {
      cause: err,
    });
  }
}

/** Pull line/column out of a parser exception (VFileMessage-shaped or plain). */
export function parseDiagnostic(err: unknown): XmlDiagnostic {
  const message = err instanceof Error && "reason" in err && typeof err.reason === "string"
    ? err.reason
    : errorMessage(err);

  if (err instanceof Error && "line" in err && typeof err.line === "number") {
    const column = "column" in err && typeof err.column === "number" ? err.column : undefined;
    return column === undefined
      ? { severity: "fatal", message, line: err.line }
      : { severity: "fatal", message, line: err.line, column };
  }

  const m = message.match(/line\s+(\d+),\s*column\s+(\d+)/i) ?? message.match(/(\d+):(\d+)/);
  if (m?.[1] !== undefined && m[2] !== undefined) {
    return { severity: "fatal", message, line: Number(m[1]), column: Number(m[2]) };
  }
  return { severity: "fatal", message };
}

/* ───────────────────────── Helpers ───────────────────────── */

export function localName(qname: string): string {
  const i = qname.indexOf(":");
  return i >= 0 ? qname.slice(i + 1) : qname;
}

function isElementNode(n: RootContent | ElementContent): n is XEl {
  return n.type === "element";
}

export function getRootElement(ast: Root): XEl {
  const el = ast.children.find(isElementNode);
  if (!el) throw new XmlError("MalformedXml", "XML has no root element");
  return el;
}

export function getAttr(el: XEl, name: string): string | undefined {
  return el.attributes[name] ?? undefined;
}

export function childElements(el: XEl, name?: string): XEl[] {
  return el.children
    .filter(isElementNode)
    .filter((c) => (name ? localName(c.name) === name : true));
}

export function firstChild(el: XEl, name: string): XEl | undefined {
  return childElements(el, name)[0];
}

/** Non-whitespace character data directly under `el`, or null. */
export function textOf(el: XEl): string | null {
  for (const c of el.children) {
    if ((c.type === "text" || c.type === "cdata") && c.value.trim() !== "") return c.value;
  }
  return null;
}
