import { test } from "node:test";
import assert from "node:assert/strict";
import { XmlDocument } from "../src/core/application/xml_document.ts";
import { XmlService } from "../src/core/application/xml_service.ts";
import { isXmlError } from "../src/core/shared/errors.ts";
import { silentLogger } from "../src/core/shared/log.ts";

const DECL = `<?xml version="1.0" encoding="ISO-8859-1"?>`;

const load = (xml: string | Uint8Array, formatOutput = true) => {
  const doc = new XmlDocument({ logger: silentLogger, formatOutput });
  doc.loadXml(xml);
  return doc;
};

/* ───── Load / save ───── */

test("saveXml writes the declaration and indents element-only content", () => {
  const doc = load("<root><a>1</a><b>2</b></root>");
  assert.equal(doc.saveXml(), `${DECL}\n<root>\n  <a>1</a>\n  <b>2</b>\n</root>\n`);
  assert.equal(doc.getXml(), "<root>\n  <a>1</a>\n  <b>2</b>\n</root>");
});

test("saveXml without formatting keeps the tree on one line", () => {
  const doc = load("<root><a>1</a><b>2</b></root>", false);
  assert.equal(doc.saveXml(), `${DECL}\n<root><a>1</a><b>2</b></root>\n`);
});

test("saveXml escapes quotes in text content", () => {
  const doc = load(`<r><q k="v">it's "x"</q></r>`);
  assert.equal(doc.getXml(), `<r>\n  <q k="v">it&apos;s &quot;x&quot;</q>\n</r>`);
});

test("saveXml of a single node", () => {
  const doc = load("<root><a><b>1</b></a></root>", false);
  const [a] = doc.getNodes("//a");
  assert.ok(a);
  assert.equal(doc.saveXml(a), "<a><b>1</b></a>");
});

test("loadXml narrows UTF-8 bytes to the working encoding", () => {
  const doc = load(Buffer.from(`<?xml version="1.0" encoding="UTF-8"?><r>ñ</r>`, "utf8"));
  assert.equal(doc.saveXml(), `${DECL}\n<r>ñ</r>\n`);
  assert.deepEqual(doc.saveXmlBytes(), Buffer.from(`${DECL}\n<r>ñ</r>\n`, "latin1"));
});

test("loadXml rejects empty and malformed input", () => {
  const doc = new XmlDocument({ logger: silentLogger });
  assert.throws(() => doc.loadXml("  "), (err) => isXmlError(err, "EmptyDocument"));
  assert.throws(() => doc.loadXml("<a><b></a>"), (err) => isXmlError(err, "MalformedXml"));
  assert.equal(doc.loadXml("<a/>"), true);
});

test("an unsupported working encoding is rejected up front", () => {
  assert.throws(
    () => new XmlDocument({ logger: silentLogger, encoding: "NOT-AN-ENCODING" }),
    (err) => isXmlError(err, "UnsupportedEncoding"),
  );
});

/* ───── Introspection ───── */

test("getName and getNamespace read the root", () => {
  const doc = load(`<inv xmlns="urn:inv"><a/></inv>`);
  assert.equal(doc.getName(), "inv");
  assert.equal(doc.getNamespace(), "urn:inv");
  assert.equal(load("<inv/>").getNamespace(), null);
  assert.equal(load(`<p:inv xmlns:p="urn:p"/>`).getNamespace(), null);
});

test("getSchema takes the location part of xsi:schemaLocation", () => {
  const doc = load(
    `<inv xmlns="urn:inv" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ` +
      `xsi:schemaLocation="urn:inv   inv.xsd"/>`,
  );
  assert.equal(doc.getSchema(), "inv.xsd");
  assert.equal(load("<inv/>").getSchema(), null);
});

test("getName on an empty document fails with EmptyDocument", () => {
  const doc = new XmlDocument({ logger: silentLogger });
  assert.throws(() => doc.getName(), (err) => isXmlError(err, "EmptyDocument"));
  assert.throws(() => doc.c14n(), (err) => isXmlError(err, "EmptyDocument"));
});

/* ───── Canonical forms ───── */

test("c14nWithEncodingFlattened drops whitespace between tags", () => {
  const doc = load("<root>\n  <element>Value</element>\n</root>");
  assert.equal(doc.c14n(), "<root>\n  <element>Value</element>\n</root>");
  assert.equal(doc.c14nWithEncodingFlattened().toString("latin1"), "<root><element>Value</element></root>");
});

test("c14nWithEncoding canonicalizes the node an XPath selects", () => {
  const doc = load(`<root><element1>A</element1><element2 b="2" a="1">B</element2></root>`);
  assert.equal(doc.c14nWithEncoding("//element2").toString("latin1"), `<element2 a="1" b="2">B</element2>`);
});

test("c14n fails with XPathNodeNotFound when nothing matches", () => {
  const doc = load("<root><a/></root>");
  assert.throws(
    () => doc.c14n({ xpath: "//nope" }),
    (err) => isXmlError(err, "XPathNodeNotFound") &&
      err.message === "It was not possible to get the node with the XPath //nope.",
  );
});

test("getSignatureNodeXml returns the canonical signature or null", () => {
  const signed = load("<doc><data>1</data><Signature><SignedInfo>x</SignedInfo></Signature></doc>");
  assert.equal(signed.getSignatureNodeXml(), "<Signature><SignedInfo>x</SignedInfo></Signature>");
  assert.equal(load("<doc><data>1</data></doc>").getSignatureNodeXml(), null);
});

/* ───── Structured access ───── */

const ORDER = "<order><id>7</id><line><sku>A</sku></line><line><sku>B</sku></line></order>";

test("toArray projects the whole document", () => {
  assert.deepEqual(load(ORDER).toArray(), { order: { id: "7", line: [{ sku: "A" }, { sku: "B" }] } });
});

test("get walks dot paths with list indices", () => {
  const doc = load(ORDER);
  assert.equal(doc.get("order.id"), "7");
  assert.equal(doc.get("order.line.1.sku"), "B");
  assert.equal(doc.get("order.nope", "fallback"), "fallback");
  assert.equal(doc.get("order.id.x"), null);
  assert.deepEqual(doc.query("//line/sku"), ["A", "B"]);
});

test("direct tree edits show up after invalidate", () => {
  const doc = load(ORDER);
  assert.equal(doc.get("order.extra", "none"), "none");

  const dom = doc.getDomDocument();
  dom.documentElement.appendChild(dom.createElement("extra"));
  assert.equal(doc.get("order.extra", "none"), "none");

  doc.invalidate();
  assert.equal(doc.get("order.extra", "none"), "");
});

/* ───── Service ───── */

test("the service encodes into a document and decodes it back", () => {
  const service = new XmlService({}, { logger: silentLogger });
  const doc = service.encode({ order: { "@attributes": { no: 5 }, id: 1, line: [{ sku: "A" }, { sku: "B" }] } });

  assert.equal(doc.get("order.id"), "1");
  assert.equal(
    doc.getXml(),
    `<order no="5">\n  <id>1</id>\n  <line>\n    <sku>A</sku>\n  </line>\n  <line>\n    <sku>B</sku>\n  </line>\n</order>`,
  );
  assert.deepEqual(service.decode(doc), {
    order: { "@attributes": { no: "5" }, id: "1", line: [{ sku: "A" }, { sku: "B" }] },
  });
});

test("encoding into a document refreshes its projection", () => {
  const service = new XmlService({}, { logger: silentLogger });
  const doc = service.encode({ root: { a: "1" } });
  assert.equal(doc.get("root.b"), null);

  service.encode({ b: "2" }, null, doc.getDocumentElement(), doc);
  assert.equal(doc.get("root.b"), "2");
});
