import { test } from "node:test";
import assert from "node:assert/strict";
import { XmlEncoder, isSkipped, type EncodableDocument } from "../src/core/domain/codec/xml_encoder.ts";
import { createEmptyDocument, serializeNode } from "../src/core/domain/parse/dom_xml.ts";
import { isXmlError } from "../src/core/shared/errors.ts";
import type { StructuredValue } from "../src/core/shared/types.ts";

class Sheet implements EncodableDocument {
  readonly dom = createEmptyDocument();
  invalidations = 0;

  getDomDocument(): Document {
    return this.dom;
  }

  invalidate(): void {
    this.invalidations++;
  }
}

const encoder = new XmlEncoder(() => new Sheet());
const xmlOf = (sheet: Sheet) => serializeNode(sheet.dom);

test("isSkipped covers null, undefined, false and empty containers", () => {
  const skipped: StructuredValue[] = [null, undefined, false, [], {}];
  const kept: StructuredValue[] = ["", 0, true, ["x"], { a: 1 }];
  for (const v of skipped) assert.equal(isSkipped(v), true);
  for (const v of kept) assert.equal(isSkipped(v), false);
});

test("encode drops skipped values and keeps empty strings and true", () => {
  const sheet = encoder.encode({
    root: { a: "1", b: 2, c: null, d: false, e: [], f: {}, g: "", h: true },
  });
  assert.equal(xmlOf(sheet), "<root><a>1</a><b>2</b><g></g><h></h></root>");
});

test("encode writes a sequence as repeated siblings", () => {
  const sheet = encoder.encode({
    root: { item: ["a", "b", { "@attributes": { id: 3 }, "@value": "c" }] },
  });
  assert.equal(xmlOf(sheet), `<root><item>a</item><item>b</item><item id="3">c</item></root>`);
});

test("encode combines attributes with a text value", () => {
  assert.equal(xmlOf(encoder.encode({ el: { "@attributes": { id: 1 }, "@value": "x" } })), `<el id="1">x</el>`);
});

test("encode writes true attributes as empty and skips false or null ones", () => {
  const sheet = encoder.encode({ el: { "@attributes": { checked: true, off: false, n: null } } });
  assert.equal(xmlOf(sheet), `<el checked=""/>`);
});

test("encode ignores @attributes and @value on the first level", () => {
  assert.equal(xmlOf(encoder.encode({ "@attributes": { id: 1 }, "@value": "x", root: "v" })), "<root>v</root>");
});

test("encode sanitizes text before it reaches the tree", () => {
  const sheet = encoder.encode({ root: { a: "x &amp; y", b: "1 < 2", c: "a\u0001b" } });
  assert.equal(xmlOf(sheet), "<root><a>x &amp; y</a><b>1 &lt; 2</b><c>ab</c></root>");
});

test("encode rejects an array as attribute value", () => {
  assert.throws(
    () => encoder.encode({ el: { "@attributes": { id: [1, 2] } } }),
    (err) => isXmlError(err, "InvalidStructure") && err.message.includes(`attribute "id" of node "el"`),
  );
});

test("encode rejects a sequence nested in a sequence", () => {
  assert.throws(() => encoder.encode({ root: { item: [["x"]] } }), (err) => isXmlError(err, "InvalidStructure"));
});

test("encode rejects a structured @value", () => {
  assert.throws(() => encoder.encode({ el: { "@value": { a: 1 } } }), (err) => isXmlError(err, "InvalidStructure"));
});

test("encode rejects a second root element", () => {
  assert.throws(() => encoder.encode({ a: "1", b: "2" }), (err) => isXmlError(err, "InvalidStructure"));
  assert.throws(() => encoder.encode({ root: ["x", "y"] }), (err) => isXmlError(err, "InvalidStructure"));
});

test("encode applies the namespace to every created element", () => {
  const sheet = encoder.encode({ root: { item: "v" } }, ["urn:x", "x"]);
  const root = sheet.dom.documentElement;
  assert.equal(root.tagName, "x:root");
  assert.equal(root.namespaceURI, "urn:x");
  assert.equal(root.firstChild?.nodeName, "x:item");
  assert.equal(xmlOf(sheet), `<x:root xmlns:x="urn:x"><x:item>v</x:item></x:root>`);
});

test("encode appends under a given parent of an existing document", () => {
  const sheet = encoder.encode({ root: { a: "1" } });
  encoder.encode({ b: "2" }, null, sheet.dom.documentElement, sheet);
  assert.equal(xmlOf(sheet), "<root><a>1</a><b>2</b></root>");
  assert.equal(sheet.invalidations, 2);
});
