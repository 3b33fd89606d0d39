import { test } from "node:test";
import assert from "node:assert/strict";
import { XmlService } from "../src/core/application/xml_service.ts";
import { XmlDocument } from "../src/core/application/xml_document.ts";
import { silentLogger } from "../src/core/shared/log.ts";

const DECL = `<?xml version="1.0" encoding="ISO-8859-1"?>`;
const service = new XmlService({}, { logger: silentLogger });

test("control characters never reach the output", () => {
  const doc = service.encode({ root: { a: "x\u0007y\u001Fz" } });
  assert.equal(doc.getXml(), "<root>\n  <a>xyz</a>\n</root>");
});

test("characters outside the working encoding survive until bytes are written", () => {
  const doc = service.encode({ r: { a: "€" } });
  assert.equal(doc.get("r.a"), "€");
  assert.deepEqual(doc.saveXmlBytes(), Buffer.from(`${DECL}\n<r>\n  <a>?</a>\n</r>\n`, "latin1"));
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><a>?</a></r>");
});

test("UTF-8 sources lose what the working encoding cannot hold on load", () => {
  const doc = new XmlDocument({ logger: silentLogger });
  doc.loadXml(`<?xml version="1.0" encoding="UTF-8"?><r><a>€ ñ</a></r>`);
  assert.equal(doc.get("r.a"), "? ñ");
});

test("quotes and ampersands in text are escaped in canonical output", () => {
  const doc = service.encode({ r: { a: `5" & 'x'` } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><a>5&quot; &amp; &apos;x&apos;</a></r>");
});

test("pre-escaped entities are not escaped twice", () => {
  const doc = service.encode({ r: { a: "&lt;b&gt;", b: "&amp;lt;" } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><a>&lt;b&gt;</a><b>&lt;</b></r>");
});

test("quotes inside attribute values keep their attribute escaping", () => {
  const doc = service.encode({ r: { "@attributes": { t: `a"b` } } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), `<r t="a&quot;b"></r>`);
});

test("numeric strings are written unchanged", () => {
  const doc = service.encode({ r: { n: "1e3", m: -0.5 } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><n>1e3</n><m>-0.5</m></r>");
});

/* ───── Empty values through canonical output ───── */

test("empty strings and true render as start/end tag pairs in canonical output", () => {
  const doc = service.encode({ r: { k: "", t: true } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><k></k><t></t></r>");
  assert.equal(doc.c14n({ exclusive: true }), "<r><k></k><t></t></r>");
  assert.equal(doc.getXml(), "<r>\n  <k></k>\n  <t></t>\n</r>");
});

test("empty elements next to filled ones canonicalize in every form", () => {
  const doc = service.encode({ root: { a: "x", b: "" } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<root><a>x</a><b></b></root>");
  assert.equal(doc.c14nWithEncodingFlattened().toString("latin1"), "<root><a>x</a><b></b></root>");
});

test("a value made only of control characters becomes an empty element", () => {
  const doc = service.encode({ r: { c: "\u0001" } });
  assert.equal(doc.c14nWithEncoding().toString("latin1"), "<r><c></c></r>");
});

test("a selected subtree with an empty element canonicalizes", () => {
  const doc = service.encode({ r: { a: { b: "", c: "1" } } });
  assert.equal(doc.c14nWithEncoding("//a").toString("latin1"), "<a><b></b><c>1</c></a>");
});

test("attribute quotes and text quotes are escaped differently", () => {
  const doc = service.encode({ r: { item: { "@attributes": { note: `say "hi"` }, "@value": "it's" } } });
  assert.equal(
    doc.c14nWithEncoding().toString("latin1"),
    `<r><item note="say &quot;hi&quot;">it&apos;s</item></r>`,
  );
});

test("nested repeated records keep document order", () => {
  const doc = service.encode({
    invoice: { line: [{ sku: "A", qty: 1 }, { sku: "B", qty: 2, tags: { tag: ["x", "y"] } }] },
  });
  assert.equal(
    doc.c14nWithEncoding().toString("latin1"),
    "<invoice><line><sku>A</sku><qty>1</qty></line>" +
      "<line><sku>B</sku><qty>2</qty><tags><tag>x</tag><tag>y</tag></tags></line></invoice>",
  );
});

test("queries may select attributes and text of an encoded document", () => {
  const doc = service.encode({
    root: {
      item: [
        { "@attributes": { id: 1 }, "@value": "first" },
        { "@attributes": { id: 2 }, "@value": "second" },
      ],
    },
  });
  assert.equal(doc.query("//item[@id=:i]/@id", { i: "2" }), "2");
  assert.deepEqual(doc.query("//item/text()"), ["first", "second"]);
});
