import { test } from "node:test";
import assert from "node:assert/strict";
import {
  XPathQuery,
  quoteXPathLiteral,
  resolvePlaceholders,
  selectNodes,
  toLocalNameQuery,
} from "../src/core/domain/query/xpath_query.ts";
import { isXmlError } from "../src/core/shared/errors.ts";

const XML =
  `<root><item id="1">first</item><item id="2">second</item>` +
  `<item id="3"><name>third</name><tag>a</tag><tag>b</tag></item></root>`;

const NS_XML = `<doc xmlns="urn:a" xmlns:b="urn:b"><entry>1</entry><b:entry>2</b:entry></doc>`;

/* ───── Query text ───── */

test("toLocalNameQuery rewrites bare steps only", () => {
  assert.equal(toLocalNameQuery("/root/item"), `/*[local-name()="root"]/*[local-name()="item"]`);
  assert.equal(toLocalNameQuery("count(//item)"), `count(//*[local-name()="item"])`);
  assert.equal(toLocalNameQuery("//item/text()"), `//*[local-name()="item"]/text()`);
  assert.equal(toLocalNameQuery("//item/@id"), `//*[local-name()="item"]/@id`);
  assert.equal(toLocalNameQuery("//ns:item"), "//ns:item");
});

test("toLocalNameQuery leaves string literals alone", () => {
  assert.equal(toLocalNameQuery("//a[@k='x/y']"), `//*[local-name()="a"][@k='x/y']`);
});

test("quoteXPathLiteral picks a quote kind or falls back to concat", () => {
  assert.equal(quoteXPathLiteral("plain"), "'plain'");
  assert.equal(quoteXPathLiteral("it's"), `"it's"`);
  assert.equal(quoteXPathLiteral(`a'b"c`), `concat('a',"'",'b"c')`);
});

test("resolvePlaceholders fills known names and keeps the rest", () => {
  assert.equal(
    resolvePlaceholders("//a[@k=:k and @m=:missing]", { k: 5 }),
    "//a[@k='5' and @m=:missing]",
  );
  assert.equal(resolvePlaceholders("//ns:item", { item: "x" }), "//ns:item");
});

/* ───── Evaluation ───── */

test("placeholders select by attribute value", () => {
  const q = new XPathQuery(XML);
  assert.equal(q.resolveQuery("//item[@id=:id]", { id: 2 }), `//*[local-name()="item"][@id='2']`);
  assert.equal(q.getValue("//item[@id=:id]", { id: 2 }), "second");
  assert.equal(q.getValue("//item[@id=:id]", { id: 9 }), null);
});

test("values with both quote kinds still match", () => {
  const q = new XPathQuery(`<root><q>say "hi" it's</q></root>`);
  assert.equal(q.getValue("//q[.=:v]", { v: `say "hi" it's` }), `say "hi" it's`);
});

test("getValues returns the text of every match", () => {
  assert.deepEqual(new XPathQuery(XML).getValues("//item"), ["first", "second", "thirdab"]);
});

test("queries run relative to a context node", () => {
  const q = new XPathQuery(XML);
  const [third] = q.getNodes("//item[@id='3']");
  assert.ok(third);
  assert.deepEqual(q.getValues("tag", {}, third), ["a", "b"]);
});

test("get projects matches into text, mappings and lists", () => {
  const q = new XPathQuery(XML);
  const third = { name: "third", tag: ["a", "b"] };
  assert.deepEqual(q.get("//item[@id=:id]", { id: 3 }), third);
  assert.deepEqual(q.get("//item"), ["first", "second", third]);
  assert.deepEqual(q.get("/"), { root: { item: ["first", "second", third] } });
  assert.equal(q.get("//missing"), null);
});

test("get projects attribute and text matches to their values", () => {
  const q = new XPathQuery(XML);
  assert.deepEqual(q.get("//item/@id"), ["1", "2", "3"]);
  assert.equal(q.get("//item[@id=:id]/@id", { id: 2 }), "2");
  assert.equal(q.get("//item[@id='1']/text()"), "first");
  assert.deepEqual(q.get("//item/text()"), ["first", "second"]);
});

test("projectNode of an attribute is its value", () => {
  const q = new XPathQuery(XML);
  const [id] = q.getNodes("//item[@id='3']/@id");
  assert.ok(id);
  assert.equal(q.projectNode(id), "3");
});

test("evaluate returns scalars", () => {
  const q = new XPathQuery(XML);
  assert.equal(q.evaluate("count(//item)"), 3);
  assert.equal(q.evaluate("string(//item[@id=:id]/@id)", { id: 1 }), "1");
  assert.equal(q.evaluate("//item"), "first");
});

test("namespaces are optional without a prefix map", () => {
  assert.deepEqual(new XPathQuery(NS_XML).getValues("//entry"), ["1", "2"]);
});

test("registered prefixes match only qualified elements", () => {
  assert.deepEqual(new XPathQuery(NS_XML, { b: "urn:b" }).getValues("//b:entry"), ["2"]);
});

test("selectNodes queries text in one call", () => {
  assert.equal(selectNodes(XML, "//tag").length, 2);
});

/* ───── Failures ───── */

test("a malformed expression fails with InvalidXPath", () => {
  assert.throws(
    () => new XPathQuery(XML).getNodes("//root@invalid_xpath]"),
    (err) =>
      isXmlError(err, "InvalidXPath") &&
      err.message.startsWith("An error occurred while executing the XPath expression:"),
  );
});

test("getNodes rejects expressions that are not node-sets", () => {
  assert.throws(() => new XPathQuery(XML).getNodes("count(//item)"), (err) => isXmlError(err, "InvalidXPath"));
});

test("unparsable source text fails with InvalidXml", () => {
  assert.throws(
    () => new XPathQuery("<a><b></a>"),
    (err) => isXmlError(err, "InvalidXml") && err.message.startsWith("The provided XML is not valid."),
  );
});
