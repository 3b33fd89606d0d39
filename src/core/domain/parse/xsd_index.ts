// xsd_index.ts
// Build a strict-enough in-memory index from an XSD document.
// Supports: global and local elements, complexType (named & inline), simpleContent,
// sequence/choice/all/group, min/maxOccurs, attributes (global/ref), attributeGroup,
// enumerations, fixed values, anyAttribute and substitution groups.
//
// Notes:
// - This is NOT a full XSD 1.0 validator, but it enforces element order and cardinality, and common attribute constraints.
// - It ignores namespaces for matching element names (uses localName()).

import type { Element as XEl, ElementContent, RootContent } from "xast";
import { XmlError } from "../../shared/errors.ts";
import { getAttr as attr, localName, parseXmlToXast } from "./xast_xml.ts";

export type AttrUse = "required" | "optional" | "prohibited";
export type MaxOccurs = number | "unbounded";
export type Occurs = { min: number; max: MaxOccurs };

export type XsdAttrDef = {
  use: AttrUse;
  enum?: ReadonlySet<string>;
  fixed?: string;
};

export type XsdParticle =
  | { kind: "empty"; occurs: Occurs }
  | { kind: "element"; name: string; occurs: Occurs }
  | { kind: "sequence"; items: XsdParticle[]; occurs: Occurs }
  | { kind: "choice"; items: XsdParticle[]; occurs: Occurs }
  | { kind: "all"; items: XsdParticle[]; occurs: Occurs }
  | { kind: "groupRef"; ref: string; occurs: Occurs }
  | { kind: "any"; occurs: Occurs };

export type XsdComplexTypeDef = {
  content: XsdParticle;
  attributes: Map<string, XsdAttrDef>;
  mixed: boolean;
  allowAnyAttribute: boolean;
};

export type XsdElementDef = XsdComplexTypeDef & {
  name: string;
  /** Enumerated text values of a simple-typed element. */
  enum?: ReadonlySet<string>;
  /** Derived: child element names reachable (ignores order/occurs). */
  allowedChildren: Set<string> | "ANY" | "EMPTY";
};

export type XsdIndex = {
  /** Global element declarations. */
  elements: Map<string, XsdElementDef>;
  /** Element declarations nested in content models, by name (first declaration wins). */
  localElements: Map<string, XsdElementDef>;
  complexTypes: Map<string, XsdComplexTypeDef>;
  simpleTypes: Map<string, ReadonlySet<string> | undefined>;
  groups: Map<string, XsdParticle>;
  attributeGroups: Map<string, Map<string, XsdAttrDef>>;
  attributes: Map<string, XsdAttrDef>; // global attributes
  substitutionGroups: Map<string, Set<string>>; // head -> members
  substitutionGroupFor: Map<string, string>; // member -> head
};

type Resolvers = {
  resolveComplexType: (name: string) => XsdComplexTypeDef | undefined;
  resolveAttrGroup: (name: string) => Map<string, XsdAttrDef>;
  resolveGroup: (name: string) => XsdParticle;
  attributes: Map<string, XsdAttrDef>;
  simpleTypes: Map<string, ReadonlySet<string> | undefined>;
};

function isEl(n: RootContent | ElementContent, ln?: string): n is XEl {
  return n.type === "element" && (!ln || localName(n.name) === ln);
}

function childEl(e: XEl, ln: string): XEl | undefined {
  return e.children.find((n): n is XEl => isEl(n, ln));
}

function occursFromEl(e: XEl): Occurs {
  const min = parseInt(attr(e, "minOccurs") ?? "1", 10);
  const rawMax = attr(e, "maxOccurs") ?? "1";
  const max: MaxOccurs = rawMax === "unbounded" ? "unbounded" : parseInt(rawMax, 10);
  return { min: Number.isFinite(min) ? min : 1, max: (max === "unbounded" || Number.isFinite(max)) ? max : 1 };
}

function emptyParticle(): XsdParticle {
  return { kind: "empty", occurs: { min: 1, max: 1 } };
}

function emptyType(mixed = false): XsdComplexTypeDef {
  return { content: emptyParticle(), attributes: new Map(), mixed, allowAnyAttribute: false };
}

export function buildXsdIndex(xsdText: string): XsdIndex {
  const ast = parseXmlToXast(xsdText, { errorCode: "SchemaValidationFailed" });
  const schema = ast.children.find((n): n is XEl => isEl(n, "schema"));
  if (!schema) throw new XmlError("SchemaValidationFailed", "XSD: missing <schema> root element");

  // ---- collect globals ----
  const globalElements = new Map<string, XEl>();
  const complexTypeEls = new Map<string, XEl>();
  const groupEls = new Map<string, XEl>();
  const attributeGroupEls = new Map<string, XEl>();
  const globalAttrEls = new Map<string, XEl>();
  const simpleTypes = new Map<string, ReadonlySet<string> | undefined>();
  const substitutionGroups = new Map<string, Set<string>>();
  const substitutionGroupFor = new Map<string, string>();

  for (const n of schema.children) {
    if (!isEl(n)) continue;
    const ln = localName(n.name);
    const nm = attr(n, "name");
    if (!nm) continue;
    if (ln === "element") {
      globalElements.set(nm, n);
      const sg = attr(n, "substitutionGroup");
      if (sg) {
        const head = localName(sg);
        substitutionGroupFor.set(nm, head);
        const members = substitutionGroups.get(head) ?? new Set<string>();
        members.add(nm);
        substitutionGroups.set(head, members);
      }
    } else if (ln === "complexType") {
      complexTypeEls.set(nm, n);
    } else if (ln === "simpleType") {
      simpleTypes.set(nm, extractEnum(n));
    } else if (ln === "group") {
      groupEls.set(nm, n);
    } else if (ln === "attributeGroup") {
      attributeGroupEls.set(nm, n);
    } else if (ln === "attribute") {
      globalAttrEls.set(nm, n);
    }
  }

  // ---- global attributes ----
  const attributes = new Map<string, XsdAttrDef>();
  for (const [nm, el] of globalAttrEls) {
    attributes.set(nm, parseAttributeDef(el, attributes, simpleTypes));
  }

  // ---- attribute groups (lazy resolve, handles nesting) ----
  const attributeGroups = new Map<string, Map<string, XsdAttrDef>>();
  const attrGroupsInProgress = new Set<string>();
  function resolveAttrGroup(name: string): Map<string, XsdAttrDef> {
    const done = attributeGroups.get(name);
    if (done) return done;
    if (attrGroupsInProgress.has(name)) return new Map();
    attrGroupsInProgress.add(name);

    const host = attributeGroupEls.get(name);
    const out = host ? collectAttrs(host, ctx).attrs : new Map<string, XsdAttrDef>();
    attributeGroups.set(name, out);
    return out;
  }

  // ---- groups (content model) ----
  const groups = new Map<string, XsdParticle>();
  const groupsInProgress = new Set<string>();
  function resolveGroup(name: string): XsdParticle {
    const done = groups.get(name);
    if (done) return done;
    if (groupsInProgress.has(name)) return emptyParticle(); // cycle
    groupsInProgress.add(name);

    const host = groupEls.get(name);
    const body = host ? findFirstParticleChild(host) : null;
    const parsed = body ? parseParticle(body, localEls) : emptyParticle();
    groups.set(name, parsed);
    return parsed;
  }

  // ---- complex types ----
  const complexTypes = new Map<string, XsdComplexTypeDef>();
  const typesInProgress = new Set<string>();
  function resolveComplexType(name: string): XsdComplexTypeDef | undefined {
    const done = complexTypes.get(name);
    if (done) return done;
    const host = complexTypeEls.get(name);
    if (!host) return undefined;
    if (typesInProgress.has(name)) return emptyType();
    typesInProgress.add(name);

    const def = parseComplexType(host, ctx, localEls);
    complexTypes.set(name, def);
    return def;
  }

  const localEls = new Map<string, XEl>();
  const ctx: Resolvers = { resolveComplexType, resolveAttrGroup, resolveGroup, attributes, simpleTypes };

  for (const name of attributeGroupEls.keys()) resolveAttrGroup(name);
  for (const name of groupEls.keys()) resolveGroup(name);
  for (const name of complexTypeEls.keys()) resolveComplexType(name);

  // ---- elements ----
  const elements = new Map<string, XsdElementDef>();
  for (const [name, el] of globalElements) {
    elements.set(name, parseElementDef(name, el, ctx, localEls));
  }

  // Local declarations discovered while parsing content models; parsing one may find more.
  const localElements = new Map<string, XsdElementDef>();
  let pending = Array.from(localEls.entries());
  while (pending.length > 0) {
    for (const [name, el] of pending) {
      if (!localElements.has(name)) localElements.set(name, parseElementDef(name, el, ctx, localEls));
    }
    pending = Array.from(localEls.entries()).filter(([name]) => !localElements.has(name));
  }

  const index: XsdIndex = {
    elements,
    localElements,
    complexTypes,
    simpleTypes,
    groups,
    attributeGroups,
    attributes,
    substitutionGroups,
    substitutionGroupFor,
  };
  expandAllowedChildrenForSubstitutions(index);
  return index;
}

// -------------------------
// Parsing: elements/types/particles
// -------------------------

function expandAllowedChildrenForSubstitutions(index: XsdIndex): void {
  if (index.substitutionGroups.size === 0) return;
  for (const def of [...index.elements.values(), ...index.localElements.values()]) {
    if (def.allowedChildren === "ANY" || def.allowedChildren === "EMPTY") continue;
    const extra = new Set<string>();
    for (const name of def.allowedChildren) {
      const subs = index.substitutionGroups.get(name);
      if (!subs) continue;
      for (const sub of subs) extra.add(sub);
    }
    for (const sub of extra) def.allowedChildren.add(sub);
  }
}

function parseElementDef(name: string, el: XEl, ctx: Resolvers, localEls: Map<string, XEl>): XsdElementDef {
  const inlineCt = childEl(el, "complexType");
  const inlineSt = childEl(el, "simpleType");
  const typeName = attr(el, "type");

  let ct: XsdComplexTypeDef;
  let enumVals: ReadonlySet<string> | undefined;
  if (inlineCt) {
    ct = parseComplexType(inlineCt, ctx, localEls);
  } else if (inlineSt) {
    ct = emptyType(true);
    enumVals = extractEnum(inlineSt);
  } else if (typeName) {
    const ln = localName(typeName);
    // Anything that is not a named complexType is a simple type: text only.
    ct = ctx.resolveComplexType(ln) ?? emptyType(true);
    enumVals = ctx.simpleTypes.get(ln);
  } else {
    // No type at all is xs:anyType.
    ct = { content: { kind: "any", occurs: { min: 0, max: "unbounded" } }, attributes: new Map(), mixed: true, allowAnyAttribute: true };
  }

  const allowedChildren = deriveAllowedChildrenFromParticle(ct.content, ctx.resolveGroup);
  const def: XsdElementDef = { name, ...ct, attributes: new Map(ct.attributes), allowedChildren };
  if (enumVals) def.enum = enumVals;
  return def;
}

function parseComplexType(ctEl: XEl, ctx: Resolvers, localEls: Map<string, XEl>): XsdComplexTypeDef {
  const mixedAttr = (attr(ctEl, "mixed") ?? "").toLowerCase();
  const mixed = mixedAttr === "true" || mixedAttr === "1";

  // Simple content: text plus attributes, no child elements.
  if (childEl(ctEl, "simpleContent")) {
    const { attrs, allowAnyAttribute } = collectAttrs(ctEl, ctx);
    return { content: emptyParticle(), attributes: attrs, mixed: true, allowAnyAttribute };
  }

  // complexContent extension?
  const complexContent = childEl(ctEl, "complexContent");
  const ext = complexContent ? childEl(complexContent, "extension") : undefined;
  if (ext) {
    const baseName = localName(attr(ext, "base") ?? "");
    const base = (baseName ? ctx.resolveComplexType(baseName) : undefined) ?? emptyType();

    const extParticleHost = findFirstParticleChild(ext);
    const extParticle = extParticleHost ? parseParticle(extParticleHost, localEls) : emptyParticle();

    const { attrs: extAttrs, allowAnyAttribute: extAnyAttr } = collectAttrs(ext, ctx);
    const mergedAttrs = new Map<string, XsdAttrDef>(base.attributes);
    for (const [k, v] of extAttrs) mergedAttrs.set(k, v);

    return {
      content: mergeExtensionContent(base.content, extParticle),
      attributes: mergedAttrs,
      mixed: mixed || base.mixed,
      allowAnyAttribute: base.allowAnyAttribute || extAnyAttr,
    };
  }

  // regular complexType with direct particle
  const host = findFirstParticleChild(ctEl);
  const content = host ? parseParticle(host, localEls) : emptyParticle();
  const { attrs, allowAnyAttribute } = collectAttrs(ctEl, ctx);
  return { content, attributes: attrs, mixed, allowAnyAttribute };
}

function mergeExtensionContent(base: XsdParticle, extra: XsdParticle): XsdParticle {
  const bEmpty = base.kind === "empty" && base.occurs.min === 1 && base.occurs.max === 1;
  const eEmpty = extra.kind === "empty" && extra.occurs.min === 1 && extra.occurs.max === 1;
  if (bEmpty) return extra;
  if (eEmpty) return base;
  return { kind: "sequence", items: [base, extra], occurs: { min: 1, max: 1 } };
}

const PARTICLE_NAMES = new Set(["sequence", "choice", "all", "group", "element", "any"]);

function findFirstParticleChild(host: XEl): XEl | null {
  for (const c of host.children) {
    if (!isEl(c)) continue;
    if (PARTICLE_NAMES.has(localName(c.name))) return c;
    // attributes and annotations never hold the content model
    const ln = localName(c.name);
    if (ln === "attribute" || ln === "attributeGroup" || ln === "annotation") continue;
    const nested = findFirstParticleChild(c);
    if (nested) return nested;
  }
  return null;
}

function isMeaningful(p: XsdParticle): boolean {
  return p.kind !== "empty" || p.occurs.min !== 1 || p.occurs.max !== 1;
}

function parseParticle(el: XEl, localEls: Map<string, XEl>): XsdParticle {
  const ln = localName(el.name);
  const occurs = occursFromEl(el);

  if (ln === "sequence" || ln === "choice" || ln === "all") {
    const items = el.children
      .filter((n): n is XEl => isEl(n))
      .map((c) => parseParticle(c, localEls))
      .filter(isMeaningful);
    return { kind: ln, items, occurs };
  }

  if (ln === "group") {
    const ref = localName(attr(el, "ref") ?? "");
    if (ref) return { kind: "groupRef", ref, occurs };
    const body = findFirstParticleChild(el);
    const p = body ? parseParticle(body, localEls) : emptyParticle();
    return { kind: "sequence", items: [p], occurs };
  }

  if (ln === "element") {
    const ref = attr(el, "ref");
    const name = attr(el, "name");
    if (ref) return { kind: "element", name: localName(ref), occurs };
    if (!name) return { kind: "empty", occurs };
    if (!localEls.has(name)) localEls.set(name, el);
    return { kind: "element", name, occurs };
  }

  if (ln === "any") {
    return { kind: "any", occurs };
  }

  // annotation, attribute, ...
  return emptyParticle();
}

// -------------------------
// Attributes
// -------------------------

function collectAttrs(host: XEl, ctx: Resolvers): { attrs: Map<string, XsdAttrDef>; allowAnyAttribute: boolean } {
  const attrs = new Map<string, XsdAttrDef>();
  let allowAnyAttribute = false;

  const walk = (el: XEl) => {
    for (const c of el.children) {
      if (!isEl(c)) continue;
      const ln = localName(c.name);
      if (ln === "attribute") {
        const nm = attr(c, "name") ?? localName(attr(c, "ref") ?? "");
        if (nm) attrs.set(nm, parseAttributeDef(c, ctx.attributes, ctx.simpleTypes));
      } else if (ln === "attributeGroup") {
        const ref = localName(attr(c, "ref") ?? "");
        if (ref) {
          for (const [k, v] of ctx.resolveAttrGroup(ref)) attrs.set(k, v);
        }
      } else if (ln === "anyAttribute") {
        allowAnyAttribute = true;
      } else if (!PARTICLE_NAMES.has(ln)) {
        walk(c);
      }
    }
  };

  walk(host);
  return { attrs, allowAnyAttribute };
}

function parseUse(v: string | undefined): AttrUse {
  return v === "required" || v === "prohibited" ? v : "optional";
}

function parseAttributeDef(
  attrEl: XEl,
  globalAttributes: Map<string, XsdAttrDef>,
  simpleTypes: Map<string, ReadonlySet<string> | undefined>,
): XsdAttrDef {
  const use = parseUse(attr(attrEl, "use"));
  const fixed = attr(attrEl, "fixed");
  const typeName = attr(attrEl, "type");
  const inlineSt = childEl(attrEl, "simpleType");
  const enumVals = inlineSt ? extractEnum(inlineSt) : typeName ? simpleTypes.get(localName(typeName)) : undefined;

  const ref = attr(attrEl, "ref");
  const base = ref ? globalAttributes.get(localName(ref)) : undefined;

  // use from the referencing site wins; fixed/enum from the base unless overridden
  const def: XsdAttrDef = { use };
  const f = fixed ?? base?.fixed;
  const e = enumVals ?? base?.enum;
  if (f !== undefined) def.fixed = f;
  if (e !== undefined) def.enum = e;
  return def;
}

/** xs:simpleType -> xs:restriction -> xs:enumeration@value */
function extractEnum(simpleType: XEl): ReadonlySet<string> | undefined {
  const restriction = childEl(simpleType, "restriction");
  if (!restriction) return undefined;
  const values = restriction.children
    .filter((n): n is XEl => isEl(n, "enumeration"))
    .map((e) => attr(e, "value"))
    .filter((v): v is string => typeof v === "string");
  return values.length ? new Set(values) : undefined;
}

// -------------------------
// Derived allowedChildren
// -------------------------

function deriveAllowedChildrenFromParticle(
  p: XsdParticle,
  resolveGroup: (name: string) => XsdParticle,
): Set<string> | "ANY" | "EMPTY" {
  // xs:any anywhere means "ANY" to avoid false negatives.
  let hasAny = false;
  const names = new Set<string>();
  const seen = new Set<string>();

  const walk = (n: XsdParticle) => {
    switch (n.kind) {
      case "any":
        hasAny = true;
        return;
      case "element":
        names.add(n.name);
        return;
      case "groupRef":
        if (seen.has(n.ref)) return;
        seen.add(n.ref);
        walk(resolveGroup(n.ref));
        return;
      case "sequence":
      case "choice":
      case "all":
        for (const it of n.items) walk(it);
        return;
      case "empty":
        return;
    }
  };

  walk(p);

  if (hasAny) return "ANY";
  if (names.size === 0) return "EMPTY";
  return names;
}
