// xsd_validator.ts
// Validate an xast tree against an XSD index (order + cardinality + common attribute constraints).
// Problems are pushed as diagnostics; nothing here throws.
import type { Element as XEl, ElementContent } from "xast";
import type { XmlDiagnostic } from "../../shared/errors.ts";
import { localName } from "./xast_xml.ts";
import type { XsdIndex, XsdElementDef, XsdParticle, Occurs } from "./xsd_index.ts";

const IGNORED_ATTR_PREFIXES = ["xmlns", "xml:", "xsi:"];

/** True when no error was added to `diagnostics`. */
export function validateAgainstXsd(root: XEl, xsd: XsdIndex, diagnostics: XmlDiagnostic[]): boolean {
  const before = diagnostics.length;
  const name = localName(root.name);
  const def = xsd.elements.get(name);
  if (!def) {
    report(diagnostics, root, `/${name}`, `Element '${name}': No matching global declaration available for the validation root`);
  } else {
    walk(root, def, `/${name}`, xsd, diagnostics);
  }
  return diagnostics.length === before;
}

function walk(el: XEl, def: XsdElementDef, here: string, xsd: XsdIndex, out: XmlDiagnostic[]) {
  const name = localName(el.name);
  validateAttrs(el, name, def, here, out);
  validateContent(el, name, def, here, xsd, out);

  for (const k of childElements(el)) {
    const kn = localName(k.name);
    const kidDef = resolveElementDef(kn, xsd);
    if (kidDef) {
      walk(k, kidDef, `${here}/${kn}`, xsd, out);
    } else if (def.allowedChildren !== "ANY") {
      report(out, k, `${here}/${kn}`, `Element '${kn}': This element is not declared`);
    }
  }
}

function report(out: XmlDiagnostic[], el: XEl, path: string, message: string) {
  const start = el.position?.start;
  out.push(start
    ? { severity: "error", message, path, line: start.line, column: start.column }
    : { severity: "error", message, path });
}

function validateAttrs(el: XEl, elementName: string, def: XsdElementDef, here: string, out: XmlDiagnostic[]) {
  const present = Object.keys(el.attributes).filter((a) => !IGNORED_ATTR_PREFIXES.some((p) => a.startsWith(p)));

  for (const a of present) {
    const decl = def.attributes.get(a);
    if (!decl) {
      if (!def.allowAnyAttribute) {
        report(out, el, here, `Element '${elementName}', attribute '${a}': The attribute '${a}' is not allowed`);
      }
      continue;
    }
    if (decl.use === "prohibited") {
      report(out, el, here, `Element '${elementName}', attribute '${a}': The attribute '${a}' is not allowed`);
      continue;
    }

    const value = el.attributes[a] ?? "";
    if (decl.fixed !== undefined && value !== decl.fixed) {
      report(out, el, here, `Element '${elementName}', attribute '${a}': The value '${value}' does not match the fixed value constraint '${decl.fixed}'`);
    }
    if (decl.enum && !decl.enum.has(value)) {
      report(out, el, here, `Element '${elementName}', attribute '${a}': [facet 'enumeration'] The value '${value}' is not an element of the set {${formatSet(decl.enum)}}`);
    }
  }

  for (const [a, decl] of def.attributes) {
    if (decl.use === "required" && !(a in el.attributes)) {
      report(out, el, here, `Element '${elementName}': The attribute '${a}' is required but missing`);
    }
  }
}

function validateContent(el: XEl, elementName: string, def: XsdElementDef, here: string, xsd: XsdIndex, out: XmlDiagnostic[]) {
  const kids = childElements(el);
  const kidNames = kids.map((k) => localName(k.name));
  const text = directText(el);

  if (text.trim() !== "" && !def.mixed) {
    report(out, el, here, `Element '${elementName}': Character content other than whitespace is not allowed because the content type is 'element-only'`);
  }

  if (def.enum && kids.length === 0 && !def.enum.has(text.trim())) {
    report(out, el, here, `Element '${elementName}': [facet 'enumeration'] The value '${text.trim()}' is not an element of the set {${formatSet(def.enum)}}`);
  }

  if (matchesParticle(def.content, kidNames, xsd)) return;

  report(
    out,
    el,
    here,
    `Element '${elementName}': Child elements do not match the content model: expected ${formatParticle(def.content)}, got (${kidNames.join(", ")})`,
  );
}

/* ───────────────────────── Helpers ───────────────────────── */

function isElement(c: ElementContent): c is XEl {
  return c.type === "element";
}

function childElements(el: XEl): XEl[] {
  return el.children.filter(isElement);
}

function directText(el: XEl): string {
  let s = "";
  for (const c of el.children) {
    if (c.type === "text" || c.type === "cdata") s += c.value;
  }
  return s;
}

function resolveElementDef(name: string, xsd: XsdIndex): XsdElementDef | undefined {
  return xsd.localElements.get(name) ?? xsd.elements.get(name);
}

/** Same name, or a member of the expected element's substitution group. */
function matchesElementName(expected: string, actual: string, xsd: XsdIndex): boolean {
  return expected === actual || (xsd.substitutionGroups.get(expected)?.has(actual) ?? false);
}

function formatSet(values: ReadonlySet<string>): string {
  return Array.from(values).map((v) => `'${v}'`).join(", ");
}

/* ───────────────────────── Content model matching ───────────────────────── */

function matchesParticle(p: XsdParticle, children: string[], xsd: XsdIndex): boolean {
  return new ContentMatcher(children, xsd).endsOf(p, 0).includes(children.length);
}

/**
 * Sets of end positions reachable by matching a particle from a start position.
 * One instance per child list; results are memoized by particle and position.
 */
class ContentMatcher {
  private readonly memo = new Map<string, number[]>();

  constructor(
    private readonly children: readonly string[],
    private readonly xsd: XsdIndex,
  ) {}

  endsOf(p: XsdParticle, start: number): number[] {
    const key = `${particleId(p)}@${start}`;
    const known = this.memo.get(key);
    if (known) return known;

    const ends = this.repeat(p, start);
    this.memo.set(key, ends);
    return ends;
  }

  /** Apply min..max occurrences of `p`. */
  private repeat(p: XsdParticle, start: number): number[] {
    const { min, max } = p.occurs;
    const limit = max === "unbounded" ? this.children.length - start : max;

    let frontier = new Set([start]);
    for (let i = 0; i < min; i++) {
      frontier = this.step(p, frontier);
      if (frontier.size === 0) return [];
    }

    const reached = new Set(frontier);
    for (let i = min; i < limit; i++) {
      const next = this.step(p, frontier);
      const grew = [...next].some((e) => !frontier.has(e));
      next.forEach((e) => reached.add(e));
      // stop on no match or on zero-width progress
      if (next.size === 0 || !grew) break;
      frontier = next;
    }
    return [...reached].sort((a, b) => a - b);
  }

  private step(p: XsdParticle, from: ReadonlySet<number>): Set<number> {
    const out = new Set<number>();
    for (const pos of from) this.once(p, pos).forEach((e) => out.add(e));
    return out;
  }

  /** One occurrence of `p` at `pos`. */
  private once(p: XsdParticle, pos: number): number[] {
    const here = this.children[pos];
    switch (p.kind) {
      case "empty":
        return [pos];
      case "element":
        return here !== undefined && matchesElementName(p.name, here, this.xsd) ? [pos + 1] : [];
      case "any":
        return here !== undefined ? [pos + 1] : [];
      case "groupRef": {
        const group = this.xsd.groups.get(p.ref);
        return group ? this.endsOf(group, pos) : [];
      }
      case "sequence":
        return [...p.items.reduce<Set<number>>(
          (at, item) => (at.size === 0 ? at : this.union(item, at)),
          new Set([pos]),
        )];
      case "choice":
        return [...this.union(p, new Set([pos]), p.items)];
      case "all": {
        const ends: number[] = [];
        for (let end = pos; end <= this.children.length; end++) {
          if (satisfiesAll(p.items, this.children.slice(pos, end))) ends.push(end);
        }
        return ends;
      }
    }
  }

  /** Ends of `items` (or of `p` itself) from every start in `from`. */
  private union(p: XsdParticle, from: ReadonlySet<number>, items: readonly XsdParticle[] = [p]): Set<number> {
    const out = new Set<number>();
    for (const start of from) {
      for (const item of items) this.endsOf(item, start).forEach((e) => out.add(e));
    }
    return out;
  }
}

/** xs:all: any order, each member within its own occurrence bounds. */
function satisfiesAll(items: readonly XsdParticle[], run: readonly string[]): boolean {
  const counts = new Map<string, number>();
  for (const n of run) counts.set(n, (counts.get(n) ?? 0) + 1);

  const open = items.some((i) => i.kind === "any");
  const names = new Set<string>();
  for (const item of items) {
    if (item.kind === "element") names.add(item.name);
    else if (item.kind !== "any") return false;
  }
  if (!open && run.some((n) => !names.has(n))) return false;

  return items.every((item) => {
    if (item.kind !== "element") return true;
    const seen = counts.get(item.name) ?? 0;
    const { min, max } = item.occurs;
    return seen >= min && (max === "unbounded" || seen <= max);
  });
}

/* ───────────────────────── Formatting ───────────────────────── */

function formatParticle(p: XsdParticle): string {
  const core = (() => {
    switch (p.kind) {
      case "empty": return "(empty)";
      case "any": return "<any>";
      case "element": return `<${p.name}>`;
      case "groupRef": return `group(${p.ref})`;
      case "sequence": return `seq(${p.items.map(formatParticle).join(", ")})`;
      case "choice": return `choice(${p.items.map(formatParticle).join(" | ")})`;
      case "all": return `all(${p.items.map(formatParticle).join(", ")})`;
    }
  })();

  return `${core}${formatOccurs(p.occurs)}`;
}

function formatOccurs(o: Occurs): string {
  const max = o.max === "unbounded" ? "*" : String(o.max);
  if (o.min === 1 && o.max === 1) return "";
  return `{${o.min}..${max}}`;
}

const particleIds = new WeakMap<XsdParticle, number>();
let nextParticleId = 1;

function particleId(p: XsdParticle): number {
  let id = particleIds.get(p);
  if (id === undefined) {
    id = nextParticleId++;
    particleIds.set(p, id);
  }
  return id;
}
