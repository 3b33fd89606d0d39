// encoding.ts
// Bridges the document's working encoding (usually a single-byte one) and the Unicode
// strings the tree works with. Narrowing is lossy by contract: characters the target
// encoding cannot represent become "?".
import iconv from "iconv-lite";
import { XmlError } from "../../shared/errors.ts";

export interface XmlDeclaration {
  version: string;
  encoding?: string;
  standalone?: string;
}

export interface PreparedSource {
  /** Text handed to the parser, declaration included. */
  text: string;
  /** Encoding named by the source's own declaration, if it had one. */
  declaredEncoding?: string;
  /** True when a UTF-8 source was converted into a single-byte working encoding. */
  narrowed: boolean;
}

const DECLARATION =
  /^\s*<\?xml\s+version\s*=\s*(["'])([^"']+)\1(?:\s+encoding\s*=\s*(["'])([^"']+)\3)?(?:\s+standalone\s*=\s*(["'])([^"']+)\5)?\s*\?>/;

const UTF8_BOM = "\uFEFF";

export function normalizeEncodingName(name: string): string {
  return name.trim().toUpperCase();
}

export function isUtf8(name: string): boolean {
  const n = normalizeEncodingName(name).replace(/[^A-Z0-9]/g, "");
  return n === "UTF8";
}

export function assertSupportedEncoding(name: string): void {
  if (!iconv.encodingExists(name)) {
    throw new XmlError("UnsupportedEncoding", `The encoding "${name}" is not supported.`);
  }
}

export function readDeclaration(text: string): XmlDeclaration | null {
  const m = DECLARATION.exec(stripBom(text));
  if (!m) return null;
  const decl: XmlDeclaration = { version: m[2] ?? "1.0" };
  if (m[4] !== undefined) decl.encoding = m[4];
  if (m[6] !== undefined) decl.standalone = m[6];
  return decl;
}

export function formatDeclaration(version: string, encoding: string): string {
  return `<?xml version="${version}" encoding="${encoding}"?>`;
}

/** Replace the encoding named in an existing declaration. */
export function rewriteDeclaredEncoding(text: string, encoding: string): string {
  return text.replace(DECLARATION, (whole) =>
    whole.replace(/encoding\s*=\s*(["'])[^"']+\1/, `encoding="${encoding}"`));
}

export function stripBom(text: string): string {
  return text.startsWith(UTF8_BOM) ? text.slice(1) : text;
}

/** Turn raw bytes into text using the declared encoding, else the working one. */
export function decodeSource(source: string | Uint8Array, workingEncoding: string): string {
  if (typeof source === "string") return stripBom(source);

  const bytes = Buffer.from(source.buffer, source.byteOffset, source.byteLength);
  // The declaration itself is ASCII; peek at it through latin1.
  const head = bytes.subarray(0, 256).toString("latin1");
  const declared = readDeclaration(head)?.encoding;
  const hasBom = bytes.length >= 3 && bytes[0] === 0xef && bytes[1] === 0xbb && bytes[2] === 0xbf;
  const encoding = hasBom ? "UTF-8" : declared ?? workingEncoding;
  assertSupportedEncoding(encoding);
  return stripBom(iconv.decode(bytes, encoding));
}

export function encodeText(text: string, encoding: string): Buffer {
  assertSupportedEncoding(encoding);
  return iconv.encode(text, encoding);
}

/** Round-trip text through a byte encoding; what survives is what the bytes can hold. */
export function narrowText(text: string, encoding: string): string {
  if (isUtf8(encoding)) return text;
  return iconv.decode(encodeText(text, encoding), encoding);
}

/**
 * Load-side pipeline: empty check, UTF-8 → working-encoding narrowing with
 * declaration rewrite, declaration synthesis when the source has none.
 */
export function prepareSource(source: string | Uint8Array, workingEncoding: string): PreparedSource {
  const empty = typeof source === "string" ? source.trim() === "" : source.byteLength === 0;
  if (empty) {
    throw new XmlError("EmptyDocument", "The XML content that you want to load is empty.");
  }

  let text = decodeSource(source, workingEncoding);
  if (text.trim() === "") {
    throw new XmlError("EmptyDocument", "The XML content that you want to load is empty.");
  }

  const decl = readDeclaration(text);
  const declaredEncoding = decl?.encoding;
  const effective = declaredEncoding ?? workingEncoding;

  let narrowed = false;
  if (declaredEncoding !== undefined && isUtf8(declaredEncoding) && !isUtf8(workingEncoding)) {
    text = rewriteDeclaredEncoding(narrowText(text, workingEncoding), workingEncoding);
    narrowed = true;
  }

  if (decl === null) {
    text = `${formatDeclaration("1.0", effective)}\n${text.trimStart()}`;
  }

  return declaredEncoding === undefined ? { text, narrowed } : { text, declaredEncoding, narrowed };
}
