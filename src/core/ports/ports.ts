// Ports (interfaces only). The service depends on these; the codec and validator
// classes are the default adapters.

import type { SchemaSource } from "../shared/config.ts";
import type { XmlDiagnostic } from "../shared/errors.ts";
import type { DecodedMapping, StructuredMapping, XmlNamespace } from "../shared/types.ts";
import type { EncodableDocument } from "../domain/codec/xml_encoder.ts";
import type { DecodableDocument } from "../domain/codec/xml_decoder.ts";

/** Message rewrites applied in insertion order; `%(line)s` is filled in afterwards. */
export type Translations = Readonly<Record<string, string>>;

/** What the schema validator needs from a document. */
export interface ISchemaValidatable {
  readonly schemaSource: SchemaSource;
  getNamespace(): string | null;
  /** Schema location taken from the root's `xsi:schemaLocation`, if any. */
  getSchemaLocationHint(): string | null;
  schemaValidate(path: string, diagnostics?: XmlDiagnostic[]): boolean;
}

/** Structured data → XML tree. */
export interface IXmlEncoder<TDoc extends EncodableDocument> {
  /**
   * Write `data` under `parent` (the document node when null) of `doc` (a new
   * document when null) and return the document.
   * Throws `InvalidStructure` for shapes the conventions cannot represent.
   */
  encode(
    data: StructuredMapping,
    namespace?: XmlNamespace | null,
    parent?: Document | Element | null,
    doc?: TDoc | null,
  ): TDoc;
}

/** XML tree → structured data. Never throws for a well-formed tree. */
export interface IXmlDecoder {
  decode(source: Element | DecodableDocument, twinsAsArray?: boolean): DecodedMapping;
}

/** Schema validation with translated diagnostics. */
export interface IXmlValidator {
  /**
   * Validate against `schemaPath`, or against the document's own schema location.
   * Throws `SchemaValidationFailed` carrying the translated diagnostics.
   */
  validate(doc: ISchemaValidatable, schemaPath?: string | null, translations?: Translations): void;
}

export interface IXmlService<TDoc extends EncodableDocument>
  extends IXmlEncoder<TDoc>, IXmlDecoder, IXmlValidator {}
