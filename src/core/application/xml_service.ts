// xml_service.ts
// Facade over the encoder, decoder and validator ports.
import type { XmlDocumentOptions } from "../shared/config.ts";
import type { DecodedMapping, StructuredMapping, XmlNamespace } from "../shared/types.ts";
import { XmlDecoder, type DecodableDocument } from "../domain/codec/xml_decoder.ts";
import { XmlEncoder } from "../domain/codec/xml_encoder.ts";
import type { ISchemaValidatable, IXmlDecoder, IXmlEncoder, IXmlService, IXmlValidator, Translations } from "../ports/ports.ts";
import { XmlDocument } from "./xml_document.ts";
import { XmlValidator } from "./xml_validator.ts";

export type XmlServiceDeps = {
  encoder: IXmlEncoder<XmlDocument>;
  decoder: IXmlDecoder;
  validator: IXmlValidator;
};

export class XmlService implements IXmlService<XmlDocument> {
  private readonly deps: XmlServiceDeps;

  /** Missing collaborators default to the built-in ones; new documents use `documentOptions`. */
  constructor(deps: Partial<XmlServiceDeps> = {}, documentOptions: Partial<XmlDocumentOptions> = {}) {
    this.deps = {
      encoder: new XmlEncoder(() => new XmlDocument(documentOptions), documentOptions.logger),
      decoder: new XmlDecoder(),
      validator: new XmlValidator(),
      ...deps,
    };
  }

  encode(
    data: StructuredMapping,
    namespace: XmlNamespace | null = null,
    parent: Document | Element | null = null,
    doc: XmlDocument | null = null,
  ): XmlDocument {
    return this.deps.encoder.encode(data, namespace, parent, doc);
  }

  decode(source: Element | DecodableDocument, twinsAsArray = false): DecodedMapping {
    return this.deps.decoder.decode(source, twinsAsArray);
  }

  validate(doc: ISchemaValidatable, schemaPath: string | null = null, translations: Translations = {}): void {
    this.deps.validator.validate(doc, schemaPath, translations);
  }
}
