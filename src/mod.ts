// Public surface of xmlcodec.

export { XmlDocument, type C14nOptions } from "./core/application/xml_document.ts";
export { XmlService, type XmlServiceDeps } from "./core/application/xml_service.ts";
export {
  DEFAULT_TRANSLATIONS,
  XmlValidator,
  translateDiagnostic,
  translateMessage,
} from "./core/application/xml_validator.ts";

export { XmlEncoder, isSkipped, type EncodableDocument } from "./core/domain/codec/xml_encoder.ts";
export { XmlDecoder, decodeContent, type DecodableDocument, type DecodedContent } from "./core/domain/codec/xml_decoder.ts";
export {
  XPathQuery,
  quoteXPathLiteral,
  resolvePlaceholders,
  selectNodes,
  toLocalNameQuery,
  type NamespaceMap,
  type ProjectedNode,
  type XPathScalar,
} from "./core/domain/query/xpath_query.ts";
export { fixEntities, flattenXml, isNumeric, sanitize, unescapeSanitized } from "./core/domain/text/text_normalizer.ts";
export {
  assertSupportedEncoding,
  decodeSource,
  encodeText,
  isUtf8,
  narrowText,
  normalizeEncodingName,
  prepareSource,
  readDeclaration,
  type PreparedSource,
  type XmlDeclaration,
} from "./core/domain/text/encoding.ts";
export { canonicalize, type CanonicalizeOptions } from "./core/domain/parse/dom_xml.ts";
export { buildXsdIndex, type XsdIndex } from "./core/domain/parse/xsd_index.ts";
export { validateAgainstXsd } from "./core/domain/parse/xsd_validator.ts";

export type {
  ISchemaValidatable,
  IXmlDecoder,
  IXmlEncoder,
  IXmlService,
  IXmlValidator,
  Translations,
} from "./core/ports/ports.ts";

export {
  DEFAULT_ENCODING,
  ENV_ENCODING,
  ENV_LOG_LEVEL,
  defaultOptions,
  fsSchemaSource,
  resolveOptions,
  type RuntimeEnv,
  type SchemaSource,
  type XmlDocumentOptions,
} from "./core/shared/config.ts";
export { XmlError, formatDiagnostic, isXmlError, type XmlDiagnostic, type XmlErrorCode } from "./core/shared/errors.ts";
export { createConsoleLogger, silentLogger, type LogLevel, type XmlLogger } from "./core/shared/log.ts";
export {
  ATTRIBUTES_KEY,
  VALUE_KEY,
  type DecodedMapping,
  type DecodedValue,
  type QueryParams,
  type SanitizedText,
  type StructuredMapping,
  type StructuredValue,
  type XmlNamespace,
  type XmlScalar,
} from "./core/shared/types.ts";
