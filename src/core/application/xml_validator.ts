// xml_validator.ts
// Schema validation for documents: resolves the schema path, runs the document's
// schema engine and rewrites the diagnostics through a translation table.
import { basename, isAbsolute } from "node:path";
import { XmlError, type XmlDiagnostic } from "../shared/errors.ts";
import type { ISchemaValidatable, IXmlValidator, Translations } from "../ports/ports.ts";

export const LINE_PLACEHOLDER = "%(line)s";

/** Plain-language rewrites of the schema engine's messages. Order matters. */
export const DEFAULT_TRANSLATIONS: Translations = {
  "': ": `' (line ${LINE_PLACEHOLDER}): `,
  ": [facet 'enumeration'] The value ": ": the value ",
  "is not an element of the set": "is not valid, it must be one of the following values",
  "does not match the fixed value constraint": "is not valid, the only value allowed is",
  "Character content other than whitespace is not allowed because the content type is 'element-only'":
    "the value of the field is invalid",
  "Child elements do not match the content model: expected": "the fields inside do not match the schema, expected",
  "This element is not declared": "this field is not defined in the schema",
  "is required but missing": "is required",
  "Element": "Field",
  "No matching global declaration available for the validation root":
    "The root node of the XML does not match what is expected in the schema definition",
};

export class XmlValidator implements IXmlValidator {
  constructor(private readonly translations: Translations = DEFAULT_TRANSLATIONS) {}

  validate(doc: ISchemaValidatable, schemaPath: string | null = null, translations: Translations = {}): void {
    const path = schemaPath ?? this.schemaPathOf(doc);

    const diagnostics: XmlDiagnostic[] = [];
    if (doc.schemaValidate(path, diagnostics)) return;

    const ns = doc.getNamespace();
    const table: Translations = {
      ...this.translations,
      ...translations,
      ...(ns === null ? {} : { [`{${ns}}`]: "" }),
    };
    throw new XmlError(
      "SchemaValidationFailed",
      `The XML validation failed using the schema ${basename(path)}.`,
      diagnostics.map((d) => translateDiagnostic(d, table)),
    );
  }

  private schemaPathOf(doc: ISchemaValidatable): string {
    const schema = doc.getSchemaLocationHint();
    if (schema === null) {
      throw new XmlError(
        "SchemaValidationFailed",
        'The XML does not contain a valid schema location in the "xsi:schemaLocation" attribute.',
      );
    }
    if (!isAbsolute(schema) || !doc.schemaSource.exists(schema)) {
      throw new XmlError(
        "SchemaValidationFailed",
        "To validate an XML, the absolute path to the schema must be specified.",
      );
    }
    return schema;
  }
}

export function translateMessage(message: string, table: Translations, line?: number): string {
  let out = message.trim();
  for (const [from, to] of Object.entries(table)) {
    if (from !== "") out = out.split(from).join(to);
  }
  return out.split(LINE_PLACEHOLDER).join(line === undefined ? "?" : String(line));
}

export function translateDiagnostic(d: XmlDiagnostic, table: Translations): XmlDiagnostic {
  return { ...d, message: translateMessage(d.message, table, d.line) };
}
