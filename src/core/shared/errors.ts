// errors.ts
// Single error type for the whole library. Every failure carries a code from a closed
// set plus, where the engine gives them, positioned diagnostics.

export type XmlErrorCode =
  | "EmptyDocument"
  | "MalformedXml"
  | "InvalidStructure"
  | "InvalidXPath"
  | "InvalidXml"
  | "XPathNodeNotFound"
  | "SchemaValidationFailed"
  | "UnsupportedEncoding";

export type DiagnosticSeverity = "warning" | "error" | "fatal";

/** One message reported by the parser, the XPath evaluator or the schema engine. */
export interface XmlDiagnostic {
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly line?: number;
  readonly column?: number;
  /** Element path (`/root/child`) for schema diagnostics. */
  readonly path?: string;
}

export class XmlError extends Error {
  readonly code: XmlErrorCode;
  readonly diagnostics: readonly XmlDiagnostic[];

  constructor(
    code: XmlErrorCode,
    message: string,
    diagnostics: readonly XmlDiagnostic[] = [],
    options?: { cause?: unknown },
  ) {
    super(composeMessage(message, diagnostics), options);
    this.name = "XmlError";
    this.code = code;
    this.diagnostics = diagnostics;
  }
}

export function isXmlError(err: unknown, code?: XmlErrorCode): err is XmlError {
  return err instanceof XmlError && (code === undefined || err.code === code);
}

export function formatDiagnostic(d: XmlDiagnostic): string {
  const level = d.severity === "warning" ? "Warning" : d.severity === "error" ? "Error" : "Fatal";
  const where = d.line !== undefined
    ? ` in line ${d.line}, column ${d.column ?? 0}`
    : "";
  return `${level} ${d.message.trim()}${where}.`;
}

function composeMessage(message: string, diagnostics: readonly XmlDiagnostic[]): string {
  if (diagnostics.length === 0) return message;
  return `${message} ${diagnostics.map(formatDiagnostic).join(" ")}`.trim();
}

/** Best-effort text of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
