// config.ts
// Document options: defaults merged under caller options, with a small env layer.
import { existsSync, readFileSync } from "node:fs";
import { createConsoleLogger, isLogLevel, type XmlLogger } from "./log.ts";

export type RuntimeEnv = {
  get: (name: string) => string | undefined;
};

/** Where schema files come from. Synchronous: validation is a pure in-memory step. */
export type SchemaSource = {
  exists: (path: string) => boolean;
  readText: (path: string) => string;
};

export interface XmlDocumentOptions {
  /** XML version written in the declaration. */
  version: string;
  /** Working encoding of the document; output bytes use it. */
  encoding: string;
  /** Indent element-only content when serializing. */
  formatOutput: boolean;
  logger: XmlLogger;
  schemaSource: SchemaSource;
}

export const ENV_ENCODING = "XMLCODEC_ENCODING";
export const ENV_LOG_LEVEL = "XMLCODEC_LOG_LEVEL";

export const DEFAULT_ENCODING = "ISO-8859-1";

export const nodeEnv: RuntimeEnv = {
  get: (name) => process.env[name],
};

export const fsSchemaSource: SchemaSource = {
  exists: (path) => existsSync(path),
  readText: (path) => readFileSync(path, "utf8"),
};

export function defaultOptions(env: RuntimeEnv = nodeEnv): XmlDocumentOptions {
  const level = env.get(ENV_LOG_LEVEL);
  return {
    version: "1.0",
    encoding: env.get(ENV_ENCODING) || DEFAULT_ENCODING,
    formatOutput: true,
    logger: createConsoleLogger("[xmlcodec]", isLogLevel(level) ? level : "warn"),
    schemaSource: fsSchemaSource,
  };
}

export function resolveOptions(
  opts: Partial<XmlDocumentOptions> = {},
  env: RuntimeEnv = nodeEnv,
): XmlDocumentOptions {
  return { ...defaultOptions(env), ...opts };
}
