import { readFile } from "node:fs/promises";
import { StringDecoder } from "node:string_decoder";
import type {
  Binding,
  DotenvValues,
  KeyLookup,
  LoadIntoOptions,
  LoadOptions,
  SourceOptions,
} from "./types.ts";
import { findDotenv, isMissing } from "./find.ts";
import { ConsoleLogger, type Logger } from "./log.ts";
import { parseStatements } from "./parser.ts";
import { resolve } from "./resolver.ts";

export interface Source {
  found: boolean;
  text: string;
  /** Path the text came from, or a placeholder for strings and streams. */
  origin: string;
}

/**
 * Reads a document from `text`, `stream` or `path`, in that order of preference.
 * Without any of them the nearest `.env` above the current directory is used.
 * A missing file is reported as `found: false`; other I/O errors propagate.
 */
export async function readSource(options: SourceOptions): Promise<Source> {
  const encoding = options.encoding ?? "utf8";

  if (options.text !== undefined) {
    return { found: true, text: options.text, origin: "<text>" };
  }

  if (options.stream) {
    return { found: true, text: await readStream(options.stream, encoding), origin: "<stream>" };
  }

  const path = options.path ?? await findDotenv();
  if (!path) {
    return { found: false, text: "", origin: ".env" };
  }

  try {
    return { found: true, text: await readFile(path, { encoding }), origin: path };
  } catch (error) {
    if (isMissing(error)) {
      return { found: false, text: "", origin: path };
    }
    throw error;
  }
}

async function readStream(
  stream: AsyncIterable<string | Uint8Array>,
  encoding: BufferEncoding,
): Promise<string> {
  const decoder = new StringDecoder(encoding);
  let text = "";
  for await (const chunk of stream) {
    text += typeof chunk === "string" ? chunk : decoder.write(Buffer.from(chunk));
  }
  return text + decoder.end();
}

/** Parses `text`, reporting every unparsable statement to `logger`. */
export function parseWithWarnings(text: string, logger: Logger): Binding[] {
  const bindings: Binding[] = [];
  for (const statement of parseStatements(text)) {
    if (statement.type === "binding") {
      bindings.push(statement.data);
    } else if (statement.type === "error") {
      logger.warn(`could not parse statement starting at line ${statement.line}`);
    }
  }
  return bindings;
}

async function load(options: LoadOptions): Promise<{ source: Source; values: DotenvValues }> {
  const logger = options.logger ?? new ConsoleLogger();
  const source = await readSource(options);

  if (!source.found) {
    if (options.verbose) {
      logger.info(`could not find configuration file ${source.origin}.`);
    }
    return { source, values: new Map() };
  }

  const values = resolve(parseWithWarnings(source.text, logger), {
    env: options.env,
    override: options.override ?? true,
    interpolate: options.interpolate ?? true,
    singleQuotesExpand: options.singleQuotesExpand ?? false,
  });

  return { source, values };
}

/** Resolves a whole document into an ordered mapping; document values win by default. */
export async function dotenvValues(options: LoadOptions = {}): Promise<DotenvValues> {
  const { values } = await load(options);
  return values;
}

/**
 * Resolves a document and copies its values into `target` (`process.env` by
 * default). Names already present in `target` are kept unless `override` is set,
 * and bare names without a value are never copied.
 *
 * @returns false when the document defines nothing
 */
export async function loadDotenv(options: LoadIntoOptions = {}): Promise<boolean> {
  const override = options.override ?? false;
  const target = options.target ?? process.env;
  const values = await dotenvValues({ ...options, env: options.env ?? target, override });

  if (values.size === 0) {
    return false;
  }

  for (const [key, value] of values) {
    if (!override && Object.hasOwn(target, key) && target[key] !== undefined) {
      continue;
    }
    if (value !== null) {
      target[key] = value;
    }
  }

  return true;
}

export async function lookupKey(
  path: string,
  key: string,
  options: LoadOptions = {},
): Promise<KeyLookup> {
  const { source, values } = await load({ ...options, path, stream: undefined, text: undefined });

  if (!source.found) {
    return { status: "missing-file" };
  }

  const value = values.get(key);
  return value === undefined ? { status: "missing-key" } : { status: "found", value };
}

/** Looks up one key in a file, logging why when there is nothing to return. */
export async function getKey(
  path: string,
  key: string,
  options: LoadOptions = {},
): Promise<string | null> {
  const logger = options.logger ?? new ConsoleLogger();
  const result = await lookupKey(path, key, { ...options, logger });

  switch (result.status) {
    case "found":
      return result.value;
    case "missing-file":
      logger.info(`could not find configuration file ${path}.`);
      logger.warn(`Key ${key} not found in ${path}.`);
      return null;
    case "missing-key":
      logger.warn(`Key ${key} not found in ${path}.`);
      return null;
  }
}
