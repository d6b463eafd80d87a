import type { Logger } from "./log.ts";

export type QuoteClass = "unquoted" | "single" | "double";

export interface Segment {
  quote: QuoteClass;
  text: string;
}

export interface Binding {
  key: string;
  /** `null` when the line declares a bare name without `=`. */
  value: string | null;
  segments: Segment[];
  /** Raw text of the statement, line terminator included. */
  original: string;
  line: number;
}

export type Statement =
  | { type: "binding"; data: Binding }
  | { type: "comment"; text: string; original: string; line: number }
  | { type: "blank"; original: string; line: number }
  | { type: "error"; original: string; line: number };

/** Process environment snapshot, in the shape of `process.env`. */
export type Environment = Readonly<Record<string, string | undefined>>;

/** Values already resolved earlier in the document. */
export type ResolutionContext = Map<string, string | null>;

export type DotenvValues = Map<string, string | null>;

export type QuoteMode = "always" | "auto" | "never";

export interface ResolveOptions {
  env?: Environment;
  override?: boolean;
  interpolate?: boolean;
  singleQuotesExpand?: boolean;
}

export interface SourceOptions {
  path?: string;
  stream?: AsyncIterable<string | Uint8Array>;
  text?: string;
  encoding?: BufferEncoding;
}

export interface LoadOptions extends SourceOptions, ResolveOptions {
  verbose?: boolean;
  logger?: Logger;
}

export interface LoadIntoOptions extends LoadOptions {
  target?: Record<string, string | undefined>;
}

export interface RenderOptions {
  quoteMode?: QuoteMode;
  export?: boolean;
}

export interface EditOptions extends RenderOptions {
  encoding?: BufferEncoding;
  logger?: Logger;
}

export type KeyLookup =
  | { status: "found"; value: string | null }
  | { status: "missing-key" }
  | { status: "missing-file" };

export interface FindOptions {
  filename?: string;
  cwd?: string;
  raiseErrorIfNotFound?: boolean;
}

export interface CLIOptions {
  file: string;
  quote?: QuoteMode;
  export?: boolean;
}

export interface ListOptions extends CLIOptions {
  format?: "simple" | "json" | "shell" | "export";
}

export interface RunOptions extends CLIOptions {
  override?: boolean;
}
