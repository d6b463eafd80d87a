export type {
  Binding,
  DotenvValues,
  EditOptions,
  Environment,
  FindOptions,
  KeyLookup,
  LoadIntoOptions,
  LoadOptions,
  QuoteClass,
  QuoteMode,
  RenderOptions,
  ResolutionContext,
  ResolveOptions,
  Segment,
  SourceOptions,
  Statement,
} from "./core/types.ts";
export { parse, parseStatements, Parser } from "./core/parser.ts";
export { interpolate, LookupError } from "./core/interpolate.ts";
export { resolve, Resolver } from "./core/resolver.ts";
export { render } from "./core/serializer.ts";
export {
  dotenvValues,
  getKey,
  loadDotenv,
  lookupKey,
  parseWithWarnings,
  readSource,
  type Source,
} from "./core/dotenv.ts";
export { setKey, unsetKey } from "./core/rewrite.ts";
export { DotenvNotFoundError, findDotenv } from "./core/find.ts";
export { ConsoleLogger, createLogger, type Logger, NoOpLogger } from "./core/log.ts";
