import type { QuoteMode, RenderOptions } from "./types.ts";

const QUOTE_MODES: readonly QuoteMode[] = ["always", "auto", "never"];

/**
 * Renders one binding as a document line, without a line terminator.
 *
 * Quoted values always read back unchanged: `'` becomes `\'` and a backslash is
 * doubled only where the parser would otherwise take it as an escape.
 */
export function render(key: string, value: string, options: RenderOptions = {}): string {
  const quoteMode = options.quoteMode ?? "always";
  if (!QUOTE_MODES.includes(quoteMode)) {
    throw new TypeError(`Unknown quote mode: ${quoteMode}`);
  }

  const quote = quoteMode === "always" || (quoteMode === "auto" && !/^[\p{L}\p{N}]+$/u.test(value));
  const rendered = quote ? `'${escapeSingleQuoted(value)}'` : value;
  const prefix = options.export ? "export " : "";

  return `${prefix}${key}=${rendered}`;
}

function escapeSingleQuoted(value: string): string {
  let escaped = "";
  for (let i = 0; i < value.length; i++) {
    const char = value[i];
    const next = value[i + 1];

    if (char === "'") {
      escaped += "\\'";
    } else if (char === "\\" && (next === undefined || next === "\\" || next === "'")) {
      escaped += "\\\\";
    } else {
      escaped += char;
    }
  }
  return escaped;
}
