import type { Environment, ResolutionContext } from "./types.ts";

type Operator = "-" | ":-" | "+" | ":+" | "?" | ":?";

interface Reference {
  name: string;
  operator?: Operator;
  operand: string;
  /** Offset just past the closing brace. */
  end: number;
}

const NAME_TERMINATORS = new Set(["}", ":", "-", "+", "?", "$", "{"]);

export class LookupError extends Error {
  constructor(public variable: string, public detail: string) {
    super(`${variable}: ${detail}`);
    this.name = "LookupError";
  }
}

/**
 * Expands every `${...}` reference in `value`. Bare `$NAME` is left alone.
 *
 * With `override` the document context wins over the environment, otherwise the
 * environment does. A context entry holding `null` counts as set but empty.
 *
 * @throws {LookupError} when a `?` or `:?` reference finds nothing to use.
 */
export function interpolate(
  value: string,
  ctx: ResolutionContext,
  env: Environment,
  override: boolean,
): string {
  let result = "";
  let pos = 0;

  while (pos < value.length) {
    const start = value.indexOf("${", pos);
    if (start === -1) break;

    const reference = scanReference(value, start);
    if (!reference) {
      result += value.slice(pos, start + 2);
      pos = start + 2;
      continue;
    }

    result += value.slice(pos, start);
    result += expandReference(reference, ctx, env, override);
    pos = reference.end;
  }

  return result + value.slice(pos);
}

function expandReference(
  reference: Reference,
  ctx: ResolutionContext,
  env: Environment,
  override: boolean,
): string {
  const current = lookup(reference.name, ctx, env, override);
  const isSet = current !== undefined;
  const text = current ?? "";
  const operand = () => interpolate(reference.operand, ctx, env, override);

  switch (reference.operator) {
    case undefined:
      return text;
    case "-":
      return isSet ? text : operand();
    case ":-":
      return text !== "" ? text : operand();
    case "+":
      return isSet ? operand() : "";
    case ":+":
      return text !== "" ? operand() : "";
    case "?":
      if (isSet) return text;
      throw new LookupError(reference.name, operand() || "parameter null or not set");
    case ":?":
      if (text !== "") return text;
      throw new LookupError(reference.name, operand() || "parameter null or not set");
  }
}

function lookup(
  name: string,
  ctx: ResolutionContext,
  env: Environment,
  override: boolean,
): string | null | undefined {
  const fromDocument = ctx.get(name);
  const fromEnv = Object.hasOwn(env, name) ? env[name] : undefined;

  if (override) {
    return fromDocument !== undefined ? fromDocument : fromEnv;
  }
  return fromEnv !== undefined ? fromEnv : fromDocument;
}

function toOperator(colon: boolean, symbol: string | undefined): Operator | undefined {
  switch (symbol) {
    case "-":
      return colon ? ":-" : "-";
    case "+":
      return colon ? ":+" : "+";
    case "?":
      return colon ? ":?" : "?";
    default:
      return undefined;
  }
}

/** Reads the reference opening at `start` (the `$` of `${`), or null if it is not one. */
function scanReference(value: string, start: number): Reference | null {
  let pos = start + 2;
  while (pos < value.length && !NAME_TERMINATORS.has(value[pos])) {
    pos++;
  }

  const name = value.slice(start + 2, pos);
  if (!name) return null;

  if (value[pos] === "}") {
    return { name, operand: "", end: pos + 1 };
  }

  const colon = value[pos] === ":";
  const operator = toOperator(colon, value[colon ? pos + 1 : pos]);
  if (!operator) return null;
  pos += operator.length;

  // The operand runs to the brace matching ours; nested `${...}` are skipped over
  const operandStart = pos;
  let depth = 0;
  while (pos < value.length) {
    if (value.startsWith("${", pos)) {
      depth++;
      pos += 2;
      continue;
    }
    if (value[pos] === "}") {
      if (depth === 0) {
        return { name, operator, operand: value.slice(operandStart, pos), end: pos + 1 };
      }
      depth--;
    }
    pos++;
  }

  return null;
}
