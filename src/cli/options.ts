import { join } from "node:path";
import type { CLIOptions, QuoteMode } from "../core/types.ts";
import { findDotenv, isFile } from "../core/find.ts";

export type Argv = Record<string, unknown> & { _: unknown[] };

export class CommandError extends Error {
  constructor(message: string, public exitCode = 1) {
    super(message);
    this.name = "CommandError";
  }
}

export function stringArg(args: Argv, name: string): string | undefined {
  const value = args[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/** Positional argument after the command name (`_[0]`). */
export function positional(args: Argv, index: number, label: string): string {
  const value = args._[index];
  if (value === undefined) {
    throw new CommandError(`Missing argument: ${label}`, 2);
  }
  return String(value);
}

export function quoteModeArg(args: Argv): QuoteMode {
  const mode = stringArg(args, "quote") ?? "always";
  if (mode === "always" || mode === "auto" || mode === "never") {
    return mode;
  }
  throw new CommandError(`Invalid quote mode: ${mode} (expected always, auto or never)`, 2);
}

/** `--file`, else the nearest `.env` upwards, else `./.env`. */
export async function resolveFile(args: Argv): Promise<string> {
  return stringArg(args, "file") ?? ((await findDotenv()) || join(process.cwd(), ".env"));
}

export async function toCLIOptions(args: Argv): Promise<CLIOptions> {
  return {
    file: await resolveFile(args),
    quote: quoteModeArg(args),
    export: args.export === true,
  };
}

export async function requireFile(file: string): Promise<void> {
  if (!(await isFile(file))) {
    throw new CommandError(`Error opening env file: ${file} does not exist`, 2);
  }
}
