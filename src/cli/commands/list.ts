import type { DotenvValues, ListOptions } from "../../core/types.ts";
import { dotenvValues } from "../../core/dotenv.ts";
import { type Argv, CommandError, requireFile, resolveFile, stringArg } from "../options.ts";

const SHELL_SAFE = /^[\w@%+=:,./-]+$/;

export async function listCommand(args: Argv): Promise<void> {
  const options: ListOptions = {
    file: await resolveFile(args),
    format: parseFormat(stringArg(args, "format")),
  };
  await requireFile(options.file);
  const values = await dotenvValues({ path: options.file });

  switch (options.format) {
    case "json":
      renderJSON(values);
      break;
    case "shell":
      renderLines(values, "", shellQuote);
      break;
    case "export":
      renderLines(values, "export ", shellQuote);
      break;
    default:
      renderLines(values, "", (value) => value);
  }
}

function parseFormat(format: string | undefined): ListOptions["format"] {
  switch (format) {
    case undefined:
    case "simple":
      return "simple";
    case "json":
    case "shell":
    case "export":
      return format;
    default:
      throw new CommandError(`Unknown format: ${format}`, 2);
  }
}

function renderLines(
  values: DotenvValues,
  prefix: string,
  quote: (value: string) => string,
): void {
  for (const key of [...values.keys()].sort()) {
    const value = values.get(key);
    // Bare names carry no value to print
    if (value === null || value === undefined) continue;
    console.log(`${prefix}${key}=${quote(value)}`);
  }
}

function renderJSON(values: DotenvValues): void {
  const sorted = [...values.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  console.log(JSON.stringify(Object.fromEntries(sorted), null, 2));
}

/** Quotes a value for a POSIX shell, leaving plain words as they are. */
export function shellQuote(value: string): string {
  if (value === "") return "''";
  if (SHELL_SAFE.test(value)) return value;
  return `'${value.replace(/'/g, "'\"'\"'")}'`;
}
