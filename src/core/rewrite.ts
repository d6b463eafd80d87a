import { randomUUID } from "node:crypto";
import { chmod, open, readFile, rename, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import type { EditOptions, Statement } from "./types.ts";
import { isFile } from "./find.ts";
import { ConsoleLogger, type Logger } from "./log.ts";
import { parseStatements } from "./parser.ts";
import { render } from "./serializer.ts";

/**
 * Applies `transform` to the file at `path`, creating it when missing. The result
 * goes to a temporary file beside it that then replaces the original, so a
 * failure leaves the original untouched. The original's permission bits carry over.
 */
async function rewrite(
  path: string,
  encoding: BufferEncoding,
  transform: (text: string) => string,
): Promise<void> {
  const handle = await open(path, "a");
  await handle.close();
  const mode = (await stat(path)).mode & 0o777;

  const output = transform(await readFile(path, { encoding }));
  const temp = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`);

  try {
    await writeFile(temp, output, { encoding, mode });
    await chmod(temp, mode);
    await rename(temp, path);
  } catch (error) {
    await rm(temp, { force: true });
    throw error;
  }
}

function statementsOf(text: string, logger: Logger): Statement[] {
  const statements = parseStatements(text);
  for (const statement of statements) {
    if (statement.type === "error") {
      logger.warn(`could not parse statement starting at line ${statement.line}`);
    }
  }
  return statements;
}

function originalOf(statement: Statement): string {
  return statement.type === "binding" ? statement.data.original : statement.original;
}

/**
 * Sets `key` to `value` in the file at `path`. Every existing binding of the key
 * is replaced in place (blank lines before it are kept); otherwise one line is
 * appended. All other statements are written back byte for byte.
 */
export async function setKey(
  path: string,
  key: string,
  value: string,
  options: EditOptions = {},
): Promise<[true, string, string]> {
  const logger = options.logger ?? new ConsoleLogger();
  const line = `${render(key, value, options)}\n`;

  await rewrite(path, options.encoding ?? "utf8", (text) => {
    let output = "";
    let replaced = false;
    let missingNewline = false;

    for (const statement of statementsOf(text, logger)) {
      if (statement.type === "binding" && statement.data.key === key) {
        output += (/^\s*/.exec(statement.data.original)?.[0] ?? "") + line;
        replaced = true;
        continue;
      }

      const original = originalOf(statement);
      output += original;
      missingNewline = !/[\r\n]$/.test(original);
    }

    if (!replaced) {
      if (missingNewline) output += "\n";
      output += line;
    }

    return output;
  });

  return [true, key, value];
}

/** Removes every binding of `key` from the file at `path`. */
export async function unsetKey(
  path: string,
  key: string,
  options: EditOptions = {},
): Promise<[true | null, string]> {
  const logger = options.logger ?? new ConsoleLogger();

  if (!(await isFile(path))) {
    logger.warn(`Can't delete from ${path} - it doesn't exist.`);
    return [null, key];
  }

  let removed = false;
  await rewrite(path, options.encoding ?? "utf8", (text) => {
    let output = "";
    for (const statement of statementsOf(text, logger)) {
      if (statement.type === "binding" && statement.data.key === key) {
        removed = true;
      } else {
        output += originalOf(statement);
      }
    }
    return output;
  });

  if (!removed) {
    logger.warn(`Key ${key} not removed from ${path} - key doesn't exist.`);
    return [null, key];
  }

  return [true, key];
}
