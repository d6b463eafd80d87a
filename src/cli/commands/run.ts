import { spawn } from "node:child_process";
import type { DotenvValues, Environment, RunOptions } from "../../core/types.ts";
import { dotenvValues } from "../../core/dotenv.ts";
import { type Argv, CommandError, resolveFile } from "../options.ts";
import { isFile } from "../../core/find.ts";

export async function runCommand(args: Argv): Promise<void> {
  const passthrough = Array.isArray(args["--"]) ? args["--"].map(String) : [];
  const [command, ...commandArgs] = passthrough;

  if (!command) {
    throw new CommandError("No command given. Use: envline run -- <command> [args...]", 1);
  }

  const options: RunOptions = {
    file: await resolveFile(args),
    override: args.override !== false,
  };

  if (!(await isFile(options.file))) {
    throw new CommandError(`Invalid value for '-f': ${options.file} does not exist`, 2);
  }

  const values = await dotenvValues({ path: options.file });
  const env = buildRunEnv(values, process.env, options.override ?? true);

  if (process.env.DEBUG) {
    console.error(`Injecting ${values.size} environment variables`);
  }

  process.exitCode = await spawnCommand(command, commandArgs, env);
}

/**
 * The child's environment: the current one plus every file value that has one.
 * Without `override` names already in `env` keep their current value.
 */
export function buildRunEnv(
  values: DotenvValues,
  env: Environment,
  override: boolean,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) result[key] = value;
  }

  for (const [key, value] of values) {
    if (value === null) continue;
    if (!override && Object.hasOwn(result, key)) continue;
    result[key] = value;
  }

  return result;
}

function spawnCommand(
  command: string,
  commandArgs: string[],
  env: Record<string, string>,
): Promise<number> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, commandArgs, { env, stdio: "inherit" });
    child.on("error", reject);
    child.on("exit", (code) => resolve(code ?? 1));
  });
}
