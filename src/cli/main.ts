#!/usr/bin/env -S npx tsx

import { existsSync, realpathSync } from "node:fs";
import { fileURLToPath } from "node:url";
import minimist from "minimist";
import { getCommand } from "./commands/get.ts";
import { listCommand } from "./commands/list.ts";
import { runCommand } from "./commands/run.ts";
import { setCommand } from "./commands/set.ts";
import { unsetCommand } from "./commands/unset.ts";
import { type Argv, CommandError } from "./options.ts";

const HELP = `envline - Read and edit .env files

Usage:
  envline [options] list [--format <fmt>]
  envline [options] get <key>
  envline [options] set <key> <value>
  envline [options] unset <key>
  envline [options] run [--no-override] -- <cmd> [args...]

Common Options:
  -f, --file <path>       .env file path (default: search from current dir)
  -q, --quote <mode>      Quote values on set: always (default), auto, never
  -e, --export            Prefix lines written by set with "export"
  -h, --help              Show this help

List Options:
  --format <fmt>         Output format: simple (default), json, shell, export

Run Options:
  --no-override          Keep variables already set in the environment

Examples:
  envline set DATABASE_URL postgres://localhost/app
  envline list --format json
  envline run -- node server.js
`;

export async function main(argv: string[] = process.argv.slice(2)): Promise<void> {
  const ddIndex = argv.indexOf("--");
  const passthrough = ddIndex >= 0 ? argv.slice(ddIndex + 1) : [];
  const argsToParse = ddIndex >= 0 ? argv.slice(0, ddIndex) : argv;

  const args = minimist(argsToParse, {
    alias: {
      f: "file",
      q: "quote",
      e: "export",
      h: "help",
    },
    // "_" keeps positional values such as ports as strings
    string: ["_", "file", "quote", "format"],
    boolean: ["export", "override", "help"],
    default: {
      quote: "always",
      override: true,
    },
  });

  const command = args._[0];

  if (!command || args.help) {
    console.log(HELP);
    return;
  }

  const parsedArgs: Argv = { ...args, "--": passthrough };

  try {
    switch (command) {
      case "list":
        await listCommand(parsedArgs);
        break;
      case "get":
        await getCommand(parsedArgs);
        break;
      case "set":
        await setCommand(parsedArgs);
        break;
      case "unset":
        await unsetCommand(parsedArgs);
        break;
      case "run":
        await runCommand(parsedArgs);
        break;
      default:
        console.error(`Unknown command: ${command}`);
        console.log(HELP);
        process.exitCode = 1;
    }
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    if (process.env.DEBUG) {
      console.error(error instanceof Error ? error.stack : String(error));
    }
    process.exitCode = error instanceof CommandError ? error.exitCode : 1;
  }
}

function isEntryPoint(entry: string | undefined): boolean {
  if (!entry || !existsSync(entry)) return false;
  return realpathSync(entry) === fileURLToPath(import.meta.url);
}

if (isEntryPoint(process.argv[1])) {
  await main();
}
