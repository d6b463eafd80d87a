import { setKey } from "../../core/rewrite.ts";
import { type Argv, positional, toCLIOptions } from "../options.ts";

export async function setCommand(args: Argv): Promise<void> {
  const options = await toCLIOptions(args);
  const key = positional(args, 1, "KEY");
  const value = positional(args, 2, "VALUE");

  const [, storedKey, storedValue] = await setKey(options.file, key, value, {
    quoteMode: options.quote,
    export: options.export,
  });

  console.log(`${storedKey}=${storedValue}`);
}
