import { unsetKey } from "../../core/rewrite.ts";
import { type Argv, CommandError, positional, resolveFile } from "../options.ts";

export async function unsetCommand(args: Argv): Promise<void> {
  const file = await resolveFile(args);
  const key = positional(args, 1, "KEY");

  const [removed] = await unsetKey(file, key);
  if (!removed) {
    throw new CommandError(`Could not remove ${key} from ${file}`, 1);
  }

  console.log(`Successfully removed ${key}`);
}
