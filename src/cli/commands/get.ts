import { dotenvValues } from "../../core/dotenv.ts";
import { type Argv, CommandError, positional, requireFile, resolveFile } from "../options.ts";

export async function getCommand(args: Argv): Promise<void> {
  const file = await resolveFile(args);
  const key = positional(args, 1, "KEY");

  await requireFile(file);
  const value = (await dotenvValues({ path: file })).get(key);

  if (!value) {
    throw new CommandError(`Key ${key} has no value in ${file}`, 1);
  }

  console.log(value);
}
