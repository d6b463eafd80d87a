import { chmod, mkdtemp, readdir, readFile, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, expect, test, vi } from "vitest";
import { setKey, unsetKey } from "../core/rewrite.ts";
import type { Logger } from "../core/log.ts";

let dir: string;
let dotenvPath: string;

function makeLogger() {
  return { info: vi.fn<(message: string) => void>(), warn: vi.fn<(message: string) => void>() } satisfies Logger;
}

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "envline-rewrite-"));
  dotenvPath = join(dir, ".env");
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

test.each([
  ["", "a", "", "a=''\n"],
  ["", "a", "b", "a='b'\n"],
  ["", "a", "'b'", "a='\\'b\\''\n"],
  ["", "a", '"b"', "a='\"b\"'\n"],
  ["", "a", "b'c", "a='b\\'c'\n"],
  ["a=b", "a", "c", "a='c'\n"],
  ["a=b\n", "a", "c", "a='c'\n"],
  ["a=b\n\n", "a", "c", "a='c'\n\n"],
  ["a=b\nc=d", "a", "e", "a='e'\nc=d"],
  ["a=b\nc=d\ne=f", "c", "g", "a=b\nc='g'\ne=f"],
  ["a=b\n", "c", "d", "a=b\nc='d'\n"],
  ["a=b", "c", "d", "a=b\nc='d'\n"],
  ["# note", "a", "b", "# note\na='b'\n"],
])("setKey - %j with %s=%j", async (before, key, value, after) => {
  await writeFile(dotenvPath, before);
  const logger = makeLogger();

  expect(await setKey(dotenvPath, key, value, { logger })).toEqual([true, key, value]);
  expect(await readFile(dotenvPath, "utf8")).toBe(after);
  expect(logger.warn).not.toHaveBeenCalled();
});

test("setKey - creates a missing file", async () => {
  expect(await setKey(dotenvPath, "FOO", "bar")).toEqual([true, "FOO", "bar"]);
  expect(await readFile(dotenvPath, "utf8")).toBe("FOO='bar'\n");
});

test("setKey - keeps comments and blank lines around the replaced binding", async () => {
  await writeFile(dotenvPath, "# db\n\n  HOST=old # inline\nPORT=1\n");
  await setKey(dotenvPath, "HOST", "new");
  expect(await readFile(dotenvPath, "utf8")).toBe("# db\n\n  HOST='new'\nPORT=1\n");
});

test("setKey - replaces every binding of the key", async () => {
  await writeFile(dotenvPath, "A=1\nB=2\nA=3\n");
  await setKey(dotenvPath, "A", "x");
  expect(await readFile(dotenvPath, "utf8")).toBe("A='x'\nB=2\nA='x'\n");
});

test("setKey - quote mode and export prefix", async () => {
  await setKey(dotenvPath, "A", "1", { quoteMode: "never", export: true });
  await setKey(dotenvPath, "B", "two words", { quoteMode: "auto" });
  await setKey(dotenvPath, "C", "word", { quoteMode: "auto" });
  expect(await readFile(dotenvPath, "utf8")).toBe("export A=1\nB='two words'\nC=word\n");
});

test("setKey - honours the file encoding", async () => {
  await writeFile(dotenvPath, Buffer.from("é=x\n", "latin1"));
  await setKey(dotenvPath, "é", "è", { encoding: "latin1" });
  expect(await readFile(dotenvPath)).toEqual(Buffer.from("é='è'\n", "latin1"));
});

test("setKey - unparsable lines are written back unchanged", async () => {
  const logger = makeLogger();
  await writeFile(dotenvPath, 'A=1\nB="oops\nC=3');
  await setKey(dotenvPath, "C", "4", { logger });
  expect(await readFile(dotenvPath, "utf8")).toBe("A=1\nB=\"oops\nC='4'\n");
  expect(logger.warn).toHaveBeenCalledTimes(1);
  expect(logger.warn).toHaveBeenCalledWith("could not parse statement starting at line 2");
});

test("setKey - leaves no temporary file behind", async () => {
  await setKey(dotenvPath, "A", "1");
  await setKey(dotenvPath, "A", "2");
  expect(await readdir(dir)).toEqual([".env"]);
});

test("setKey and unsetKey - keep the file's permissions", async () => {
  await writeFile(dotenvPath, "A=1\n");
  await chmod(dotenvPath, 0o600);

  await setKey(dotenvPath, "B", "2", { logger: makeLogger() });
  expect((await stat(dotenvPath)).mode & 0o777).toBe(0o600);

  await unsetKey(dotenvPath, "MISSING", { logger: makeLogger() });
  expect((await stat(dotenvPath)).mode & 0o777).toBe(0o600);

  await unsetKey(dotenvPath, "A", { logger: makeLogger() });
  expect((await stat(dotenvPath)).mode & 0o777).toBe(0o600);
  expect(await readFile(dotenvPath, "utf8")).toBe("B='2'\n");
});

test.skipIf(process.getuid?.() === 0)("setKey - read-only file is left untouched", async () => {
  await writeFile(dotenvPath, "a=b\n");
  await chmod(dotenvPath, 0o444);
  await expect(setKey(dotenvPath, "a", "c")).rejects.toThrow();
  await chmod(dotenvPath, 0o644);
  expect(await readFile(dotenvPath, "utf8")).toBe("a=b\n");
});

test.each([
  ["a=b", "a", "", [true, "a"]],
  ["a=b\n", "a", "", [true, "a"]],
  ["a=b\nc=d", "a", "c=d", [true, "a"]],
  ["a=b\nc=d", "c", "a=b\n", [true, "c"]],
  ["# keep\na=b\n# also\n", "a", "# keep\n# also\n", [true, "a"]],
  ["a=1\nb=2\na=3\n", "a", "b=2\n", [true, "a"]],
])("unsetKey - %j without %s", async (before, key, after, expected) => {
  await writeFile(dotenvPath, before);
  expect(await unsetKey(dotenvPath, key, { logger: makeLogger() })).toEqual(expected);
  expect(await readFile(dotenvPath, "utf8")).toBe(after);
});

test("unsetKey - missing key", async () => {
  const logger = makeLogger();
  await writeFile(dotenvPath, "c=d\n");
  expect(await unsetKey(dotenvPath, "a", { logger })).toEqual([null, "a"]);
  expect(await readFile(dotenvPath, "utf8")).toBe("c=d\n");
  expect(logger.warn).toHaveBeenCalledWith(`Key a not removed from ${dotenvPath} - key doesn't exist.`);
});

test("unsetKey - missing file is not created", async () => {
  const logger = makeLogger();
  expect(await unsetKey(dotenvPath, "a", { logger })).toEqual([null, "a"]);
  expect(logger.warn).toHaveBeenCalledWith(`Can't delete from ${dotenvPath} - it doesn't exist.`);
  expect(await readdir(dir)).toEqual([]);
});

test("unsetKey - honours the file encoding", async () => {
  await writeFile(dotenvPath, Buffer.from("é=x\nb=1\n", "latin1"));
  expect(await unsetKey(dotenvPath, "é", { encoding: "latin1" })).toEqual([true, "é"]);
  expect(await readFile(dotenvPath, "utf8")).toBe("b=1\n");
});
