import { afterEach, expect, test, vi } from "vitest";
import { ConsoleLogger, createLogger, NoOpLogger } from "../core/log.ts";

afterEach(() => {
  vi.restoreAllMocks();
});

test("createLogger - picks the implementation", () => {
  expect(createLogger("stderr")).toBeInstanceOf(ConsoleLogger);
  expect(createLogger("off")).toBeInstanceOf(NoOpLogger);
});

test("ConsoleLogger - writes info and warnings to stderr", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  const logger = new ConsoleLogger();
  logger.info("loaded");
  logger.warn("Key A not found in .env.");

  expect(error).toHaveBeenCalledWith("loaded");
  expect(warn).toHaveBeenCalledWith("Warning: Key A not found in .env.");
});

test("NoOpLogger - prints nothing", () => {
  const error = vi.spyOn(console, "error").mockImplementation(() => {});
  const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

  const logger = new NoOpLogger();
  logger.info("x");
  logger.warn("y");

  expect(error).not.toHaveBeenCalled();
  expect(warn).not.toHaveBeenCalled();
});
