import { afterEach, describe, expect, it, vi } from "vitest";
import { Logger, parseLevel } from "../logger";

describe("Logger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("warn");

    logger.debug("polling");
    logger.info("started");
    logger.warn("disk almost full");

    expect(out).not.toHaveBeenCalled();
    expect(err).toHaveBeenCalledTimes(1);
    expect(String(err.mock.calls[0][0])).toMatch(/ disk almost full$/);
  });

  it("writes info to stdout and errors to stderr", () => {
    const out = vi.spyOn(console, "log").mockImplementation(() => {});
    const err = vi.spyOn(console, "error").mockImplementation(() => {});
    const logger = new Logger("debug");

    logger.info("started");
    logger.error("query failed");

    expect(out).toHaveBeenCalledTimes(1);
    expect(err).toHaveBeenCalledTimes(1);
  });

  it("changes level at runtime", () => {
    const logger = new Logger("error");
    expect(logger.isEnabled("info")).toBe(false);

    logger.setLevel("debug");
    expect(logger.isEnabled("debug")).toBe(true);
  });

  it("parses known level names only", () => {
    expect(parseLevel("warn")).toBe("warn");
    expect(parseLevel("verbose")).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });
});
