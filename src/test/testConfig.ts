import { describe, expect, it } from "vitest";
import { DEFAULT_CONFIG, loadConfig, resolveConfig } from "../config";
import { ConfigError } from "../errors";

function configErrorKey(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error.key;
    throw error;
  }
  return undefined;
}

describe("config", () => {
  it("falls back to the defaults", () => {
    expect(loadConfig({})).toEqual({
      pollTimeoutMs: 1000,
      maxIoRetries: 64,
      logLevel: "info",
    });
  });

  it("reads overrides from the environment", () => {
    expect(
      loadConfig({
        POLLER_TIMEOUT_MS: "250",
        POLLER_MAX_IO_RETRIES: "3",
        POLLER_LOG_LEVEL: "debug",
      })
    ).toEqual({ pollTimeoutMs: 250, maxIoRetries: 3, logLevel: "debug" });
  });

  it("treats blank variables as unset", () => {
    expect(loadConfig({ POLLER_TIMEOUT_MS: "  " }).pollTimeoutMs).toBe(1000);
  });

  it("names the variable that failed to parse", () => {
    expect(configErrorKey(() => loadConfig({ POLLER_TIMEOUT_MS: "soon" }))).toBe(
      "POLLER_TIMEOUT_MS"
    );
    expect(() => loadConfig({ POLLER_TIMEOUT_MS: "soon" })).toThrow(
      "Invalid configuration for POLLER_TIMEOUT_MS: expected an integer, got 'soon'"
    );
  });

  it("names the variable that failed validation", () => {
    expect(configErrorKey(() => loadConfig({ POLLER_TIMEOUT_MS: "0" }))).toBe(
      "POLLER_TIMEOUT_MS"
    );
    expect(
      configErrorKey(() => loadConfig({ POLLER_MAX_IO_RETRIES: "-1" }))
    ).toBe("POLLER_MAX_IO_RETRIES");
    expect(configErrorKey(() => loadConfig({ POLLER_LOG_LEVEL: "loud" }))).toBe(
      "POLLER_LOG_LEVEL"
    );
  });

  it("merges overrides onto the defaults", () => {
    expect(resolveConfig({ maxIoRetries: 5 })).toEqual({
      ...DEFAULT_CONFIG,
      maxIoRetries: 5,
    });
    expect(configErrorKey(() => resolveConfig({ pollTimeoutMs: 1.5 }))).toBe(
      "POLLER_TIMEOUT_MS"
    );
  });
});
