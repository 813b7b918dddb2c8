import { Literal, Number, Record, Union, type Static } from "runtypes";
import { ConfigError } from "./errors";

const PollTimeout = Number.withConstraint(
  (n) => (n > 0 && n % 1 === 0) || "must be a positive integer"
);

const MaxIoRetries = Number.withConstraint(
  (n) => (n >= 1 && n % 1 === 0) || "must be an integer of at least 1"
);

const LogLevel = Union(
  Literal("debug"),
  Literal("info"),
  Literal("warn"),
  Literal("error")
);

export const PollerConfig = Record({
  pollTimeoutMs: PollTimeout,
  maxIoRetries: MaxIoRetries,
  logLevel: LogLevel,
});

export type PollerConfigType = Static<typeof PollerConfig>;

export const DEFAULT_CONFIG: PollerConfigType = {
  pollTimeoutMs: 1000,
  maxIoRetries: 64,
  logLevel: "info",
};

const ENV_KEYS = {
  pollTimeoutMs: "POLLER_TIMEOUT_MS",
  maxIoRetries: "POLLER_MAX_IO_RETRIES",
  logLevel: "POLLER_LOG_LEVEL",
} as const;

function readInteger(
  env: NodeJS.ProcessEnv,
  key: string,
  fallback: number
): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  if (!/^-?\d+$/.test(raw.trim())) {
    throw new ConfigError(key, `expected an integer, got '${raw}'`);
  }
  return parseInt(raw, 10);
}

/**
 * Build the poller configuration from environment variables, falling back
 * to {@link DEFAULT_CONFIG} for anything unset.
 *
 * @throws ConfigError naming the first variable that does not validate.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PollerConfigType {
  const candidate = {
    pollTimeoutMs: readInteger(
      env,
      ENV_KEYS.pollTimeoutMs,
      DEFAULT_CONFIG.pollTimeoutMs
    ),
    maxIoRetries: readInteger(
      env,
      ENV_KEYS.maxIoRetries,
      DEFAULT_CONFIG.maxIoRetries
    ),
    logLevel: env[ENV_KEYS.logLevel] ?? DEFAULT_CONFIG.logLevel,
  };
  return validateConfig(candidate);
}

/** Merge overrides onto the defaults and validate the result. */
export function resolveConfig(
  overrides: Partial<PollerConfigType> = {}
): PollerConfigType {
  return validateConfig({ ...DEFAULT_CONFIG, ...overrides });
}

function validateConfig(candidate: {
  pollTimeoutMs: unknown;
  maxIoRetries: unknown;
  logLevel: unknown;
}): PollerConfigType {
  const fields = [
    ["pollTimeoutMs", PollTimeout],
    ["maxIoRetries", MaxIoRetries],
    ["logLevel", LogLevel],
  ] as const;
  for (const [field, runtype] of fields) {
    const result = runtype.validate(candidate[field]);
    if (!result.success) {
      throw new ConfigError(ENV_KEYS[field], result.message);
    }
  }
  return PollerConfig.check(candidate);
}
