import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: { [level in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const LEVEL_TAG: { [level in LogLevel]: string } = {
  debug: chalk.gray("debug"),
  info: chalk.cyan("info "),
  warn: chalk.yellow("warn "),
  error: chalk.red("error"),
};

export class Logger {
  level: LogLevel;

  constructor(level: LogLevel = "info") {
    this.level = level;
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  debug(message: string) {
    this.write("debug", message);
  }

  info(message: string) {
    this.write("info", message);
  }

  warn(message: string) {
    this.write("warn", message);
  }

  error(message: string) {
    this.write("error", message);
  }

  private write(level: LogLevel, message: string) {
    if (!this.isEnabled(level)) return;
    const time = chalk.dim(new Date().toISOString().substring(11, 23));
    const line = `${time} ${LEVEL_TAG[level]} ${message}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export const logger = new Logger(
  parseLevel(process.env.POLLER_LOG_LEVEL) ?? "info"
);

export function parseLevel(value: string | undefined): LogLevel | undefined {
  switch (value) {
    case "debug":
    case "info":
    case "warn":
    case "error":
      return value;
    default:
      return undefined;
  }
}
