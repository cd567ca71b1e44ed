import chalk from "chalk";

export type LogLevel = "debug" | "info" | "warn" | "error";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const levelColors: Record<LogLevel, (s: string) => string> = {
  debug: chalk.gray,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function resolveLevel(value: string | undefined): LogLevel {
  const env = (value ?? "info").toLowerCase();
  if (env === "debug" || env === "info" || env === "warn" || env === "error")
    return env;
  return "info";
}

function fmt(scope: string, level: LogLevel, msg: string): string {
  const ts = new Date().toISOString();
  return `${chalk.dim(ts)} ${levelColors[level](
    level.toUpperCase().padEnd(5)
  )} ${chalk.magenta(scope)} ${msg}`;
}

export type Logger = {
  debug: (msg: string) => void;
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

/**
 * Scoped logger. Every level goes to stderr: stdout carries the MCP stdio
 * protocol when the server runs in MCP mode.
 */
export function createLogger(
  scope: string,
  level: LogLevel = resolveLevel(process.env.LOG_LEVEL)
): Logger {
  const should = (l: LogLevel) => levelOrder[l] >= levelOrder[level];
  const write = (l: LogLevel, msg: string) => {
    if (should(l)) console.error(fmt(scope, l, msg));
  };

  return {
    debug: (msg) => write("debug", msg),
    info: (msg) => write("info", msg),
    warn: (msg) => write("warn", msg),
    error: (msg) => write("error", msg),
  };
}

/** Discards everything; handy for tests. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
