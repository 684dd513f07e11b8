const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let minimumLevel: LogLevel = "info";
let isVerbose = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
  minimumLevel = verbose ? "debug" : "info";
}

/**
 * Suppress everything below `error`. Verbose mode is ignored while silent.
 */
export function setSilentMode(silent: boolean): void {
  minimumLevel = silent ? "error" : isVerbose ? "debug" : "info";
}

function logWith(level: LogLevel, args: unknown[]): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) {
    return;
  }
  const method = level === "warn" ? "warn" : level === "error" ? "error" : "log";
  originalConsole[method](...args);
}

export const logger = {
  debug(...args: unknown[]): void {
    logWith("debug", args);
  },
  info(...args: unknown[]): void {
    logWith("info", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
