const originalConsole = {
  log: console.log.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
};

let isVerbose = false;

export function setVerboseMode(verbose: boolean): void {
  isVerbose = verbose;
}

function logWith(method: "log" | "warn" | "error", args: unknown[]): void {
  originalConsole[method](...args);
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

export const logger: Logger = {
  debug(...args: unknown[]): void {
    if (!isVerbose) {
      return;
    }
    logWith("log", args);
  },
  info(...args: unknown[]): void {
    logWith("log", args);
  },
  warn(...args: unknown[]): void {
    logWith("warn", args);
  },
  error(...args: unknown[]): void {
    logWith("error", args);
  },
};

/**
 * Logger that prefixes every line with `[scope]`, e.g. `[worker-2]`.
 */
export function scopedLogger(scope: string, base: Logger = logger): Logger {
  const tag = `[${scope}]`;
  return {
    debug: (...args: unknown[]) => base.debug(tag, ...args),
    info: (...args: unknown[]) => base.info(tag, ...args),
    warn: (...args: unknown[]) => base.warn(tag, ...args),
    error: (...args: unknown[]) => base.error(tag, ...args),
  };
}

/** Logger that drops everything. Used by tests and library callers. */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export function installConsoleBridge(): void {
  console.log = (...args: unknown[]) => logger.info(...args);
  console.warn = (...args: unknown[]) => logger.warn(...args);
  console.error = (...args: unknown[]) => logger.error(...args);
}
