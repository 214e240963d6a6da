export type LogLevel = "quiet" | "info" | "verbose";

export type Logger = {
  info(message: string): void;
  verbose(message: string): void;
  warn(message: string): void;
  error(message: string): void;
};

export function parseLogLevel(value?: string): LogLevel {
  const parsed = String(value || "info").toLowerCase();
  if (parsed === "quiet" || parsed === "verbose") return parsed;
  return "info";
}

export function createLogger(scope: string, level: LogLevel = parseLogLevel(process.env.LOG_LEVEL)): Logger {
  const prefix = `[${scope}]`;
  return {
    info(message) {
      if (level !== "quiet") console.log(`${prefix} ${message}`);
    },
    verbose(message) {
      if (level === "verbose") console.log(`${prefix} ${message}`);
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
    error(message) {
      console.error(`${prefix} ${message}`);
    }
  };
}

// for tests and library callers that want no console output
export const silentLogger: Logger = {
  info() {},
  verbose() {},
  warn() {},
  error() {}
};
