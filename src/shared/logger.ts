export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

export function createNoopLogger(): Logger {
  return {
    info() {},
    warn() {},
    error() {}
  };
}

type LogLevel = "info" | "warn" | "error";

/**
 * One JSON line per entry; warnings and errors go to stderr.
 */
export function createConsoleLogger(component: string): Logger {
  const write = (level: LogLevel, message: string, context?: Record<string, unknown>) => {
    const line = JSON.stringify({
      level,
      component,
      message,
      ...(context ?? {}),
      logged_at_utc: new Date().toISOString()
    });
    if (level === "info") {
      console.log(line);
    } else {
      console.error(line);
    }
  };

  return {
    info(message, context) {
      write("info", message, context);
    },
    warn(message, context) {
      write("warn", message, context);
    },
    error(message, context) {
      write("error", message, context);
    }
  };
}
