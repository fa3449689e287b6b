import type { Logger } from "../../src/shared/logger.js";

export interface LogEntry {
  level: "info" | "warn" | "error";
  message: string;
  context: Record<string, unknown> | undefined;
}

export interface RecordingLogger extends Logger {
  entries: LogEntry[];
  messages(level: LogEntry["level"]): string[];
}

export function createRecordingLogger(): RecordingLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    messages(level) {
      return entries.filter((entry) => entry.level === level).map((entry) => entry.message);
    },
    info(message, context) {
      entries.push({ level: "info", message, context });
    },
    warn(message, context) {
      entries.push({ level: "warn", message, context });
    },
    error(message, context) {
      entries.push({ level: "error", message, context });
    }
  };
}
