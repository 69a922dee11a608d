import type { Logger } from "../lib/logger.js";

export type LogEntry = { level: "info" | "warn" | "error"; obj: object; msg?: string };

export function recordingLogger() {
  const entries: LogEntry[] = [];
  const logger: Logger = {
    info: (obj, msg) => entries.push({ level: "info", obj, msg }),
    warn: (obj, msg) => entries.push({ level: "warn", obj, msg }),
    error: (obj, msg) => entries.push({ level: "error", obj, msg })
  };
  const events = () => entries.map((e) => ("event" in e.obj ? e.obj.event : undefined));
  return { logger, entries, events };
}
