import type { RelayEvent } from "../types.js";
import { GatewayError } from "../errors.js";

export type LogLevel = "silent" | "error" | "info" | "debug";

const RANK: Record<LogLevel, number> = { silent: 0, error: 1, info: 2, debug: 3 };

export function eventLevel(event: RelayEvent): Exclude<LogLevel, "silent"> {
  switch (event.type) {
    case "call.error":
    case "usage.error":
      return "error";
    case "call.start":
    case "models.cache":
      return "debug";
    default:
      return "info";
  }
}

export function serializeError(error: unknown): Record<string, unknown> {
  if (error instanceof GatewayError) {
    return { name: error.name, message: error.message, status: error.status, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { message: String(error) };
}

export interface NdjsonEventSinkOptions {
  writer: { write(chunk: string): unknown };
  level?: LogLevel;
  clock?: () => Date;
}

/** One JSON line per event at or above `level`. Error values are flattened to name/message/status/code. */
export function createNdjsonEventSink(options: NdjsonEventSinkOptions): (event: RelayEvent) => void {
  const threshold = RANK[options.level ?? "info"];

  return (event: RelayEvent): void => {
    const level = eventLevel(event);
    if (RANK[level] > threshold) return;

    const timestamp = options.clock ? options.clock() : new Date();
    const record: Record<string, unknown> = { timestamp: timestamp.toISOString(), level, ...event };
    if ("error" in event) record.error = serializeError(event.error);
    options.writer.write(`${JSON.stringify(record)}\n`);
  };
}

/** Errors to stderr, everything else to stdout. */
export function createConsoleLogger(level: LogLevel = "info"): (event: RelayEvent) => void {
  const out = createNdjsonEventSink({ writer: process.stdout, level });
  const err = createNdjsonEventSink({ writer: process.stderr, level });
  return (event) => (eventLevel(event) === "error" ? err(event) : out(event));
}

/** Fans one event out to several listeners; a throwing listener does not stop the others. */
export function combineListeners(
  ...listeners: Array<((event: RelayEvent) => void) | undefined>
): (event: RelayEvent) => void {
  return (event) => {
    for (const listener of listeners) {
      try {
        listener?.(event);
      } catch (error) {
        console.error("Relay event listener failed", error);
      }
    }
  };
}
