import { toStructuredLog } from "@shortexec/core";
import {
  appendBufferedLogEntry,
  readBufferedLogs,
  resetBufferedLogs,
  type BufferedLogFilter,
  type BufferedLogLevel,
  type BufferedLogSnapshot
} from "./log-buffer";

export type LogSink = (level: BufferedLogLevel, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") {
    // eslint-disable-next-line no-console
    console.error(line);
    return;
  }

  // eslint-disable-next-line no-console
  console.log(line);
};

let sink: LogSink = consoleSink;

/**
 * Replace the process sink that structured lines are written to. The ring buffer is always fed.
 *
 * @returns A function restoring the previous sink
 */
export function setLogSink(next: LogSink): () => void {
  const previous = sink;
  sink = next;
  return () => {
    sink = previous;
  };
}

function emitLog(level: BufferedLogLevel, event: string, payload: Record<string, unknown>): void {
  const rawLog = toStructuredLog(event, payload);
  appendBufferedLogEntry({
    ts: new Date().toISOString(),
    level,
    event,
    payload,
    raw: rawLog
  });
  sink(level, rawLog);
}

/**
 * Logs an informational structured event.
 *
 * @param event - Event name, dotted by subsystem (`snippet.execution`, `api.started`)
 * @param payload - Key/value data to attach to the log entry
 */
export function logInfo(event: string, payload: Record<string, unknown>): void {
  emitLog("info", event, payload);
}

/**
 * Logs an error-level structured event.
 */
export function logError(event: string, payload: Record<string, unknown>): void {
  emitLog("error", event, payload);
}

export function formatErrorForLog(error: unknown): Record<string, unknown> {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  }

  return { value: error };
}

export function readLogBuffer(filter: BufferedLogFilter = {}): BufferedLogSnapshot {
  return readBufferedLogs(filter);
}

export function resetLogBuffer(): void {
  resetBufferedLogs();
}
