import type { ExecutionStatus } from "@shortexec/core";
import { ulid } from "ulid";
import { formatErrorForLog, logError, logInfo } from "../lib/log";

export const AUDIT_EVENT = "snippet.execution";

const REDACT_KEYS = [/authorization/i, /token/i, /secret/i, /password/i, /cookie/i];

const ERROR_STATUSES: ReadonlySet<ExecutionStatus> = new Set<ExecutionStatus>([
  "invalid_name",
  "code_validation_failed",
  "parse_error",
  "fatal_error",
  "exception",
  "timeout"
]);

export type AuditContext = Record<string, unknown>;

export type AuditEntry = {
  id: string;
  ts: string;
  name: string;
  status: ExecutionStatus;
  message: string;
  context: AuditContext;
};

export type AuditListener = (entry: AuditEntry) => void;

function shouldRedact(key: string): boolean {
  return REDACT_KEYS.some((pattern) => pattern.test(key));
}

export function redact(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item));
  }

  if (value && typeof value === "object") {
    return redactRecord(Object.fromEntries(Object.entries(value)));
  }

  return value;
}

function redactRecord(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(record).map(([key, field]) => [key, shouldRedact(key) ? "[REDACTED]" : redact(field)])
  );
}

/**
 * One structured record per terminal execution state, written only while execution logging is on.
 *
 * `record` never throws: a failing listener or enablement check is reported through the
 * error log and the invocation carries on.
 */
export class AuditLogger {
  private readonly listeners = new Set<AuditListener>();
  private readonly isEnabled: () => boolean;
  private readonly now: () => Date;

  constructor(input: { isEnabled: () => boolean; now?: () => Date }) {
    this.isEnabled = input.isEnabled;
    this.now = input.now ?? (() => new Date());
  }

  subscribe(listener: AuditListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  record(name: string, status: ExecutionStatus, message: string, context: AuditContext = {}): AuditEntry | null {
    let entry: AuditEntry;
    try {
      if (!this.isEnabled()) {
        return null;
      }

      const now = this.now();
      entry = {
        id: ulid(now.getTime()),
        ts: now.toISOString(),
        name,
        status,
        message,
        context: redactRecord(context)
      };

      if (ERROR_STATUSES.has(status)) {
        logError(AUDIT_EVENT, entry);
      } else {
        logInfo(AUDIT_EVENT, entry);
      }
    } catch (error) {
      logError("snippet.audit.failed", { name, status, error: formatErrorForLog(error) });
      return null;
    }

    for (const listener of this.listeners) {
      try {
        listener(entry);
      } catch (error) {
        logError("snippet.audit.listener_failed", { name, status, error: formatErrorForLog(error) });
      }
    }

    return entry;
  }
}
