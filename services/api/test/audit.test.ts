import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { readLogBuffer, resetLogBuffer, setLogSink } from "../src/lib/log";
import { AUDIT_EVENT, AuditLogger, redact, type AuditEntry } from "../src/services/audit";

const now = () => new Date("2026-02-23T00:00:00.000Z");

describe("AuditLogger", () => {
  let restoreSink: () => void = () => {};

  beforeEach(() => {
    restoreSink = setLogSink(() => {});
  });

  afterEach(() => {
    restoreSink();
    resetLogBuffer();
  });

  it("writes nothing while execution logging is off", () => {
    const audit = new AuditLogger({ isEnabled: () => false, now });

    expect(audit.record("greet", "success", "Executed successfully")).toBeNull();
    expect(readLogBuffer({ event: AUDIT_EVENT }).logs).toHaveLength(0);
  });

  it("records one structured entry per call", () => {
    const audit = new AuditLogger({ isEnabled: () => true, now });

    const entry = audit.record("greet", "success", "Executed successfully", { surface: "normal" });

    expect(entry).toMatchObject({
      ts: "2026-02-23T00:00:00.000Z",
      name: "greet",
      status: "success",
      message: "Executed successfully",
      context: { surface: "normal" }
    });
    expect(entry?.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);

    const logs = readLogBuffer({ event: AUDIT_EVENT }).logs;
    expect(logs).toHaveLength(1);
    expect(logs[0].level).toBe("info");
    expect(logs[0].payload).toEqual(entry);
  });

  it("logs failures at error level", () => {
    const audit = new AuditLogger({ isEnabled: () => true, now });

    audit.record("greet", "timeout", "timeout: Execution exceeded 50ms");
    audit.record("greet", "access_denied", "Access denied");

    const snapshot = readLogBuffer({ event: AUDIT_EVENT });
    expect(snapshot.logs.map((log) => [log.level, log.payload.status])).toEqual([
      ["info", "access_denied"],
      ["error", "timeout"]
    ]);
  });

  it("redacts credential-like keys in the context", () => {
    const audit = new AuditLogger({ isEnabled: () => true, now });

    const entry = audit.record("greet", "success", "Executed successfully", {
      attributes: { name: "Ada", api_token: "test-token" },
      headers: [{ Authorization: "Bearer test-secret" }]
    });

    expect(entry?.context).toEqual({
      attributes: { name: "Ada", api_token: "[REDACTED]" },
      headers: [{ Authorization: "[REDACTED]" }]
    });
  });

  it("notifies subscribers and survives a failing one", () => {
    const audit = new AuditLogger({ isEnabled: () => true, now });
    const seen: AuditEntry[] = [];
    audit.subscribe(() => {
      throw new Error("listener down");
    });
    const unsubscribe = audit.subscribe((entry) => {
      seen.push(entry);
    });

    const entry = audit.record("greet", "success", "Executed successfully");
    expect(seen).toEqual([entry]);
    expect(readLogBuffer({ event: "snippet.audit.listener_failed" }).logs).toHaveLength(1);

    unsubscribe();
    audit.record("greet", "success", "Executed successfully");
    expect(seen).toHaveLength(1);
  });

  it("never throws when the enablement check fails", () => {
    const audit = new AuditLogger({
      isEnabled: () => {
        throw new Error("config unavailable");
      },
      now
    });

    expect(audit.record("greet", "success", "Executed successfully")).toBeNull();
    const logs = readLogBuffer({ event: "snippet.audit.failed" }).logs;
    expect(logs).toHaveLength(1);
    expect(logs[0].payload).toMatchObject({ name: "greet", status: "success" });
  });
});

describe("redact", () => {
  it("leaves non-object values alone", () => {
    expect(redact("token")).toBe("token");
    expect(redact(null)).toBeNull();
    expect(redact({ password: "x", nested: { cookie: "y", keep: 1 } })).toEqual({
      password: "[REDACTED]",
      nested: { cookie: "[REDACTED]", keep: 1 }
    });
  });
});
