export * from "./types";
export * from "./errors";
export * from "./names";
export * from "./sanitize";
export * from "./security-config";
export * from "./capability";
export * from "./markup";

/**
 * Format an event name and associated payload into a structured JSON log string.
 *
 * @param event - The event name or identifier
 * @param payload - Arbitrary data to include with the event
 * @returns A JSON string containing `ts` (ISO timestamp), `event`, and `payload`
 */
export function toStructuredLog(event: string, payload: Record<string, unknown>): string {
  return JSON.stringify({ ts: new Date().toISOString(), event, payload });
}

/**
 * Normalize raw invocation attributes to a string map. Later duplicate keys win; non-string values are stringified.
 *
 * @param raw - Attribute bag from the caller; anything that is not a plain object yields `{}`
 */
export function normalizeAttributes(raw: unknown): Record<string, string> {
  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    return {};
  }

  const attributes: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    const name = key.trim();
    if (!name || value === undefined || value === null) {
      continue;
    }
    attributes[name] = typeof value === "string" ? value : String(value);
  }
  return attributes;
}
