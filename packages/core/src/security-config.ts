import blockedFunctionGroups from "./blocked-functions.json";
import type { SecurityConfig } from "./types";

export const BLOCKED_FUNCTION_CATEGORIES = ["process", "filesystem", "network", "runtime"] as const;
export type BlockedFunctionCategory = (typeof BLOCKED_FUNCTION_CATEGORIES)[number];

export const BLOCKED_FUNCTIONS_BY_CATEGORY: Readonly<Record<BlockedFunctionCategory, readonly string[]>> =
  blockedFunctionGroups;

export const DEFAULT_BLOCKED_FUNCTIONS: readonly string[] = BLOCKED_FUNCTION_CATEGORIES.flatMap(
  (category) => BLOCKED_FUNCTIONS_BY_CATEGORY[category]
);

export const DEFAULT_MAX_CODE_LENGTH = 10_000;
export const DEFAULT_MAX_EXECUTION_SECONDS = 30;
export const DEFAULT_MAX_MEMORY_BYTES = 32 * 1024 * 1024;

export const DEFAULT_SECURITY_CONFIG: SecurityConfig = {
  blockedFunctions: DEFAULT_BLOCKED_FUNCTIONS,
  maxCodeLength: DEFAULT_MAX_CODE_LENGTH,
  maxExecutionSeconds: DEFAULT_MAX_EXECUTION_SECONDS,
  maxMemoryBytes: DEFAULT_MAX_MEMORY_BYTES,
  enableSyntaxCheck: true,
  // Audit logging is opt-in; production stays quiet unless debugging is switched on.
  enableExecutionLog: false
};

export type SecurityConfigOverrides = Partial<SecurityConfig> & {
  addBlockedFunctions?: readonly string[];
  removeBlockedFunctions?: readonly string[];
};

/**
 * Build a security config from the compiled-in defaults and caller overrides.
 *
 * `blockedFunctions` replaces the default list outright; `addBlockedFunctions` and
 * `removeBlockedFunctions` are then applied on top (case-insensitive removal).
 */
export function createSecurityConfig(overrides: SecurityConfigOverrides = {}): SecurityConfig {
  const { addBlockedFunctions = [], removeBlockedFunctions = [], ...rest } = overrides;
  const base = rest.blockedFunctions ?? DEFAULT_SECURITY_CONFIG.blockedFunctions;
  const removed = new Set(removeBlockedFunctions.map((name) => name.trim().toLowerCase()));

  const blockedFunctions = [...new Set([...base, ...addBlockedFunctions].map((name) => name.trim()).filter(Boolean))]
    .filter((name) => !removed.has(name.toLowerCase()));

  return {
    ...DEFAULT_SECURITY_CONFIG,
    ...rest,
    blockedFunctions
  };
}

const MEMORY_UNITS: Record<string, number> = {
  k: 1024,
  m: 1024 * 1024,
  g: 1024 * 1024 * 1024
};

/**
 * Parse a memory size such as `"32M"`, `"1G"`, `"512k"` or a plain byte count.
 *
 * @returns Size in bytes; `Infinity` for `-1` or `"unlimited"`, `NaN` when the value is unreadable
 */
export function parseMemoryLimit(value: string | number): number {
  if (typeof value === "number") {
    return value < 0 ? Number.POSITIVE_INFINITY : value;
  }

  const trimmed = value.trim().toLowerCase();
  if (trimmed === "-1" || trimmed === "unlimited") {
    return Number.POSITIVE_INFINITY;
  }

  const match = /^(\d+)\s*([kmg])?b?$/.exec(trimmed);
  if (!match) {
    return Number.NaN;
  }

  const amount = Number.parseInt(match[1], 10);
  const unit = match[2];
  return unit ? amount * MEMORY_UNITS[unit] : amount;
}

/**
 * Memory ceiling to run a snippet under. The configured value can only lower the ambient limit.
 */
export function effectiveMemoryLimit(ambientBytes: number, configuredBytes: number): number {
  if (!Number.isFinite(configuredBytes) || configuredBytes <= 0) {
    return ambientBytes;
  }

  return Math.min(ambientBytes, configuredBytes);
}

export function formatMemoryLimit(bytes: number): string {
  if (!Number.isFinite(bytes)) {
    return "-1";
  }

  for (const [unit, size] of [["G", MEMORY_UNITS.g], ["M", MEMORY_UNITS.m], ["K", MEMORY_UNITS.k]] as const) {
    if (bytes >= size && bytes % size === 0) {
      return `${bytes / size}${unit}`;
    }
  }

  return String(bytes);
}
