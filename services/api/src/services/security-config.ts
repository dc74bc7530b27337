import { createSecurityConfig, type SecurityConfig, type SecurityConfigOverrides } from "@shortexec/core";
import type { ApiConfig } from "../config";

export type SecurityConfigFilter = (config: SecurityConfig) => SecurityConfig;

/**
 * Source of the security config in force for an invocation.
 *
 * The built config is cached for `ttlMs`; registered filters run on every rebuild, in
 * registration order. Changes made through filters are seen at most `ttlMs` late unless
 * `invalidate` is called.
 */
export class SecurityConfigProvider {
  private readonly overrides: SecurityConfigOverrides;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly filters: SecurityConfigFilter[] = [];
  private cached?: { config: SecurityConfig; expiresAtMs: number };

  constructor(input: { overrides?: SecurityConfigOverrides; ttlMs?: number; now?: () => number } = {}) {
    this.overrides = input.overrides ?? {};
    this.ttlMs = input.ttlMs ?? 0;
    this.now = input.now ?? Date.now;
  }

  get(): SecurityConfig {
    const nowMs = this.now();
    if (this.cached && this.cached.expiresAtMs > nowMs) {
      return this.cached.config;
    }

    const config = this.filters.reduce(
      (current, filter) => filter(current),
      createSecurityConfig(this.overrides)
    );
    this.cached = { config, expiresAtMs: nowMs + this.ttlMs };
    return config;
  }

  /**
   * @returns A function that removes the filter again
   */
  addFilter(filter: SecurityConfigFilter): () => void {
    this.filters.push(filter);
    this.invalidate();
    return () => {
      const index = this.filters.indexOf(filter);
      if (index >= 0) {
        this.filters.splice(index, 1);
      }
      this.invalidate();
    };
  }

  invalidate(): void {
    this.cached = undefined;
  }
}

export function createSecurityConfigProvider(config: ApiConfig): SecurityConfigProvider {
  return new SecurityConfigProvider({
    ttlMs: config.securityConfigTtlMs,
    overrides: {
      maxCodeLength: config.maxCodeLength,
      maxExecutionSeconds: config.maxExecutionSeconds,
      maxMemoryBytes: config.maxMemoryBytes,
      enableSyntaxCheck: config.syntaxCheck,
      enableExecutionLog: config.snippetDebug,
      addBlockedFunctions: config.blockedFunctionsAdd,
      removeBlockedFunctions: config.blockedFunctionsRemove
    }
  });
}
