import { AsyncLocalStorage } from "node:async_hooks";
import { effectiveMemoryLimit, type SecurityConfig } from "@shortexec/core";

export type ResourceLimits = {
  /** `Infinity` when unbounded. */
  memoryLimitBytes: number;
  /** `0` when unbounded. */
  timeLimitSeconds: number;
};

/**
 * Process-wide resource limits plus per-invocation overrides.
 *
 * Overrides live in an async-local scope, so concurrent invocations never see each other's
 * limits and the previous values come back on every exit path of the scoped function.
 */
export class RuntimeLimits {
  private readonly scope = new AsyncLocalStorage<ResourceLimits>();
  private active = 0;

  constructor(private readonly ambient: ResourceLimits) {}

  current(): ResourceLimits {
    return this.scope.getStore() ?? this.ambient;
  }

  activeScopes(): number {
    return this.active;
  }

  /**
   * Run `fn` under limits derived from `config`. Memory can only be lowered relative to the
   * limits in force; the time limit is replaced unconditionally.
   */
  async withResourceLimits<T>(
    config: Pick<SecurityConfig, "maxMemoryBytes" | "maxExecutionSeconds">,
    fn: (limits: ResourceLimits) => Promise<T>
  ): Promise<T> {
    const previous = this.current();
    const limits: ResourceLimits = {
      memoryLimitBytes: effectiveMemoryLimit(previous.memoryLimitBytes, config.maxMemoryBytes),
      timeLimitSeconds: config.maxExecutionSeconds
    };

    this.active += 1;
    try {
      return await this.scope.run(limits, () => fn(limits));
    } finally {
      this.active -= 1;
    }
  }
}
