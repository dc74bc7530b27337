import { describe, expect, it } from "vitest";
import { createSecurityConfigProvider, SecurityConfigProvider } from "../src/services/security-config";
import { createTestConfig } from "./helpers/fakes";

describe("SecurityConfigProvider", () => {
  it("caches the built config for the configured TTL", () => {
    let nowMs = 1_000;
    const provider = new SecurityConfigProvider({ overrides: { maxExecutionSeconds: 3 }, ttlMs: 500, now: () => nowMs });

    const first = provider.get();
    nowMs += 499;
    expect(provider.get()).toBe(first);

    nowMs += 1;
    const rebuilt = provider.get();
    expect(rebuilt).not.toBe(first);
    expect(rebuilt).toEqual(first);
    expect(rebuilt.maxExecutionSeconds).toBe(3);
  });

  it("applies filters in order and drops them again", () => {
    const provider = new SecurityConfigProvider({ overrides: { maxExecutionSeconds: 3 }, ttlMs: 60_000 });
    expect(provider.get().maxExecutionSeconds).toBe(3);

    const removeFirst = provider.addFilter((config) => ({ ...config, maxExecutionSeconds: 1 }));
    provider.addFilter((config) => ({ ...config, maxExecutionSeconds: config.maxExecutionSeconds * 10 }));
    expect(provider.get().maxExecutionSeconds).toBe(10);

    removeFirst();
    expect(provider.get().maxExecutionSeconds).toBe(30);
  });

  it("builds from the service configuration", () => {
    const provider = createSecurityConfigProvider({
      ...createTestConfig(),
      blockedFunctionsAdd: ["shellOut"],
      blockedFunctionsRemove: ["EXEC"],
      syntaxCheck: false
    });

    const config = provider.get();
    expect(config.blockedFunctions).toContain("shellOut");
    expect(config.blockedFunctions).not.toContain("exec");
    expect(config.blockedFunctions).toContain("execSync");
    expect(config.enableSyntaxCheck).toBe(false);
    expect(config.enableExecutionLog).toBe(true);
    expect(config.maxExecutionSeconds).toBe(2);
    expect(config.maxCodeLength).toBe(10_000);
  });
});
