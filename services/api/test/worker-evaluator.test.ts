import { RuntimeTrapError } from "@shortexec/core";
import { afterAll, describe, expect, it } from "vitest";
import type { EvaluationRequest } from "../src/services/evaluator";
import { toHeapMb, WorkerEvaluator } from "../src/services/worker-evaluator";

const MiB = 1024 * 1024;
const evaluator = new WorkerEvaluator({ terminateGraceMs: 500 });

afterAll(async () => {
  await evaluator.close();
});

function request(code: string, overrides: Partial<EvaluationRequest> = {}): EvaluationRequest {
  return {
    code,
    bindings: { attributes: { name: "Ada" }, content: "", tag: "greet" },
    limits: { memoryLimitBytes: 64 * MiB, timeLimitSeconds: 2 },
    ...overrides
  };
}

async function trapOf(promise: Promise<unknown>): Promise<RuntimeTrapError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof RuntimeTrapError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected evaluation to fail");
}

describe("toHeapMb", () => {
  it("derives the worker heap ceiling from the memory limit", () => {
    expect(toHeapMb(64 * MiB)).toBe(64);
    expect(toHeapMb(8 * MiB)).toBe(8);
    expect(toHeapMb(512 * 1024)).toBe(0.5);
    expect(toHeapMb(Number.POSITIVE_INFINITY)).toBeUndefined();
    expect(toHeapMb(0)).toBeUndefined();
  });
});

describe("WorkerEvaluator", () => {
  it("evaluates a snippet in a worker thread", async () => {
    const result = await evaluator.evaluate(request('print("a"); return "Hello, " + attributes.name;'));
    expect(result).toEqual({ value: "Hello, Ada", stdout: "a" });
  });

  it("streams output to the live sink", async () => {
    const chunks: string[] = [];
    const result = await evaluator.evaluate(
      request('console.log("one"); return "two";', {
        onOutput: (chunk) => {
          chunks.push(chunk);
        }
      })
    );
    expect(chunks).toEqual(["one\n"]);
    expect(result).toEqual({ value: "two", stdout: "" });
  });

  it("reports thrown errors", async () => {
    const trap = await trapOf(evaluator.evaluate(request('throw new TypeError("bad input");')));
    expect(trap.kind).toBe("fatal_error");
    expect(trap.details).toBe("TypeError: bad input");
  });

  it("reports a throw that follows an attempt to settle early", async () => {
    const trap = await trapOf(
      evaluator.evaluate(request('if (typeof __settle === "function") { __settle("ok"); }\nthrow new Error("boom");'))
    );
    expect(trap.kind).toBe("exception");
    expect(trap.details).toBe("Error: boom");
  });

  it("fails a returned promise that never settles", async () => {
    const trap = await trapOf(evaluator.evaluate(request("return new Promise(function () {});")));
    expect(trap.kind).toBe("exception");
  });

  it("stops a snippet that runs past the time limit", async () => {
    const trap = await trapOf(
      evaluator.evaluate(request("while (true) {}", { limits: { memoryLimitBytes: 64 * MiB, timeLimitSeconds: 0.1 } }))
    );
    expect(trap.kind).toBe("timeout");
    expect(trap.details).toBe("Execution exceeded 100ms");
  });

  it("stops a snippet that exhausts its heap", async () => {
    const trap = await trapOf(
      evaluator.evaluate(
        request("var chunks = []; while (true) { chunks.push(new Array(100000).fill(chunks.length)); }", {
          limits: { memoryLimitBytes: 16 * MiB, timeLimitSeconds: 10 }
        })
      )
    );
    expect(trap.kind).toBe("fatal_error");
  }, 20_000);
});
