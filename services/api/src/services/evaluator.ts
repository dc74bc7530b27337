import { compileFunction, createContext, Script } from "node:vm";
import { RuntimeTrapError } from "@shortexec/core";
import type { EvaluatorDriver } from "../config";
import type { ResourceLimits } from "../lib/resource-limits";
import {
  BOOTSTRAP_SOURCE,
  describeHostError,
  NEVER_SETTLED_MESSAGE,
  RUN_SOURCE,
  SNIPPET_FILENAME,
  toRuntimeTrap,
  toTimeoutMs,
  type SandboxHost,
  type SnippetFailure
} from "../lib/sandbox";
import { WorkerEvaluator } from "./worker-evaluator";

export type EvaluationBindings = {
  attributes: Readonly<Record<string, string>>;
  content: string;
  tag: string;
};

export type EvaluationRequest = {
  code: string;
  bindings: EvaluationBindings;
  limits: ResourceLimits;
  /** Receives output as it is written. When absent, output is collected into `stdout`. */
  onOutput?: (chunk: string) => void;
};

export type EvaluationResult = {
  /** Text form of the returned value; `""` for `undefined` and `null`. */
  value: string;
  stdout: string;
};

/**
 * Runs one snippet body. Rejects with a `RuntimeTrapError` for every failure class.
 */
export interface Evaluator {
  evaluate(request: EvaluationRequest): Promise<EvaluationResult>;
  close(): Promise<void>;
}

type Settlement = { value: string } | { failure: SnippetFailure };

export function createEvaluationContext(tag: string) {
  return createContext(
    {},
    {
      name: `snippet:${tag}`,
      codeGeneration: { strings: false, wasm: false },
      microtaskMode: "afterEvaluate"
    }
  );
}

/**
 * In-process evaluator on `node:vm`. Enforces the wall-clock limit; the memory limit is
 * advisory here because the context shares the host heap.
 */
export class VmEvaluator implements Evaluator {
  async evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const timeoutMs = toTimeoutMs(request.limits.timeLimitSeconds);
    const chunks: string[] = [];
    const state: { settlement?: Settlement } = {};
    const host: SandboxHost = {
      write: (chunk) => {
        if (request.onOutput) {
          request.onOutput(chunk);
          return;
        }
        chunks.push(chunk);
      },
      done: (text) => {
        state.settlement ??= { value: text };
      },
      fail: (name, message, stack) => {
        state.settlement ??= { failure: { name, message, stack } };
      }
    };

    const context = createEvaluationContext(request.bindings.tag);
    const install: unknown = new Script(BOOTSTRAP_SOURCE).runInContext(context);
    if (typeof install !== "function") {
      throw new RuntimeTrapError("fatal_error", "Evaluation context could not be prepared");
    }
    const arm: unknown = Reflect.apply(install, undefined, [
      host,
      JSON.stringify(request.bindings.attributes),
      request.bindings.content,
      request.bindings.tag
    ]);
    if (typeof arm !== "function") {
      throw new RuntimeTrapError("fatal_error", "Evaluation context could not be prepared");
    }

    try {
      const body = compileFunction(request.code, [], { filename: SNIPPET_FILENAME, parsingContext: context });
      Reflect.apply(arm, undefined, [body]);
      new Script(RUN_SOURCE).runInContext(context, timeoutMs === undefined ? {} : { timeout: timeoutMs });
    } catch (error) {
      throw toRuntimeTrap(describeHostError(error), timeoutMs);
    }

    const settlement = state.settlement;
    if (!settlement) {
      throw new RuntimeTrapError("exception", NEVER_SETTLED_MESSAGE);
    }
    if ("failure" in settlement) {
      throw toRuntimeTrap(settlement.failure, timeoutMs);
    }

    return { value: settlement.value, stdout: chunks.join("") };
  }

  async close(): Promise<void> {}
}

export function createEvaluator(driver: EvaluatorDriver): Evaluator {
  if (driver === "vm") {
    return new VmEvaluator();
  }

  return new WorkerEvaluator();
}
