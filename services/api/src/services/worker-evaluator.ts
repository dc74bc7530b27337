import { Worker } from "node:worker_threads";
import { RuntimeTrapError, TimeoutError } from "@shortexec/core";
import { z } from "zod";
import { formatErrorForLog, logError } from "../lib/log";
import {
  BOOTSTRAP_SOURCE,
  describeHostError,
  NEVER_SETTLED_MESSAGE,
  RUN_SOURCE,
  SNIPPET_FILENAME,
  toRuntimeTrap,
  toTimeoutMs
} from "../lib/sandbox";
import type { EvaluationRequest, EvaluationResult, Evaluator } from "./evaluator";

const MiB = 1024 * 1024;
const DEFAULT_TERMINATE_GRACE_MS = 1000;
const MAX_TIMER_DELAY_MS = 2_147_483_647;

const WORKER_SOURCE = `
const { parentPort, workerData } = require("node:worker_threads");
const { compileFunction, createContext, Script } = require("node:vm");

let settled = false;
const text = (error, key) => (typeof error[key] === "string" ? error[key] : undefined);
const describe = (error) =>
  typeof error === "object" && error !== null
    ? { name: text(error, "name") || "", message: text(error, "message") || "", stack: text(error, "stack") || "", code: text(error, "code") }
    : { name: "", message: String(error), stack: "" };
const post = (message) => parentPort.postMessage(message);
const host = {
  write: (chunk) => post({ type: "output", chunk }),
  done: (value) => {
    if (!settled) {
      settled = true;
      post({ type: "result", value });
    }
  },
  fail: (name, message, stack) => {
    if (!settled) {
      settled = true;
      post({ type: "failure", failure: { name, message, stack } });
    }
  }
};

try {
  const context = createContext({}, {
    name: workerData.contextName,
    codeGeneration: { strings: false, wasm: false },
    microtaskMode: "afterEvaluate"
  });
  const arm = new Script(workerData.bootstrap).runInContext(context)(host, workerData.attributesJson, workerData.content, workerData.tag);
  arm(compileFunction(workerData.code, [], { filename: workerData.filename, parsingContext: context }));
  new Script(workerData.run).runInContext(context, workerData.timeoutMs ? { timeout: workerData.timeoutMs } : {});
  if (!settled) {
    post({ type: "unsettled" });
  }
} catch (error) {
  settled = true;
  post({ type: "failure", failure: describe(error) });
}
`;

const workerMessageSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("output"), chunk: z.string() }),
  z.object({ type: z.literal("result"), value: z.string() }),
  z.object({
    type: z.literal("failure"),
    failure: z.object({
      name: z.string(),
      message: z.string(),
      stack: z.string(),
      code: z.string().optional()
    })
  }),
  z.object({ type: z.literal("unsettled") })
]);

/**
 * Old-generation heap ceiling in MiB for the worker. Fractional values are passed through as is,
 * so the ceiling never exceeds the effective memory limit.
 */
export function toHeapMb(memoryLimitBytes: number): number | undefined {
  if (!Number.isFinite(memoryLimitBytes) || memoryLimitBytes <= 0) {
    return undefined;
  }
  return memoryLimitBytes / MiB;
}

/**
 * Evaluates each snippet in a fresh worker thread. The memory limit becomes the worker's
 * old-generation heap ceiling; the time limit is enforced by `vm` inside the worker, with
 * termination from the host as a backstop.
 */
export class WorkerEvaluator implements Evaluator {
  private readonly running = new Set<Worker>();
  private readonly terminateGraceMs: number;

  constructor(input: { terminateGraceMs?: number } = {}) {
    this.terminateGraceMs = input.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
  }

  evaluate(request: EvaluationRequest): Promise<EvaluationResult> {
    const timeoutMs = toTimeoutMs(request.limits.timeLimitSeconds);
    const heapMb = toHeapMb(request.limits.memoryLimitBytes);

    return new Promise<EvaluationResult>((resolve, reject) => {
      const chunks: string[] = [];
      const worker = new Worker(WORKER_SOURCE, {
        eval: true,
        workerData: {
          contextName: `snippet:${request.bindings.tag}`,
          bootstrap: BOOTSTRAP_SOURCE,
          code: request.code,
          run: RUN_SOURCE,
          filename: SNIPPET_FILENAME,
          timeoutMs,
          attributesJson: JSON.stringify(request.bindings.attributes),
          content: request.bindings.content,
          tag: request.bindings.tag
        },
        ...(heapMb === undefined ? {} : { resourceLimits: { maxOldGenerationSizeMb: heapMb } })
      });
      this.running.add(worker);

      let finished = false;
      const backstop =
        timeoutMs === undefined
          ? undefined
          : setTimeout(() => {
              finish(() => reject(new TimeoutError(timeoutMs)));
            }, Math.min(timeoutMs + this.terminateGraceMs, MAX_TIMER_DELAY_MS));

      const finish = (settle: () => void): void => {
        if (finished) {
          return;
        }
        finished = true;
        clearTimeout(backstop);
        this.running.delete(worker);
        this.terminate(worker);
        settle();
      };

      worker.on("message", (raw: unknown) => {
        const parsed = workerMessageSchema.safeParse(raw);
        if (!parsed.success) {
          finish(() => reject(new RuntimeTrapError("fatal_error", "Evaluator sent a malformed message")));
          return;
        }

        const message = parsed.data;
        switch (message.type) {
          case "output":
            if (request.onOutput) {
              request.onOutput(message.chunk);
            } else {
              chunks.push(message.chunk);
            }
            return;
          case "result":
            finish(() => resolve({ value: message.value, stdout: chunks.join("") }));
            return;
          case "failure":
            finish(() => reject(toRuntimeTrap(message.failure, timeoutMs)));
            return;
          case "unsettled":
            finish(() => reject(new RuntimeTrapError("exception", NEVER_SETTLED_MESSAGE)));
            return;
        }
      });

      worker.on("error", (error) => {
        finish(() => reject(toRuntimeTrap(describeHostError(error), timeoutMs)));
      });

      worker.on("exit", (exitCode) => {
        finish(() => reject(new RuntimeTrapError("fatal_error", `Evaluator exited with code ${exitCode}`)));
      });
    });
  }

  async close(): Promise<void> {
    const workers = [...this.running];
    this.running.clear();
    await Promise.allSettled(workers.map((worker) => worker.terminate()));
  }

  private terminate(worker: Worker): void {
    worker.terminate().catch((error: unknown) => {
      logError("snippet.evaluator.terminate_failed", { error: formatErrorForLog(error) });
    });
  }
}
