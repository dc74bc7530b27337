import { createContext, Script } from "node:vm";
import { RuntimeTrapError, TimeoutError } from "@shortexec/core";
import { describe, expect, it } from "vitest";
import {
  describeHostError,
  OUT_OF_MEMORY_ERROR_CODE,
  TIMEOUT_ERROR_CODE,
  toRuntimeTrap,
  toTimeoutMs
} from "../src/lib/sandbox";

function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error("expected a throw");
}

describe("describeHostError", () => {
  it("keeps the timeout code of an error raised from another realm", () => {
    const context = createContext({}, { microtaskMode: "afterEvaluate" });
    const error = thrownBy(() => new Script("while (true) {}").runInContext(context, { timeout: 20 }));

    const failure = describeHostError(error);
    expect(failure.code).toBe(TIMEOUT_ERROR_CODE);
    expect(toRuntimeTrap(failure, 20).kind).toBe("timeout");
  });

  it("reads fields from error-shaped objects of any realm", () => {
    const foreign = new Script('var e = new RangeError("too deep"); e.code = "E_DEEP"; e').runInContext(createContext({}));
    const failure = describeHostError(foreign);
    expect(failure.name).toBe("RangeError");
    expect(failure.message).toBe("too deep");
    expect(failure.code).toBe("E_DEEP");
  });

  it("describes primitive throws by their text", () => {
    expect(describeHostError("boom")).toEqual({ name: "", message: "boom", stack: "" });
  });
});

describe("toTimeoutMs", () => {
  it("treats zero, negative and non-finite limits as unbounded", () => {
    expect(toTimeoutMs(0)).toBeUndefined();
    expect(toTimeoutMs(-1)).toBeUndefined();
    expect(toTimeoutMs(Number.POSITIVE_INFINITY)).toBeUndefined();
  });

  it("converts seconds to whole milliseconds with a floor of 1", () => {
    expect(toTimeoutMs(1.5)).toBe(1500);
    expect(toTimeoutMs(0.0001)).toBe(1);
  });
});

describe("toRuntimeTrap", () => {
  it("maps the engine timeout code to a timeout trap", () => {
    const trap = toRuntimeTrap({ name: "Error", message: "Script execution timed out.", stack: "", code: TIMEOUT_ERROR_CODE }, 250);
    expect(trap).toBeInstanceOf(TimeoutError);
    expect(trap.kind).toBe("timeout");
    expect(trap.details).toBe("Execution exceeded 250ms");
  });

  it("maps heap exhaustion to a fatal error", () => {
    const trap = toRuntimeTrap({ name: "Error", message: "worker ran out of memory", stack: "", code: OUT_OF_MEMORY_ERROR_CODE }, undefined);
    expect(trap.kind).toBe("fatal_error");
    expect(trap.details).toBe("Allowed memory limit exhausted");
  });

  it("classifies by error name and reports the snippet line", () => {
    const parse = toRuntimeTrap({ name: "SyntaxError", message: "Unexpected token '}'", stack: "snippet:3\n}\n^" }, 1000);
    expect(parse).toBeInstanceOf(RuntimeTrapError);
    expect(parse.kind).toBe("parse_error");
    expect(parse.details).toBe("SyntaxError: Unexpected token '}'");
    expect(parse.line).toBe(3);

    const fatal = toRuntimeTrap({ name: "TypeError", message: "x is not a function", stack: "TypeError\n    at snippet:2:5" }, 1000);
    expect(fatal.kind).toBe("fatal_error");
    expect(fatal.line).toBe(2);

    const thrown = toRuntimeTrap({ name: "", message: "boom", stack: "" }, 1000);
    expect(thrown.kind).toBe("exception");
    expect(thrown.details).toBe("boom");
    expect(thrown.line).toBeUndefined();
  });

  it("scrubs host paths from messages", () => {
    const trap = toRuntimeTrap({ name: "Error", message: "Cannot open /srv/app/secret.js:10", stack: "" }, 1000);
    expect(trap.kind).toBe("exception");
    expect(trap.details).toBe("Error: Cannot open [path]");
  });

  it("falls back to a generic description", () => {
    expect(toRuntimeTrap({ name: "", message: "", stack: "" }, 1000).details).toBe("Unknown error");
    expect(toRuntimeTrap({ name: "RangeError", message: "", stack: "" }, 1000).details).toBe("RangeError");
  });
});
