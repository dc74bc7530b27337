import { RuntimeTrapError, scrubPaths, TimeoutError, type RuntimeTrapKind } from "@shortexec/core";

export const SNIPPET_FILENAME = "snippet";

export const TIMEOUT_ERROR_CODE = "ERR_SCRIPT_EXECUTION_TIMEOUT";
export const OUT_OF_MEMORY_ERROR_CODE = "ERR_WORKER_OUT_OF_MEMORY";
export const NEVER_SETTLED_MESSAGE = "Returned promise never settled";

const ENGINE_ERROR_NAMES = new Set(["TypeError", "ReferenceError", "RangeError", "EvalError", "URIError"]);

/**
 * Plain description of a failure. Every field is a primitive so it crosses realms and worker boundaries.
 */
export type SnippetFailure = {
  name: string;
  message: string;
  stack: string;
  code?: string;
};

/**
 * Host callbacks handed to the bootstrap. The snippet never gets a reference to this object.
 */
export type SandboxHost = {
  write: (chunk: string) => void;
  done: (text: string) => void;
  fail: (name: string, message: string, stack: string) => void;
};

export const RUN_GLOBAL = "__runSnippet";

/** Source that starts the armed snippet; run with the wall-clock timeout. */
export const RUN_SOURCE = `${RUN_GLOBAL}();`;

/*
 * Runs inside the evaluation context before the snippet. Every binding the snippet sees is
 * created here, in the context's own realm, so none of them leads back to a host constructor.
 * Built-ins are captured up front because the snippet may overwrite the globals.
 *
 * Returns `arm(body)`. Arming installs a one-shot runner global that removes itself before
 * calling the body, so the settle and fail closures stay out of the snippet's reach.
 */
export const BOOTSTRAP_SOURCE = `(function (host, attributesJson, content, tag) {
  "use strict";
  var toString = String;
  var resolve = Promise.resolve.bind(Promise);
  var defineProperty = Object.defineProperty;
  var freeze = Object.freeze;
  var parse = JSON.parse;
  var global = globalThis;
  var toText = function (value) {
    if (value === undefined || value === null) {
      return "";
    }
    return typeof value === "string" ? value : toString(value);
  };
  var join = function (args) {
    var parts = [];
    for (var i = 0; i < args.length; i += 1) {
      parts.push(toText(args[i]));
    }
    return parts.join(" ");
  };
  var fail = function (error) {
    var name = "";
    var message = "";
    var stack = "";
    try {
      if (error !== null && (typeof error === "object" || typeof error === "function")) {
        name = toText(error.name);
        message = toText(error.message);
        stack = toText(error.stack);
      } else {
        message = toText(error);
      }
    } catch (describeError) {
      message = "Unprintable error";
    }
    host.fail(name, message, stack);
  };
  var settle = function (value) {
    if (value !== null && (typeof value === "object" || typeof value === "function") && typeof value.then === "function") {
      resolve(value).then(function (resolved) {
        host.done(toText(resolved));
      }, fail);
      return;
    }
    host.done(toText(value));
  };
  var log = function () {
    host.write(join(arguments) + "\\n");
  };
  var define = function (name, value) {
    defineProperty(global, name, { value: value, enumerable: false, writable: false, configurable: false });
  };
  define("attributes", freeze(parse(attributesJson)));
  define("content", content);
  define("tag", tag);
  define("print", function () {
    host.write(join(arguments));
  });
  define("console", freeze({ log: log, info: log, warn: log, error: log, debug: log }));
  return function (body) {
    defineProperty(global, "${RUN_GLOBAL}", {
      enumerable: false,
      writable: false,
      configurable: true,
      value: function () {
        delete global.${RUN_GLOBAL};
        var value;
        try {
          value = body();
        } catch (error) {
          fail(error);
          return;
        }
        settle(value);
      }
    });
  };
})`;

/**
 * Wall-clock budget in milliseconds, or `undefined` when the time limit is unbounded.
 */
export function toTimeoutMs(timeLimitSeconds: number): number | undefined {
  if (!Number.isFinite(timeLimitSeconds) || timeLimitSeconds <= 0) {
    return undefined;
  }
  return Math.max(1, Math.round(timeLimitSeconds * 1000));
}

function readText(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : undefined;
}

/**
 * Errors raised while a context runs may come from the context's realm, so fields are read
 * structurally rather than through `instanceof Error`.
 */
export function describeHostError(error: unknown): SnippetFailure {
  if (typeof error === "object" && error !== null) {
    return {
      name: readText(error, "name") ?? "",
      message: readText(error, "message") ?? "",
      stack: readText(error, "stack") ?? "",
      code: readText(error, "code")
    };
  }

  return { name: "", message: String(error), stack: "" };
}

function failureLine(failure: SnippetFailure): number | undefined {
  const match = new RegExp(`\\b${SNIPPET_FILENAME}:(\\d+)`).exec(failure.stack);
  if (!match) {
    return undefined;
  }
  const line = Number.parseInt(match[1], 10);
  return line > 0 ? line : undefined;
}

function trapKind(failure: SnippetFailure): RuntimeTrapKind {
  if (failure.name === "SyntaxError") {
    return "parse_error";
  }
  if (ENGINE_ERROR_NAMES.has(failure.name)) {
    return "fatal_error";
  }
  return "exception";
}

/**
 * Classify a failure by error name and code. Classification never relies on `instanceof`:
 * errors thrown by the snippet belong to another realm.
 */
export function toRuntimeTrap(failure: SnippetFailure, timeoutMs: number | undefined): RuntimeTrapError {
  if (failure.code === TIMEOUT_ERROR_CODE) {
    return new TimeoutError(timeoutMs ?? 0);
  }

  if (failure.code === OUT_OF_MEMORY_ERROR_CODE) {
    return new RuntimeTrapError("fatal_error", "Allowed memory limit exhausted");
  }

  const message = scrubPaths(failure.message);
  const details = failure.name && message ? `${failure.name}: ${message}` : failure.name || message || "Unknown error";
  return new RuntimeTrapError(trapKind(failure), details, failureLine(failure));
}
