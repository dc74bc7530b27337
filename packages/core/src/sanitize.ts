import { compileFunction, createContext } from "node:vm";
import { DEFAULT_SECURITY_CONFIG } from "./security-config";
import type { CodeRejection, SanitizeResult, SecurityConfig } from "./types";

/*
 * Static gate in front of the evaluator. Pattern matching cannot be sound against a
 * Turing-complete language: a call name assembled from strings at run time walks straight
 * past it. It is one layer only; the real boundary is that authoring snippets requires the
 * administrative role.
 */

export const SNIPPET_BINDINGS = ["attributes", "content", "tag", "print", "console"] as const;

const OPEN_MARKER = /^\s*<\?js\s*/i;
const CLOSE_MARKER = /\s*\?>\s*$/;

export type DangerousPattern = {
  pattern: RegExp;
  description: string;
};

export const DANGEROUS_PATTERNS: readonly DangerousPattern[] = [
  { pattern: /(?<![.\w$])process\s*[.[]/, description: "Direct process/environment access" },
  { pattern: /\beval\s*\(/, description: "Nested eval() calls" },
  { pattern: /\bFunction\s*\(/, description: "Dynamic function construction" },
  { pattern: /\bglobalThis\b/, description: "Direct global object access" },
  { pattern: /(?<![.\w$])global\s*[.[]/, description: "Direct global object access" },
  { pattern: /\bwith\s*\(/, description: "Scope extraction (with statement)" },
  { pattern: /\.\s*constructor\s*\.\s*constructor\b|\bconstructor\s*\[/, description: "Constructor chain access" },
  { pattern: /\b__proto__\b/, description: "Prototype tampering" },
  { pattern: /\bthis\s*\[/, description: "Computed scope lookup" },
  { pattern: /(?<![.\w$])require\s*\(/, description: "Module requirement" },
  { pattern: /\bmodule\s*\.\s*require\s*\(/, description: "Module requirement (module.require)" },
  { pattern: /\bimport\s*\(/, description: "Dynamic module import" },
  { pattern: /^\s*import\s+[\w$*{"']/m, description: "Static module import" }
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function reject(rejection: CodeRejection): SanitizeResult {
  return { ok: false, rejection };
}

/**
 * Remove host paths and `file:line` locations from an engine error message.
 */
export function scrubPaths(message: string): string {
  return message
    .replace(/\s+in\s+\S+\s+on line/g, " on line")
    .replace(/(?:file:\/\/)?(?:[A-Za-z]:)?(?:[\\/][\w.@-]+){2,}(?::\d+)*/g, "[path]")
    .trim();
}

/**
 * Find the first configured blocked function called directly in `code`.
 *
 * Matching is case-insensitive and anchored on a word boundary, so `systemic(` does not hit `system`.
 */
export function findBlockedFunction(code: string, blockedFunctions: readonly string[]): string | null {
  for (const name of blockedFunctions) {
    if (new RegExp(`\\b${escapeRegExp(name)}\\s*\\(`, "i").test(code)) {
      return name;
    }
  }

  return null;
}

export function findDangerousPattern(code: string): DangerousPattern | null {
  return DANGEROUS_PATTERNS.find(({ pattern }) => pattern.test(code)) ?? null;
}

/**
 * Parse the body without running it.
 *
 * @returns The scrubbed parser message, or `null` when the body compiles
 */
export function checkSnippetSyntax(code: string): string | null {
  try {
    compileFunction(code, [...SNIPPET_BINDINGS], { parsingContext: createContext({}) });
    return null;
  } catch (error) {
    if (error && typeof error === "object" && "message" in error && typeof error.message === "string") {
      return scrubPaths(error.message);
    }
    return scrubPaths(String(error));
  }
}

function normalizeLineEndings(code: string): string {
  return code.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
}

/**
 * Validate stored or submitted snippet code and return the body the evaluator should run.
 *
 * @param raw - Code as received; anything but a string is rejected with `invalid_type`
 * @param config - Limits and blocklist in force; defaults to the compiled-in config
 * @returns The cleaned body, or the first rejection hit. Whitespace-only input yields `""`.
 */
export function sanitizeSnippetCode(raw: unknown, config: SecurityConfig = DEFAULT_SECURITY_CONFIG): SanitizeResult {
  if (typeof raw !== "string") {
    return reject({ kind: "invalid_type", message: "Code must be a string." });
  }

  if (raw.trim() === "") {
    return { ok: true, code: "" };
  }

  const code = raw.replace(OPEN_MARKER, "").replace(CLOSE_MARKER, "");

  if (Buffer.byteLength(code, "utf8") > config.maxCodeLength) {
    return reject({
      kind: "too_long",
      message: `Code exceeds maximum length of ${config.maxCodeLength} bytes.`
    });
  }

  const blocked = findBlockedFunction(code, config.blockedFunctions);
  if (blocked) {
    return reject({
      kind: "blocked_function",
      message: `Blocked function detected: ${blocked}`,
      functionName: blocked
    });
  }

  const dangerous = findDangerousPattern(code);
  if (dangerous) {
    return reject({
      kind: "dangerous_pattern",
      message: `Dangerous code pattern detected: ${dangerous.description}`,
      pattern: dangerous.description
    });
  }

  if (config.enableSyntaxCheck) {
    const syntaxError = checkSnippetSyntax(code);
    if (syntaxError !== null) {
      return reject({ kind: "syntax_error", message: `Syntax error: ${syntaxError}` });
    }
  }

  return { ok: true, code: normalizeLineEndings(code) };
}
