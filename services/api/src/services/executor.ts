import {
  authorCan,
  authorize,
  isPrivileged,
  RuntimeTrapError,
  sanitizeSnippetCode,
  stripEvaluationMarkers,
  validateSnippetName,
  type Actor,
  type ExecutionResult,
  type ExecutionStatus,
  type ExecutionSurface,
  type Invocation,
  type SnippetParameters
} from "@shortexec/core";
import { formatErrorForLog, logError } from "../lib/log";
import { accessDeniedMessage, errorMessage, restrictedMessage, trapDetails } from "../lib/messages";
import type { RuntimeLimits } from "../lib/resource-limits";
import type { AuditContext, AuditLogger } from "./audit";
import type { Evaluator } from "./evaluator";
import type { SnippetRegistry } from "./registry";
import type { SecurityConfigProvider } from "./security-config";

const SUCCESS_MESSAGE = "Executed successfully";
const INTERNAL_FAILURE_DETAILS = "Internal error";

type FlaggedSurface = Extract<ExecutionSurface, "widget" | "excerpt" | "comment" | "feed">;

// Each of these surfaces runs snippets only while the settings flag of the same name is on.
const FLAGGED_SURFACES: ReadonlySet<ExecutionSurface> = new Set<ExecutionSurface>(["widget", "excerpt", "comment", "feed"]);

function isFlaggedSurface(surface: ExecutionSurface): surface is FlaggedSurface {
  return FLAGGED_SURFACES.has(surface);
}

export type ExecuteRequest = {
  invocation: Invocation;
  /** Who is viewing the rendered content. */
  actor: Actor;
  /** Author of the content that embeds the tag, when known. */
  author?: Actor;
  client?: { ip?: string; uri?: string };
  /** Receives output of unbuffered snippets as it is written. Without it that output is dropped. */
  onLiveOutput?: (chunk: string) => void;
};

export type SnippetExecutorDependencies = {
  registry: SnippetRegistry;
  securityConfig: SecurityConfigProvider;
  evaluator: Evaluator;
  limits: RuntimeLimits;
  audit: AuditLogger;
};

type Terminal = {
  status: ExecutionStatus;
  output: string;
  message: string;
  context?: AuditContext;
};

function outcomeOf(status: ExecutionStatus): ExecutionResult["outcome"] {
  switch (status) {
    case "success":
      return "completed";
    case "not_found":
    case "disabled":
    case "empty_code":
    case "access_denied":
    case "context_restricted":
      return "blocked";
    default:
      return "failed";
  }
}

/**
 * Drives one invocation from name validation to its terminal state.
 *
 * `execute` never rejects. Every invocation ends in exactly one audit record, and the
 * resource limits in force before the call are back in force after it.
 */
export class SnippetExecutor {
  constructor(private readonly deps: SnippetExecutorDependencies) {}

  async execute(request: ExecuteRequest): Promise<ExecutionResult> {
    const startedAt = performance.now();
    const name = request.invocation.tag;

    let terminal: Terminal;
    try {
      terminal = await this.run(request);
    } catch (error) {
      logError("snippet.execution.unexpected", { name, error: formatErrorForLog(error) });
      terminal = {
        status: "exception",
        output: errorMessage(name, "exception", isPrivileged(request.actor), trapDetails("exception", INTERNAL_FAILURE_DETAILS)),
        message: trapDetails("exception", INTERNAL_FAILURE_DETAILS)
      };
    }

    this.deps.audit.record(name, terminal.status, terminal.message, {
      surface: request.invocation.surface,
      actorId: request.actor.id ?? null,
      authenticated: request.actor.authenticated,
      attributes: request.invocation.attributes,
      ip: request.client?.ip ?? null,
      uri: request.client?.uri ?? null,
      executionTimeMs: Math.round((performance.now() - startedAt) * 1000) / 1000,
      ...terminal.context
    });

    return {
      outcome: outcomeOf(terminal.status),
      status: terminal.status,
      output: terminal.output,
      message: terminal.message
    };
  }

  /**
   * Text to splice into content in place of the invocation.
   */
  async invoke(request: ExecuteRequest): Promise<string> {
    const result = await this.execute(request);
    return result.output;
  }

  private async run(request: ExecuteRequest): Promise<Terminal> {
    const { invocation, actor } = request;
    const name = invocation.tag;
    const privileged = isPrivileged(actor);

    if (!validateSnippetName(name)) {
      return {
        status: "invalid_name",
        output: errorMessage(name, "invalid_name", privileged),
        message: "Invalid snippet name format"
      };
    }

    const snippet = await this.deps.registry.get(name);
    if (!snippet) {
      return { status: "not_found", output: errorMessage(name, "not_found", privileged), message: "Snippet not found" };
    }
    if (!snippet.enabled) {
      return { status: "disabled", output: errorMessage(name, "disabled", privileged), message: "Snippet is disabled" };
    }
    if (snippet.code.trim() === "") {
      return {
        status: "empty_code",
        output: errorMessage(name, "empty_code", privileged),
        message: "Snippet has no code defined"
      };
    }

    if (!authorize(actor, "execute", { snippetName: name })) {
      return { status: "access_denied", output: accessDeniedMessage(name), message: "Access denied" };
    }

    const settings = await this.deps.registry.getSettings();
    if (request.author && !authorCan(request.author, settings.authorCapability)) {
      return {
        status: "access_denied",
        output: accessDeniedMessage(name),
        message: `Content author lacks ${settings.authorCapability}`
      };
    }

    const surface = invocation.surface;
    if (isFlaggedSurface(surface) && !settings[surface]) {
      return {
        status: "context_restricted",
        output: restrictedMessage(name),
        message: `Execution disabled on ${surface} surface`
      };
    }

    const config = this.deps.securityConfig.get();
    const sanitized = sanitizeSnippetCode(snippet.code, config);
    if (!sanitized.ok) {
      return {
        status: "code_validation_failed",
        output: errorMessage(name, "code_validation_failed", privileged, sanitized.rejection.message),
        message: sanitized.rejection.message,
        context: { rejection: sanitized.rejection.kind }
      };
    }

    const heapBefore = process.memoryUsage().heapUsed;
    let output: string;
    try {
      const result = await this.deps.limits.withResourceLimits(config, (limits) =>
        this.deps.evaluator.evaluate({
          code: sanitized.code,
          bindings: {
            attributes: invocation.attributes,
            content: invocation.innerContent ?? "",
            tag: name
          },
          limits,
          onOutput: snippet.buffer ? undefined : (chunk) => request.onLiveOutput?.(chunk)
        })
      );
      output = stripEvaluationMarkers(result.stdout + result.value);
    } catch (error) {
      if (!(error instanceof RuntimeTrapError)) {
        throw error;
      }

      const details = trapDetails(error.kind, error.details);
      return {
        status: error.kind,
        output: errorMessage(name, error.kind, privileged, details),
        message: details,
        context: { line: error.line ?? null }
      };
    }

    await this.rememberParameters(name, invocation.attributes);
    return {
      status: "success",
      output,
      message: SUCCESS_MESSAGE,
      context: {
        memoryDeltaBytes: process.memoryUsage().heapUsed - heapBefore,
        outputBytes: Buffer.byteLength(output, "utf8")
      }
    };
  }

  private async rememberParameters(name: string, parameters: SnippetParameters): Promise<void> {
    try {
      if (Object.keys(parameters).length > 0) {
        await this.deps.registry.setLastParameters(name, parameters);
      } else {
        await this.deps.registry.clearLastParameters(name);
      }
    } catch (error) {
      logError("snippet.parameters.store_failed", { name, error: formatErrorForLog(error) });
    }
  }
}
