import { escapeHtml, type ExecutionStatus, type RuntimeTrapKind } from "@shortexec/core";

type ErrorStatus = Exclude<ExecutionStatus, "success" | "access_denied" | "context_restricted">;

const STATUS_LABELS: Record<ErrorStatus, string> = {
  invalid_name: "Invalid snippet name format",
  not_found: "Snippet not found",
  disabled: "Snippet is disabled",
  empty_code: "Snippet has no code defined",
  code_validation_failed: "Code validation failed",
  parse_error: "Execution error",
  fatal_error: "Execution error",
  exception: "Execution error",
  timeout: "Execution error"
};

/**
 * Text shown in place of a failed invocation. Viewers without the administrative role only
 * ever see the snippet name.
 */
export function errorMessage(name: string, status: ErrorStatus, privileged: boolean, details?: string): string {
  const safeName = escapeHtml(name);
  if (!privileged) {
    return `[Error: ${safeName}]`;
  }

  const label = STATUS_LABELS[status];
  return details
    ? `[Snippet Error: ${safeName} - ${label}: ${escapeHtml(details)}]`
    : `[Snippet Error: ${safeName} - ${label}]`;
}

export function trapDetails(kind: RuntimeTrapKind, details: string): string {
  return `${kind}: ${details}`;
}

export function accessDeniedMessage(name: string): string {
  return `[Access Denied: ${escapeHtml(name)}]`;
}

/** The literal tag, as if no snippet were registered under it. */
export function restrictedMessage(name: string): string {
  return `[${name}]`;
}
