export const EXECUTION_SURFACES = ["normal", "widget", "excerpt", "comment", "feed", "admin-test"] as const;
export type ExecutionSurface = (typeof EXECUTION_SURFACES)[number];

export const CAPABILITY_ACTIONS = ["execute", "edit", "create", "delete", "import", "export"] as const;
export type CapabilityAction = (typeof CAPABILITY_ACTIONS)[number];

export const RUNTIME_TRAP_KINDS = ["parse_error", "fatal_error", "exception", "timeout"] as const;
export type RuntimeTrapKind = (typeof RUNTIME_TRAP_KINDS)[number];

export const BLOCKED_STATUSES = ["not_found", "disabled", "empty_code", "access_denied", "context_restricted"] as const;
export type BlockedStatus = (typeof BLOCKED_STATUSES)[number];

export type FailedStatus = "invalid_name" | "code_validation_failed" | RuntimeTrapKind;

export type ExecutionStatus = "success" | BlockedStatus | FailedStatus;

export type ExecutionOutcome = "completed" | "blocked" | "failed";

export const CODE_REJECTION_KINDS = [
  "invalid_type",
  "too_long",
  "blocked_function",
  "dangerous_pattern",
  "syntax_error"
] as const;
export type CodeRejectionKind = (typeof CODE_REJECTION_KINDS)[number];

export type CodeRejection = {
  kind: CodeRejectionKind;
  message: string;
  functionName?: string;
  pattern?: string;
};

export type SanitizeResult =
  | { ok: true; code: string }
  | { ok: false; rejection: CodeRejection };

export type SnippetParameters = Record<string, string>;

export type Snippet = {
  name: string;
  code: string;
  enabled: boolean;
  buffer: boolean;
  description: string;
  lastParameters: SnippetParameters;
};

export type SnippetInput = Omit<Snippet, "lastParameters">;

export type SnippetSettings = {
  widget: boolean;
  excerpt: boolean;
  comment: boolean;
  feed: boolean;
  authorCapability: string;
  editorCapability: string;
};

export type Invocation = {
  tag: string;
  attributes: SnippetParameters;
  innerContent?: string;
  surface: ExecutionSurface;
};

export type Actor = {
  id?: string;
  authenticated: boolean;
  roles: ReadonlySet<string>;
};

export type ExecutionResult = {
  outcome: ExecutionOutcome;
  status: ExecutionStatus;
  output: string;
  message: string;
};

export type SecurityConfig = {
  blockedFunctions: readonly string[];
  maxCodeLength: number;
  maxExecutionSeconds: number;
  maxMemoryBytes: number;
  enableSyntaxCheck: boolean;
  enableExecutionLog: boolean;
};
