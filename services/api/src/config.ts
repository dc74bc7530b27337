import { DEFAULT_AUTHOR_CAPABILITY, parseMemoryLimit } from "@shortexec/core";
import { z } from "zod";

export const REGISTRY_DRIVERS = ["memory", "redis"] as const;
export type RegistryDriver = (typeof REGISTRY_DRIVERS)[number];

export const EVALUATOR_DRIVERS = ["vm", "worker"] as const;
export type EvaluatorDriver = (typeof EVALUATOR_DRIVERS)[number];

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value !== "string") {
    return value;
  }
  const trimmed = value.trim();
  return trimmed.length === 0 ? undefined : trimmed;
}

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .default(fallback)
    .transform((value) => value === "1" || value.toLowerCase() === "true");

const nameList = z
  .string()
  .default("")
  .transform((value) => value.split(",").map((item) => item.trim()).filter(Boolean));

// Largest whole-second delay a Node timer accepts, less room for the evaluator's termination grace.
export const MAX_TIME_LIMIT_SECONDS = 2_147_482;

const timeLimit = z.coerce.number().max(MAX_TIME_LIMIT_SECONDS, `must be at most ${MAX_TIME_LIMIT_SECONDS} seconds`);

const memoryLimit = z
  .string()
  .refine((value) => !Number.isNaN(parseMemoryLimit(value)), "must be a size such as 32M, 1G or -1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().int().positive().default(4100),
  WEB_ORIGIN: z
    .string()
    .url("WEB_ORIGIN must be a valid URL")
    .refine((value) => value !== "*", "WEB_ORIGIN cannot be '*'")
    .default("http://localhost:3000"),
  AUTH_TOKEN_SECRET: z.string().min(1).default("dev-auth-token-secret"),
  AUTH_TOKEN_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60),
  API_WRITE_RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(60 * 1000),
  API_WRITE_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(120),
  REGISTRY_DRIVER: z.enum(REGISTRY_DRIVERS).default("memory"),
  REDIS_URL: z.preprocess(emptyStringToUndefined, z.string().optional()),
  LOG_BUFFER_CAPACITY: z.coerce.number().int().positive().default(500),
  SNIPPET_EVALUATOR: z.enum(EVALUATOR_DRIVERS).default("worker"),
  SNIPPET_DEBUG: booleanFlag("false"),
  SNIPPET_MAX_CODE_LENGTH: z.coerce.number().int().positive().default(10_000),
  SNIPPET_MAX_EXECUTION_SECONDS: timeLimit.positive().default(30),
  SNIPPET_MAX_MEMORY: memoryLimit.default("32M"),
  SNIPPET_SYNTAX_CHECK: booleanFlag("true"),
  SNIPPET_BLOCKED_FUNCTIONS_ADD: nameList,
  SNIPPET_BLOCKED_FUNCTIONS_REMOVE: nameList,
  SNIPPET_AUTHOR_CAPABILITY: z.string().min(1).default(DEFAULT_AUTHOR_CAPABILITY),
  SECURITY_CONFIG_TTL_MS: z.coerce.number().int().min(0).default(5000),
  RUNTIME_MEMORY_LIMIT: memoryLimit.default("128M"),
  RUNTIME_TIME_LIMIT_SECONDS: timeLimit.min(0).default(0)
}).superRefine((value, ctx) => {
  if (value.REGISTRY_DRIVER === "redis" && !value.REDIS_URL) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["REDIS_URL"],
      message: "REDIS_URL is required when REGISTRY_DRIVER=redis"
    });
  }

  if (value.NODE_ENV === "production") {
    if (value.AUTH_TOKEN_SECRET === "dev-auth-token-secret") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["AUTH_TOKEN_SECRET"],
        message: "AUTH_TOKEN_SECRET must not use the development default in production"
      });
    }

    if (value.REGISTRY_DRIVER !== "redis") {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["REGISTRY_DRIVER"],
        message: "REGISTRY_DRIVER must be redis in production"
      });
    }
  }
});

export type ApiConfig = {
  nodeEnv: "development" | "test" | "production";
  port: number;
  webOrigin: string;
  authTokenSecret: string;
  authTokenTtlSeconds: number;
  apiWriteRateLimitWindowMs: number;
  apiWriteRateLimitMax: number;
  registryDriver: RegistryDriver;
  redisUrl?: string;
  logBufferCapacity: number;
  evaluator: EvaluatorDriver;
  snippetDebug: boolean;
  maxCodeLength: number;
  maxExecutionSeconds: number;
  maxMemoryBytes: number;
  syntaxCheck: boolean;
  blockedFunctionsAdd: string[];
  blockedFunctionsRemove: string[];
  authorCapability: string;
  securityConfigTtlMs: number;
  runtimeMemoryLimitBytes: number;
  runtimeTimeLimitSeconds: number;
};

/**
 * Parse and validate environment variables into the service configuration.
 *
 * @param env - Source of environment variables; defaults to `process.env`
 * @returns The validated, camel-cased configuration
 * @throws Error listing every invalid variable when validation fails
 */
export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(`Invalid API configuration: ${issues}`);
  }

  const value = parsed.data;
  return {
    nodeEnv: value.NODE_ENV,
    port: value.API_PORT,
    webOrigin: value.WEB_ORIGIN,
    authTokenSecret: value.AUTH_TOKEN_SECRET,
    authTokenTtlSeconds: value.AUTH_TOKEN_TTL_SECONDS,
    apiWriteRateLimitWindowMs: value.API_WRITE_RATE_LIMIT_WINDOW_MS,
    apiWriteRateLimitMax: value.API_WRITE_RATE_LIMIT_MAX,
    registryDriver: value.REGISTRY_DRIVER,
    redisUrl: value.REDIS_URL,
    logBufferCapacity: value.LOG_BUFFER_CAPACITY,
    evaluator: value.SNIPPET_EVALUATOR,
    snippetDebug: value.SNIPPET_DEBUG,
    maxCodeLength: value.SNIPPET_MAX_CODE_LENGTH,
    maxExecutionSeconds: value.SNIPPET_MAX_EXECUTION_SECONDS,
    maxMemoryBytes: parseMemoryLimit(value.SNIPPET_MAX_MEMORY),
    syntaxCheck: value.SNIPPET_SYNTAX_CHECK,
    blockedFunctionsAdd: value.SNIPPET_BLOCKED_FUNCTIONS_ADD,
    blockedFunctionsRemove: value.SNIPPET_BLOCKED_FUNCTIONS_REMOVE,
    authorCapability: value.SNIPPET_AUTHOR_CAPABILITY,
    securityConfigTtlMs: value.SECURITY_CONFIG_TTL_MS,
    runtimeMemoryLimitBytes: parseMemoryLimit(value.RUNTIME_MEMORY_LIMIT),
    runtimeTimeLimitSeconds: value.RUNTIME_TIME_LIMIT_SECONDS
  };
}
