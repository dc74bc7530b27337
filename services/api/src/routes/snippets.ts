import {
  AuthorizationError,
  authorize,
  CodeRejectedError,
  NotFoundError,
  normalizeAttributes,
  sanitizeDescription,
  sanitizeSnippetCode,
  validateSnippetName,
  ValidationError,
  type Actor,
  type CapabilityAction,
  type Snippet
} from "@shortexec/core";
import { z } from "zod";
import type { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import { actorOf } from "../lib/auth-middleware";
import { logInfo } from "../lib/log";
import type { SnippetExecutor } from "../services/executor";
import type { SnippetRegistry } from "../services/registry";
import type { SecurityConfigProvider } from "../services/security-config";

const MAX_DESCRIPTION_LENGTH = 2000;

const snippetNameParamSchema = z.object({
  name: z.string().min(1)
});

const snippetSaveSchema = z.object({
  code: z.string(),
  enabled: z.boolean().default(true),
  buffer: z.boolean().default(false),
  description: z.string().max(MAX_DESCRIPTION_LENGTH).default("")
});

const snippetTestSchema = z.object({
  attributes: z.record(z.unknown()).optional(),
  content: z.string().optional()
});

export function toSnippetView(snippet: Snippet) {
  return {
    name: snippet.name,
    enabled: snippet.enabled,
    buffer: snippet.buffer,
    description: snippet.description,
    code: snippet.code,
    lastParameters: snippet.lastParameters
  };
}

function assertAllowed(actor: Actor, action: CapabilityAction, snippetName?: string): void {
  if (!authorize(actor, action, { snippetName })) {
    throw new AuthorizationError();
  }
}

export function registerSnippetRoutes(
  router: Router,
  deps: {
    registry: SnippetRegistry;
    securityConfig: SecurityConfigProvider;
    executor: SnippetExecutor;
  }
): void {
  router.get("/api/snippets", asyncHandler(async (req, res) => {
    assertAllowed(actorOf(req), "edit");

    const snippets = await deps.registry.list();
    res.json({ snippets: snippets.map(toSnippetView) });
  }));

  router.get("/api/snippets/:name", asyncHandler(async (req, res) => {
    const params = snippetNameParamSchema.parse(req.params);
    assertAllowed(actorOf(req), "edit", params.name);

    const snippet = await deps.registry.get(params.name);
    if (!snippet) {
      throw new NotFoundError("Snippet");
    }

    res.json(toSnippetView(snippet));
  }));

  router.put("/api/snippets/:name", asyncHandler(async (req, res) => {
    const params = snippetNameParamSchema.parse(req.params);
    const actor = actorOf(req);
    const existing = await deps.registry.get(params.name);
    assertAllowed(actor, existing ? "edit" : "create", params.name);

    if (!validateSnippetName(params.name)) {
      throw new ValidationError("Snippet names use letters, digits, hyphens and underscores, start with a letter and are at most 50 long.");
    }

    const parsed = snippetSaveSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_SNIPPET", details: parsed.error.flatten() });
      return;
    }

    const sanitized = sanitizeSnippetCode(parsed.data.code, deps.securityConfig.get());
    if (!sanitized.ok) {
      logInfo("snippet.save_rejected", {
        name: params.name,
        actorId: actor.id ?? null,
        rejection: sanitized.rejection.kind
      });
      throw new CodeRejectedError(sanitized.rejection);
    }

    const snippet = await deps.registry.put({
      name: params.name,
      code: sanitized.code,
      enabled: parsed.data.enabled,
      buffer: parsed.data.buffer,
      description: sanitizeDescription(parsed.data.description)
    });
    logInfo("snippet.saved", { name: snippet.name, actorId: actor.id ?? null, created: !existing });
    res.status(existing ? 200 : 201).json(toSnippetView(snippet));
  }));

  router.delete("/api/snippets/:name", asyncHandler(async (req, res) => {
    const params = snippetNameParamSchema.parse(req.params);
    const actor = actorOf(req);
    assertAllowed(actor, "delete", params.name);

    const removed = await deps.registry.delete(params.name);
    if (!removed) {
      throw new NotFoundError("Snippet");
    }

    logInfo("snippet.deleted", { name: params.name, actorId: actor.id ?? null });
    res.status(204).end();
  }));

  router.post("/api/snippets/:name/test", asyncHandler(async (req, res) => {
    const params = snippetNameParamSchema.parse(req.params);
    const actor = actorOf(req);
    assertAllowed(actor, "edit", params.name);

    const parsed = snippetTestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_TEST_REQUEST", details: parsed.error.flatten() });
      return;
    }

    const stored = await deps.registry.get(params.name);
    const attributes = parsed.data.attributes
      ? normalizeAttributes(parsed.data.attributes)
      : stored?.lastParameters ?? {};
    const live: string[] = [];
    const result = await deps.executor.execute({
      invocation: {
        tag: params.name,
        attributes,
        innerContent: parsed.data.content,
        surface: "admin-test"
      },
      actor,
      client: { ip: req.ip, uri: req.originalUrl },
      onLiveOutput: (chunk) => {
        live.push(chunk);
      }
    });

    res.json({
      outcome: result.outcome,
      status: result.status,
      output: live.join("") + result.output
    });
  }));
}
