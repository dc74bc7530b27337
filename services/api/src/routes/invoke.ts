import { createActor, normalizeAttributes, type Actor } from "@shortexec/core";
import { z } from "zod";
import type { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import { actorOf } from "../lib/auth-middleware";
import type { SnippetExecutor } from "../services/executor";
import type { ContentRenderer } from "../services/renderer";

// `admin-test` is reserved for the snippet test route.
const surfaceSchema = z.enum(["normal", "widget", "excerpt", "comment", "feed"]).default("normal");

const authorSchema = z.object({
  id: z.string().min(1),
  roles: z.array(z.string()).default([])
});

const invokeSchema = z.object({
  tag: z.string(),
  attributes: z.record(z.unknown()).default({}),
  content: z.string().optional(),
  surface: surfaceSchema,
  author: authorSchema.optional()
});

const renderSchema = z.object({
  content: z.string().max(1024 * 1024),
  surface: surfaceSchema,
  author: authorSchema.optional()
});

function toAuthor(input: z.infer<typeof authorSchema> | undefined): Actor | undefined {
  return input ? createActor({ id: input.id, authenticated: true, roles: input.roles }) : undefined;
}

export function registerInvokeRoutes(
  router: Router,
  deps: {
    executor: SnippetExecutor;
    renderer: ContentRenderer;
  }
): void {
  router.post("/api/invoke", asyncHandler(async (req, res) => {
    const parsed = invokeSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_INVOCATION", details: parsed.error.flatten() });
      return;
    }

    const live: string[] = [];
    const output = await deps.executor.invoke({
      invocation: {
        tag: parsed.data.tag,
        attributes: normalizeAttributes(parsed.data.attributes),
        innerContent: parsed.data.content,
        surface: parsed.data.surface
      },
      actor: actorOf(req),
      author: toAuthor(parsed.data.author),
      client: { ip: req.ip, uri: req.originalUrl },
      onLiveOutput: (chunk) => {
        live.push(chunk);
      }
    });

    res.json({ output, live: live.join("") });
  }));

  router.post("/api/render", asyncHandler(async (req, res) => {
    const parsed = renderSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_RENDER_REQUEST", details: parsed.error.flatten() });
      return;
    }

    const output = await deps.renderer.render(parsed.data.content, {
      surface: parsed.data.surface,
      actor: actorOf(req),
      author: toAuthor(parsed.data.author),
      client: { ip: req.ip, uri: req.originalUrl }
    });

    res.json({ output });
  }));
}
