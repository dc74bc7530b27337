import { AuthorizationError, authorize } from "@shortexec/core";
import { z } from "zod";
import type { Router } from "express";
import { asyncHandler } from "../lib/async-handler";
import { actorOf } from "../lib/auth-middleware";
import { logInfo } from "../lib/log";
import type { SnippetRegistry } from "../services/registry";

const capabilitySchema = z.string().trim().min(1).max(64).regex(/^[a-z0-9_.-]+$/i);

const settingsPatchSchema = z
  .object({
    widget: z.boolean(),
    excerpt: z.boolean(),
    comment: z.boolean(),
    feed: z.boolean(),
    authorCapability: capabilitySchema,
    editorCapability: capabilitySchema
  })
  .partial()
  .strict();

export function registerSettingsRoutes(router: Router, deps: { registry: SnippetRegistry }): void {
  router.get("/api/settings", asyncHandler(async (req, res) => {
    if (!authorize(actorOf(req), "edit")) {
      throw new AuthorizationError();
    }

    res.json(await deps.registry.getSettings());
  }));

  router.put("/api/settings", asyncHandler(async (req, res) => {
    const actor = actorOf(req);
    if (!authorize(actor, "edit")) {
      throw new AuthorizationError();
    }

    const parsed = settingsPatchSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: "INVALID_SETTINGS", details: parsed.error.flatten() });
      return;
    }

    const settings = await deps.registry.putSettings(parsed.data);
    logInfo("snippet.settings.updated", { actorId: actor.id ?? null, changed: Object.keys(parsed.data) });
    res.json(settings);
  }));
}
