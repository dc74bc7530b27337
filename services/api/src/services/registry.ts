import {
  ConflictError,
  DEFAULT_AUTHOR_CAPABILITY,
  ValidationError,
  type Snippet,
  type SnippetInput,
  type SnippetParameters,
  type SnippetSettings
} from "@shortexec/core";
import IORedis from "ioredis";
import { z } from "zod";
import type { ApiConfig } from "../config";

const SNIPPET_KEY_PREFIX = "shortexec:snippet:";
const PARAMS_KEY_PREFIX = "shortexec:snippet-params:";
const NAMES_KEY = "shortexec:snippet-names";
const NAMES_SEQUENCE_KEY = "shortexec:snippet-names-seq";
const SETTINGS_KEY = "shortexec:settings";

/**
 * Snippet storage. Names are kept in creation order; re-saving a snippet keeps its position.
 */
export interface SnippetRegistry {
  get(name: string): Promise<Snippet | null>;
  list(): Promise<Snippet[]>;
  put(snippet: SnippetInput): Promise<Snippet>;
  /** @returns Whether a snippet was removed */
  delete(name: string): Promise<boolean>;
  setLastParameters(name: string, parameters: SnippetParameters): Promise<void>;
  clearLastParameters(name: string): Promise<void>;
  getSettings(): Promise<SnippetSettings>;
  putSettings(patch: Partial<SnippetSettings>): Promise<SnippetSettings>;
  close(): Promise<void>;
}

export function defaultSnippetSettings(authorCapability = DEFAULT_AUTHOR_CAPABILITY): SnippetSettings {
  return {
    widget: false,
    excerpt: false,
    comment: false,
    feed: false,
    authorCapability,
    editorCapability: DEFAULT_AUTHOR_CAPABILITY
  };
}

export class InMemorySnippetRegistry implements SnippetRegistry {
  private readonly snippets = new Map<string, Snippet>();
  private settings: SnippetSettings;

  constructor(input: { settings?: Partial<SnippetSettings> } = {}) {
    this.settings = { ...defaultSnippetSettings(), ...input.settings };
  }

  async get(name: string): Promise<Snippet | null> {
    const snippet = this.snippets.get(name);
    return snippet ? { ...snippet, lastParameters: { ...snippet.lastParameters } } : null;
  }

  async list(): Promise<Snippet[]> {
    return [...this.snippets.values()].map((snippet) => ({ ...snippet, lastParameters: { ...snippet.lastParameters } }));
  }

  async put(input: SnippetInput): Promise<Snippet> {
    const existing = this.snippets.get(input.name);
    const snippet: Snippet = { ...input, lastParameters: existing ? existing.lastParameters : {} };
    this.snippets.set(input.name, snippet);
    return { ...snippet, lastParameters: { ...snippet.lastParameters } };
  }

  async delete(name: string): Promise<boolean> {
    return this.snippets.delete(name);
  }

  async setLastParameters(name: string, parameters: SnippetParameters): Promise<void> {
    const snippet = this.snippets.get(name);
    if (snippet) {
      snippet.lastParameters = { ...parameters };
    }
  }

  async clearLastParameters(name: string): Promise<void> {
    const snippet = this.snippets.get(name);
    if (snippet) {
      snippet.lastParameters = {};
    }
  }

  async getSettings(): Promise<SnippetSettings> {
    return { ...this.settings };
  }

  async putSettings(patch: Partial<SnippetSettings>): Promise<SnippetSettings> {
    this.settings = { ...this.settings, ...patch };
    return { ...this.settings };
  }

  async close(): Promise<void> {}
}

const storedFlagSchema = z.enum(["0", "1"]).transform((value) => value === "1");

const storedSnippetSchema = z.object({
  code: z.string(),
  enabled: storedFlagSchema,
  buffer: storedFlagSchema,
  description: z.string().default("")
});

const storedParametersSchema = z.record(z.string());

const storedSettingsSchema = z.object({
  widget: storedFlagSchema.optional(),
  excerpt: storedFlagSchema.optional(),
  comment: storedFlagSchema.optional(),
  feed: storedFlagSchema.optional(),
  authorCapability: z.string().min(1).optional(),
  editorCapability: z.string().min(1).optional()
});

function snippetKey(name: string): string {
  return `${SNIPPET_KEY_PREFIX}${name}`;
}

function paramsKey(name: string): string {
  return `${PARAMS_KEY_PREFIX}${name}`;
}

function toFlag(value: boolean): "0" | "1" {
  return value ? "1" : "0";
}

function parseParameters(raw: string | null): SnippetParameters {
  if (!raw) {
    return {};
  }

  try {
    const parsed = storedParametersSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

export class RedisSnippetRegistry implements SnippetRegistry {
  private static readonly MAX_OPTIMISTIC_RETRIES = 5;
  private readonly redis: IORedis;
  private readonly defaults: SnippetSettings;

  constructor(input: { redisUrl?: string; redisClient?: IORedis; settings?: Partial<SnippetSettings> }) {
    if (input.redisClient) {
      this.redis = input.redisClient;
    } else if (input.redisUrl) {
      this.redis = new IORedis(input.redisUrl, { maxRetriesPerRequest: null });
    } else {
      throw new ValidationError("redisUrl is required when redisClient is not provided");
    }
    this.defaults = { ...defaultSnippetSettings(), ...input.settings };
  }

  async get(name: string): Promise<Snippet | null> {
    const [fields, rawParameters] = await Promise.all([
      this.redis.hgetall(snippetKey(name)),
      this.redis.get(paramsKey(name))
    ]);

    const parsed = storedSnippetSchema.safeParse(fields);
    if (!parsed.success) {
      return null;
    }

    return {
      name,
      ...parsed.data,
      lastParameters: parseParameters(rawParameters)
    };
  }

  async list(): Promise<Snippet[]> {
    const names = await this.redis.zrange(NAMES_KEY, 0, -1);
    const snippets = await Promise.all(names.map((name) => this.get(name)));
    return snippets.filter((snippet): snippet is Snippet => snippet !== null);
  }

  async put(input: SnippetInput): Promise<Snippet> {
    const order = await this.redis.incr(NAMES_SEQUENCE_KEY);
    await this.redis
      .multi()
      .hset(snippetKey(input.name), {
        code: input.code,
        enabled: toFlag(input.enabled),
        buffer: toFlag(input.buffer),
        description: input.description
      })
      .zadd(NAMES_KEY, "NX", order, input.name)
      .exec();

    const rawParameters = await this.redis.get(paramsKey(input.name));
    return { ...input, lastParameters: parseParameters(rawParameters) };
  }

  async delete(name: string): Promise<boolean> {
    const results = await this.redis
      .multi()
      .del(snippetKey(name))
      .del(paramsKey(name))
      .zrem(NAMES_KEY, name)
      .exec();

    const removed = results?.[0]?.[1];
    return typeof removed === "number" && removed > 0;
  }

  /**
   * Stores parameters only while the snippet exists; a run that outlives a delete writes nothing.
   */
  async setLastParameters(name: string, parameters: SnippetParameters): Promise<void> {
    const key = snippetKey(name);

    for (let attempt = 0; attempt < RedisSnippetRegistry.MAX_OPTIMISTIC_RETRIES; attempt += 1) {
      await this.redis.watch(key);

      try {
        if ((await this.redis.exists(key)) === 0) {
          return;
        }

        const committed = await this.redis.multi().set(paramsKey(name), JSON.stringify(parameters)).exec();
        if (committed) {
          return;
        }
      } finally {
        await this.redis.unwatch();
      }
    }

    throw new ConflictError(`Failed to store last parameters for ${name} due to concurrent updates.`);
  }

  async clearLastParameters(name: string): Promise<void> {
    await this.redis.del(paramsKey(name));
  }

  async getSettings(): Promise<SnippetSettings> {
    const parsed = storedSettingsSchema.safeParse(await this.redis.hgetall(SETTINGS_KEY));
    if (!parsed.success) {
      return { ...this.defaults };
    }

    const stored = parsed.data;
    return {
      widget: stored.widget ?? this.defaults.widget,
      excerpt: stored.excerpt ?? this.defaults.excerpt,
      comment: stored.comment ?? this.defaults.comment,
      feed: stored.feed ?? this.defaults.feed,
      authorCapability: stored.authorCapability ?? this.defaults.authorCapability,
      editorCapability: stored.editorCapability ?? this.defaults.editorCapability
    };
  }

  async putSettings(patch: Partial<SnippetSettings>): Promise<SnippetSettings> {
    const fields: Record<string, string> = {};
    for (const key of ["widget", "excerpt", "comment", "feed"] as const) {
      const value = patch[key];
      if (value !== undefined) {
        fields[key] = toFlag(value);
      }
    }
    if (patch.authorCapability !== undefined) {
      fields.authorCapability = patch.authorCapability;
    }
    if (patch.editorCapability !== undefined) {
      fields.editorCapability = patch.editorCapability;
    }

    if (Object.keys(fields).length > 0) {
      await this.redis.hset(SETTINGS_KEY, fields);
    }
    return this.getSettings();
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}

export function createSnippetRegistry(config: ApiConfig): SnippetRegistry {
  const settings = { authorCapability: config.authorCapability };
  if (config.registryDriver === "redis") {
    return new RedisSnippetRegistry({ redisUrl: config.redisUrl, settings });
  }

  return new InMemorySnippetRegistry({ settings });
}
