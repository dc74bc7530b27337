import type { ExecutionSurface } from "@shortexec/core";
import type { ExecuteRequest, SnippetExecutor } from "./executor";
import type { SnippetRegistry } from "./registry";

export type RenderRequest = Omit<ExecuteRequest, "invocation" | "onLiveOutput"> & {
  surface: ExecutionSurface;
};

const ATTRIBUTE_PATTERN =
  /([\w-]+)\s*=\s*"([^"]*)"(?:\s|$)|([\w-]+)\s*=\s*'([^']*)'(?:\s|$)|([\w-]+)\s*=\s*([^\s'"]+)(?:\s|$)|"([^"]*)"(?:\s|$)|'([^']*)'(?:\s|$)|(\S+)(?:\s|$)/g;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * Match `[name ...]`, `[name .../]` and `[name ...]inner[/name]` for the given names.
 *
 * Groups: 1 escape `[`, 2 name, 3 raw attributes, 4 self-closing `/`, 5 inner content, 6 escape `]`.
 */
export function buildShortcodePattern(names: readonly string[]): RegExp {
  const alternation = names.map(escapeRegExp).join("|");
  return new RegExp(
    `\\[(\\[?)(${alternation})(?![\\w-])` +
      `([^\\]\\/]*(?:\\/(?!\\])[^\\]\\/]*)*?)` +
      `(?:(\\/)\\]|\\](?:([^\\[]*(?:\\[(?!\\/\\2\\])[^\\[]*)*)\\[\\/\\2\\])?)` +
      `(\\]?)`,
    "g"
  );
}

/**
 * Parse the attribute text of a tag. Named keys are lower-cased; bare values get positional keys `"0"`, `"1"`, ...
 */
export function parseShortcodeAttributes(text: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const normalized = text.replace(/[\u00a0\u200b]+/g, " ");
  let position = 0;

  for (const match of normalized.matchAll(ATTRIBUTE_PATTERN)) {
    const [, doubleKey, doubleValue, singleKey, singleValue, bareKey, bareValue, doubleOnly, singleOnly, word] = match;
    if (doubleKey) {
      attributes[doubleKey.toLowerCase()] = doubleValue;
    } else if (singleKey) {
      attributes[singleKey.toLowerCase()] = singleValue;
    } else if (bareKey) {
      attributes[bareKey.toLowerCase()] = bareValue;
    } else {
      const value: string | undefined = doubleOnly ?? singleOnly ?? word;
      if (value !== undefined) {
        attributes[String(position)] = value;
        position += 1;
      }
    }
  }

  return attributes;
}

/**
 * Expands snippet tags inside a block of content.
 *
 * Only enabled snippets are dispatched; any other tag is left as written. Output that unbuffered
 * snippets write while running is emitted ahead of the rendered content.
 */
export class ContentRenderer {
  constructor(private readonly deps: { executor: SnippetExecutor; registry: SnippetRegistry }) {}

  async render(text: string, request: RenderRequest): Promise<string> {
    if (!text.includes("[")) {
      return text;
    }

    const names = (await this.deps.registry.list()).filter((snippet) => snippet.enabled).map((snippet) => snippet.name);
    if (names.length === 0) {
      return text;
    }

    const pattern = buildShortcodePattern(names);
    const live: string[] = [];
    const parts: string[] = [];
    let cursor = 0;
    let match: RegExpExecArray | null;

    while ((match = pattern.exec(text)) !== null) {
      parts.push(text.slice(cursor, match.index));
      cursor = match.index + match[0].length;
      parts.push(await this.expand(match, request, live));
    }
    parts.push(text.slice(cursor));

    return live.join("") + parts.join("");
  }

  private async expand(match: RegExpExecArray, request: RenderRequest, live: string[]): Promise<string> {
    const whole = match[0];
    const openEscape = match[1];
    const closeEscape = match[6];
    if (openEscape === "[" && closeEscape === "]") {
      return whole.slice(1, -1);
    }

    const innerContent: string | undefined = match[5];
    const { surface, ...rest } = request;
    const result = await this.deps.executor.execute({
      ...rest,
      invocation: {
        tag: match[2],
        attributes: parseShortcodeAttributes(match[3]),
        innerContent,
        surface
      },
      onLiveOutput: (chunk) => {
        live.push(chunk);
      }
    });

    if (result.status === "context_restricted") {
      return whole;
    }
    return `${openEscape}${result.output}${closeEscape}`;
  }
}
