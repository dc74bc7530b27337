import type { Actor, CapabilityAction } from "./types";

export const ADMIN_ROLE = "config.manage";
export const DEFAULT_AUTHOR_CAPABILITY = "content.edit";

export type CapabilityContext = {
  snippetName?: string;
};

type ActionRule = (actor: Actor, context: CapabilityContext) => boolean;

const ACTION_RULES: Record<CapabilityAction, ActionRule> = {
  execute: (_actor, context) => Boolean(context.snippetName),
  edit: () => true,
  create: () => true,
  delete: () => true,
  import: () => true,
  export: () => true
};

function isCapabilityAction(action: string): action is CapabilityAction {
  return Object.prototype.hasOwnProperty.call(ACTION_RULES, action);
}

export function createActor(input: { id?: string; authenticated?: boolean; roles?: Iterable<string> } = {}): Actor {
  return {
    id: input.id,
    authenticated: input.authenticated ?? Boolean(input.id),
    roles: new Set(input.roles ?? [])
  };
}

export const ANONYMOUS_ACTOR: Actor = createActor({ authenticated: false });

/**
 * Whether the actor may see error details and manage snippets at all.
 */
export function isPrivileged(actor: Actor): boolean {
  return actor.authenticated && actor.roles.has(ADMIN_ROLE);
}

/**
 * Decide whether `actor` may perform `action`. Unknown actions are denied.
 *
 * No side effects and no logging: callers record one audit entry per invocation.
 */
export function authorize(actor: Actor, action: string, context: CapabilityContext = {}): boolean {
  if (!isPrivileged(actor)) {
    return false;
  }

  if (!isCapabilityAction(action)) {
    return false;
  }

  return ACTION_RULES[action](actor, context);
}

/**
 * Content-author check: the author of the content that embeds a tag must hold `capability`.
 */
export function authorCan(author: Actor, capability: string): boolean {
  return author.roles.has(capability) || author.roles.has(ADMIN_ROLE);
}
