export const MAX_SNIPPET_NAME_LENGTH = 50;

// Tags the host renderer already owns.
export const RESERVED_SNIPPET_NAMES: ReadonlySet<string> = new Set([
  "caption",
  "gallery",
  "playlist",
  "audio",
  "video",
  "embed",
  "wp_caption"
]);

/**
 * Check whether a candidate can be registered and dispatched as a snippet tag.
 *
 * @param name - Candidate name; any value is accepted and non-strings are rejected
 * @returns `true` when `name` is 1-50 characters of letters, digits, `_` or `-`, starts with a letter and is not reserved
 */
export function validateSnippetName(name: unknown): boolean {
  if (typeof name !== "string" || name.length === 0) {
    return false;
  }

  if (name.length > MAX_SNIPPET_NAME_LENGTH) {
    return false;
  }

  if (!/^[a-z0-9_-]+$/i.test(name)) {
    return false;
  }

  if (/^[0-9_-]/.test(name)) {
    return false;
  }

  return !RESERVED_SNIPPET_NAMES.has(name.toLowerCase());
}
