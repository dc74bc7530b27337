const DESCRIPTION_ALLOWED_TAGS = new Set(["p", "br", "strong", "em", "code"]);

/**
 * Reduce a snippet description to plain text plus bare `<p>`, `<br>`, `<strong>`, `<em>` and `<code>`.
 *
 * Attributes are dropped from allowed tags; every other tag is removed and its text kept.
 * Script and style bodies are removed entirely. A `<` that does not open a complete tag is escaped.
 */
export function sanitizeDescription(description: string): string {
  return description
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1\s*>/gi, "")
    .replace(/<!--[\s\S]*?-->/g, "")
    .replace(/<(\/?)([a-z][a-z0-9]*)\b[^<>]*>|</gi, (_match, closing: string | undefined, tagName: string | undefined) => {
      if (tagName === undefined) {
        return "&lt;";
      }
      const name = tagName.toLowerCase();
      if (!DESCRIPTION_ALLOWED_TAGS.has(name)) {
        return "";
      }
      if (name === "br") {
        return "<br>";
      }
      return `<${closing ?? ""}${name}>`;
    })
    .trim();
}

/**
 * Remove raw evaluation markers (`<?js ... ?>`, `<? ... ?>`) left in rendered output.
 */
export function stripEvaluationMarkers(output: string): string {
  return output.replace(/<\?js[\s\S]*?\?>/gi, "").replace(/<\?[\s\S]*?\?>/g, "");
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;"
};

export function escapeHtml(value: string): string {
  return value.replace(/[&<>"']/g, (char) => HTML_ESCAPES[char] ?? char);
}
