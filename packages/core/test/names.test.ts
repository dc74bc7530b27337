import { describe, expect, it } from "vitest";
import { RESERVED_SNIPPET_NAMES, validateSnippetName } from "../src";

describe("validateSnippetName", () => {
  it("accepts letters followed by letters, digits, underscores and hyphens", () => {
    for (const name of ["test_shortcode", "my-shortcode", "shortcode123", "a", "A-1", "greet", "x".repeat(50)]) {
      expect(validateSnippetName(name)).toBe(true);
    }
  });

  it("rejects empty, oversized and badly formed names", () => {
    for (const name of ["", "x".repeat(51), "123invalid", "_invalid", "-invalid", "invalid space", "naïve", "dot.name", "semi;colon"]) {
      expect(validateSnippetName(name)).toBe(false);
    }
  });

  it("rejects reserved names regardless of case", () => {
    for (const name of RESERVED_SNIPPET_NAMES) {
      expect(validateSnippetName(name)).toBe(false);
    }
    expect(validateSnippetName("Gallery")).toBe(false);
    expect(validateSnippetName("WP_CAPTION")).toBe(false);
  });

  it("treats non-string input as invalid instead of throwing", () => {
    for (const value of [undefined, null, 42, {}, ["greet"]]) {
      expect(validateSnippetName(value)).toBe(false);
    }
  });
});
