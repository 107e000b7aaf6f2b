import type { AdaptedTool, SearchResult } from "../catalog/types";

export const MAX_REGEX_LENGTH = 200;

export type RegexSearchError = {
  code: "invalid_pattern" | "pattern_too_long";
  message: string;
};

/**
 * Text a pattern is matched against: names, description and argument names
 */
export function searchableText(tool: AdaptedTool): string {
  const parts = [tool.adaptedName, tool.qualifiedName, tool.description];
  for (const arg of tool.args) {
    parts.push(arg.name);
    if (arg.description) {
      parts.push(arg.description);
    }
  }
  return parts.join(" ");
}

/**
 * Search tools using regex pattern
 * A leading (?i) makes the match case-insensitive
 */
export function searchWithRegex(
  tools: AdaptedTool[],
  pattern: string,
  limit: number = 5
): SearchResult[] | { error: RegexSearchError } {
  // Validate pattern length
  if (pattern.length > MAX_REGEX_LENGTH) {
    return {
      error: {
        code: "pattern_too_long",
        message: `Pattern exceeds maximum length of ${MAX_REGEX_LENGTH} characters`,
      },
    };
  }

  let flags = "";
  let searchPattern = pattern;

  if (pattern.startsWith("(?i)")) {
    flags = "i";
    searchPattern = pattern.slice(4);
  }

  let regex: RegExp;
  try {
    regex = new RegExp(searchPattern, flags);
  } catch (error) {
    return {
      error: {
        code: "invalid_pattern",
        message: error instanceof Error ? error.message : "Invalid regex pattern",
      },
    };
  }

  return tools
    .filter(tool => regex.test(searchableText(tool)))
    .sort((a, b) => a.adaptedName.localeCompare(b.adaptedName))
    .slice(0, Math.max(0, limit))
    .map(tool => ({
      adaptedName: tool.adaptedName,
      qualifiedName: tool.qualifiedName,
      preview: tool.description,
      signature: generateSignature(tool),
    }));
}

/**
 * Generate a condensed function signature for a tool
 * Arguments missing from `required` are marked with "?"
 */
export function generateSignature(tool: AdaptedTool): string {
  const required = new Set(tool.normalizedInputSchema.required ?? []);
  const argList = tool.args
    .map(arg => `${arg.name}${required.has(arg.name) ? "" : "?"}`)
    .join(", ");

  return `${tool.rawTool.rawName}(${argList})`;
}
