import type { JSONSchema7 } from "json-schema";
import type { SourceDescriptor } from "../config";

/**
 * Tool description as reported by a driver, before the source is attached
 */
export type RawToolDefinition = {
  rawName: string;
  description: string;
  rawInputSchema: unknown;
  rawOutputSchema?: unknown;
  tags: string[];
  callTemplate?: SourceDescriptor;  // per-tool template from a manual
};

export type RawTool = RawToolDefinition & {
  sourceRef: SourceDescriptor;  // not owned
};

export type ToolArg = { name: string; description?: string };

export type AdaptedTool = {
  adaptedName: string;     // sanitized, unique, <= 64 chars
  qualifiedName: string;   // "<source>.<rawName>"
  description: string;
  normalizedInputSchema: JSONSchema7;
  normalizedOutputSchema?: JSONSchema7;
  tags: string[];
  args: ToolArg[];
  rawTool: RawTool;
};

// Pattern search result
export type SearchResult = {
  adaptedName: string;
  qualifiedName: string;
  preview: string;     // Description
  signature: string;   // Condensed function signature
};
