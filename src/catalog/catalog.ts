import type { JSONSchema7 } from "json-schema";
import { ToolAdapterError } from "../errors";
import { NameSanitizer } from "./names";
import { normalizeInputSchema, normalizeSchema, type NormalizeOptions, type SchemaWarning } from "./schema";
import type { AdaptedTool, RawTool, ToolArg } from "./types";

export type BuildCatalogOptions = {
  /** Prefix names with the source name (default: true) */
  namespaceTools?: boolean;
  sanitizer?: NameSanitizer;
  schema?: NormalizeOptions;
};

export type BuildCatalogResult = {
  catalog: ToolCatalog;
  /** One SchemaDegraded error per degraded tool schema */
  degradations: ToolAdapterError[];
};

/**
 * Read-only collection of adapted tools from one discovery pass
 */
export class ToolCatalog {
  private readonly byName: Map<string, AdaptedTool>;
  private readonly byQualifiedName: Map<string, AdaptedTool>;

  constructor(tools: Iterable<AdaptedTool> = []) {
    this.byName = new Map();
    this.byQualifiedName = new Map();
    for (const tool of tools) {
      if (this.byName.has(tool.adaptedName)) {
        throw new Error(`Duplicate adapted tool name: ${tool.adaptedName}`);
      }
      this.byName.set(tool.adaptedName, tool);
      if (!this.byQualifiedName.has(tool.qualifiedName)) {
        this.byQualifiedName.set(tool.qualifiedName, tool);
      }
    }
  }

  get size(): number {
    return this.byName.size;
  }

  list(): AdaptedTool[] {
    return Array.from(this.byName.values());
  }

  /**
   * Look up by adapted name, then by "<source>.<rawName>"
   */
  get(name: string): AdaptedTool | undefined {
    return this.byName.get(name) ?? this.byQualifiedName.get(name);
  }

  /**
   * Case-insensitive substring search over name and description.
   * Ranked: exact name > name substring > description substring,
   * ties in insertion order.
   */
  search(query: string, maxResults: number): AdaptedTool[] {
    if (maxResults <= 0) {
      return [];
    }

    const needle = query.toLowerCase();
    const ranked: Array<{ tool: AdaptedTool; rank: number; index: number }> = [];

    this.list().forEach((tool, index) => {
      const name = tool.adaptedName.toLowerCase();
      let rank: number;
      if (name === needle) {
        rank = 0;
      } else if (name.includes(needle)) {
        rank = 1;
      } else if (tool.description.toLowerCase().includes(needle)) {
        rank = 2;
      } else {
        return;
      }
      ranked.push({ tool, rank, index });
    });

    return ranked
      .sort((a, b) => a.rank - b.rank || a.index - b.index)
      .slice(0, maxResults)
      .map(entry => entry.tool);
  }
}

/**
 * Extract argument information from JSON schema
 */
export function extractArgs(schema: JSONSchema7): ToolArg[] {
  const args: ToolArg[] = [];

  for (const [name, prop] of Object.entries(schema.properties ?? {})) {
    const description = typeof prop === "object" ? prop.description : undefined;
    args.push({ name, description });
  }

  return args;
}

export function qualifiedToolName(raw: RawTool): string {
  return `${raw.sourceRef.name}.${raw.rawName}`;
}

function describeWarnings(warnings: SchemaWarning[]): string {
  return warnings.map(warning => `${warning.path}: ${warning.message}`).join("; ");
}

/**
 * Adapt a raw tool: sanitize its name and normalize its schemas
 */
export function adaptTool(
  raw: RawTool,
  sanitizer: NameSanitizer,
  options: Pick<BuildCatalogOptions, "namespaceTools" | "schema"> = {},
): { tool: AdaptedTool; warnings: SchemaWarning[] } {
  const qualifiedName = qualifiedToolName(raw);
  const adaptedName = sanitizer.assign(options.namespaceTools === false ? raw.rawName : qualifiedName);

  const input = normalizeInputSchema(raw.rawInputSchema, options.schema);
  const output = raw.rawOutputSchema === undefined ? undefined : normalizeSchema(raw.rawOutputSchema, options.schema);

  const tool: AdaptedTool = {
    adaptedName,
    qualifiedName,
    description: raw.description || `Tool: ${qualifiedName}`,
    normalizedInputSchema: input.schema,
    normalizedOutputSchema: output?.schema,
    tags: [...raw.tags],
    args: extractArgs(input.schema),
    rawTool: raw,
  };

  return { tool, warnings: [...input.warnings, ...(output?.warnings.map(w => ({ ...w, path: `output:${w.path}` })) ?? [])] };
}

/**
 * Build a fresh catalog from raw tools, in the order given
 */
export function buildCatalog(rawTools: RawTool[], options: BuildCatalogOptions = {}): BuildCatalogResult {
  const sanitizer = options.sanitizer ?? new NameSanitizer();
  const tools: AdaptedTool[] = [];
  const degradations: ToolAdapterError[] = [];

  for (const raw of rawTools) {
    const { tool, warnings } = adaptTool(raw, sanitizer, options);
    tools.push(tool);

    if (warnings.length > 0) {
      degradations.push(
        new ToolAdapterError("SchemaDegraded", {
          message: `Schema of ${tool.qualifiedName} degraded: ${describeWarnings(warnings)}`,
          source: raw.sourceRef.name,
          tool: tool.adaptedName,
        }),
      );
    }
  }

  return { catalog: new ToolCatalog(tools), degradations };
}
