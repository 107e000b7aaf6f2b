import type {
  JSONSchema7,
  JSONSchema7Definition,
  JSONSchema7Type,
  JSONSchema7TypeName,
} from "json-schema";
import type { JsonSchemaPrimitive } from "../config";

export type SchemaWarning = {
  path: string;      // JSON pointer into the raw schema, e.g. "#/properties/upload"
  message: string;
};

export type NormalizeOptions = {
  nullFallback?: JsonSchemaPrimitive;
  typeMappings?: Record<string, JsonSchemaPrimitive>;
};

export type NormalizeResult = {
  schema: JSONSchema7;
  warnings: SchemaWarning[];
};

export const MAX_SCHEMA_DEPTH = 64;

const DEFAULT_TYPE_MAPPINGS: Record<string, JsonSchemaPrimitive> = { file: "string" };

const STANDARD_TYPES: readonly JSONSchema7TypeName[] = [
  "string",
  "number",
  "integer",
  "boolean",
  "object",
  "array",
  "null",
];

/** Envelope keys that wrap a schema without adding meaning */
const WRAPPER_KEYS = ["json", "schema", "jsonSchema"] as const;

const STRING_KEYWORDS = [
  "$id",
  "$ref",
  "$schema",
  "$comment",
  "title",
  "description",
  "format",
  "pattern",
  "contentMediaType",
  "contentEncoding",
] as const;

const NUMBER_KEYWORDS = ["minimum", "maximum", "exclusiveMinimum", "exclusiveMaximum"] as const;

/** Keywords whose value must be a non-negative integer */
const COUNT_KEYWORDS = [
  "minLength",
  "maxLength",
  "minItems",
  "maxItems",
  "minProperties",
  "maxProperties",
] as const;

const BOOLEAN_KEYWORDS = ["uniqueItems", "readOnly", "writeOnly"] as const;

const DEFINITION_KEYWORDS = [
  "additionalProperties",
  "additionalItems",
  "contains",
  "propertyNames",
  "not",
  "if",
  "then",
  "else",
] as const;

const DEFINITION_MAP_KEYWORDS = ["properties", "patternProperties", "definitions", "$defs"] as const;

const JSON_VALUE_KEYWORDS = ["const", "default"] as const;

/** Values nested deeper than this are not accepted as JSON values */
const MAX_VALUE_DEPTH = 64;

function isOneOf<T extends string>(list: readonly T[], key: string): key is T {
  return list.some(item => item === key);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === "string");
}

/**
 * True for finite, acyclic JSON data nested at most MAX_VALUE_DEPTH levels
 */
export function isJsonValue(value: unknown): value is JSONSchema7Type {
  return checkJsonValue(value, new Set(), 0);
}

function checkJsonValue(value: unknown, ancestors: Set<object>, depth: number): boolean {
  if (value === null || typeof value === "string" || typeof value === "boolean") {
    return true;
  }
  if (typeof value === "number") {
    return Number.isFinite(value);
  }
  if (typeof value !== "object" || depth >= MAX_VALUE_DEPTH || ancestors.has(value)) {
    return false;
  }

  const children = Array.isArray(value) ? value : isRecord(value) ? Object.values(value) : undefined;
  if (children === undefined) {
    return false;
  }
  ancestors.add(value);
  try {
    return children.every(child => checkJsonValue(child, ancestors, depth + 1));
  } finally {
    ancestors.delete(value);
  }
}

function isJsonArray(value: unknown): value is JSONSchema7Type[] {
  return Array.isArray(value) && isJsonValue(value);
}

function isCount(value: unknown): value is number {
  return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

/** Short description of a value for messages; never serializes it */
function describeValue(value: unknown): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "string") return `"${value}"`;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return typeof value;
}

function isNullBranch(value: unknown): boolean {
  return isRecord(value) && value.type === "null" && Object.keys(value).every(key => key === "type" || key === "description");
}

type Unwrapped = { kind: "node"; value: unknown } | { kind: "cycle" };

function unwrap(value: unknown): Unwrapped {
  const visited = new Set<object>();
  let current = value;
  while (isRecord(current)) {
    const keys = Object.keys(current);
    const [onlyKey] = keys;
    if (keys.length !== 1 || onlyKey === undefined || !isOneOf(WRAPPER_KEYS, onlyKey)) {
      break;
    }
    const inner = current[onlyKey];
    if (!isRecord(inner)) {
      break;
    }
    visited.add(current);
    if (visited.has(inner)) {
      return { kind: "cycle" };
    }
    current = inner;
  }
  return { kind: "node", value: current };
}

type NodeResult = {
  schema: JSONSchema7;
  optional: boolean;  // a null alternative was dropped
};

type DefinitionResult = {
  schema: JSONSchema7Definition;
  optional: boolean;
};

type TypeResult =
  | { kind: "ok"; type?: JSONSchema7TypeName | JSONSchema7TypeName[]; nullable: boolean; notes: string[] }
  | { kind: "degrade"; reason: string };

class SchemaNormalizer {
  readonly warnings: SchemaWarning[] = [];
  private readonly ancestors = new Set<object>();
  private readonly nullFallback: JsonSchemaPrimitive;
  private readonly typeMappings: Record<string, JsonSchemaPrimitive>;

  constructor(options: NormalizeOptions) {
    this.nullFallback = options.nullFallback ?? "string";
    this.typeMappings = options.typeMappings ?? DEFAULT_TYPE_MAPPINGS;
  }

  warn(path: string, message: string): void {
    this.warnings.push({ path, message });
  }

  definition(value: unknown, path: string, depth: number): DefinitionResult {
    if (typeof value === "boolean") {
      return { schema: value, optional: false };
    }
    return this.node(value, path, depth);
  }

  node(value: unknown, path: string, depth: number): NodeResult {
    const unwrapped = unwrap(value);
    if (unwrapped.kind === "cycle") {
      this.warn(path, "Circular schema wrapper");
      return { schema: {}, optional: false };
    }

    const node = unwrapped.value;
    if (!isRecord(node)) {
      this.warn(path, `Expected a schema object, got ${Array.isArray(node) ? "array" : typeof node}`);
      return { schema: {}, optional: false };
    }
    if (depth > MAX_SCHEMA_DEPTH) {
      this.warn(path, `Schema nesting exceeds ${MAX_SCHEMA_DEPTH} levels`);
      return { schema: {}, optional: false };
    }
    if (this.ancestors.has(node)) {
      this.warn(path, "Circular schema reference");
      return { schema: {}, optional: false };
    }

    this.ancestors.add(node);
    try {
      return this.build(node, path, depth);
    } finally {
      this.ancestors.delete(node);
    }
  }

  private resolveTypeName(name: string, notes: string[]): JSONSchema7TypeName | undefined {
    if (name !== "null" && isOneOf(STANDARD_TYPES, name)) {
      return name;
    }
    const mapped = Object.hasOwn(this.typeMappings, name) ? this.typeMappings[name] : undefined;
    if (mapped !== undefined) {
      notes.push(`(original type: ${name})`);
      return mapped;
    }
    return undefined;
  }

  private type(value: unknown): TypeResult {
    const notes: string[] = [];

    if (typeof value === "string") {
      if (value === "null") {
        return { kind: "ok", type: this.nullFallback, nullable: false, notes: ["(original type: null)"] };
      }
      const resolved = this.resolveTypeName(value, notes);
      return resolved === undefined
        ? { kind: "degrade", reason: `Unsupported type "${value}"` }
        : { kind: "ok", type: resolved, nullable: false, notes };
    }

    if (isStringArray(value)) {
      const hasNull = value.includes("null");
      const concrete: JSONSchema7TypeName[] = [];
      for (const name of value) {
        if (name === "null") continue;
        const resolved = this.resolveTypeName(name, notes);
        if (resolved === undefined) {
          return { kind: "degrade", reason: `Unsupported type "${name}"` };
        }
        if (!concrete.includes(resolved)) {
          concrete.push(resolved);
        }
      }

      const [single] = concrete;
      if (single === undefined) {
        return hasNull
          ? { kind: "ok", type: this.nullFallback, nullable: false, notes: [...notes, "(original type: null)"] }
          : { kind: "degrade", reason: "Empty type list" };
      }
      if (hasNull && concrete.length === 1) {
        return { kind: "ok", type: single, nullable: true, notes };
      }
      return { kind: "ok", type: concrete, nullable: hasNull, notes };
    }

    return { kind: "degrade", reason: `Unrecognized type value: ${describeValue(value)}` };
  }

  private build(node: Record<string, unknown>, path: string, depth: number): NodeResult {
    const out: JSONSchema7 = {};
    const notes: string[] = [];
    const optionalProperties = new Set<string>();
    let optional = node.nullable === true;
    let required: string[] | undefined;
    let droppedNullBranch = false;
    let nullOnlyUnion = false;

    if ("type" in node) {
      const result = this.type(node.type);
      if (result.kind === "degrade") {
        this.warn(path, `${result.reason}; degraded to an unconstrained schema`);
        return { schema: typeof node.description === "string" ? { description: node.description } : {}, optional: false };
      }
      if (result.type !== undefined) {
        out.type = result.type;
      }
      optional = optional || result.nullable;
      notes.push(...result.notes);
    }

    for (const [key, value] of Object.entries(node)) {
      const at = `${path}/${key}`;

      if (key === "type" || key === "nullable") {
        continue;
      }

      if (isOneOf(STRING_KEYWORDS, key)) {
        if (typeof value === "string") out[key] = value;
        else this.warn(at, "Expected a string; keyword dropped");
      } else if (isOneOf(NUMBER_KEYWORDS, key)) {
        if (typeof value === "number" && Number.isFinite(value)) out[key] = value;
        else this.warn(at, "Expected a number; keyword dropped");
      } else if (isOneOf(COUNT_KEYWORDS, key)) {
        if (isCount(value)) out[key] = value;
        else this.warn(at, "Expected a non-negative integer; keyword dropped");
      } else if (key === "multipleOf") {
        if (typeof value === "number" && Number.isFinite(value) && value > 0) out.multipleOf = value;
        else this.warn(at, "Expected a number greater than 0; keyword dropped");
      } else if (isOneOf(BOOLEAN_KEYWORDS, key)) {
        if (typeof value === "boolean") out[key] = value;
        else this.warn(at, "Expected a boolean; keyword dropped");
      } else if (isOneOf(DEFINITION_KEYWORDS, key)) {
        out[key] = this.definition(value, at, depth + 1).schema;
      } else if (isOneOf(DEFINITION_MAP_KEYWORDS, key)) {
        if (!isRecord(value)) {
          this.warn(at, "Expected an object of schemas; keyword dropped");
          continue;
        }
        const mapped: Record<string, JSONSchema7Definition> = {};
        for (const [name, entry] of Object.entries(value)) {
          const result = this.definition(entry, `${at}/${name}`, depth + 1);
          mapped[name] = result.schema;
          if (key === "properties" && result.optional) {
            optionalProperties.add(name);
          }
        }
        out[key] = mapped;
      } else if (isOneOf(JSON_VALUE_KEYWORDS, key)) {
        if (isJsonValue(value)) out[key] = value;
        else this.warn(at, "Expected a JSON value; keyword dropped");
      } else if (key === "enum" || key === "examples") {
        if (!isJsonArray(value)) this.warn(at, "Expected an array of JSON values; keyword dropped");
        else if (key === "enum") out.enum = value;
        else out.examples = value;
      } else if (key === "required") {
        if (!isStringArray(value)) {
          this.warn(at, "Expected an array of property names; keyword dropped");
          continue;
        }
        required = [...new Set(value)];
        if (required.length < value.length) {
          this.warn(at, "Duplicate property names removed");
        }
      } else if (key === "items") {
        if (Array.isArray(value)) {
          out.items = value.map((item, index) => this.definition(item, `${at}/${index}`, depth + 1).schema);
        } else {
          out.items = this.definition(value, at, depth + 1).schema;
        }
      } else if (key === "anyOf" || key === "oneOf" || key === "allOf") {
        if (!Array.isArray(value) || value.length === 0) {
          this.warn(at, "Expected a non-empty array of schemas; keyword dropped");
          continue;
        }
        const branches: JSONSchema7Definition[] = [];
        value.forEach((branch, index) => {
          if (key !== "allOf" && isNullBranch(branch)) {
            return;
          }
          branches.push(this.definition(branch, `${at}/${index}`, depth + 1).schema);
        });
        if (branches.length === 0) {
          // Every branch was null: same as a null-only type
          nullOnlyUnion = true;
          continue;
        }
        if (branches.length < value.length) {
          droppedNullBranch = true;
          optional = true;
        }
        out[key] = branches;
      } else if (key === "dependencies") {
        if (!isRecord(value)) {
          this.warn(at, "Expected an object; keyword dropped");
          continue;
        }
        const dependencies: Record<string, JSONSchema7Definition | string[]> = {};
        for (const [name, entry] of Object.entries(value)) {
          dependencies[name] = isStringArray(entry) ? entry : this.definition(entry, `${at}/${name}`, depth + 1).schema;
        }
        out.dependencies = dependencies;
      }
      // Vendor extensions and annotation keywords outside draft-07 are dropped
    }

    if (droppedNullBranch) {
      inlineSingleBranch(out, "anyOf");
      inlineSingleBranch(out, "oneOf");
    }

    if (nullOnlyUnion && out.type === undefined) {
      out.type = this.nullFallback;
      notes.push("(original type: null)");
    }

    if (required !== undefined) {
      const kept = required.filter(name => !optionalProperties.has(name));
      if (kept.length > 0 || required.length === 0) {
        out.required = kept;
      }
    }

    if (notes.length > 0) {
      out.description = [out.description, ...notes].filter(part => part !== undefined && part !== "").join(" ");
    }

    return { schema: out, optional };
  }
}

/**
 * Merge a lone remaining union branch into its parent node
 */
function inlineSingleBranch(out: JSONSchema7, key: "anyOf" | "oneOf"): void {
  const branches = out[key];
  if (branches === undefined || branches.length > 1) {
    return;
  }
  delete out[key];
  const [branch] = branches;
  if (branch === undefined || typeof branch === "boolean") {
    return;
  }
  for (const [name, value] of Object.entries(branch)) {
    if (!(name in out)) {
      Object.assign(out, { [name]: value });
    }
  }
}

function isObjectType(type: JSONSchema7["type"]): boolean {
  return type === "object" || (Array.isArray(type) && type.length === 1 && type[0] === "object");
}

/**
 * Normalize any schema node into valid draft-07 JSON Schema. Never throws.
 */
export function normalizeSchema(raw: unknown, options: NormalizeOptions = {}): NormalizeResult {
  const normalizer = new SchemaNormalizer(options);
  const { schema } = normalizer.node(raw, "#", 0);
  return { schema, warnings: normalizer.warnings };
}

/**
 * Normalize a tool input schema: the result is always an object schema.
 */
export function normalizeInputSchema(raw: unknown, options: NormalizeOptions = {}): NormalizeResult {
  if (raw === undefined || raw === null) {
    return { schema: { type: "object", properties: {} }, warnings: [] };
  }

  const normalizer = new SchemaNormalizer(options);
  const { schema } = normalizer.node(raw, "#", 0);

  if (schema.type === undefined) {
    return {
      schema: { type: "object", ...schema, ...(schema.properties === undefined ? { properties: {} } : {}) },
      warnings: normalizer.warnings,
    };
  }

  if (!isObjectType(schema.type)) {
    normalizer.warn("#/type", `Tool input must be an object schema, got ${JSON.stringify(schema.type)}`);
    return { schema: { type: "object", properties: {} }, warnings: normalizer.warnings };
  }

  return { schema, warnings: normalizer.warnings };
}
