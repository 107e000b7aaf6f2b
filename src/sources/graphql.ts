import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { SourceDescriptor, SourceDescriptorOf } from "../config";
import { isRecord } from "../catalog/schema";
import { expectProtocol, MalformedResponseError, RemoteToolError, SourceTimeoutError } from "./errors";
import type { FetchLike } from "./http";
import { decodeJson } from "./manual";
import { createSession } from "./session";
import type { DriverOptions, SourceSession, ToolSourceDriver } from "./types";

type GraphqlSource = SourceDescriptorOf<"graphql">;

/** Subset of the introspection type reference we rely on */
type TypeRef = { kind: string; name: string | null; ofType: TypeRef | null };

type FieldInfo = {
  name: string;
  description: string | null;
  args: Array<{ name: string; description: string | null; type: TypeRef }>;
  type: TypeRef;
};

type Operation = {
  field: string;
  operationType: "query" | "mutation";
  argTypes: Map<string, string>;
  selection: string;
};

const DEFAULT_REQUEST_TIMEOUT = 30000;

const TYPE_REF_FRAGMENT = `kind name ofType { kind name ofType { kind name ofType { kind name ofType { kind name } } } }`;

export const INTROSPECTION_QUERY = `query ToolIntrospection {
  __schema {
    queryType { name }
    mutationType { name }
    types {
      kind
      name
      fields {
        name
        description
        args { name description type { ${TYPE_REF_FRAGMENT} } }
        type { ${TYPE_REF_FRAGMENT} }
      }
    }
  }
}`;

const SCALAR_SCHEMAS: Record<string, Record<string, unknown>> = {
  String: { type: "string" },
  ID: { type: "string" },
  Int: { type: "integer" },
  Float: { type: "number" },
  Boolean: { type: "boolean" },
};

function parseTypeRef(value: unknown): TypeRef | null {
  if (!isRecord(value) || typeof value.kind !== "string") {
    return null;
  }
  return {
    kind: value.kind,
    name: typeof value.name === "string" ? value.name : null,
    ofType: parseTypeRef(value.ofType),
  };
}

function parseFields(value: unknown): FieldInfo[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const fields: FieldInfo[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.name !== "string") continue;
    const type = parseTypeRef(entry.type);
    if (!type) continue;
    const args = Array.isArray(entry.args) ? entry.args : [];
    fields.push({
      name: entry.name,
      description: typeof entry.description === "string" ? entry.description : null,
      type,
      args: args.flatMap(arg => {
        const argType = isRecord(arg) ? parseTypeRef(arg.type) : null;
        return isRecord(arg) && typeof arg.name === "string" && argType
          ? [{ name: arg.name, description: typeof arg.description === "string" ? arg.description : null, type: argType }]
          : [];
      }),
    });
  }
  return fields;
}

/** Render a type reference in GraphQL syntax, e.g. [String!]! */
export function renderTypeRef(ref: TypeRef): string {
  if (ref.kind === "NON_NULL" && ref.ofType) return `${renderTypeRef(ref.ofType)}!`;
  if (ref.kind === "LIST" && ref.ofType) return `[${renderTypeRef(ref.ofType)}]`;
  return ref.name ?? "String";
}

function namedType(ref: TypeRef): TypeRef {
  return ref.ofType && (ref.kind === "NON_NULL" || ref.kind === "LIST") ? namedType(ref.ofType) : ref;
}

/** JSON Schema for an argument type; non-null wrappers are handled by `required` */
export function typeRefSchema(ref: TypeRef): Record<string, unknown> {
  if (ref.kind === "NON_NULL" && ref.ofType) return typeRefSchema(ref.ofType);
  if (ref.kind === "LIST" && ref.ofType) return { type: "array", items: typeRefSchema(ref.ofType) };
  if (ref.kind === "SCALAR" && ref.name && SCALAR_SCHEMAS[ref.name]) return { ...SCALAR_SCHEMAS[ref.name] };
  if (ref.kind === "ENUM") return { type: "string", description: `${ref.name ?? "enum"} value` };
  if (ref.kind === "INPUT_OBJECT") return { type: "object", description: `${ref.name ?? "input"} object` };
  return {};
}

/**
 * GraphQL source: one tool per root query (or mutation) field
 */
export class GraphqlDriver implements ToolSourceDriver {
  readonly protocolKind = "graphql";
  private readonly fetch: FetchLike;
  private readonly requestTimeout: number;
  private readonly operations = new Map<SourceSession, Map<string, Operation>>();

  constructor(options: DriverOptions & { fetch?: FetchLike } = {}) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    const session = createSession(expectProtocol(source, "graphql"));
    this.operations.set(session, new Map());
    return session;
  }

  async closeSession(session: SourceSession): Promise<void> {
    this.operations.delete(session);
  }

  private async post(source: GraphqlSource, query: string, variables: Record<string, unknown>): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetch(source.url, {
        method: "POST",
        headers: { "Content-Type": "application/json", Accept: "application/json", ...source.headers },
        body: JSON.stringify({ query, variables }),
        signal: AbortSignal.timeout(this.requestTimeout),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new SourceTimeoutError(`GraphQL request to ${source.name} timed out after ${this.requestTimeout}ms`, {
          cause: error,
        });
      }
      throw error;
    }

    const text = await response.text();
    if (!response.ok) {
      throw new RemoteToolError(`HTTP ${response.status} ${response.statusText}: ${text.slice(0, 500)}`, {
        status: response.status,
      });
    }

    const payload = decodeJson(text, `GraphQL response from ${source.name}`);
    if (!isRecord(payload)) {
      throw new MalformedResponseError(`GraphQL response from ${source.name} is not an object`);
    }
    if (Array.isArray(payload.errors) && payload.errors.length > 0) {
      const messages = payload.errors.map(error => (isRecord(error) && typeof error.message === "string" ? error.message : String(error)));
      throw new RemoteToolError(`GraphQL errors: ${messages.join("; ")}`);
    }
    return payload.data;
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = expectProtocol(session.source, "graphql");
    const data = await this.post(source, INTROSPECTION_QUERY, {});
    const schema = isRecord(data) ? data.__schema : undefined;
    if (!isRecord(schema) || !Array.isArray(schema.types)) {
      throw new MalformedResponseError(`Introspection result from ${source.name} has no schema`);
    }

    const rootKey = source.operationType === "mutation" ? "mutationType" : "queryType";
    const root = schema[rootKey];
    const rootName = isRecord(root) && typeof root.name === "string" ? root.name : undefined;
    if (rootName === undefined) {
      return [];
    }

    const types = new Map<string, FieldInfo[]>();
    for (const type of schema.types) {
      if (isRecord(type) && typeof type.name === "string") {
        types.set(type.name, parseFields(type.fields));
      }
    }

    const operations = new Map<string, Operation>();
    const tools: RawToolDefinition[] = [];

    for (const field of types.get(rootName) ?? []) {
      const properties: Record<string, unknown> = {};
      const required: string[] = [];
      const argTypes = new Map<string, string>();

      for (const arg of field.args) {
        properties[arg.name] = {
          ...typeRefSchema(arg.type),
          ...(arg.description ? { description: arg.description } : {}),
        };
        argTypes.set(arg.name, renderTypeRef(arg.type));
        if (arg.type.kind === "NON_NULL") required.push(arg.name);
      }

      operations.set(field.name, {
        field: field.name,
        operationType: source.operationType,
        argTypes,
        selection: selectionFor(namedType(field.type), types),
      });

      tools.push({
        rawName: field.name,
        description: field.description ?? "",
        rawInputSchema: { type: "object", properties, ...(required.length > 0 ? { required } : {}) },
        tags: [source.operationType],
      });
    }

    this.operations.set(session, operations);
    return tools;
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const source = expectProtocol(session.source, "graphql");
    const operation = this.operations.get(session)?.get(tool.rawName);
    if (!operation) {
      throw new Error(`GraphQL field ${tool.rawName} was not discovered on ${source.name}`);
    }

    const document = buildOperation(operation, args);
    const data = await this.post(source, document.query, document.variables);
    return isRecord(data) ? data[operation.field] : data;
  }
}

/**
 * Scalar fields of an object result; scalar results need no selection
 */
function selectionFor(type: TypeRef, types: Map<string, FieldInfo[]>): string {
  if (type.kind !== "OBJECT" && type.kind !== "INTERFACE") {
    return "";
  }
  const scalars = (types.get(type.name ?? "") ?? [])
    .filter(field => field.args.length === 0)
    .filter(field => {
      const kind = namedType(field.type).kind;
      return kind === "SCALAR" || kind === "ENUM";
    })
    .map(field => field.name);
  return ` { ${["__typename", ...scalars].join(" ")} }`;
}

export function buildOperation(
  operation: Operation,
  args: Record<string, unknown>,
): { query: string; variables: Record<string, unknown> } {
  const variables: Record<string, unknown> = {};
  const declarations: string[] = [];
  const bindings: string[] = [];

  for (const [name, type] of operation.argTypes) {
    if (args[name] === undefined) continue;
    variables[name] = args[name];
    declarations.push(`$${name}: ${type}`);
    bindings.push(`${name}: $${name}`);
  }

  const header = declarations.length > 0 ? `(${declarations.join(", ")})` : "";
  const call = bindings.length > 0 ? `(${bindings.join(", ")})` : "";
  return {
    query: `${operation.operationType} Call${header} { ${operation.field}${call}${operation.selection} }`,
    variables,
  };
}
