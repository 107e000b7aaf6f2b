import type { RawToolDefinition } from "../catalog/types";
import type { SourceDescriptorOf } from "../config";
import { HttpMethodSchema } from "../config";
import { isRecord } from "../catalog/schema";

type OpenApiDocument = Record<string, unknown> & { paths: Record<string, unknown> };

type ConvertOptions = {
  sourceName: string;
  /** URL the document was fetched from; resolves relative servers */
  baseUrl?: string;
};

const MAX_REF_DEPTH = 32;

const PARAMETER_SCHEMA_KEYS = [
  "type",
  "format",
  "items",
  "enum",
  "default",
  "minimum",
  "maximum",
  "pattern",
  "minLength",
  "maxLength",
] as const;

export function isOpenApiDocument(document: unknown): document is OpenApiDocument {
  return (
    isRecord(document) &&
    (typeof document.openapi === "string" || typeof document.swagger === "string") &&
    isRecord(document.paths)
  );
}

function lookupPointer(document: OpenApiDocument, ref: string): unknown {
  if (!ref.startsWith("#/")) {
    return undefined;
  }
  let current: unknown = document;
  for (const segment of ref.slice(2).split("/")) {
    const key = segment.replace(/~1/g, "/").replace(/~0/g, "~");
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[key];
  }
  return current;
}

/**
 * Inline local $refs. Cycles and unresolvable refs become `{}`.
 */
function resolveRefs(value: unknown, document: OpenApiDocument, visiting: string[] = []): unknown {
  if (Array.isArray(value)) {
    return value.map(item => resolveRefs(item, document, visiting));
  }
  if (!isRecord(value)) {
    return value;
  }

  const ref = value.$ref;
  if (typeof ref === "string") {
    if (visiting.includes(ref) || visiting.length >= MAX_REF_DEPTH) {
      return {};
    }
    const target = lookupPointer(document, ref);
    return target === undefined ? {} : resolveRefs(target, document, [...visiting, ref]);
  }

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    result[key] = resolveRefs(entry, document, visiting);
  }
  return result;
}

function stringAt(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

function serverUrl(document: OpenApiDocument, baseUrl?: string): string {
  let server: string | undefined;

  if (Array.isArray(document.servers)) {
    const [first] = document.servers;
    server = isRecord(first) ? stringAt(first, "url") : undefined;
  } else if (typeof document.host === "string") {
    const schemes = Array.isArray(document.schemes) ? document.schemes : [];
    const scheme = schemes.includes("https") || schemes.length === 0 ? "https" : String(schemes[0]);
    server = `${scheme}://${document.host}${stringAt(document, "basePath") ?? ""}`;
  } else if (typeof document.basePath === "string") {
    server = document.basePath;
  }

  if (baseUrl === undefined) {
    return (server ?? "").replace(/\/$/, "");
  }
  try {
    return new URL(server ?? "/", baseUrl).toString().replace(/\/$/, "");
  } catch {
    return (server ?? "").replace(/\/$/, "");
  }
}

function operationName(method: string, path: string, operation: Record<string, unknown>): string {
  const operationId = stringAt(operation, "operationId");
  if (operationId) {
    return operationId;
  }
  const slug = path.replace(/[{}]/g, "").replace(/[^A-Za-z0-9]+/g, "_").replace(/^_+|_+$/g, "");
  return slug ? `${method}_${slug}` : method;
}

function parameterSchema(parameter: Record<string, unknown>): unknown {
  if (parameter.schema !== undefined) {
    const schema = parameter.schema;
    const description = stringAt(parameter, "description");
    return isRecord(schema) && description !== undefined && schema.description === undefined
      ? { ...schema, description }
      : schema;
  }

  // Swagger 2 non-body parameters carry the schema inline
  const schema: Record<string, unknown> = {};
  for (const key of PARAMETER_SCHEMA_KEYS) {
    if (parameter[key] !== undefined) {
      schema[key] = parameter[key];
    }
  }
  const description = stringAt(parameter, "description");
  if (description !== undefined) {
    schema.description = description;
  }
  return schema;
}

function jsonContentSchema(container: unknown): unknown {
  if (!isRecord(container)) {
    return undefined;
  }
  if (container.schema !== undefined) {
    return container.schema;
  }
  if (!isRecord(container.content)) {
    return undefined;
  }
  const json = container.content["application/json"] ?? Object.values(container.content)[0];
  return isRecord(json) ? json.schema : undefined;
}

function responseSchema(operation: Record<string, unknown>): unknown {
  const responses = operation.responses;
  if (!isRecord(responses)) {
    return undefined;
  }
  return jsonContentSchema(responses["200"] ?? responses["201"] ?? responses.default);
}

/**
 * Convert an OpenAPI 3 or Swagger 2 document into one tool per operation
 */
export function convertOpenApi(document: OpenApiDocument, options: ConvertOptions): RawToolDefinition[] {
  const resolved = resolveRefs(document, document);
  if (!isOpenApiDocument(resolved)) {
    return [];
  }

  const base = serverUrl(resolved, options.baseUrl);
  const tools: RawToolDefinition[] = [];

  for (const [path, pathItem] of Object.entries(resolved.paths)) {
    if (!isRecord(pathItem)) continue;
    const sharedParameters = Array.isArray(pathItem.parameters) ? pathItem.parameters : [];

    for (const method of HttpMethodSchema.options) {
      const operation = pathItem[method.toLowerCase()];
      if (!isRecord(operation)) continue;

      const properties: Record<string, unknown> = {};
      const required: string[] = [];
      const headerFields: string[] = [];
      let bodyField: string | undefined;

      const parameters = [...sharedParameters, ...(Array.isArray(operation.parameters) ? operation.parameters : [])];
      for (const parameter of parameters) {
        if (!isRecord(parameter)) continue;
        const name = stringAt(parameter, "name");
        const location = stringAt(parameter, "in");
        if (!name || !location || location === "cookie") continue;

        properties[name] = parameterSchema(parameter);
        if (parameter.required === true) required.push(name);
        if (location === "header") headerFields.push(name);
        if (location === "body") bodyField = name;
      }

      const requestBody = operation.requestBody;
      const bodySchema = jsonContentSchema(requestBody);
      if (bodySchema !== undefined) {
        bodyField = "body";
        properties.body = bodySchema;
        if (isRecord(requestBody) && requestBody.required === true) required.push("body");
      }

      const callTemplate: SourceDescriptorOf<"http"> = {
        protocolKind: "http",
        name: options.sourceName,
        url: `${base}${path}`,
        httpMethod: method,
        contentType: "application/json",
      };
      if (headerFields.length > 0) callTemplate.headerFields = headerFields;
      if (bodyField !== undefined) callTemplate.bodyField = bodyField;

      const tool: RawToolDefinition = {
        rawName: operationName(method.toLowerCase(), path, operation),
        description: stringAt(operation, "summary") ?? stringAt(operation, "description") ?? "",
        rawInputSchema: {
          type: "object",
          properties,
          ...(required.length > 0 ? { required } : {}),
        },
        tags: Array.isArray(operation.tags) ? operation.tags.filter((tag): tag is string => typeof tag === "string") : [],
        callTemplate,
      };
      const output = responseSchema(operation);
      if (output !== undefined) {
        tool.rawOutputSchema = output;
      }
      tools.push(tool);
    }
  }

  return tools;
}
