import { z } from "zod";
import type { RawToolDefinition } from "../catalog/types";
import type { SourceDescriptor } from "../config";
import { SourceDescriptorSchema } from "../config";
import { isRecord } from "../catalog/schema";
import { MalformedResponseError } from "./errors";
import { convertOpenApi, isOpenApiDocument } from "./openapi";

/**
 * A tool entry in a manual. `inputs`/`outputs` are accepted as aliases of
 * `inputSchema`/`outputSchema`, and `tool_call_template` of `callTemplate`.
 */
function manualToolSchema(sourceName: string) {
  const callTemplate = z.preprocess(
    value => (isRecord(value) && !("name" in value) ? { ...value, name: sourceName } : value),
    SourceDescriptorSchema,
  );

  return z
    .object({
      name: z.string().min(1),
      description: z.string().default(""),
      inputSchema: z.unknown().optional(),
      inputs: z.unknown().optional(),
      outputSchema: z.unknown().optional(),
      outputs: z.unknown().optional(),
      tags: z.array(z.string()).default([]),
      callTemplate: callTemplate.optional(),
      tool_call_template: callTemplate.optional(),
    })
    .transform((tool): RawToolDefinition => {
      const definition: RawToolDefinition = {
        rawName: tool.name,
        description: tool.description,
        rawInputSchema: tool.inputSchema ?? tool.inputs,
        tags: tool.tags,
      };
      const outputSchema = tool.outputSchema ?? tool.outputs;
      if (outputSchema !== undefined) {
        definition.rawOutputSchema = outputSchema;
      }
      const template = tool.callTemplate ?? tool.tool_call_template;
      if (template !== undefined) {
        definition.callTemplate = template;
      }
      return definition;
    });
}

export function manualSchema(sourceName: string) {
  return z.object({
    version: z.string().optional(),
    tools: z.array(manualToolSchema(sourceName)),
  });
}

/**
 * Parse a decoded manual document (tool manifest or OpenAPI/Swagger)
 */
export function parseManual(document: unknown, source: SourceDescriptor, baseUrl?: string): RawToolDefinition[] {
  if (isOpenApiDocument(document)) {
    return convertOpenApi(document, { sourceName: source.name, baseUrl });
  }

  const result = manualSchema(source.name).safeParse(document);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join(", ");
    throw new MalformedResponseError(`Invalid manual from ${source.name}: ${issues}`);
  }
  return result.data.tools;
}

/**
 * Decode JSON text, reporting malformed payloads as driver errors
 */
export function decodeJson(text: string, what: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new MalformedResponseError(`${what} is not valid JSON`, { cause: error });
  }
}

export function tryDecodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
