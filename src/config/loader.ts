import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import { z } from "zod";
import { readFile } from "fs/promises";
import type { Config, ConfigInput, ConnectionConfig, SchemaSettings, SettingsConfig } from "./schema";
import { ConfigSchema, ConnectionConfigSchema, SchemaSettingsSchema, SettingsConfigSchema } from "./schema";

export type ConfigParseResult = z.SafeParseReturnType<ConfigInput, Config>;

/**
 * Settings with every default applied
 */
export type ResolvedSettings = Required<Omit<SettingsConfig, "connection" | "schema">> & {
  connection: ConnectionConfig;
  schema: SchemaSettings;
};

function failure(message: string): ConfigParseResult {
  return {
    success: false,
    error: new z.ZodError<ConfigInput>([{ code: z.ZodIssueCode.custom, message, path: [] }]),
  };
}

/**
 * Interpolate environment variables in config values
 * Handles {env:VAR_NAME} pattern
 */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    // Replace {env:VAR_NAME} with actual env var or empty string
    return value.replace(/\{env:([A-Za-z_][A-Za-z0-9_]*)\}/g, (_, varName: string) => env[varName] ?? "");
  }

  if (Array.isArray(value)) {
    return value.map(item => interpolateEnvVars(item, env));
  }

  if (value !== null && typeof value === "object") {
    const result: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(value)) {
      result[key] = interpolateEnvVars(entry, env);
    }
    return result;
  }

  return value;
}

/**
 * Parse and validate a JSONC adapter config
 * @param jsonc - JSONC string (may contain comments and trailing commas)
 */
export function parseConfig(jsonc: string, env: NodeJS.ProcessEnv = process.env): ConfigParseResult {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(jsonc, errors, { allowTrailingComma: true });

  const [firstError] = errors;
  if (firstError) {
    return failure(
      `Failed to parse JSONC: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`,
    );
  }

  return ConfigSchema.safeParse(interpolateEnvVars(parsed, env));
}

/**
 * Load config from file path
 */
export async function loadConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): Promise<ConfigParseResult> {
  let content: string;
  try {
    content = await readFile(filePath, "utf-8");
  } catch (error) {
    return failure(`Failed to read config file: ${error instanceof Error ? error.message : String(error)}`);
  }
  return parseConfig(content, env);
}

export function resolveSettings(settings?: SettingsConfig): ResolvedSettings {
  const base = SettingsConfigSchema.parse(settings ?? {});
  return {
    namespaceTools: base.namespaceTools,
    searchLimit: base.searchLimit,
    connection: ConnectionConfigSchema.parse(base.connection ?? {}),
    schema: SchemaSettingsSchema.parse(base.schema ?? {}),
  };
}

export function formatConfigIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join(", ");
}
