import { z } from "zod";

export const PROTOCOL_KINDS = [
  "http",
  "sse",
  "streamableHttp",
  "cli",
  "graphql",
  "mcp",
  "tcp",
  "udp",
  "text",
] as const;

export const HttpMethodSchema = z.enum(["GET", "POST", "PUT", "PATCH", "DELETE"]);

export const ApiKeyAuthSchema = z.object({
  authType: z.literal("apiKey"),
  apiKey: z.string().describe("Key value, usually an {env:VAR} placeholder"),
  varName: z.string().min(1).describe("Header or query parameter carrying the key"),
  location: z.enum(["header", "query"]).default("header"),
});

export const BasicAuthSchema = z.object({
  authType: z.literal("basic"),
  username: z.string(),
  password: z.string(),
});

export const AuthSchema = z.discriminatedUnion("authType", [ApiKeyAuthSchema, BasicAuthSchema]);

const sourceName = z
  .string()
  .min(1)
  .describe("Configuration-scoped source name, used as the tool namespace");

/**
 * Fields shared by the HTTP family (http, sse, streamableHttp)
 */
const httpFields = {
  name: sourceName,
  url: z.string().url().describe("Manual endpoint, or the tool endpoint for per-tool templates"),
  httpMethod: HttpMethodSchema.default("GET"),
  contentType: z.string().default("application/json"),
  headers: z.record(z.string(), z.string()).optional().describe("Static request headers"),
  bodyField: z.string().optional().describe("Argument sent as the whole request body"),
  headerFields: z.array(z.string()).optional().describe("Arguments sent as request headers"),
  auth: AuthSchema.optional(),
};

export const HttpSourceSchema = z.object({
  protocolKind: z.literal("http"),
  ...httpFields,
});

export const SseSourceSchema = z.object({
  protocolKind: z.literal("sse"),
  ...httpFields,
  eventType: z.string().optional().describe("Only collect events of this type"),
});

export const StreamableHttpSourceSchema = z.object({
  protocolKind: z.literal("streamableHttp"),
  ...httpFields,
});

/**
 * Spawns a process that prints its manual, or runs a tool, on stdout
 */
export const CliSourceSchema = z.object({
  protocolKind: z.literal("cli"),
  name: sourceName,
  command: z.array(z.string()).min(1).describe("Command and arguments"),
  environment: z.record(z.string(), z.string()).optional().describe("Environment variables for the process"),
  workingDir: z.string().optional(),
});

export const GraphqlSourceSchema = z.object({
  protocolKind: z.literal("graphql"),
  name: sourceName,
  url: z.string().url(),
  headers: z.record(z.string(), z.string()).optional(),
  operationType: z.enum(["query", "mutation"]).default("query"),
});

/**
 * Local MCP server configuration
 * Spawns a process and communicates via stdio
 */
export const LocalServerConfigSchema = z.object({
  type: z.literal("local"),
  command: z.array(z.string()).min(1).describe("Command and arguments to spawn the MCP server"),
  environment: z.record(z.string(), z.string()).optional().describe("Environment variables for the process"),
});

/**
 * Remote MCP server configuration
 * Streamable HTTP with SSE fallback
 */
export const RemoteServerConfigSchema = z.object({
  type: z.literal("remote"),
  url: z.string().url().describe("MCP endpoint URL"),
  headers: z.record(z.string(), z.string()).optional().describe("HTTP headers for authentication"),
});

export const ServerConfigSchema = z.discriminatedUnion("type", [
  LocalServerConfigSchema,
  RemoteServerConfigSchema,
]);

export const McpSourceSchema = z.object({
  protocolKind: z.literal("mcp"),
  name: sourceName,
  server: ServerConfigSchema,
});

const socketFields = {
  name: sourceName,
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
};

export const TcpSourceSchema = z.object({
  protocolKind: z.literal("tcp"),
  ...socketFields,
});

export const UdpSourceSchema = z.object({
  protocolKind: z.literal("udp"),
  ...socketFields,
});

export const TextSourceSchema = z.object({
  protocolKind: z.literal("text"),
  name: sourceName,
  filePath: z.string().min(1).describe("JSON/JSONC manual or OpenAPI document"),
});

export const SourceDescriptorSchema = z.discriminatedUnion("protocolKind", [
  HttpSourceSchema,
  SseSourceSchema,
  StreamableHttpSourceSchema,
  CliSourceSchema,
  GraphqlSourceSchema,
  McpSourceSchema,
  TcpSourceSchema,
  UdpSourceSchema,
  TextSourceSchema,
]);

/**
 * Connection settings applied by the source drivers
 */
export const ConnectionConfigSchema = z.object({
  /** Request timeout in milliseconds (default: 30000) */
  requestTimeout: z.number().min(100).max(300000).default(30000),
  /** Number of retry attempts when a session fails to open (default: 2) */
  retryAttempts: z.number().min(0).max(10).default(2),
  /** Base delay between retries in milliseconds (default: 1000) */
  retryDelay: z.number().min(0).max(30000).default(1000),
});

export const JsonSchemaPrimitiveSchema = z.enum([
  "string",
  "number",
  "integer",
  "boolean",
  "object",
  "array",
]);

export const SchemaSettingsSchema = z.object({
  /** Type used when `null` is the only type of a node */
  nullFallback: JsonSchemaPrimitiveSchema.default("string"),
  /** Non-standard type names and the primitive they map to */
  typeMappings: z.record(z.string(), JsonSchemaPrimitiveSchema).default({ file: "string" }),
});

export const SettingsConfigSchema = z.object({
  /** Prefix every tool name with its source name */
  namespaceTools: z.boolean().default(true),
  /** Default maximum number of search results */
  searchLimit: z.number().int().min(1).max(1000).default(100),
  connection: ConnectionConfigSchema.optional(),
  schema: SchemaSettingsSchema.optional(),
});

/**
 * Adapter configuration schema
 */
export const ConfigSchema = z
  .object({
    /** Tool sources, in discovery order */
    sources: z.array(SourceDescriptorSchema),
    settings: SettingsConfigSchema.optional(),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.sources.forEach((source, index) => {
      if (seen.has(source.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate source name: ${source.name}`,
          path: ["sources", index, "name"],
        });
      }
      seen.add(source.name);
    });
  });

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type SourceDescriptor = z.infer<typeof SourceDescriptorSchema>;
export type SourceDescriptorInput = z.input<typeof SourceDescriptorSchema>;
export type ProtocolKind = SourceDescriptor["protocolKind"];
export type SourceDescriptorOf<K extends ProtocolKind> = Extract<SourceDescriptor, { protocolKind: K }>;
export type HttpFamilySource = SourceDescriptorOf<"http" | "sse" | "streamableHttp">;
export type AuthConfig = z.infer<typeof AuthSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LocalServerConfig = z.infer<typeof LocalServerConfigSchema>;
export type RemoteServerConfig = z.infer<typeof RemoteServerConfigSchema>;
export type ConnectionConfig = z.infer<typeof ConnectionConfigSchema>;
export type SchemaSettings = z.infer<typeof SchemaSettingsSchema>;
export type SettingsConfig = z.infer<typeof SettingsConfigSchema>;
export type JsonSchemaPrimitive = z.infer<typeof JsonSchemaPrimitiveSchema>;

export function isProtocolKind<K extends ProtocolKind>(
  source: SourceDescriptor,
  kind: K,
): source is SourceDescriptorOf<K> {
  return source.protocolKind === kind;
}
