// Tool source adapter
// Aggregates tools from http, sse, streamableHttp, cli, graphql, mcp, tcp, udp
// and text sources into one catalog with one call interface

export { ToolAdapter, withToolAdapter } from "./adapter";
export type { ToolAdapterOptions, Diagnostics, AdapterStatus, HealthStatus } from "./adapter";

export {
  ToolAdapterError,
  TOOL_ADAPTER_ERROR_TAXONOMY,
  isToolAdapterError,
  type ToolAdapterErrorKind,
  type InvocationFailure,
} from "./errors";

export { makeLogger, makeNoopLogger, type Logger } from "./logger";

export {
  ConfigSchema,
  SourceDescriptorSchema,
  parseConfig,
  loadConfig,
  resolveSettings,
  type Config,
  type ConfigInput,
  type SourceDescriptor,
  type SourceDescriptorInput,
  type ProtocolKind,
  type ResolvedSettings,
} from "./config";

export {
  ToolCatalog,
  buildCatalog,
  NameSanitizer,
  sanitizeToolName,
  normalizeSchema,
  normalizeInputSchema,
  type AdaptedTool,
  type RawTool,
  type RawToolDefinition,
  type SearchResult,
  type SchemaWarning,
} from "./catalog";

export { searchWithRegex, type RegexSearchError } from "./search";
export { discoverTools, type DiscoveryResult } from "./discovery";
export { InvocationDispatcher, classifyFailure } from "./dispatcher";
export { SessionManager, type StartOptions, type StopReport, type SourceState } from "./lifecycle";
export { AdaptedHostTool, type HostTool, type ToolSpec, type ToolUse, type ToolResultRecord } from "./host";
export { Profiler, type PerformanceReport } from "./profiler";

export {
  ToolSourceLibrary,
  createDefaultLibrary,
  SourceTimeoutError,
  RemoteToolError,
  MalformedResponseError,
  type ToolSourceDriver,
  type SourceSession,
  type DefaultLibraryOptions,
} from "./sources";
