import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { RawTool, RawToolDefinition } from "../../catalog/types";
import { isRecord } from "../../catalog/schema";
import type { SourceDescriptor, SourceDescriptorOf } from "../../config";
import type { Logger } from "../../logger";
import { makeNoopLogger } from "../../logger";
import { expectProtocol, MalformedResponseError, RemoteToolError, withTimeout } from "../errors";
import { createSession } from "../session";
import type { DriverOptions, SourceSession, ToolSourceDriver } from "../types";
import { LocalMcpClient } from "./local";
import type { LocalMcpClientOptions } from "./local";
import { RemoteMcpClient } from "./remote";
import type { RemoteMcpClientOptions } from "./remote";
import type { McpClient } from "./types";

export type McpSource = SourceDescriptorOf<"mcp">;

/**
 * Factory function type for creating MCP clients
 * Used for dependency injection in tests
 */
export type McpClientFactory = (source: McpSource) => McpClient;

export type McpDriverOptions = DriverOptions & {
  clientFactory?: McpClientFactory;
  local?: LocalMcpClientOptions;
  remote?: Omit<RemoteMcpClientOptions, "logger">;
  logger?: Logger;
};

const DEFAULT_REQUEST_TIMEOUT = 30000;

export function toRawToolDefinition(tool: Tool): RawToolDefinition {
  const annotations = tool.annotations;
  const tags: string[] = [];
  if (annotations?.readOnlyHint) tags.push("read-only");
  if (annotations?.destructiveHint) tags.push("destructive");

  return {
    rawName: tool.name,
    description: tool.description ?? "",
    rawInputSchema: tool.inputSchema,
    rawOutputSchema: tool.outputSchema,
    tags,
  };
}

function textOf(content: unknown[]): string[] {
  return content.flatMap(item =>
    isRecord(item) && item.type === "text" && typeof item.text === "string" ? [item.text] : [],
  );
}

/**
 * Unwrap a tools/call result: structured content, else joined text, else
 * the raw content array. Error results raise RemoteToolError.
 */
export function unwrapCallResult(result: unknown): unknown {
  if (!isRecord(result)) {
    throw new MalformedResponseError("MCP tool result is not an object");
  }

  // Legacy servers answer with { toolResult }
  if (!("content" in result) && "toolResult" in result) {
    return result.toolResult;
  }

  const content = Array.isArray(result.content) ? result.content : [];
  const text = textOf(content);

  if (result.isError === true) {
    throw new RemoteToolError(text.length > 0 ? text.join("\n") : "MCP tool returned an error");
  }
  if (result.structuredContent !== undefined) {
    return result.structuredContent;
  }
  if (text.length > 0 && text.length === content.length) {
    return text.join("\n");
  }
  return content;
}

/**
 * MCP source: one client per session, stdio for local servers, streamable
 * HTTP with SSE fallback for remote ones
 */
export class McpDriver implements ToolSourceDriver {
  readonly protocolKind = "mcp";
  private readonly clients = new Map<SourceSession, McpClient>();
  private readonly clientFactory: McpClientFactory;
  private readonly requestTimeout: number;
  private readonly log: Logger;

  constructor(options: McpDriverOptions = {}) {
    const logger = options.logger ?? makeNoopLogger();
    this.log = logger.child({ component: "mcp" });
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
    this.clientFactory =
      options.clientFactory ??
      (source =>
        source.server.type === "local"
          ? new LocalMcpClient(source.name, source.server, options.local)
          : new RemoteMcpClient(source.name, source.server, { ...options.remote, logger }));
  }

  private clientFor(session: SourceSession): McpClient {
    const client = this.clients.get(session);
    if (!client) {
      throw new Error(`MCP session ${session.id} for ${session.source.name} is closed`);
    }
    return client;
  }

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    const mcpSource = expectProtocol(source, "mcp");
    const client = this.clientFactory(mcpSource);

    try {
      await withTimeout(
        client.connect(),
        this.requestTimeout,
        `Connection to ${source.name} timed out after ${this.requestTimeout}ms`,
      );
    } catch (error) {
      await client.close().catch((closeError: unknown) => {
        this.log.debug({ err: closeError, source: source.name }, "closing client after failed connect");
      });
      throw error;
    }

    const session = createSession(mcpSource);
    this.clients.set(session, client);
    return session;
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const tools = await withTimeout(
      this.clientFor(session).listTools(),
      this.requestTimeout,
      `Listing tools from ${session.source.name} timed out after ${this.requestTimeout}ms`,
    );
    return tools.map(toRawToolDefinition);
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const result = await withTimeout(
      this.clientFor(session).callTool(tool.rawName, args),
      this.requestTimeout,
      `Tool execution timed out after ${this.requestTimeout}ms`,
    );
    return unwrapCallResult(result);
  }

  async closeSession(session: SourceSession): Promise<void> {
    const client = this.clients.get(session);
    if (!client) return;
    this.clients.delete(session);
    await client.close();
  }
}
