import type { Tool } from "@modelcontextprotocol/sdk/types.js";

export type McpTransportType = "stdio" | "streamable-http" | "sse";

/**
 * Connection to one MCP server, local or remote
 */
export type McpClient = {
  connect(): Promise<void>;
  listTools(): Promise<Tool[]>;
  callTool(name: string, args: Record<string, unknown>): Promise<unknown>;
  close(): Promise<void>;
};

/**
 * Transport-like interface for DI/testing
 */
export interface McpTransport {
  close(): Promise<void>;
}

/**
 * Client-like interface for DI/testing; the SDK Client satisfies it
 */
export interface McpClientLike {
  connect(transport: McpTransport): Promise<void>;
  listTools(): Promise<{ tools: Tool[] }>;
  callTool(request: { name: string; arguments: Record<string, unknown> }): Promise<unknown>;
}

export const MCP_CLIENT_VERSION = "0.1.0";

export function mcpClientName(sourceName: string): string {
  return `tool-source-adapter-${sourceName}`;
}
