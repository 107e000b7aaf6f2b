import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import type { McpClientLike, McpTransport } from "../../src/sources/mcp/types";

export function mcpTool(name: string, description?: string): Tool {
  return { name, description, inputSchema: { type: "object", properties: {} } };
}

/**
 * Client factory whose clients succeed unless told otherwise
 */
export function createMockClientFactory(options?: {
  failConnect?: boolean;
  failListTools?: boolean;
  tools?: Tool[];
  callToolResult?: unknown;
}): (name: string) => McpClientLike {
  return () => ({
    async connect(): Promise<void> {
      if (options?.failConnect) {
        throw new Error("Connection failed");
      }
    },
    async listTools(): Promise<{ tools: Tool[] }> {
      if (options?.failListTools) {
        throw new Error("List tools failed");
      }
      return { tools: options?.tools ?? [] };
    },
    async callTool(): Promise<unknown> {
      return options?.callToolResult ?? { content: [{ type: "text", text: "ok" }] };
    },
  });
}

export function createMockTransport(options?: { failClose?: boolean; onClose?: () => void }): McpTransport {
  return {
    async close(): Promise<void> {
      if (options?.failClose) {
        throw new Error("Close failed");
      }
      options?.onClose?.();
    },
  };
}
