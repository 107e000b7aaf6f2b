import { describe, expect, test } from "vitest";
import { RemoteMcpClient } from "../../src/sources/mcp/remote";
import type { McpClientLike } from "../../src/sources/mcp/types";
import { createMockClientFactory, createMockTransport, mcpTool } from "../helpers/mcp";

const config = { type: "remote", url: "https://example.com/mcp" } as const;

/**
 * Clients that fail their first connect (streamable HTTP) and accept the rest
 */
function failFirstConnect(): { factory: (name: string) => McpClientLike; attempts: () => number } {
  let attempts = 0;
  return {
    attempts: () => attempts,
    factory: () => ({
      async connect(): Promise<void> {
        attempts++;
        if (attempts === 1) {
          throw new Error("Streamable not supported");
        }
      },
      async listTools() {
        return { tools: [] };
      },
      async callTool() {
        return {};
      },
    }),
  };
}

describe("RemoteMcpClient", () => {
  describe("connect", () => {
    test("connects with streamable HTTP", async () => {
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: createMockClientFactory(),
        streamableTransportFactory: () => createMockTransport(),
      });

      await client.connect();
      expect(client.getTransportType()).toBe("streamable-http");
    });

    test("falls back to SSE when streamable fails", async () => {
      const { factory, attempts } = failFirstConnect();
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: factory,
        streamableTransportFactory: () => createMockTransport(),
        sseTransportFactory: () => createMockTransport(),
      });

      await client.connect();

      expect(attempts()).toBe(2);
      expect(client.getTransportType()).toBe("sse");
    });

    test("throws when both transports fail", async () => {
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: createMockClientFactory({ failConnect: true }),
        streamableTransportFactory: () => createMockTransport(),
        sseTransportFactory: () => createMockTransport(),
      });

      await expect(client.connect()).rejects.toThrow("Connection failed");
      expect(client.getTransportType()).toBeNull();
    });

    test("passes headers to streamable transport", async () => {
      const captured: Array<{ url: string; headers?: Record<string, string> }> = [];
      const client = new RemoteMcpClient(
        "docs",
        { ...config, headers: { Authorization: "Bearer test-secret" } },
        {
          clientFactory: createMockClientFactory(),
          streamableTransportFactory: (url, headers) => {
            captured.push({ url: url.href, headers });
            return createMockTransport();
          },
        },
      );

      await client.connect();

      expect(captured).toEqual([
        { url: "https://example.com/mcp", headers: { Authorization: "Bearer test-secret" } },
      ]);
    });

    test("passes headers to SSE transport with Accept header", async () => {
      const captured: Record<string, string>[] = [];
      const { factory } = failFirstConnect();
      const client = new RemoteMcpClient(
        "docs",
        { ...config, headers: { "X-Custom": "value" } },
        {
          clientFactory: factory,
          streamableTransportFactory: () => createMockTransport(),
          sseTransportFactory: (_url, headers) => {
            captured.push(headers);
            return createMockTransport();
          },
        },
      );

      await client.connect();

      expect(captured).toEqual([{ Accept: "text/event-stream", "X-Custom": "value" }]);
    });

    test("cleans up both transports on failure", async () => {
      const closed: string[] = [];
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: createMockClientFactory({ failConnect: true }),
        streamableTransportFactory: () => createMockTransport({ onClose: () => closed.push("streamable") }),
        sseTransportFactory: () => createMockTransport({ onClose: () => closed.push("sse") }),
      });

      await expect(client.connect()).rejects.toThrow("Connection failed");
      expect(closed).toEqual(["streamable", "sse"]);
    });

    test("a failing close of the streamable attempt does not stop the fallback", async () => {
      const { factory } = failFirstConnect();
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: factory,
        streamableTransportFactory: () => createMockTransport({ failClose: true }),
        sseTransportFactory: () => createMockTransport(),
      });

      await client.connect();
      expect(client.getTransportType()).toBe("sse");
    });

    test("uses a fresh client for the SSE attempt", async () => {
      let clientCreations = 0;
      const { factory } = failFirstConnect();
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: name => {
          clientCreations++;
          return factory(name);
        },
        streamableTransportFactory: () => createMockTransport(),
        sseTransportFactory: () => createMockTransport(),
      });

      await client.connect();

      expect(clientCreations).toBe(2);
    });
  });

  test("listTools returns tools from the client", async () => {
    const tools = [mcpTool("search_docs"), mcpTool("get_page")];
    const client = new RemoteMcpClient("docs", config, {
      clientFactory: createMockClientFactory({ tools }),
      streamableTransportFactory: () => createMockTransport(),
    });

    await client.connect();
    expect(await client.listTools()).toEqual(tools);
  });

  test("callTool forwards the call to the client", async () => {
    const client = new RemoteMcpClient("docs", config, {
      clientFactory: createMockClientFactory({ callToolResult: { result: "success" } }),
      streamableTransportFactory: () => createMockTransport(),
    });

    await client.connect();
    expect(await client.callTool("search_docs", { query: "adapters" })).toEqual({ result: "success" });
  });

  describe("close", () => {
    test("closes the transport and clears the transport type", async () => {
      let transportClosed = false;
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: createMockClientFactory(),
        streamableTransportFactory: () => createMockTransport({ onClose: () => (transportClosed = true) }),
      });

      await client.connect();
      expect(client.getTransportType()).toBe("streamable-http");

      await client.close();

      expect(transportClosed).toBe(true);
      expect(client.getTransportType()).toBeNull();
    });

    test("is safe to call multiple times or without connect", async () => {
      const client = new RemoteMcpClient("docs", config, {
        clientFactory: createMockClientFactory(),
        streamableTransportFactory: () => createMockTransport(),
      });

      await client.close();
      await client.connect();
      await client.close();
      await expect(client.close()).resolves.toBeUndefined();
    });
  });
});
