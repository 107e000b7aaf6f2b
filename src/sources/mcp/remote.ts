import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { SSEClientTransport } from "@modelcontextprotocol/sdk/client/sse.js";
import { StreamableHTTPClientTransport } from "@modelcontextprotocol/sdk/client/streamableHttp.js";
import type { Logger } from "../../logger";
import { makeNoopLogger } from "../../logger";
import type { RemoteServerConfig } from "../../config";
import { MCP_CLIENT_VERSION, mcpClientName } from "./types";
import type { McpClient, McpClientLike, McpTransport } from "./types";

/**
 * Options for RemoteMcpClient including DI seams for testing
 */
export interface RemoteMcpClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => McpClientLike;
  /** Override StreamableHTTP transport creation for testing */
  streamableTransportFactory?: (url: URL, headers?: Record<string, string>) => McpTransport;
  /** Override SSE transport creation for testing */
  sseTransportFactory?: (url: URL, headers: Record<string, string>) => McpTransport;
  logger?: Logger;
}

/**
 * Remote MCP client with auto-detection
 * Tries Streamable HTTP first (newer), falls back to SSE (legacy)
 */
export class RemoteMcpClient implements McpClient {
  private client: McpClientLike;
  private transport: McpTransport | null = null;
  private transportType: "streamable-http" | "sse" | null = null;
  private readonly name: string;
  private readonly config: RemoteServerConfig;
  private readonly options: RemoteMcpClientOptions;
  private readonly log: Logger;

  constructor(name: string, config: RemoteServerConfig, options?: RemoteMcpClientOptions) {
    this.name = name;
    this.config = config;
    this.options = options ?? {};
    this.log = (options?.logger ?? makeNoopLogger()).child({ component: "mcp-remote", source: name });
    this.client = this.createClient();
  }

  private createClient(): McpClientLike {
    if (this.options.clientFactory) {
      return this.options.clientFactory(this.name);
    }
    return new Client({ name: mcpClientName(this.name), version: MCP_CLIENT_VERSION }, {});
  }

  private createStreamableTransport(url: URL): McpTransport {
    if (this.options.streamableTransportFactory) {
      return this.options.streamableTransportFactory(url, this.config.headers);
    }
    return new StreamableHTTPClientTransport(url, {
      requestInit: { headers: this.config.headers },
    });
  }

  private createSseTransport(url: URL, headers: Record<string, string>): McpTransport {
    if (this.options.sseTransportFactory) {
      return this.options.sseTransportFactory(url, headers);
    }
    return new SSEClientTransport(url, {
      requestInit: { headers },
    });
  }

  private async discardTransport(transport: McpTransport): Promise<void> {
    try {
      await transport.close();
    } catch (error) {
      this.log.debug({ err: error }, "closing failed transport attempt");
    }
  }

  async connect(): Promise<void> {
    const url = new URL(this.config.url);
    this.transportType = null;

    // Streamable HTTP first
    let streamableTransport: McpTransport | null = null;
    try {
      streamableTransport = this.createStreamableTransport(url);
      await this.client.connect(streamableTransport);
      this.transport = streamableTransport;
      this.transportType = "streamable-http";
      return;
    } catch (error) {
      this.log.debug({ err: error }, "streamable HTTP connect failed, trying SSE");
      // Only the attempted transport is closed
      if (streamableTransport) {
        await this.discardTransport(streamableTransport);
      }
      // A client connects once; use a fresh one for the fallback
      this.client = this.createClient();
    }

    let sseTransport: McpTransport | null = null;
    try {
      sseTransport = this.createSseTransport(url, {
        Accept: "text/event-stream",
        ...this.config.headers,
      });
      await this.client.connect(sseTransport);
      this.transport = sseTransport;
      this.transportType = "sse";
    } catch (error) {
      if (sseTransport) {
        await this.discardTransport(sseTransport);
      }
      this.transport = null;
      this.transportType = null;
      throw error;
    }
  }

  async listTools() {
    const result = await this.client.listTools();
    return result.tools;
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<unknown> {
    return this.client.callTool({ name, arguments: args });
  }

  async close(): Promise<void> {
    if (this.transport) {
      const transport = this.transport;
      this.transport = null;
      await transport.close();
    }
    this.transportType = null;
  }

  /**
   * Transport used by the current connection
   */
  getTransportType(): "streamable-http" | "sse" | null {
    return this.transportType;
  }
}
