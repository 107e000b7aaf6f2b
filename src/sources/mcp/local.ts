import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { StdioClientTransport } from "@modelcontextprotocol/sdk/client/stdio.js";
import type { LocalServerConfig } from "../../config";
import { inheritedEnv } from "../env";
import { MCP_CLIENT_VERSION, mcpClientName } from "./types";
import type { McpClient, McpClientLike, McpTransport } from "./types";

export type StdioTransportOptions = {
  command: string;
  args: string[];
  env: Record<string, string>;
  stderr: "pipe" | "inherit" | "ignore";
};

/**
 * Options for LocalMcpClient including DI seams for testing
 */
export interface LocalMcpClientOptions {
  /** Override Client creation for testing */
  clientFactory?: (name: string) => McpClientLike;
  /** Override transport creation for testing */
  transportFactory?: (opts: StdioTransportOptions) => McpTransport;
}

/**
 * Local MCP client using stdio transport
 */
export class LocalMcpClient implements McpClient {
  private client: McpClientLike;
  private transport: McpTransport | null = null;
  private readonly name: string;
  private readonly config: LocalServerConfig;
  private readonly transportFactory: (opts: StdioTransportOptions) => McpTransport;

  constructor(name: string, config: LocalServerConfig, options?: LocalMcpClientOptions) {
    this.name = name;
    this.config = config;

    const clientFactory =
      options?.clientFactory ??
      ((clientName: string) => new Client({ name: mcpClientName(clientName), version: MCP_CLIENT_VERSION }, {}));

    this.transportFactory = options?.transportFactory ?? (opts => new StdioClientTransport(opts));
    this.client = clientFactory(this.name);
  }

  async connect(): Promise<void> {
    const [command, ...args] = this.config.command;
    if (command === undefined) {
      throw new Error(`Local MCP server ${this.name} has no command`);
    }

    this.transport = this.transportFactory({
      command,
      args,
      env: { ...inheritedEnv(), ...this.config.environment },
      stderr: "pipe",
    });

    await this.client.connect(this.transport);
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
  }

  isConnected(): boolean {
    return this.transport !== null;
  }
}
