import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { ProtocolKind, SourceDescriptor } from "../config";
import type { Logger } from "../logger";
import { makeNoopLogger } from "../logger";
import { CliDriver, type CommandRunner } from "./cli";
import { GraphqlDriver } from "./graphql";
import { HttpDriver, SseDriver, StreamableHttpDriver, type FetchLike } from "./http";
import { McpDriver, type McpDriverOptions } from "./mcp";
import { TcpDriver, UdpDriver } from "./socket";
import { TextDriver } from "./text";
import type { SourceSession, ToolSourceDriver } from "./types";

/**
 * Registry of protocol drivers keyed by protocol kind
 */
export class ToolSourceLibrary {
  private readonly drivers = new Map<ProtocolKind, ToolSourceDriver>();
  private readonly log: Logger;

  constructor(drivers: ToolSourceDriver[] = [], logger?: Logger) {
    this.log = (logger ?? makeNoopLogger()).child({ component: "sources" });
    drivers.forEach(driver => this.register(driver));
  }

  /** Register a driver, replacing any driver of the same kind */
  register(driver: ToolSourceDriver): this {
    this.drivers.set(driver.protocolKind, driver);
    return this;
  }

  has(kind: ProtocolKind): boolean {
    return this.drivers.has(kind);
  }

  kinds(): ProtocolKind[] {
    return Array.from(this.drivers.keys());
  }

  driverFor(kind: ProtocolKind): ToolSourceDriver {
    const driver = this.drivers.get(kind);
    if (!driver) {
      throw new Error(`No driver registered for protocol kind: ${kind}`);
    }
    return driver;
  }

  openSession(source: SourceDescriptor): Promise<SourceSession> {
    return this.driverFor(source.protocolKind).openSession(source);
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    return this.driverFor(session.source.protocolKind).discover(session);
  }

  /**
   * Invoke a tool. A tool whose call template names another protocol runs
   * on that protocol's driver, through a session opened for the call.
   */
  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const template = tool.callTemplate;
    if (!template || template.protocolKind === session.source.protocolKind) {
      return this.driverFor(session.source.protocolKind).invoke(session, tool, args);
    }

    const driver = this.driverFor(template.protocolKind);
    const callSession = await driver.openSession(template);
    try {
      return await driver.invoke(callSession, tool, args);
    } finally {
      await driver.closeSession(callSession).catch((error: unknown) => {
        this.log.warn({ err: error, source: template.name, tool: tool.rawName }, "failed to close call session");
      });
    }
  }

  closeSession(session: SourceSession): Promise<void> {
    return this.driverFor(session.source.protocolKind).closeSession(session);
  }
}

export type DefaultLibraryOptions = {
  /** Request timeout in milliseconds for every driver */
  requestTimeout?: number;
  /** Override fetch for the HTTP family and GraphQL */
  fetch?: FetchLike;
  /** Override the CLI command runner */
  runner?: CommandRunner;
  mcp?: Omit<McpDriverOptions, "requestTimeout" | "logger">;
  logger?: Logger;
};

/**
 * Library with a driver for each built-in protocol kind
 */
export function createDefaultLibrary(options: DefaultLibraryOptions = {}): ToolSourceLibrary {
  const { requestTimeout, fetch, runner, logger } = options;
  return new ToolSourceLibrary(
    [
      new HttpDriver({ requestTimeout, fetch }),
      new SseDriver({ requestTimeout, fetch }),
      new StreamableHttpDriver({ requestTimeout, fetch }),
      new CliDriver({ requestTimeout, runner }),
      new GraphqlDriver({ requestTimeout, fetch }),
      new McpDriver({ ...options.mcp, requestTimeout, logger }),
      new TcpDriver({ requestTimeout }),
      new UdpDriver({ requestTimeout }),
      new TextDriver(),
    ],
    logger,
  );
}
