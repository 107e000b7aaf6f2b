import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { ProtocolKind, SourceDescriptor } from "../config";
import { createSession } from "./session";
import type { SourceSession, ToolSourceDriver } from "./types";

export type FakeCallHandler = (name: string, args: Record<string, unknown>) => Promise<unknown>;

/**
 * Configuration for one fake source
 */
export type FakeToolSource = {
  /** Tools this source provides */
  tools: RawToolDefinition[];
  /** Simulated network delay in ms (default: 10) */
  delay?: number;
  /** Custom tool call handler */
  onCallTool?: FakeCallHandler;
  /** Simulate openSession failure */
  failOpen?: boolean;
  /** Simulate discover failure */
  failDiscover?: boolean;
  /** Simulate invoke failure */
  failCall?: boolean;
  /** Simulate closeSession failure */
  failClose?: boolean;
  /** Error message for failures */
  errorMessage?: string;
};

/**
 * Fake driver for testing purposes
 * Serves configured sources by name, with per-source delays and failures
 */
export class FakeToolSourceDriver implements ToolSourceDriver {
  readonly protocolKind: ProtocolKind;
  private readonly sources: Map<string, FakeToolSource>;
  private readonly open = new Set<SourceSession>();

  /** Number of openSession calls, successful or not */
  openCalls = 0;
  /** Number of closeSession calls */
  closeCalls = 0;
  /** Calls received, in order */
  readonly calls: Array<{ source: string; tool: string; args: Record<string, unknown> }> = [];

  constructor(sources: Record<string, FakeToolSource>, protocolKind: ProtocolKind = "mcp") {
    this.protocolKind = protocolKind;
    this.sources = new Map(Object.entries(sources));
  }

  private sourceFor(name: string): FakeToolSource {
    const source = this.sources.get(name);
    if (!source) {
      throw new Error(`Unknown fake source: ${name}`);
    }
    return source;
  }

  private async simulateDelay(source: FakeToolSource): Promise<void> {
    const delay = source.delay ?? 10;
    if (delay > 0) {
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  async openSession(descriptor: SourceDescriptor): Promise<SourceSession> {
    this.openCalls++;
    const source = this.sourceFor(descriptor.name);
    await this.simulateDelay(source);

    if (source.failOpen) {
      throw new Error(source.errorMessage ?? "Connection failed");
    }

    const session = createSession(descriptor);
    this.open.add(session);
    return session;
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = this.sourceFor(session.source.name);
    await this.simulateDelay(source);

    if (source.failDiscover) {
      throw new Error(source.errorMessage ?? "Failed to list tools");
    }
    return source.tools.map(tool => ({ ...tool, tags: [...tool.tags] }));
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const source = this.sourceFor(session.source.name);
    await this.simulateDelay(source);
    this.calls.push({ source: session.source.name, tool: tool.rawName, args });

    if (!source.tools.some(candidate => candidate.rawName === tool.rawName)) {
      throw new Error(`Tool not found: ${tool.rawName}`);
    }
    if (source.failCall) {
      throw new Error(source.errorMessage ?? "Tool call failed");
    }
    if (source.onCallTool) {
      return source.onCallTool(tool.rawName, args);
    }

    return {
      success: true,
      tool: tool.rawName,
      args,
      result: `Mock result for ${tool.rawName}`,
    };
  }

  async closeSession(session: SourceSession): Promise<void> {
    this.closeCalls++;
    const source = this.sourceFor(session.source.name);
    this.open.delete(session);
    if (source.failClose) {
      throw new Error(source.errorMessage ?? "Close failed");
    }
  }

  /** Sessions opened and not yet closed */
  openSessionCount(): number {
    return this.open.size;
  }
}

/**
 * Pre-configured fake tools for common test scenarios
 */
export const FakeTools = {
  weather: [
    {
      rawName: "get_weather_forecast",
      description: "Get the weather forecast for a city",
      rawInputSchema: {
        type: "object",
        properties: {
          city: { type: "string", description: "City name" },
          days: { type: ["integer", "null"], description: "Number of days" },
        },
        required: ["city", "days"],
      },
      tags: ["weather"],
    },
    {
      rawName: "get_current_conditions",
      description: "Current temperature and wind for a city",
      rawInputSchema: {
        type: "object",
        properties: { city: { type: "string", description: "City name" } },
        required: ["city"],
      },
      tags: ["weather"],
    },
  ],

  books: [
    {
      rawName: "list_books",
      description: "List books on a shelf",
      rawInputSchema: {
        type: "object",
        properties: { shelf: { type: "string", description: "Shelf identifier" } },
      },
      tags: ["books"],
    },
  ],

  calculator: [
    {
      rawName: "add",
      description: "Add two numbers",
      rawInputSchema: {
        type: "object",
        properties: {
          a: { type: "number", description: "First number" },
          b: { type: "number", description: "Second number" },
        },
        required: ["a", "b"],
      },
      tags: [],
    },
    {
      rawName: "multiply",
      description: "Multiply two numbers",
      rawInputSchema: {
        type: "object",
        properties: {
          a: { type: "number", description: "First number" },
          b: { type: "number", description: "Second number" },
        },
        required: ["a", "b"],
      },
      tags: [],
    },
  ],
} satisfies Record<string, RawToolDefinition[]>;

function numberArg(args: Record<string, unknown>, name: string): number {
  const value = args[name];
  if (typeof value !== "number") {
    throw new Error(`Argument ${name} must be a number`);
  }
  return value;
}

/**
 * Pre-configured tool handlers for fake sources
 */
export const FakeToolHandlers = {
  calculator: async (name: string, args: Record<string, unknown>) => {
    const a = numberArg(args, "a");
    const b = numberArg(args, "b");
    if (name === "add") return { result: a + b };
    if (name === "multiply") return { result: a * b };
    throw new Error(`Unknown tool: ${name}`);
  },

  weather: async (name: string, args: Record<string, unknown>) => {
    const city = typeof args.city === "string" ? args.city : "unknown";
    if (name === "get_weather_forecast") return `Sunny in ${city}`;
    if (name === "get_current_conditions") return { city, temperature: 21, wind: 5 };
    throw new Error(`Unknown tool: ${name}`);
  },
} satisfies Record<string, FakeCallHandler>;
