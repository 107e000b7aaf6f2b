import type { JSONSchema7 } from "json-schema";
import type { AdaptedTool } from "../catalog/types";
import { errorMessage } from "../errors";

/**
 * Capability a host agent framework needs from a tool
 */
export interface HostTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JSONSchema7;
  invoke(args: Record<string, unknown>): Promise<unknown>;
}

/**
 * Agent tool-spec form of a tool
 */
export type ToolSpec = {
  name: string;
  description: string;
  inputSchema: { json: JSONSchema7 };
};

export type ToolUse = {
  toolUseId: string;
  input?: Record<string, unknown>;
};

export type ToolResultRecord = {
  toolUseId: string;
  status: "success" | "error";
  content: Array<{ text: string }>;
};

export type ToolCaller = (adaptedName: string, args: Record<string, unknown>) => Promise<unknown>;

/**
 * Result text for a host: strings as-is, anything else as indented JSON
 */
export function formatResult(result: unknown): string {
  if (typeof result === "string") return result;
  return JSON.stringify(result ?? null, null, 2);
}

/**
 * Host tool backed by one adapted tool; calls go through the adapter
 */
export class AdaptedHostTool implements HostTool {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JSONSchema7;
  private readonly caller: ToolCaller;

  constructor(readonly tool: AdaptedTool, caller: ToolCaller) {
    this.name = tool.adaptedName;
    this.description = tool.description;
    this.inputSchema = tool.normalizedInputSchema;
    this.caller = caller;
  }

  get toolSpec(): ToolSpec {
    return {
      name: this.name,
      description: this.description,
      inputSchema: { json: this.inputSchema },
    };
  }

  invoke(args: Record<string, unknown>): Promise<unknown> {
    return this.caller(this.name, args);
  }

  /**
   * Run a tool use and report the outcome as a result record; never throws
   */
  async run(toolUse: ToolUse): Promise<ToolResultRecord> {
    try {
      const result = await this.invoke(toolUse.input ?? {});
      return { toolUseId: toolUse.toolUseId, status: "success", content: [{ text: formatResult(result) }] };
    } catch (error) {
      return { toolUseId: toolUse.toolUseId, status: "error", content: [{ text: `Error: ${errorMessage(error)}` }] };
    }
  }
}
