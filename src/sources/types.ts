import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { ProtocolKind, SourceDescriptor } from "../config";

/**
 * Opaque handle for an open source. Drivers key their connection state
 * (clients, processes) on the handle object itself.
 */
export type SourceSession = {
  readonly id: string;
  readonly source: SourceDescriptor;
};

/**
 * Discovery and invocation contract of one protocol
 */
export interface ToolSourceDriver {
  readonly protocolKind: ProtocolKind;
  openSession(source: SourceDescriptor): Promise<SourceSession>;
  discover(session: SourceSession): Promise<RawToolDefinition[]>;
  invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown>;
  closeSession(session: SourceSession): Promise<void>;
}

export type DriverOptions = {
  /** Request timeout in milliseconds */
  requestTimeout?: number;
};
