import { createSocket } from "node:dgram";
import { createConnection } from "node:net";
import type { RawTool, RawToolDefinition } from "../catalog/types";
import { isRecord } from "../catalog/schema";
import type { SourceDescriptor, SourceDescriptorOf } from "../config";
import { expectProtocol, MalformedResponseError, RemoteToolError, SourceTimeoutError } from "./errors";
import { decodeJson, parseManual } from "./manual";
import { createSession } from "./session";
import type { DriverOptions, SourceSession, ToolSourceDriver } from "./types";

type SocketSource = SourceDescriptorOf<"tcp" | "udp">;

export type SocketRequest =
  | { action: "discover" }
  | { action: "call"; tool: string; arguments: Record<string, unknown> };

const DEFAULT_REQUEST_TIMEOUT = 30000;

/**
 * Interpret a reply: `{ error }` is a remote failure, `{ result }` is unwrapped
 */
export function unwrapReply(reply: unknown): unknown {
  if (isRecord(reply)) {
    if (reply.error !== undefined && reply.error !== null) {
      const message = typeof reply.error === "string"
        ? reply.error
        : isRecord(reply.error) && typeof reply.error.message === "string"
          ? reply.error.message
          : JSON.stringify(reply.error);
      throw new RemoteToolError(message);
    }
    if ("result" in reply) {
      return reply.result;
    }
  }
  return reply;
}

/**
 * Newline-delimited JSON over a socket: one request, one reply
 */
abstract class SocketDriver implements ToolSourceDriver {
  abstract readonly protocolKind: SocketSource["protocolKind"];
  protected readonly requestTimeout: number;

  constructor(options: DriverOptions = {}) {
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  protected abstract exchange(source: SocketSource, payload: string): Promise<string>;

  private expectSource(source: SourceDescriptor): SocketSource {
    return expectProtocol(source, this.protocolKind);
  }

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    return createSession(this.expectSource(source));
  }

  async closeSession(_session: SourceSession): Promise<void> {
    // One connection per request
  }

  protected async request(source: SocketSource, request: SocketRequest): Promise<unknown> {
    const reply = await this.exchange(source, `${JSON.stringify(request)}\n`);
    return unwrapReply(decodeJson(reply.trim(), `Reply from ${source.name}`));
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = this.expectSource(session.source);
    return parseManual(await this.request(source, { action: "discover" }), source);
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const source = this.expectSource(session.source);
    return this.request(source, { action: "call", tool: tool.rawName, arguments: args });
  }
}

export class TcpDriver extends SocketDriver {
  readonly protocolKind = "tcp";

  protected exchange(source: SocketSource, payload: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const socket = createConnection({ host: source.host, port: source.port });
      let buffer = "";
      let settled = false;

      const finish = (error: Error | null, line?: string) => {
        if (settled) return;
        settled = true;
        socket.destroy();
        if (error) reject(error);
        else resolve(line ?? "");
      };

      socket.setEncoding("utf8");
      socket.setTimeout(this.requestTimeout, () => {
        finish(new SourceTimeoutError(`TCP request to ${source.name} timed out after ${this.requestTimeout}ms`));
      });
      socket.once("connect", () => socket.write(payload));
      socket.on("data", (chunk: string) => {
        buffer += chunk;
        const newline = buffer.indexOf("\n");
        if (newline !== -1) finish(null, buffer.slice(0, newline));
      });
      socket.once("end", () => {
        if (buffer.trim() === "") {
          finish(new MalformedResponseError(`TCP source ${source.name} closed without a reply`));
        } else {
          finish(null, buffer);
        }
      });
      socket.once("error", error => finish(error));
    });
  }
}

export class UdpDriver extends SocketDriver {
  readonly protocolKind = "udp";

  protected exchange(source: SocketSource, payload: string): Promise<string> {
    return new Promise<string>((resolve, reject) => {
      const socket = createSocket(source.host.includes(":") ? "udp6" : "udp4");
      let settled = false;

      const finish = (error: Error | null, message?: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.close();
        if (error) reject(error);
        else resolve(message ?? "");
      };

      const timer = setTimeout(() => {
        finish(new SourceTimeoutError(`UDP request to ${source.name} timed out after ${this.requestTimeout}ms`));
      }, this.requestTimeout);

      socket.once("message", message => finish(null, message.toString("utf8")));
      socket.once("error", error => finish(error));
      socket.send(payload, source.port, source.host, error => {
        if (error) finish(error);
      });
    });
  }
}
