import type { ToolCatalog } from "../catalog/catalog";
import { ToolAdapterError, errorMessage, isToolAdapterError, type InvocationFailure } from "../errors";
import type { Logger } from "../logger";
import { makeNoopLogger } from "../logger";
import { Profiler, TIMERS } from "../profiler";
import { MalformedResponseError, RemoteToolError, SourceTimeoutError } from "../sources/errors";
import type { ToolSourceLibrary } from "../sources/registry";
import type { SourceSession } from "../sources/types";

const CONNECTION_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "EHOSTUNREACH",
  "EPIPE",
  "ETIMEDOUT",
]);

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a driver or transport error onto a transport-neutral failure tag
 */
export function classifyFailure(error: unknown): InvocationFailure {
  if (error instanceof SourceTimeoutError) return "timeout";
  if (error instanceof RemoteToolError) return "remote_error";
  if (error instanceof MalformedResponseError || error instanceof SyntaxError) return "malformed_response";
  if (!(error instanceof Error)) return "unknown";

  if (error.name === "TimeoutError" || error.name === "AbortError") return "timeout";

  // fetch wraps socket errors: TypeError("fetch failed", { cause })
  const code = errorCode(error) ?? errorCode(error.cause);
  if (code !== undefined && CONNECTION_CODES.has(code)) return "connection";
  if (error instanceof TypeError && /fetch failed/i.test(error.message)) return "connection";

  if (/timed out/i.test(error.message)) return "timeout";
  return "unknown";
}

/**
 * Where the dispatcher finds the live session of a source
 */
export type SessionLookup = {
  getSession(sourceName: string): SourceSession | undefined;
};

export type InvocationDispatcherOptions = {
  /** Current catalog; read on every call so a rediscovery takes effect at once */
  catalog: () => ToolCatalog;
  sessions: SessionLookup;
  library: ToolSourceLibrary;
  profiler?: Profiler;
  logger?: Logger;
};

/**
 * Routes a call by adapted name to the driver of the tool's source
 */
export class InvocationDispatcher {
  private readonly options: InvocationDispatcherOptions;
  private readonly profiler: Profiler;
  private readonly log: Logger;

  constructor(options: InvocationDispatcherOptions) {
    this.options = options;
    this.profiler = options.profiler ?? new Profiler();
    this.log = (options.logger ?? makeNoopLogger()).child({ component: "dispatcher" });
  }

  /**
   * Arguments are passed through; validating them against the tool's
   * input schema is up to the caller.
   */
  async call(name: string, args: Record<string, unknown>): Promise<unknown> {
    const tool = this.options.catalog().get(name);
    if (!tool) {
      throw new ToolAdapterError("ToolNotFound", { message: `Tool not found: ${name}`, tool: name });
    }

    const sourceName = tool.rawTool.sourceRef.name;
    const done = this.profiler.startTimer(TIMERS.toolCall);
    this.log.debug({ tool: tool.adaptedName, source: sourceName, args }, "calling tool");

    try {
      const session = this.options.sessions.getSession(sourceName);
      if (!session) {
        throw new ToolAdapterError("InvocationFailed", {
          message: `No open session for source ${sourceName}`,
          source: sourceName,
          tool: tool.adaptedName,
          failure: "connection",
        });
      }

      const result = await this.options.library.invoke(session, tool.rawTool, args);
      this.log.debug({ tool: tool.adaptedName, duration: done(), result }, "tool call succeeded");
      return result;
    } catch (error) {
      const duration = done();
      const failure = isToolAdapterError(error)
        ? error
        : new ToolAdapterError("InvocationFailed", {
            message: errorMessage(error),
            source: sourceName,
            tool: tool.adaptedName,
            failure: classifyFailure(error),
            cause: error,
          });
      this.log.error({ tool: tool.adaptedName, source: sourceName, failure: failure.failure, duration, err: error }, "tool call failed");
      throw failure;
    }
  }
}
