import { EventEmitter } from "events";
import type { ConnectionConfig, SourceDescriptor } from "../config";
import { ToolAdapterError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { makeNoopLogger } from "../logger";
import { Profiler, type SourceStatus, type StartState } from "../profiler";
import type { SourceSession } from "../sources/types";
import type { ToolSourceLibrary } from "../sources/registry";

/**
 * Options for SessionManager
 */
export type SessionManagerOptions = {
  library: ToolSourceLibrary;
  /** Retry settings for opening sessions */
  connection?: Partial<ConnectionConfig>;
  profiler?: Profiler;
  logger?: Logger;
};

export type StartOptions = {
  /** Aborting rejects start and closes every session it opened */
  signal?: AbortSignal;
};

export type SourceState = {
  name: string;
  source: SourceDescriptor;
  status: SourceStatus;
  error?: ToolAdapterError;
};

export type StopReport = {
  /** Sources whose sessions closed cleanly */
  closed: string[];
  /** One LifecycleError per session that failed to close */
  failures: ToolAdapterError[];
};

/**
 * Events emitted by SessionManager
 */
export interface SessionManagerEvents {
  /** Emitted when a source session opens */
  "source:connected": (sourceName: string, session: SourceSession) => void;
  /** Emitted when a source fails every open attempt */
  "source:error": (sourceName: string, error: ToolAdapterError) => void;
  /** Emitted when every source has been attempted */
  "start:complete": (state: StartState) => void;
}

const DEFAULT_RETRY_ATTEMPTS = 2;
const DEFAULT_RETRY_DELAY = 1000;
const MAX_RETRY_DELAY = 30000;

/**
 * Sleep for specified milliseconds; an abort ends the wait early
 */
function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

/**
 * Owns one session per configured source. Sessions open concurrently with
 * retry; a source that never opens is recorded, not fatal.
 */
export class SessionManager extends EventEmitter {
  private readonly library: ToolSourceLibrary;
  private readonly retryAttempts: number;
  private readonly retryDelay: number;
  private readonly profiler: Profiler;
  private readonly log: Logger;

  private sources: SourceDescriptor[] = [];
  private readonly states = new Map<string, SourceState>();
  private readonly sessions = new Map<string, SourceSession>();

  private state: StartState = "idle";
  private startPromise: Promise<void> | null = null;
  // Bumped by stop and abort; opens from an older generation close themselves
  private generation = 0;

  constructor(options: SessionManagerOptions) {
    super();
    this.library = options.library;
    this.retryAttempts = options.connection?.retryAttempts ?? DEFAULT_RETRY_ATTEMPTS;
    this.retryDelay = options.connection?.retryDelay ?? DEFAULT_RETRY_DELAY;
    this.profiler = options.profiler ?? new Profiler();
    this.log = (options.logger ?? makeNoopLogger()).child({ component: "lifecycle" });
  }

  /**
   * Open a session for every source. Calling again while starting or
   * started returns the same promise.
   */
  start(sources: SourceDescriptor[], options: StartOptions = {}): Promise<void> {
    if (this.state !== "idle" && this.startPromise) {
      return this.startPromise;
    }

    this.state = "starting";
    this.sources = [...sources];
    this.states.clear();
    this.profiler.startBegun();
    this.log.info({ sources: sources.length }, "starting sources");

    this.startPromise = this.runStart(this.generation, options.signal);
    return this.startPromise;
  }

  private async runStart(generation: number, signal?: AbortSignal): Promise<void> {
    const attempts = Promise.allSettled(
      this.sources.map(source => this.openWithRetry(source, generation, signal)),
    );

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<"aborted">(resolve => {
      if (signal?.aborted) {
        resolve("aborted");
        return;
      }
      onAbort = () => resolve("aborted");
      signal?.addEventListener("abort", onAbort, { once: true });
    });

    const outcome = await Promise.race([attempts.then(() => "done" as const), aborted]);
    if (onAbort) {
      signal?.removeEventListener("abort", onAbort);
    }

    if (outcome === "aborted" || signal?.aborted) {
      const report = await this.stop();
      this.log.warn({ closed: report.closed.length, failures: report.failures.length }, "start aborted");
      throw new ToolAdapterError("LifecycleError", {
        message: `Start aborted${signal?.reason instanceof Error ? `: ${signal.reason.message}` : ""}`,
        cause: signal?.reason,
      });
    }

    if (generation !== this.generation) {
      return;
    }
    this.finalizeStart();
  }

  private finalizeStart(): void {
    const states = Array.from(this.states.values());
    const connected = states.filter(s => s.status === "connected");

    this.state = connected.length === states.length ? "ready" : "degraded";
    this.profiler.startComplete(this.state);
    this.log.info(
      { state: this.state, connected: connected.length, failed: states.length - connected.length },
      "sources started",
    );
    this.emit("start:complete", this.state);
  }

  /**
   * Open one session with retry; exponential backoff from retryDelay,
   * capped at 30s
   */
  private async openWithRetry(source: SourceDescriptor, generation: number, signal?: AbortSignal): Promise<void> {
    const maxAttempts = this.retryAttempts + 1;
    const startTime = performance.now();
    let lastError: unknown = null;

    this.states.set(source.name, { name: source.name, source, status: "connecting" });

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (generation !== this.generation || signal?.aborted) {
        return;
      }

      try {
        const session = await this.library.openSession(source);
        if (generation !== this.generation || signal?.aborted) {
          // Start was cancelled while this session was opening
          await this.closeQuietly(session);
          return;
        }

        this.sessions.set(source.name, session);
        this.states.set(source.name, { name: source.name, source, status: "connected" });
        this.profiler.recordSourceConnect(source.name, performance.now() - startTime, "connected");
        this.log.debug({ source: source.name, attempt }, "source connected");
        this.emit("source:connected", source.name, session);
        return;
      } catch (error) {
        lastError = error;
        this.log.debug({ source: source.name, attempt, err: error }, "open attempt failed");

        if (attempt < maxAttempts) {
          const delayMs = Math.min(this.retryDelay * Math.pow(2, attempt - 1), MAX_RETRY_DELAY);
          await sleep(delayMs, signal);
        }
      }
    }

    const failure = new ToolAdapterError("SourceUnreachable", {
      message: `Source ${source.name} is unreachable: ${errorMessage(lastError)}`,
      source: source.name,
      cause: lastError,
    });
    this.states.set(source.name, { name: source.name, source, status: "error", error: failure });
    this.profiler.recordSourceConnect(source.name, -1, "error", failure.message);
    this.log.warn({ source: source.name, err: lastError }, "source unreachable");
    this.emit("source:error", source.name, failure);
  }

  private async closeQuietly(session: SourceSession): Promise<void> {
    try {
      await this.library.closeSession(session);
    } catch (error) {
      this.log.warn({ source: session.source.name, err: error }, "failed to close late session");
    }
  }

  /**
   * Close every session. Never throws; close failures are reported.
   */
  async stop(): Promise<StopReport> {
    this.generation++;
    const entries = Array.from(this.sessions.entries());
    this.sessions.clear();

    const results = await Promise.allSettled(
      entries.map(([, session]) => this.library.closeSession(session)),
    );

    const report: StopReport = { closed: [], failures: [] };
    results.forEach((result, index) => {
      const entry = entries[index];
      if (!entry) return;
      const [name] = entry;
      if (result.status === "fulfilled") {
        report.closed.push(name);
      } else {
        report.failures.push(
          new ToolAdapterError("LifecycleError", {
            message: `Failed to close session for ${name}: ${errorMessage(result.reason)}`,
            source: name,
            cause: result.reason,
          }),
        );
      }
    });

    this.states.clear();
    this.state = "idle";
    this.startPromise = null;
    this.log.info({ closed: report.closed.length, failures: report.failures.length }, "sources stopped");
    return report;
  }

  getSession(name: string): SourceSession | undefined {
    return this.sessions.get(name);
  }

  /**
   * Open sessions in configuration order
   */
  getSessions(): SourceSession[] {
    return this.sources.flatMap(source => {
      const session = this.sessions.get(source.name);
      return session ? [session] : [];
    });
  }

  /**
   * Status per source in configuration order
   */
  getSources(): SourceState[] {
    return this.sources.flatMap(source => {
      const state = this.states.get(source.name);
      return state ? [state] : [];
    });
  }

  /**
   * SourceUnreachable errors from the last start
   */
  getFailures(): ToolAdapterError[] {
    return this.getSources().flatMap(state => (state.error ? [state.error] : []));
  }

  getState(): StartState {
    return this.state;
  }

  isStarted(): boolean {
    return this.state === "ready" || this.state === "degraded";
  }
}
