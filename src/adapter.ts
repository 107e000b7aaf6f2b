import { ToolCatalog, buildCatalog } from "./catalog/catalog";
import { NameSanitizer, type SuffixGenerator } from "./catalog/names";
import type { AdaptedTool } from "./catalog/types";
import type { Config, ConfigInput, ResolvedSettings, SourceDescriptor } from "./config";
import { ConfigSchema, formatConfigIssues, loadConfig, resolveSettings } from "./config";
import { discoverTools } from "./discovery/aggregator";
import { InvocationDispatcher } from "./dispatcher/dispatcher";
import { ToolAdapterError } from "./errors";
import { AdaptedHostTool } from "./host/host-tool";
import { SessionManager, type StartOptions, type StopReport } from "./lifecycle/manager";
import type { Logger } from "./logger";
import { makeLogger } from "./logger";
import { Profiler, TIMERS, type PerformanceReport, type SourceStatus, type StartState } from "./profiler";
import { searchWithRegex, type RegexSearchError } from "./search/regex";
import type { SearchResult } from "./catalog/types";
import { createDefaultLibrary, type DefaultLibraryOptions, type ToolSourceLibrary } from "./sources/registry";

export type ToolAdapterOptions = {
  /** Driver registry; defaults to every built-in driver */
  library?: ToolSourceLibrary;
  /** Options for the default library */
  libraryOptions?: Omit<DefaultLibraryOptions, "requestTimeout" | "logger">;
  /** Suffix generator for truncated or colliding names */
  nameSuffix?: SuffixGenerator;
  logger?: Logger;
};

export type Diagnostics = {
  /** Sources that could not be opened or discovered */
  sourceFailures: ToolAdapterError[];
  /** Tools whose schemas lost unsupported constructs */
  schemaDegradations: ToolAdapterError[];
};

export type HealthStatus = "healthy" | "degraded" | "unknown";

export type AdapterStatus = {
  state: StartState;
  sources: {
    total: number;
    connected: number;
    failed: number;
    details: Array<{
      name: string;
      protocolKind: SourceDescriptor["protocolKind"];
      status: SourceStatus;
      toolCount: number;
      error: string | null;
    }>;
  };
  tools: { total: number };
  health: { status: HealthStatus; message: string };
};

const EMPTY_DIAGNOSTICS: Diagnostics = { sourceFailures: [], schemaDegradations: [] };

/**
 * Aggregates tools from the configured sources into one catalog and one
 * call interface
 */
export class ToolAdapter {
  readonly settings: ResolvedSettings;
  readonly sources: readonly SourceDescriptor[];

  private readonly library: ToolSourceLibrary;
  private readonly manager: SessionManager;
  private readonly dispatcher: InvocationDispatcher;
  private readonly profiler = new Profiler();
  private readonly log: Logger;
  private readonly nameSuffix?: SuffixGenerator;

  private catalog = new ToolCatalog();
  private diagnostics: Diagnostics = EMPTY_DIAGNOSTICS;
  private startPromise: Promise<this> | null = null;
  private started = false;
  // Bumped by stop(); a start or rediscover from an older epoch must not install its catalog
  private epoch = 0;

  constructor(config: Config, options: ToolAdapterOptions = {}) {
    this.settings = resolveSettings(config.settings);
    this.sources = config.sources;
    this.nameSuffix = options.nameSuffix;
    this.log = (options.logger ?? makeLogger()).child({ component: "adapter" });

    this.library =
      options.library ??
      createDefaultLibrary({
        ...options.libraryOptions,
        requestTimeout: this.settings.connection.requestTimeout,
        logger: this.log,
      });

    this.manager = new SessionManager({
      library: this.library,
      connection: this.settings.connection,
      profiler: this.profiler,
      logger: this.log,
    });

    this.dispatcher = new InvocationDispatcher({
      catalog: () => this.catalog,
      sessions: this.manager,
      library: this.library,
      profiler: this.profiler,
      logger: this.log,
    });
  }

  /**
   * Validate a config object (defaults applied) and build an adapter
   */
  static fromConfig(input: ConfigInput, options?: ToolAdapterOptions): ToolAdapter {
    const result = ConfigSchema.safeParse(input);
    if (!result.success) {
      throw new ToolAdapterError("LifecycleError", {
        message: `Invalid configuration: ${formatConfigIssues(result.error)}`,
        cause: result.error,
      });
    }
    return new ToolAdapter(result.data, options);
  }

  /**
   * Load a JSONC config file and build an adapter
   */
  static async fromFile(filePath: string, options?: ToolAdapterOptions): Promise<ToolAdapter> {
    const result = await loadConfig(filePath);
    if (!result.success) {
      throw new ToolAdapterError("LifecycleError", {
        message: `Invalid configuration in ${filePath}: ${formatConfigIssues(result.error)}`,
        cause: result.error,
      });
    }
    return new ToolAdapter(result.data, options);
  }

  /**
   * Open sessions, discover and build the catalog. Idempotent: a second
   * call returns the first call's promise.
   */
  start(options: StartOptions = {}): Promise<this> {
    if (this.startPromise) {
      return this.startPromise;
    }

    const promise: Promise<this> = this.runStart(options).catch((error: unknown) => {
      if (this.startPromise === promise) {
        this.startPromise = null;
      }
      throw error;
    });
    this.startPromise = promise;
    return promise;
  }

  private async runStart(options: StartOptions): Promise<this> {
    const epoch = this.epoch;
    const signal = options.signal;
    await this.manager.start([...this.sources], options);
    await this.ensureCurrent(epoch, "starting", signal);
    if (!this.manager.isStarted()) {
      throw new ToolAdapterError("LifecycleError", { message: "Adapter was stopped while starting" });
    }
    await this.discover(epoch, "starting", signal);
    this.started = true;
    return this;
  }

  /**
   * Throw when the signal fired or stop() ran since `epoch` was taken.
   * An abort closes the sessions unless a later stop already did.
   */
  private async ensureCurrent(epoch: number, operation: string, signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      if (epoch === this.epoch) {
        await this.stop();
      }
      throw new ToolAdapterError("LifecycleError", { message: "Start aborted", cause: signal.reason });
    }
    if (epoch !== this.epoch) {
      throw new ToolAdapterError("LifecycleError", { message: `Adapter was stopped while ${operation}` });
    }
  }

  private async discover(epoch: number, operation: string, signal?: AbortSignal): Promise<void> {
    const discovery = await discoverTools(this.manager.getSessions(), this.library, {
      logger: this.log,
      profiler: this.profiler,
    });
    await this.ensureCurrent(epoch, operation, signal);

    const buildStart = performance.now();
    const { catalog, degradations } = buildCatalog(discovery.tools, {
      namespaceTools: this.settings.namespaceTools,
      schema: this.settings.schema,
      sanitizer: new NameSanitizer(this.nameSuffix),
    });
    this.profiler.recordCatalogBuild(performance.now() - buildStart, catalog.size);

    for (const degradation of degradations) {
      this.log.warn({ source: degradation.source, tool: degradation.tool }, degradation.message);
    }

    // Swapped whole, after the new catalog is complete
    this.catalog = catalog;
    this.diagnostics = {
      sourceFailures: [...this.manager.getFailures(), ...discovery.failures],
      schemaDegradations: degradations,
    };
    this.log.info({ tools: catalog.size, degraded: degradations.length }, "catalog built");
  }

  /**
   * Close every session and clear the catalog. Never throws.
   */
  async stop(): Promise<StopReport> {
    this.epoch++;
    const report = await this.manager.stop();
    this.catalog = new ToolCatalog();
    this.diagnostics = EMPTY_DIAGNOSTICS;
    this.started = false;
    this.startPromise = null;
    return report;
  }

  /**
   * Rediscover tools on the open sessions and replace the catalog
   */
  async rediscover(): Promise<void> {
    this.ensureStarted("rediscover");
    await this.discover(this.epoch, "rediscovering");
  }

  private ensureStarted(operation: string): void {
    if (!this.started) {
      throw new ToolAdapterError("LifecycleError", {
        message: `Cannot ${operation} before the adapter has started`,
      });
    }
  }

  isStarted(): boolean {
    return this.started;
  }

  listTools(): AdaptedTool[] {
    return this.catalog.list();
  }

  getTool(name: string): AdaptedTool | undefined {
    return this.catalog.get(name);
  }

  searchTools(query: string, maxResults: number = this.settings.searchLimit): AdaptedTool[] {
    const done = this.profiler.startTimer(TIMERS.substringSearch);
    try {
      return this.catalog.search(query, maxResults);
    } finally {
      done();
    }
  }

  searchToolsByPattern(pattern: string, limit?: number): SearchResult[] | { error: RegexSearchError } {
    const done = this.profiler.startTimer(TIMERS.patternSearch);
    try {
      return searchWithRegex(this.catalog.list(), pattern, limit);
    } finally {
      done();
    }
  }

  async callTool(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    this.ensureStarted("call a tool");
    return this.dispatcher.call(name, args);
  }

  /**
   * One host tool per catalog entry; calls go back through this adapter
   */
  toHostTools(): AdaptedHostTool[] {
    return this.catalog.list().map(tool => new AdaptedHostTool(tool, (name, args) => this.callTool(name, args)));
  }

  getDiagnostics(): Diagnostics {
    return {
      sourceFailures: [...this.diagnostics.sourceFailures],
      schemaDegradations: [...this.diagnostics.schemaDegradations],
    };
  }

  getStatus(): AdapterStatus {
    const sources = this.manager.getSources();
    const toolCounts = new Map<string, number>();
    for (const tool of this.catalog.list()) {
      const name = tool.rawTool.sourceRef.name;
      toolCounts.set(name, (toolCounts.get(name) ?? 0) + 1);
    }

    const details = sources.map(state => {
      const discoveryFailure = this.diagnostics.sourceFailures.find(f => f.source === state.name);
      const status: SourceStatus = state.status === "connected" && discoveryFailure ? "error" : state.status;
      return {
        name: state.name,
        protocolKind: state.source.protocolKind,
        status,
        toolCount: toolCounts.get(state.name) ?? 0,
        error: state.error?.message ?? discoveryFailure?.message ?? null,
      };
    });

    const connected = details.filter(d => d.status === "connected").length;
    const failed = details.filter(d => d.status === "error").length;

    let health: AdapterStatus["health"];
    if (details.length === 0) {
      health = { status: "unknown", message: this.sources.length === 0 ? "No sources configured" : "Not started" };
    } else if (failed === 0) {
      health = { status: "healthy", message: "All sources connected" };
    } else {
      health = { status: "degraded", message: `${failed} source(s) unavailable` };
    }

    return {
      state: this.manager.getState(),
      sources: { total: details.length, connected, failed, details },
      tools: { total: this.catalog.size },
      health,
    };
  }

  getMetrics(): PerformanceReport {
    return this.profiler.export();
  }

  /**
   * Start, run `fn`, and stop whatever the outcome
   */
  async use<T>(fn: (adapter: this) => Promise<T> | T, options?: StartOptions): Promise<T> {
    try {
      await this.start(options);
      return await fn(this);
    } finally {
      const report = await this.stop();
      if (report.failures.length > 0) {
        this.log.warn({ failures: report.failures.map(f => f.message) }, "stop reported close failures");
      }
    }
  }
}

/**
 * Scoped adapter: started before `fn`, stopped after it
 */
export async function withToolAdapter<T>(
  config: ConfigInput,
  fn: (adapter: ToolAdapter) => Promise<T> | T,
  options?: ToolAdapterOptions & StartOptions,
): Promise<T> {
  const { signal, ...adapterOptions } = options ?? {};
  const adapter = ToolAdapter.fromConfig(config, adapterOptions);
  return adapter.use(fn, { signal });
}
