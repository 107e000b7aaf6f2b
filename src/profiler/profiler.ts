/**
 * High-resolution performance profiler for the tool adapter
 * Uses performance.now() for measurements; one instance per adapter
 */

export interface PerformanceStats {
  count: number;
  min: number;
  max: number;
  avg: number;
  p50: number;
  p95: number;
  p99: number;
  total: number;
}

export type SourceStatus = "connecting" | "connected" | "error";

export interface SourceMetrics {
  name: string;
  connectTime: number;
  toolCount: number;
  status: SourceStatus;
  error?: string;
}

export type StartState = "idle" | "starting" | "ready" | "degraded";

export const TIMERS = {
  substringSearch: "search.substring",
  patternSearch: "search.pattern",
  toolCall: "tool.call",
} as const;

export interface PerformanceReport {
  timestamp: string;
  uptime: number;
  start: {
    startTime: number;
    endTime: number | null;
    duration: number | null;
    state: StartState;
    sources: SourceMetrics[];
  };
  discovery: {
    duration: number | null;
    passes: number;
  };
  catalog: {
    buildTime: number | null;
    toolCount: number;
  };
  searches: {
    substring: PerformanceStats | null;
    pattern: PerformanceStats | null;
  };
  calls: PerformanceStats | null;
}

/**
 * Nearest-rank percentile of a sorted array
 */
function percentile(sorted: number[], p: number): number {
  const index = Math.max(0, Math.ceil((p / 100) * sorted.length) - 1);
  return sorted[index] ?? 0;
}

function calculateStats(measurements: number[]): PerformanceStats | null {
  if (measurements.length === 0) return null;

  const sorted = [...measurements].sort((a, b) => a - b);
  const total = sorted.reduce((sum, v) => sum + v, 0);

  return {
    count: sorted.length,
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: total / sorted.length,
    p50: percentile(sorted, 50),
    p95: percentile(sorted, 95),
    p99: percentile(sorted, 99),
    total,
  };
}

export class Profiler {
  private measures: Map<string, number[]> = new Map();
  private sourceMetrics: Map<string, SourceMetrics> = new Map();

  private startBegin: number | null = null;
  private startEnd: number | null = null;
  private startState: StartState = "idle";

  private discoveryDuration: number | null = null;
  private discoveryPasses = 0;

  private catalogBuildTime: number | null = null;
  private toolCount = 0;

  private readonly createdAt: number = performance.now();

  /**
   * Record a duration directly (for pre-calculated values)
   */
  record(name: string, duration: number): void {
    const existing = this.measures.get(name) ?? [];
    existing.push(duration);
    this.measures.set(name, existing);
  }

  getStats(name: string): PerformanceStats | null {
    const measurements = this.measures.get(name);
    if (!measurements) return null;
    return calculateStats(measurements);
  }

  /**
   * Create a scoped timer that records its duration when called
   * Usage: const done = profiler.startTimer(TIMERS.toolCall); ... done();
   */
  startTimer(name: string): () => number {
    const start = performance.now();
    return () => {
      const duration = performance.now() - start;
      this.record(name, duration);
      return duration;
    };
  }

  startBegun(): void {
    this.startBegin = performance.now();
    this.startEnd = null;
    this.startState = "starting";
  }

  startComplete(state: Exclude<StartState, "idle" | "starting">): void {
    this.startEnd = performance.now();
    this.startState = state;
  }

  recordSourceConnect(name: string, connectTime: number, status: SourceStatus, error?: string): void {
    const previous = this.sourceMetrics.get(name);
    this.sourceMetrics.set(name, {
      name,
      connectTime,
      toolCount: previous?.toolCount ?? 0,
      status,
      error,
    });
  }

  recordSourceTools(name: string, toolCount: number): void {
    const metrics = this.sourceMetrics.get(name);
    if (metrics) {
      metrics.toolCount = toolCount;
    }
  }

  recordDiscovery(duration: number): void {
    this.discoveryDuration = duration;
    this.discoveryPasses++;
  }

  recordCatalogBuild(duration: number, toolCount: number): void {
    this.catalogBuildTime = duration;
    this.toolCount = toolCount;
  }

  getStartState(): StartState {
    return this.startState;
  }

  /**
   * Start duration (or time since start if still starting)
   */
  getStartDuration(): number | null {
    if (this.startBegin === null) return null;
    if (this.startEnd !== null) {
      return this.startEnd - this.startBegin;
    }
    return performance.now() - this.startBegin;
  }

  export(): PerformanceReport {
    return {
      timestamp: new Date().toISOString(),
      uptime: performance.now() - this.createdAt,
      start: {
        startTime: this.startBegin ?? 0,
        endTime: this.startEnd,
        duration: this.getStartDuration(),
        state: this.startState,
        sources: Array.from(this.sourceMetrics.values()),
      },
      discovery: {
        duration: this.discoveryDuration,
        passes: this.discoveryPasses,
      },
      catalog: {
        buildTime: this.catalogBuildTime,
        toolCount: this.toolCount,
      },
      searches: {
        substring: this.getStats(TIMERS.substringSearch),
        pattern: this.getStats(TIMERS.patternSearch),
      },
      calls: this.getStats(TIMERS.toolCall),
    };
  }

  reset(): void {
    this.measures.clear();
    this.sourceMetrics.clear();
    this.startBegin = null;
    this.startEnd = null;
    this.startState = "idle";
    this.discoveryDuration = null;
    this.discoveryPasses = 0;
    this.catalogBuildTime = null;
    this.toolCount = 0;
  }
}
