import type { RawTool } from "../catalog/types";
import type { SourceDescriptor } from "../config";
import { ToolAdapterError, errorMessage } from "../errors";
import type { Logger } from "../logger";
import { makeNoopLogger } from "../logger";
import type { Profiler } from "../profiler";
import type { ToolSourceLibrary } from "../sources/registry";
import type { SourceSession } from "../sources/types";

export type DiscoveryGroup = {
  source: SourceDescriptor;
  tools: RawTool[];
};

export type DiscoveryResult = {
  /** One group per reachable source, in session order */
  groups: DiscoveryGroup[];
  /** All tools, flattened in group order */
  tools: RawTool[];
  /** One SourceUnreachable error per source whose discovery failed */
  failures: ToolAdapterError[];
};

export type DiscoverOptions = {
  logger?: Logger;
  profiler?: Profiler;
};

/**
 * Discover tools on every session concurrently. A failed source is
 * reported and skipped.
 */
export async function discoverTools(
  sessions: SourceSession[],
  library: ToolSourceLibrary,
  options: DiscoverOptions = {},
): Promise<DiscoveryResult> {
  const log = (options.logger ?? makeNoopLogger()).child({ component: "discovery" });
  const startTime = performance.now();

  const settled = await Promise.allSettled(sessions.map(session => library.discover(session)));

  const result: DiscoveryResult = { groups: [], tools: [], failures: [] };

  settled.forEach((outcome, index) => {
    const session = sessions[index];
    if (!session) return;
    const source = session.source;

    if (outcome.status === "rejected") {
      log.warn({ source: source.name, err: outcome.reason }, "discovery failed");
      result.failures.push(
        new ToolAdapterError("SourceUnreachable", {
          message: `Discovery on ${source.name} failed: ${errorMessage(outcome.reason)}`,
          source: source.name,
          cause: outcome.reason,
        }),
      );
      return;
    }

    const tools: RawTool[] = outcome.value.map(definition => ({ ...definition, sourceRef: source }));
    result.groups.push({ source, tools });
    result.tools.push(...tools);
    options.profiler?.recordSourceTools(source.name, tools.length);
  });

  const duration = performance.now() - startTime;
  options.profiler?.recordDiscovery(duration);
  log.info(
    { sources: result.groups.length, failed: result.failures.length, tools: result.tools.length, duration },
    "discovery complete",
  );
  return result;
}
