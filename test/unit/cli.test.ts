import { describe, expect, test } from "vitest";
import type { SourceDescriptorOf } from "../../src/config";
import { CliDriver, toCommandFlags, type CommandRequest, type CommandResult } from "../../src/sources/cli";
import { RemoteToolError } from "../../src/sources/errors";
import { rawTool } from "../helpers/tools";

const source: SourceDescriptorOf<"cli"> = {
  protocolKind: "cli",
  name: "weather",
  command: ["weather-cli", "--manual"],
  environment: { WEATHER_UNITS: "metric" },
  workingDir: "/srv/weather",
};

function recordingRunner(...results: Array<Partial<CommandResult>>) {
  const requests: CommandRequest[] = [];
  const runner = async (request: CommandRequest): Promise<CommandResult> => {
    requests.push(request);
    return { exitCode: 0, stdout: "", stderr: "", ...results.shift() };
  };
  return { runner, requests };
}

test("toCommandFlags renders flags", () => {
  expect(
    toCommandFlags({ verbose: true, quiet: false, city: "Oslo", days: 3, filter: { a: 1 }, skip: null }),
  ).toEqual(["--verbose", "--city", "Oslo", "--days", "3", "--filter", '{"a":1}']);
});

describe("CliDriver", () => {
  test("discovers the manual printed on stdout", async () => {
    const { runner, requests } = recordingRunner({
      stdout: JSON.stringify({ tools: [{ name: "forecast", description: "Weather forecast" }] }),
    });
    const driver = new CliDriver({ runner, requestTimeout: 5000 });
    const session = await driver.openSession(source);

    const tools = await driver.discover(session);

    expect(tools).toEqual([{ rawName: "forecast", description: "Weather forecast", rawInputSchema: undefined, tags: [] }]);
    expect(requests).toHaveLength(1);
    expect(requests[0]).toMatchObject({
      command: "weather-cli",
      args: ["--manual"],
      cwd: "/srv/weather",
      timeoutMs: 5000,
    });
    expect(requests[0]?.env.WEATHER_UNITS).toBe("metric");
  });

  test("invokes through a cli call template with flags", async () => {
    const { runner, requests } = recordingRunner({ stdout: '{"temp":21}\n' });
    const driver = new CliDriver({ runner });
    const session = await driver.openSession(source);
    const tool = {
      ...rawTool(source, "forecast"),
      callTemplate: { ...source, command: ["weather-cli", "forecast"] },
    };

    const result = await driver.invoke(session, tool, { city: "Oslo" });

    expect(result).toEqual({ temp: 21 });
    expect(requests[0]?.args).toEqual(["forecast", "--city", "Oslo"]);
  });

  test("plain and empty output", async () => {
    const { runner } = recordingRunner({ stdout: "Sunny\n" }, { stdout: "  \n" });
    const driver = new CliDriver({ runner });
    const session = await driver.openSession(source);

    expect(await driver.invoke(session, rawTool(source, "forecast"), {})).toBe("Sunny");
    expect(await driver.invoke(session, rawTool(source, "forecast"), {})).toBe("");
  });

  test("a non-zero exit raises RemoteToolError with stderr", async () => {
    const { runner } = recordingRunner({ exitCode: 2, stderr: "unknown city\n" });
    const driver = new CliDriver({ runner });
    const session = await driver.openSession(source);

    await expect(driver.invoke(session, rawTool(source, "forecast"), { city: "Atlantis" })).rejects.toThrow(
      new RemoteToolError("Command weather-cli exited with code 2: unknown city"),
    );
  });

  test("a killed process reports a null exit code", async () => {
    const { runner } = recordingRunner({ exitCode: null });
    const driver = new CliDriver({ runner });
    const session = await driver.openSession(source);

    await expect(driver.discover(session)).rejects.toThrow("Command weather-cli exited with code null");
  });
});
