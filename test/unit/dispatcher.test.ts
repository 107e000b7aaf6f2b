import { describe, expect, test } from "vitest";
import { buildCatalog } from "../../src/catalog/catalog";
import { InvocationDispatcher, classifyFailure } from "../../src/dispatcher/dispatcher";
import { ToolAdapterError, isToolAdapterError } from "../../src/errors";
import { Profiler, TIMERS } from "../../src/profiler";
import { MalformedResponseError, RemoteToolError, SourceTimeoutError } from "../../src/sources/errors";
import { FakeToolHandlers, FakeToolSourceDriver, FakeTools, type FakeCallHandler } from "../../src/sources/fake";
import { ToolSourceLibrary } from "../../src/sources/registry";
import type { SourceSession } from "../../src/sources/types";
import { mcpSource, rawTool } from "../helpers/tools";

describe("classifyFailure", () => {
  const withCode = (code: string) => Object.assign(new Error("socket error"), { code });

  test.each([
    [new SourceTimeoutError("slow"), "timeout"],
    [Object.assign(new Error("aborted"), { name: "TimeoutError" }), "timeout"],
    [new Error("Request timed out"), "timeout"],
    [new RemoteToolError("bad city"), "remote_error"],
    [new MalformedResponseError("not json"), "malformed_response"],
    [new SyntaxError("Unexpected token"), "malformed_response"],
    [withCode("ECONNREFUSED"), "connection"],
    [new TypeError("fetch failed", { cause: withCode("ECONNRESET") }), "connection"],
    [new TypeError("fetch failed"), "connection"],
    [new Error("boom"), "unknown"],
    ["a string", "unknown"],
  ])("%s is %s", (error, expected) => {
    expect(classifyFailure(error)).toBe(expected);
  });
});

describe("InvocationDispatcher", () => {
  const source = mcpSource("calc");

  async function setup(onCallTool: FakeCallHandler = FakeToolHandlers.calculator, failCall = false) {
    const driver = new FakeToolSourceDriver({ calc: { tools: FakeTools.calculator, onCallTool, failCall, delay: 0 } });
    const library = new ToolSourceLibrary([driver]);
    const sessions = new Map<string, SourceSession>([["calc", await library.openSession(source)]]);
    const { catalog } = buildCatalog([rawTool(source, "add"), rawTool(source, "multiply")]);
    const profiler = new Profiler();
    const dispatcher = new InvocationDispatcher({
      catalog: () => catalog,
      sessions: { getSession: name => sessions.get(name) },
      library,
      profiler,
    });
    return { dispatcher, sessions, profiler, driver };
  }

  async function failureOf(call: Promise<unknown>): Promise<ToolAdapterError> {
    try {
      await call;
    } catch (error) {
      if (isToolAdapterError(error)) return error;
      throw error;
    }
    throw new Error("Expected the call to fail");
  }

  test("calls a tool by adapted name", async () => {
    const { dispatcher, profiler, driver } = await setup();

    expect(await dispatcher.call("calc_add", { a: 2, b: 3 })).toEqual({ result: 5 });
    expect(driver.calls).toEqual([{ source: "calc", tool: "add", args: { a: 2, b: 3 } }]);
    expect(profiler.getStats(TIMERS.toolCall)?.count).toBe(1);
  });

  test("also resolves qualified names", async () => {
    const { dispatcher } = await setup();
    expect(await dispatcher.call("calc.multiply", { a: 2, b: 3 })).toEqual({ result: 6 });
  });

  test("unknown tools raise ToolNotFound", async () => {
    const { dispatcher } = await setup();
    const error = await failureOf(dispatcher.call("calc_divide", {}));

    expect(error.kind).toBe("ToolNotFound");
    expect(error.message).toBe("Tool not found: calc_divide");
  });

  test("a source without a session is a connection failure", async () => {
    const { dispatcher, sessions } = await setup();
    sessions.clear();

    const error = await failureOf(dispatcher.call("calc_add", { a: 1, b: 1 }));

    expect(error.kind).toBe("InvocationFailed");
    expect(error.failure).toBe("connection");
    expect(error.message).toBe("No open session for source calc");
  });

  test("driver errors become InvocationFailed with a failure tag", async () => {
    const { dispatcher, profiler } = await setup(async () => {
      throw new RemoteToolError("division by zero");
    });

    const error = await failureOf(dispatcher.call("calc_add", { a: 1, b: 0 }));

    expect(error.kind).toBe("InvocationFailed");
    expect(error.failure).toBe("remote_error");
    expect(error.message).toBe("division by zero");
    expect(error.source).toBe("calc");
    expect(error.tool).toBe("calc_add");
    expect(error.cause).toBeInstanceOf(RemoteToolError);
    expect(profiler.getStats(TIMERS.toolCall)?.count).toBe(1);
  });

  test("untyped errors are tagged unknown", async () => {
    const { dispatcher } = await setup(FakeToolHandlers.calculator, true);
    const error = await failureOf(dispatcher.call("calc_add", { a: 1, b: 1 }));

    expect(error.failure).toBe("unknown");
    expect(error.message).toBe("Tool call failed");
  });

  test("adapter errors pass through unchanged", async () => {
    const original = new ToolAdapterError("LifecycleError", { message: "session closed" });
    const { dispatcher } = await setup(async () => {
      throw original;
    });

    expect(await failureOf(dispatcher.call("calc_add", {}))).toBe(original);
  });
});
