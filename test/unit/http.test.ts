import { describe, expect, test } from "vitest";
import type { HttpFamilySource, SourceDescriptorOf } from "../../src/config";
import { MalformedResponseError, RemoteToolError, SourceTimeoutError } from "../../src/sources/errors";
import {
  HttpDriver,
  SseDriver,
  StreamableHttpDriver,
  buildHttpRequest,
  parseSseEvents,
} from "../../src/sources/http";
import { jsonResponse, stubFetch } from "../helpers/fetch";
import { rawTool } from "../helpers/tools";

function httpSource(overrides: Partial<SourceDescriptorOf<"http">> = {}): SourceDescriptorOf<"http"> {
  return {
    protocolKind: "http",
    name: "pets",
    url: "https://pets.example.com/manual",
    httpMethod: "GET",
    contentType: "application/json",
    ...overrides,
  };
}

describe("buildHttpRequest", () => {
  test("fills path placeholders, header fields and the query", () => {
    const template = httpSource({ url: "https://pets.example.com/pets/{petId}", headerFields: ["X-Trace"] });

    const request = buildHttpRequest(template, template, {
      petId: "a b",
      "X-Trace": "t1",
      limit: 5,
      tags: ["x", "y"],
      skip: null,
    });

    expect(request.method).toBe("GET");
    expect(request.url.href).toBe("https://pets.example.com/pets/a%20b?limit=5&tags=x&tags=y");
    expect(request.headers).toEqual({ "X-Trace": "t1" });
    expect(request.body).toBeUndefined();
  });

  test("sends remaining arguments as a JSON body for POST", () => {
    const template = httpSource({ url: "https://pets.example.com/pets", httpMethod: "POST" });

    const request = buildHttpRequest(template, template, { name: "Rex", age: 3 });

    expect(request.url.href).toBe("https://pets.example.com/pets");
    expect(request.body).toBe('{"name":"Rex","age":3}');
    expect(request.headers).toEqual({ "Content-Type": "application/json" });
  });

  test("a body field takes one argument as the body", () => {
    const template = httpSource({ url: "https://pets.example.com/pets", httpMethod: "PUT", bodyField: "body" });

    const request = buildHttpRequest(template, template, { body: { name: "Rex" }, dryRun: true });

    expect(request.body).toBe('{"name":"Rex"}');
    expect(request.url.href).toBe("https://pets.example.com/pets?dryRun=true");
  });

  test("applies query api keys from the source", () => {
    const source = httpSource({
      auth: { authType: "apiKey", apiKey: "test-secret", varName: "api_key", location: "query" },
    });
    const template = httpSource({ url: "https://pets.example.com/pets" });

    expect(buildHttpRequest(template, source, {}).url.href).toBe("https://pets.example.com/pets?api_key=test-secret");
  });

  test("applies basic auth and source headers", () => {
    const template = httpSource({
      headers: { "User-Agent": "adapter-test" },
      auth: { authType: "basic", username: "user", password: "test-secret" },
    });

    expect(buildHttpRequest(template, template, {}).headers).toEqual({
      "User-Agent": "adapter-test",
      Authorization: `Basic ${Buffer.from("user:test-secret").toString("base64")}`,
    });
  });
});

test("parseSseEvents splits events and skips comments", () => {
  const text = 'event: update\ndata: {"a":1}\n\n: keep-alive\n\ndata: one\ndata: two\n\n';

  expect(parseSseEvents(text)).toEqual([
    { event: "update", data: '{"a":1}' },
    { event: "message", data: "one\ntwo" },
  ]);
});

describe("HttpDriver", () => {
  test("discovers tools from a manual", async () => {
    const { fetch, requests } = stubFetch(() =>
      jsonResponse({
        tools: [{ name: "list_pets", description: "List pets", inputs: { type: "object", properties: {} } }],
      }),
    );
    const driver = new HttpDriver({ fetch });
    const session = await driver.openSession(httpSource());

    const tools = await driver.discover(session);

    expect(tools).toEqual([
      { rawName: "list_pets", description: "List pets", rawInputSchema: { type: "object", properties: {} }, tags: [] },
    ]);
    expect(requests).toHaveLength(1);
    expect(requests[0]?.url).toBe("https://pets.example.com/manual");
    expect(requests[0]?.headers.get("accept")).toBe("application/json");
  });

  test("a manual that is not JSON is malformed", async () => {
    const { fetch } = stubFetch(() => new Response("<html>", { headers: { "content-type": "text/html" } }));
    const driver = new HttpDriver({ fetch });
    const session = await driver.openSession(httpSource());

    await expect(driver.discover(session)).rejects.toThrow(new MalformedResponseError("Manual from pets is not valid JSON"));
  });

  test("invokes through the tool's call template", async () => {
    const { fetch, requests } = stubFetch(() => jsonResponse({ id: "p1", name: "Rex" }));
    const driver = new HttpDriver({ fetch });
    const source = httpSource();
    const session = await driver.openSession(source);
    const tool = {
      ...rawTool(source, "get_pet"),
      callTemplate: httpSource({ url: "https://pets.example.com/pets/{petId}" }),
    };

    const result = await driver.invoke(session, tool, { petId: "p1" });

    expect(result).toEqual({ id: "p1", name: "Rex" });
    expect(requests[0]?.url).toBe("https://pets.example.com/pets/p1");
  });

  test("returns text bodies as strings", async () => {
    const { fetch } = stubFetch(() => new Response("pong", { headers: { "content-type": "text/plain" } }));
    const driver = new HttpDriver({ fetch });
    const source = httpSource({ url: "https://pets.example.com/ping" });
    const session = await driver.openSession(source);

    expect(await driver.invoke(session, rawTool(source, "ping"), {})).toBe("pong");
  });

  test("non-2xx responses raise RemoteToolError with the status", async () => {
    const { fetch } = stubFetch(() => new Response("no such pet", { status: 404, statusText: "Not Found" }));
    const driver = new HttpDriver({ fetch });
    const source = httpSource();
    const session = await driver.openSession(source);

    const call = driver.invoke(session, rawTool(source, "get_pet"), {});
    await expect(call).rejects.toThrow(new RemoteToolError("HTTP 404 Not Found: no such pet"));
    await expect(call).rejects.toMatchObject({ status: 404 });
  });

  test("aborted requests raise SourceTimeoutError", async () => {
    const { fetch } = stubFetch(() => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });
    const driver = new HttpDriver({ fetch, requestTimeout: 500 });
    const source = httpSource();
    const session = await driver.openSession(source);

    await expect(driver.invoke(session, rawTool(source, "list_pets"), {})).rejects.toThrow(
      new SourceTimeoutError("Request to https://pets.example.com timed out after 500ms"),
    );
  });

  test("rejects sources of another kind", async () => {
    const driver = new HttpDriver({ fetch: stubFetch(() => jsonResponse({})).fetch });
    const sse: HttpFamilySource = { ...httpSource(), protocolKind: "sse" };

    await expect(driver.openSession(sse)).rejects.toThrow("Source pets is a sse source, expected http");
  });
});

describe("SseDriver", () => {
  test("collects the data of matching events", async () => {
    const { fetch, requests } = stubFetch(
      () =>
        new Response('event: update\ndata: {"t":1}\n\nevent: ping\ndata: x\n\nevent: update\ndata: done\n\n', {
          headers: { "content-type": "text/event-stream" },
        }),
    );
    const driver = new SseDriver({ fetch });
    const source: HttpFamilySource = {
      ...httpSource({ url: "https://pets.example.com/events" }),
      protocolKind: "sse",
      eventType: "update",
    };
    const session = await driver.openSession(source);

    expect(await driver.invoke(session, rawTool(source, "watch"), {})).toEqual([{ t: 1 }, "done"]);
    expect(requests[0]?.headers.get("accept")).toBe("text/event-stream");
  });
});

describe("StreamableHttpDriver", () => {
  const source: HttpFamilySource = {
    ...httpSource({ url: "https://pets.example.com/feed" }),
    protocolKind: "streamableHttp",
  };

  test("decodes NDJSON line by line", async () => {
    const { fetch } = stubFetch(
      () => new Response('{"a":1}\n\n{"a":2}\n', { headers: { "content-type": "application/x-ndjson" } }),
    );
    const driver = new StreamableHttpDriver({ fetch });
    const session = await driver.openSession(source);

    expect(await driver.invoke(session, rawTool(source, "feed"), {})).toEqual([{ a: 1 }, { a: 2 }]);
  });

  test("a bad NDJSON line is malformed", async () => {
    const { fetch } = stubFetch(
      () => new Response('{"a":1}\n{bad', { headers: { "content-type": "application/x-ndjson" } }),
    );
    const driver = new StreamableHttpDriver({ fetch });
    const session = await driver.openSession(source);

    await expect(driver.invoke(session, rawTool(source, "feed"), {})).rejects.toThrow(
      new MalformedResponseError("Invalid NDJSON line: {bad"),
    );
  });

  test("plain JSON falls back to the HTTP reader", async () => {
    const { fetch } = stubFetch(() => jsonResponse([1, 2]));
    const driver = new StreamableHttpDriver({ fetch });
    const session = await driver.openSession(source);

    expect(await driver.invoke(session, rawTool(source, "feed"), {})).toEqual([1, 2]);
  });
});
