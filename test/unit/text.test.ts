import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import type { SourceDescriptorOf } from "../../src/config";
import { MalformedResponseError } from "../../src/sources/errors";
import { TextDriver, decodeJsonc } from "../../src/sources/text";
import { rawTool } from "../helpers/tools";

test("decodeJsonc accepts comments and trailing commas", () => {
  expect(decodeJsonc(`{ /* tools */ "tools": [1, 2,], }`, "Manual")).toEqual({ tools: [1, 2] });
  expect(() => decodeJsonc(`{ "tools": `, "Manual")).toThrow(MalformedResponseError);
});

describe("TextDriver", () => {
  let dir: string;
  const driver = new TextDriver();

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "tool-adapter-text-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function textSource(content: string): Promise<SourceDescriptorOf<"text">> {
    const filePath = join(dir, "manual.jsonc");
    await writeFile(filePath, content);
    return { protocolKind: "text", name: "notes", filePath };
  }

  test("reads a JSONC manual and fills in template names", async () => {
    const source = await textSource(`{
      // notes service
      "tools": [
        {
          "name": "get_note",
          "description": "Fetch a note",
          "inputs": { "type": "object", "properties": { "id": { "type": "string" } } },
          "tool_call_template": { "protocolKind": "http", "url": "https://notes.example.com/notes/{id}" },
        },
      ],
    }`);
    const session = await driver.openSession(source);

    expect(await driver.discover(session)).toEqual([
      {
        rawName: "get_note",
        description: "Fetch a note",
        rawInputSchema: { type: "object", properties: { id: { type: "string" } } },
        tags: [],
        callTemplate: {
          protocolKind: "http",
          name: "notes",
          url: "https://notes.example.com/notes/{id}",
          httpMethod: "GET",
          contentType: "application/json",
        },
      },
    ]);
  });

  test("reads an OpenAPI document", async () => {
    const source = await textSource(
      JSON.stringify({
        openapi: "3.0.3",
        servers: [{ url: "https://notes.example.com" }],
        paths: { "/notes": { get: { operationId: "listNotes", summary: "List notes" } } },
      }),
    );
    const session = await driver.openSession(source);

    const [tool] = await driver.discover(session);
    expect(tool?.rawName).toBe("listNotes");
    expect(tool?.callTemplate).toMatchObject({ protocolKind: "http", url: "https://notes.example.com/notes" });
  });

  test("a broken manual is malformed", async () => {
    const source = await textSource(`{ "tools": [ { "description": "no name" } ] }`);
    const session = await driver.openSession(source);

    await expect(driver.discover(session)).rejects.toThrow(MalformedResponseError);
  });

  test("tools cannot be called on the text source itself", async () => {
    const source = await textSource(`{ "tools": [] }`);
    const session = await driver.openSession(source);

    await expect(driver.invoke(session, rawTool(source, "get_note"), {})).rejects.toThrow(
      "Tool get_note from text source notes has no call template for a callable protocol",
    );
  });
});
