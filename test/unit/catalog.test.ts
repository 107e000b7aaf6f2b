import { describe, expect, test } from "vitest";
import { ToolCatalog, adaptTool, buildCatalog, extractArgs } from "../../src/catalog/catalog";
import { NameSanitizer } from "../../src/catalog/names";
import { isToolAdapterError } from "../../src/errors";
import { rawTool, sequentialSuffix, textSource } from "../helpers/tools";

const weather = textSource("weather");
const books = textSource("books");

describe("adaptTool", () => {
  test("creates correct structure", () => {
    const raw = rawTool(weather, "get_forecast", "Get the forecast", {
      type: "object",
      properties: {
        city: { type: "string", description: "City name" },
        days: { type: "integer" },
      },
      required: ["city"],
    });

    const { tool, warnings } = adaptTool(raw, new NameSanitizer());

    expect(tool.adaptedName).toBe("weather_get_forecast");
    expect(tool.qualifiedName).toBe("weather.get_forecast");
    expect(tool.description).toBe("Get the forecast");
    expect(tool.args).toEqual([
      { name: "city", description: "City name" },
      { name: "days", description: undefined },
    ]);
    expect(tool.rawTool).toBe(raw);
    expect(warnings).toEqual([]);
  });

  test("uses the bare raw name without namespacing", () => {
    const { tool } = adaptTool(rawTool(weather, "get_forecast"), new NameSanitizer(), { namespaceTools: false });
    expect(tool.adaptedName).toBe("get_forecast");
    expect(tool.qualifiedName).toBe("weather.get_forecast");
  });

  test("handles missing description", () => {
    const { tool } = adaptTool(rawTool(books, "list_books"), new NameSanitizer());
    expect(tool.description).toBe("Tool: books.list_books");
  });

  test("prefixes output schema warnings", () => {
    const raw = { ...rawTool(books, "list_books"), rawOutputSchema: { type: "blob" } };
    const { tool, warnings } = adaptTool(raw, new NameSanitizer());

    expect(tool.normalizedOutputSchema).toEqual({});
    expect(warnings).toEqual([
      { path: "output:#", message: 'Unsupported type "blob"; degraded to an unconstrained schema' },
    ]);
  });
});

test("extractArgs handles boolean property schemas", () => {
  expect(extractArgs({ type: "object", properties: { flag: true } })).toEqual([{ name: "flag", description: undefined }]);
});

describe("buildCatalog", () => {
  test("keeps insertion order and resolves qualified names", () => {
    const { catalog } = buildCatalog([
      rawTool(weather, "get_weather_forecast", "Forecast for a city"),
      rawTool(books, "list_books", "List books on a shelf"),
    ]);

    expect(catalog.size).toBe(2);
    expect(catalog.list().map(t => t.adaptedName)).toEqual(["weather_get_weather_forecast", "books_list_books"]);
    expect(catalog.get("books.list_books")?.adaptedName).toBe("books_list_books");
    expect(catalog.get("missing")).toBeUndefined();
  });

  test("colliding names get suffixes", () => {
    const { catalog } = buildCatalog(
      [rawTool(textSource("a.b"), "c"), rawTool(textSource("a"), "b.c")],
      { sanitizer: new NameSanitizer(sequentialSuffix()) },
    );

    expect(catalog.list().map(t => t.adaptedName)).toEqual(["a_b_c", "a_b_c_s0000001"]);
  });

  test("reports degraded schemas as SchemaDegraded", () => {
    const { catalog, degradations } = buildCatalog([
      rawTool(books, "upload", "Upload a cover", {
        type: "object",
        properties: { cover: { type: "blob" } },
      }),
    ]);

    expect(catalog.size).toBe(1);
    expect(degradations).toHaveLength(1);
    const [degraded] = degradations;
    expect(isToolAdapterError(degraded, "SchemaDegraded")).toBe(true);
    expect(degraded?.source).toBe("books");
    expect(degraded?.tool).toBe("books_upload");
    expect(degraded?.message).toBe(
      'Schema of books.upload degraded: #/properties/cover: Unsupported type "blob"; degraded to an unconstrained schema',
    );
  });
});

describe("ToolCatalog.search", () => {
  const { catalog } = buildCatalog(
    [
      rawTool(weather, "get_weather_forecast", "Forecast for a city"),
      rawTool(books, "list_books", "List books on a shelf"),
      rawTool(books, "weather", "Books about weather"),
      rawTool(books, "find_atlas", "Maps with weather charts"),
    ],
    { namespaceTools: false },
  );

  test("returns only matching tools", () => {
    const names = buildCatalog([
      rawTool(weather, "get_weather_forecast", "Forecast for a city"),
      rawTool(books, "list_books", "List books on a shelf"),
    ]).catalog.search("weather", 10).map(t => t.qualifiedName);

    expect(names).toEqual(["weather.get_weather_forecast"]);
  });

  test("ranks exact name, then name substring, then description", () => {
    expect(catalog.search("WEATHER", 10).map(t => t.adaptedName)).toEqual([
      "weather",
      "get_weather_forecast",
      "find_atlas",
    ]);
  });

  test("respects maxResults", () => {
    expect(catalog.search("weather", 1).map(t => t.adaptedName)).toEqual(["weather"]);
    expect(catalog.search("weather", 0)).toEqual([]);
    expect(catalog.search("weather", -3)).toEqual([]);
  });

  test("empty query matches everything in insertion order", () => {
    expect(catalog.search("", 10).map(t => t.adaptedName)).toEqual([
      "get_weather_forecast",
      "list_books",
      "weather",
      "find_atlas",
    ]);
  });
});

test("ToolCatalog rejects duplicate adapted names", () => {
  const { catalog } = buildCatalog([rawTool(books, "list_books")]);
  const [tool] = catalog.list();
  expect(tool).toBeDefined();
  if (tool) {
    expect(() => new ToolCatalog([tool, tool])).toThrow("Duplicate adapted tool name: books_list_books");
  }
});
