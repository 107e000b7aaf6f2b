import { expect, test } from "vitest";
import { buildCatalog } from "../../src/catalog/catalog";
import { MAX_REGEX_LENGTH, generateSignature, searchWithRegex } from "../../src/search/regex";
import { rawTool, textSource } from "../helpers/tools";

const mail = textSource("mail");
const outlook = textSource("outlook");
const weather = textSource("weather");

const tools = buildCatalog([
  rawTool(mail, "send_email", "Send an email message", {
    type: "object",
    properties: {
      to: { type: "string", description: "Recipient address" },
      cc: { type: "string" },
    },
    required: ["to"],
  }),
  rawTool(outlook, "SEND_MAIL", "Send a mail message"),
  rawTool(weather, "get_weather", "Get current weather for a location", {
    type: "object",
    properties: { latitude: { type: "number" } },
  }),
]).catalog.list();

test("regex search finds matching tools", () => {
  const results = searchWithRegex(tools, "email");

  expect(Array.isArray(results)).toBe(true);
  if (Array.isArray(results)) {
    expect(results.map(r => r.adaptedName)).toEqual(["mail_send_email"]);
    expect(results[0]?.preview).toBe("Send an email message");
  }
});

test("regex search handles case-insensitive with (?i)", () => {
  const results = searchWithRegex(tools, "(?i)^.*send");

  expect(Array.isArray(results) ? results.map(r => r.adaptedName) : results).toEqual([
    "mail_send_email",
    "outlook_SEND_MAIL",
  ]);
});

test("regex search matches argument names", () => {
  const results = searchWithRegex(tools, "latitude");
  expect(Array.isArray(results) ? results.map(r => r.qualifiedName) : results).toEqual(["weather.get_weather"]);
});

test("regex search with no matches", () => {
  expect(searchWithRegex(tools, "xyzzy")).toEqual([]);
});

test("regex search with limit", () => {
  const results = searchWithRegex(tools, "(?i)e", 2);
  expect(Array.isArray(results) ? results.length : -1).toBe(2);
});

test("regex search rejects long patterns", () => {
  expect(searchWithRegex(tools, "a".repeat(MAX_REGEX_LENGTH + 1))).toEqual({
    error: {
      code: "pattern_too_long",
      message: `Pattern exceeds maximum length of ${MAX_REGEX_LENGTH} characters`,
    },
  });
});

test("regex search reports invalid patterns", () => {
  const result = searchWithRegex(tools, "(unclosed");
  expect(Array.isArray(result)).toBe(false);
  if (!Array.isArray(result)) {
    expect(result.error.code).toBe("invalid_pattern");
  }
});

test("signature marks optional arguments", () => {
  const [sendEmail] = tools;
  expect(sendEmail && generateSignature(sendEmail)).toBe("send_email(to, cc?)");
});
