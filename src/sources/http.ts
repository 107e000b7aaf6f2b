import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { AuthConfig, HttpFamilySource, SourceDescriptor } from "../config";
import { MalformedResponseError, RemoteToolError, SourceTimeoutError } from "./errors";
import { decodeJson, parseManual, tryDecodeJson } from "./manual";
import { createSession } from "./session";
import type { DriverOptions, SourceSession, ToolSourceDriver } from "./types";

export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export type HttpDriverOptions = DriverOptions & {
  /** Override fetch for testing */
  fetch?: FetchLike;
};

const DEFAULT_REQUEST_TIMEOUT = 30000;

export function isHttpFamily(source: SourceDescriptor): source is HttpFamilySource {
  return source.protocolKind === "http" || source.protocolKind === "sse" || source.protocolKind === "streamableHttp";
}

function applyAuth(auth: AuthConfig | undefined, url: URL, headers: Record<string, string>): void {
  if (!auth) return;
  if (auth.authType === "basic") {
    headers.Authorization = `Basic ${Buffer.from(`${auth.username}:${auth.password}`).toString("base64")}`;
  } else if (auth.location === "query") {
    url.searchParams.set(auth.varName, auth.apiKey);
  } else {
    headers[auth.varName] = auth.apiKey;
  }
}

function toParam(value: unknown): string {
  return typeof value === "object" && value !== null ? JSON.stringify(value) : String(value);
}

export type HttpRequest = {
  url: URL;
  method: string;
  headers: Record<string, string>;
  body?: string;
};

/**
 * Build the request for a tool call. Path placeholders and header fields
 * consume their arguments; what remains goes to the body or the query.
 */
export function buildHttpRequest(
  template: HttpFamilySource,
  source: HttpFamilySource,
  args: Record<string, unknown>,
): HttpRequest {
  const remaining: Record<string, unknown> = { ...args };

  const path = template.url.replace(/\{([^}]+)\}/g, (placeholder, name: string) => {
    if (!(name in remaining)) return placeholder;
    const value = remaining[name];
    delete remaining[name];
    return encodeURIComponent(toParam(value));
  });
  const url = new URL(path);

  const headers: Record<string, string> = { ...source.headers, ...template.headers };
  for (const field of template.headerFields ?? []) {
    if (field in remaining) {
      headers[field] = toParam(remaining[field]);
      delete remaining[field];
    }
  }

  applyAuth(template.auth ?? source.auth, url, headers);

  const method = template.httpMethod;
  let body: string | undefined;

  if (template.bodyField !== undefined) {
    if (template.bodyField in remaining) {
      const value = remaining[template.bodyField];
      body = typeof value === "string" ? value : JSON.stringify(value);
      delete remaining[template.bodyField];
    }
  } else if (method !== "GET" && method !== "DELETE" && Object.keys(remaining).length > 0) {
    body = JSON.stringify(remaining);
    for (const key of Object.keys(remaining)) delete remaining[key];
  }

  for (const [key, value] of Object.entries(remaining)) {
    if (value === undefined || value === null) continue;
    if (Array.isArray(value)) {
      for (const item of value) url.searchParams.append(key, toParam(item));
    } else {
      url.searchParams.set(key, toParam(value));
    }
  }

  if (body !== undefined) {
    headers["Content-Type"] = template.contentType;
  }

  return { url, method, headers, body };
}

export type SseEvent = { event: string; data: string };

/**
 * Split a text/event-stream payload into events
 */
export function parseSseEvents(text: string): SseEvent[] {
  const events: SseEvent[] = [];

  for (const block of text.split(/\r?\n\r?\n/)) {
    let event = "message";
    const data: string[] = [];

    for (const line of block.split(/\r?\n/)) {
      if (line === "" || line.startsWith(":")) continue;
      const colon = line.indexOf(":");
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? "" : line.slice(colon + 1);
      if (value.startsWith(" ")) value = value.slice(1);

      if (field === "event") event = value;
      else if (field === "data") data.push(value);
    }

    if (data.length > 0) {
      events.push({ event, data: data.join("\n") });
    }
  }

  return events;
}

/**
 * HTTP source: fetches a manual (or OpenAPI document) and calls tools over
 * plain request/response. The sse and streamableHttp drivers only change
 * how a tool response is read.
 */
export class HttpDriver implements ToolSourceDriver {
  readonly protocolKind: HttpFamilySource["protocolKind"] = "http";
  protected readonly fetch: FetchLike;
  protected readonly requestTimeout: number;

  constructor(options: HttpDriverOptions = {}) {
    this.fetch = options.fetch ?? ((input, init) => fetch(input, init));
    this.requestTimeout = options.requestTimeout ?? DEFAULT_REQUEST_TIMEOUT;
  }

  protected expectSource(source: SourceDescriptor): HttpFamilySource {
    if (!isHttpFamily(source) || source.protocolKind !== this.protocolKind) {
      throw new Error(`Source ${source.name} is a ${source.protocolKind} source, expected ${this.protocolKind}`);
    }
    return source;
  }

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    return createSession(this.expectSource(source));
  }

  async closeSession(_session: SourceSession): Promise<void> {
    // Stateless: every request opens its own connection
  }

  protected async send(request: HttpRequest, accept: string): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetch(request.url, {
        method: request.method,
        headers: { Accept: accept, ...request.headers },
        body: request.body,
        signal: AbortSignal.timeout(this.requestTimeout),
      });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        throw new SourceTimeoutError(
          `Request to ${request.url.origin} timed out after ${this.requestTimeout}ms`,
          { cause: error },
        );
      }
      throw error;
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new RemoteToolError(
        `HTTP ${response.status} ${response.statusText}${text ? `: ${text.slice(0, 500)}` : ""}`,
        { status: response.status },
      );
    }
    return response;
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = this.expectSource(session.source);
    const request = buildHttpRequest(source, source, {});
    const response = await this.send(request, "application/json");
    const document = decodeJson(await response.text(), `Manual from ${source.name}`);
    return parseManual(document, source, source.url);
  }

  async invoke(session: SourceSession, tool: RawTool, args: Record<string, unknown>): Promise<unknown> {
    const source = this.expectSource(session.source);
    const template = tool.callTemplate && isHttpFamily(tool.callTemplate) ? tool.callTemplate : source;
    const response = await this.send(buildHttpRequest(template, source, args), this.accept());
    return this.readResponse(response, template);
  }

  protected accept(): string {
    return "application/json, text/plain;q=0.9, */*;q=0.8";
  }

  protected async readResponse(response: Response, _template: HttpFamilySource): Promise<unknown> {
    const text = await response.text();
    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.includes("json")) {
      return text === "" ? null : decodeJson(text, "Tool response");
    }
    return text;
  }
}

/**
 * Server-sent events: the call returns the data of every event received
 */
export class SseDriver extends HttpDriver {
  override readonly protocolKind = "sse";

  protected override accept(): string {
    return "text/event-stream";
  }

  protected override async readResponse(response: Response, template: HttpFamilySource): Promise<unknown> {
    const eventType = template.protocolKind === "sse" ? template.eventType : undefined;
    return parseSseEvents(await response.text())
      .filter(event => eventType === undefined || event.event === eventType)
      .map(event => tryDecodeJson(event.data));
  }
}

/**
 * Chunked HTTP: NDJSON bodies are decoded line by line as chunks arrive
 */
export class StreamableHttpDriver extends HttpDriver {
  override readonly protocolKind = "streamableHttp";

  protected override accept(): string {
    return "application/x-ndjson, application/json;q=0.9, */*;q=0.8";
  }

  protected override async readResponse(response: Response, template: HttpFamilySource): Promise<unknown> {
    const contentType = response.headers.get("content-type") ?? "";
    if (!contentType.includes("ndjson") || response.body === null) {
      return super.readResponse(response, template);
    }

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    const items: unknown[] = [];
    let buffer = "";

    const flushLine = (line: string) => {
      const trimmed = line.trim();
      if (trimmed === "") return;
      try {
        items.push(JSON.parse(trimmed));
      } catch (error) {
        throw new MalformedResponseError(`Invalid NDJSON line: ${trimmed.slice(0, 100)}`, { cause: error });
      }
    };

    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      lines.forEach(flushLine);
    }
    flushLine(buffer + decoder.decode());

    return items;
  }
}
