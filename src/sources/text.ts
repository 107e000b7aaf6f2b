import { readFile } from "fs/promises";
import { parse, printParseErrorCode, type ParseError } from "jsonc-parser";
import type { RawTool, RawToolDefinition } from "../catalog/types";
import type { SourceDescriptor } from "../config";
import { expectProtocol, MalformedResponseError } from "./errors";
import { parseManual } from "./manual";
import { createSession } from "./session";
import type { SourceSession, ToolSourceDriver } from "./types";

/**
 * Parse JSONC text (comments and trailing commas allowed)
 */
export function decodeJsonc(text: string, what: string): unknown {
  const errors: ParseError[] = [];
  const document: unknown = parse(text, errors, { allowTrailingComma: true });
  const [firstError] = errors;
  if (firstError) {
    throw new MalformedResponseError(
      `${what}: ${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`,
    );
  }
  return document;
}

/**
 * Text source: a manual or OpenAPI document on disk. Its tools carry call
 * templates for other protocols; the library routes calls to those drivers.
 */
export class TextDriver implements ToolSourceDriver {
  readonly protocolKind = "text";

  async openSession(source: SourceDescriptor): Promise<SourceSession> {
    return createSession(expectProtocol(source, "text"));
  }

  async closeSession(_session: SourceSession): Promise<void> {
    // Nothing held open
  }

  async discover(session: SourceSession): Promise<RawToolDefinition[]> {
    const source = expectProtocol(session.source, "text");
    const content = await readFile(source.filePath, "utf-8");
    return parseManual(decodeJsonc(content, `Manual ${source.filePath}`), source);
  }

  async invoke(session: SourceSession, tool: RawTool, _args: Record<string, unknown>): Promise<unknown> {
    throw new Error(
      `Tool ${tool.rawName} from text source ${session.source.name} has no call template for a callable protocol`,
    );
  }
}
