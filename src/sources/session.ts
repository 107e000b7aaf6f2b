import { randomUUID } from "crypto";
import type { SourceDescriptor } from "../config";
import type { SourceSession } from "./types";

export function createSession(source: SourceDescriptor): SourceSession {
  return { id: randomUUID(), source };
}
