import type { ProtocolKind, SourceDescriptor, SourceDescriptorOf } from "../config";
import { isProtocolKind } from "../config";

/**
 * Driver-level errors. The dispatcher maps these onto the adapter taxonomy;
 * they never reach adapter callers directly.
 */
export class SourceTimeoutError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SourceTimeoutError";
  }
}

export class RemoteToolError extends Error {
  readonly status?: number;

  constructor(message: string, options?: ErrorOptions & { status?: number }) {
    super(message, options);
    this.name = "RemoteToolError";
    this.status = options?.status;
  }
}

export class MalformedResponseError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "MalformedResponseError";
  }
}

export function expectProtocol<K extends ProtocolKind>(
  source: SourceDescriptor,
  kind: K,
): SourceDescriptorOf<K> {
  if (!isProtocolKind(source, kind)) {
    throw new Error(`Source ${source.name} is a ${source.protocolKind} source, expected ${kind}`);
  }
  return source;
}

/**
 * Race a promise against a timeout
 */
export function withTimeout<T>(promise: Promise<T>, ms: number, errorMessage: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new SourceTimeoutError(errorMessage)), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}
