/**
 * Error taxonomy shared by every adapter component. Each kind carries the
 * default message used when a caller does not supply one.
 */
export const TOOL_ADAPTER_ERROR_TAXONOMY = {
  SourceUnreachable: { message: "Tool source is unreachable" },
  SchemaDegraded: { message: "Schema construct could not be converted" },
  ToolNotFound: { message: "Tool not found" },
  InvocationFailed: { message: "Tool invocation failed" },
  LifecycleError: { message: "Tool source session lifecycle failed" },
} as const;

export type ToolAdapterErrorKind = keyof typeof TOOL_ADAPTER_ERROR_TAXONOMY;

/**
 * Transport-neutral reason attached to `InvocationFailed` errors
 */
export type InvocationFailure =
  | "timeout"
  | "connection"
  | "malformed_response"
  | "remote_error"
  | "unknown";

export interface ToolAdapterErrorOptions {
  message?: string;
  source?: string;
  tool?: string;
  failure?: InvocationFailure;
  cause?: unknown;
}

/**
 * The only error type that crosses the adapter boundary
 */
export class ToolAdapterError extends Error {
  readonly kind: ToolAdapterErrorKind;
  readonly source?: string;
  readonly tool?: string;
  readonly failure?: InvocationFailure;

  constructor(kind: ToolAdapterErrorKind, options: ToolAdapterErrorOptions = {}) {
    super(options.message ?? TOOL_ADAPTER_ERROR_TAXONOMY[kind].message, {
      cause: options.cause,
    });
    this.name = "ToolAdapterError";
    this.kind = kind;
    this.source = options.source;
    this.tool = options.tool;
    this.failure = options.failure;
  }

  toJSON(): Record<string, unknown> {
    return {
      kind: this.kind,
      message: this.message,
      source: this.source ?? null,
      tool: this.tool ?? null,
      failure: this.failure ?? null,
    };
  }
}

export function isToolAdapterError(
  error: unknown,
  kind?: ToolAdapterErrorKind,
): error is ToolAdapterError {
  return error instanceof ToolAdapterError && (kind === undefined || error.kind === kind);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
