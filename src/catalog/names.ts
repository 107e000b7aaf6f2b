import { randomUUID } from "crypto";

export const MAX_TOOL_NAME_LENGTH = 64;
export const NAME_SUFFIX_LENGTH = 8;

/** Prefix kept when a name is truncated: prefix + "_" + suffix == 64 */
const TRUNCATED_PREFIX_LENGTH = MAX_TOOL_NAME_LENGTH - NAME_SUFFIX_LENGTH - 1;

const RANDOM_SUFFIX_ATTEMPTS = 16;

export type SuffixGenerator = () => string;

export function randomSuffix(): string {
  return randomUUID().replace(/-/g, "").slice(0, NAME_SUFFIX_LENGTH);
}

/**
 * Map a tool name onto [A-Za-z0-9_]{1,64}
 * Names that fit are returned unchanged; longer ones get a random suffix.
 */
export function sanitizeToolName(name: string, suffix: SuffixGenerator = randomSuffix): string {
  const cleaned = name.replace(/[^A-Za-z0-9_]/g, "_") || "_";

  if (cleaned.length <= MAX_TOOL_NAME_LENGTH) {
    return cleaned;
  }

  return `${cleaned.slice(0, TRUNCATED_PREFIX_LENGTH)}_${fitSuffix(suffix())}`;
}

/**
 * Coerce a generated suffix into exactly NAME_SUFFIX_LENGTH safe characters
 */
function fitSuffix(value: string): string {
  return value.replace(/[^A-Za-z0-9_]/g, "_").slice(0, NAME_SUFFIX_LENGTH).padEnd(NAME_SUFFIX_LENGTH, "0");
}

function withSuffix(name: string, suffix: string): string {
  const base = name.length + 1 + NAME_SUFFIX_LENGTH > MAX_TOOL_NAME_LENGTH
    ? name.slice(0, TRUNCATED_PREFIX_LENGTH)
    : name;
  return `${base}_${suffix}`;
}

/**
 * Assigns unique adapted names within one discovery pass
 */
export class NameSanitizer {
  private assigned = new Set<string>();
  private counter = 0;

  constructor(private readonly suffix: SuffixGenerator = randomSuffix) {}

  assign(name: string): string {
    const sanitized = sanitizeToolName(name, this.suffix);
    let candidate = sanitized;

    for (let attempt = 0; this.assigned.has(candidate) && attempt < RANDOM_SUFFIX_ATTEMPTS; attempt++) {
      candidate = withSuffix(sanitized, fitSuffix(this.suffix()));
    }

    // Counter suffixes always terminate: the assigned set is finite
    while (this.assigned.has(candidate)) {
      this.counter++;
      candidate = withSuffix(sanitized, this.counter.toString(16).padStart(NAME_SUFFIX_LENGTH, "0"));
    }

    this.assigned.add(candidate);
    return candidate;
  }

  has(name: string): boolean {
    return this.assigned.has(name);
  }

  get size(): number {
    return this.assigned.size;
  }
}
