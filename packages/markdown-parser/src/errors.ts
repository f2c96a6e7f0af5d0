export type MarkdownErrorCode =
  | "CALLBACK_ABORTED"
  | "NESTING_TOO_DEEP"
  | "SINK_WRITE_FAILED"
  | "BUFFER_LIMIT_EXCEEDED"
  | "UNKNOWN_DIALECT_FLAG";

export class MarkdownError extends Error {
  readonly code: MarkdownErrorCode;

  constructor(code: MarkdownErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The engine stopped: a callback asked to abort, or a resource limit was hit. */
export class ParserError extends MarkdownError {
  constructor(code: "CALLBACK_ABORTED" | "NESTING_TOO_DEEP", message: string) {
    super(code, message);
  }
}

/** A write to the output sink failed. The sink's own error is kept as `cause`. */
export class SinkError extends MarkdownError {
  constructor(cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super("SINK_WRITE_FAILED", `Output sink write failed: ${detail}`, { cause });
  }
}

export class AllocationError extends MarkdownError {
  readonly limit: number;

  constructor(limit: number) {
    super("BUFFER_LIMIT_EXCEEDED", `Output buffer exceeded its limit of ${limit} characters`);
    this.limit = limit;
  }
}

export class ConfigError extends MarkdownError {
  readonly keys: string[];

  constructor(keys: string[]) {
    super("UNKNOWN_DIALECT_FLAG", `Unknown dialect flag(s): ${keys.join(", ")}`);
    this.keys = keys;
  }
}
