import { AllocationError } from "./errors";

/** Receives rendered HTML in document order. A write may throw to signal failure. */
export interface HtmlSink {
  write(chunk: string): void;
}

export interface StringSinkOptions {
  /** Largest output, in UTF-16 code units, the sink accepts. */
  limit?: number;
}

export class StringSink implements HtmlSink {
  readonly limit: number;
  private readonly chunks: string[] = [];
  private size = 0;

  constructor({ limit = Number.POSITIVE_INFINITY }: StringSinkOptions = {}) {
    this.limit = limit;
  }

  write(chunk: string): void {
    if (this.size + chunk.length > this.limit) {
      throw new AllocationError(this.limit);
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return this.chunks.join("");
  }
}
