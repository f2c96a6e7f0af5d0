import { TextDecoder } from "node:util";
import { blockPhase } from "./block-parser";
import { resolveDialect, DIALECT_COMMONMARK, type DialectFlags } from "./config";
import { ParserError } from "./errors";
import type { ParserCallbacks } from "./events";
import { guardCallbacks, walkBlockTree } from "./walk-block-tree";

export type MarkdownInput = string | Uint8Array;

export type ParseResult = { ok: true } | { ok: false; error: ParserError };

const utf8 = new TextDecoder("utf-8", { ignoreBOM: true });

/** Byte input is decoded as UTF-8. A byte order mark is kept as text. */
export function toSourceText(input: MarkdownInput): string {
  return typeof input === "string" ? input : utf8.decode(input);
}

/**
 * Parses `input` and reports its structure through `callbacks` in document
 * order. Every entered block or span is left again unless the parse stops
 * early, in which case no further callback is made.
 *
 * Unknown dialect flags throw a ConfigError before anything is reported.
 */
export function parseWithResult(
  input: MarkdownInput,
  callbacks: ParserCallbacks,
  flags: DialectFlags = DIALECT_COMMONMARK,
): ParseResult {
  const dialect = resolveDialect(flags);
  const source = toSourceText(input);
  const debugLog = callbacks.debugLog;
  const log = debugLog ? (message: string) => debugLog.call(callbacks, message) : undefined;

  try {
    const { document, refDefinitions } = blockPhase(source, dialect, log);
    walkBlockTree(document, { out: guardCallbacks(callbacks), source, dialect, refDefinitions, log });
  } catch (error) {
    if (error instanceof ParserError) {
      return { ok: false, error };
    }
    throw error;
  }
  return { ok: true };
}

/** Returns false when the parse was aborted by a callback or hit the nesting limit. */
export function parse(input: MarkdownInput, callbacks: ParserCallbacks, flags?: DialectFlags): boolean {
  return parseWithResult(input, callbacks, flags).ok;
}
