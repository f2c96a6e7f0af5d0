import { Logger, type ILogObj } from "tslog";

export interface ParserLogObj extends ILogObj {
  phase?: string;
  [key: string]: unknown;
}

export type LogMode = "silent" | "error" | "info" | "debug";

const MIN_LEVELS: Record<LogMode, number> = {
  silent: 7,
  error: 5,
  info: 3,
  debug: 2,
};

export function createDebugLogger(name = "markdown-parser", mode: LogMode = "debug"): Logger<ParserLogObj> {
  return new Logger<ParserLogObj>({
    name,
    type: mode === "silent" ? "hidden" : "pretty",
    minLevel: MIN_LEVELS[mode],
    hideLogPositionForProduction: true,
  });
}

/**
 * Adapts a logger to the parser's `debugLog` callback. Messages arrive
 * prefixed with their phase ("block: ...", "inline: ...").
 */
export function debugLogTo(logger: Logger<ParserLogObj>): (message: string) => void {
  return (message: string) => {
    const colon = message.indexOf(":");
    const phase = colon > 0 ? message.slice(0, colon) : "parse";
    logger.debug({ phase }, message);
  };
}
