export * from "./events";
export * from "./errors";
export {
  DEFAULT_MAX_NESTING_DEPTH,
  DIALECT_COMMONMARK,
  DIALECT_GITHUB,
  resolveDialect,
  type Dialect,
  type DialectFlags,
  type RendererFlags,
} from "./config";
export { parse, parseWithResult, type MarkdownInput, type ParseResult } from "./parse-markdown";
export {
  createHtmlRenderer,
  escapeHtml,
  escapeUrl,
  markdownToHtml,
  renderHtml,
  type HtmlRenderer,
  type MarkdownToHtmlOptions,
  type RenderOptions,
  type RenderResult,
} from "./renderer";
export { StringSink, type HtmlSink, type StringSinkOptions } from "./sink";
export { createDebugLogger, debugLogTo, type LogMode, type ParserLogObj } from "./debug";
export { decodeEntity, isNumericEntity, lookupEntity } from "./entity";
