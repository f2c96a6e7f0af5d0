import { TextEncoder } from "node:util";
import type { Logger } from "tslog";
import { DIALECT_COMMONMARK, type DialectFlags, type RendererFlags } from "./config";
import { createDebugLogger, debugLogTo, type ParserLogObj } from "./debug";
import { decodeEntity } from "./entity";
import { AllocationError, SinkError, type ParserError } from "./errors";
import type { Attribute, Block, ParserCallbacks, Span, TextType } from "./events";
import { parseWithResult, toSourceText, type MarkdownInput } from "./parse-markdown";
import { StringSink, type HtmlSink } from "./sink";

export interface RenderOptions extends RendererFlags {
  /** Receives the parser's debug messages when `debug` is set. */
  logger?: Logger<ParserLogObj>;
}

export type RenderResult = { ok: true } | { ok: false; error: ParserError | SinkError | AllocationError };

export interface HtmlRenderer {
  callbacks: ParserCallbacks;
  /** First failure reported by the sink, if any. */
  error(): SinkError | AllocationError | null;
}

interface RenderState {
  sink: HtmlSink;
  xhtml: boolean;
  verbatimEntities: boolean;
  error: SinkError | AllocationError | null;
  atLineStart: boolean;
  /** Images open around the current position; their content becomes alt text. */
  imageNesting: number;
  blocks: Block[];
}

const HTML_ESCAPE_RE = /[&<>"]/g;
const HTML_ESCAPES: Record<string, string> = { "&": "&amp;", "<": "&lt;", ">": "&gt;", '"': "&quot;" };
const URL_SAFE_RE = /^[A-Za-z0-9\-_.+!*(),%#@?=;:/$~]$/;
const utf8 = new TextEncoder();

export function escapeHtml(text: string): string {
  return text.replace(HTML_ESCAPE_RE, ch => HTML_ESCAPES[ch] ?? ch);
}

/** Percent-encodes everything outside the URL-safe set, leaving existing `%XX` alone. */
export function escapeUrl(text: string): string {
  let out = "";
  for (const ch of text) {
    if (URL_SAFE_RE.test(ch)) {
      out += ch;
    } else if (ch === "&") {
      out += "&amp;";
    } else if (ch === "'") {
      out += "&#x27;";
    } else {
      for (const byte of utf8.encode(ch)) {
        out += `%${byte.toString(16).toUpperCase().padStart(2, "0")}`;
      }
    }
  }
  return out;
}

/**
 * Builds parser callbacks that write HTML to `sink`. A failing write is
 * latched: later output is dropped and the error is available from `error()`.
 */
export function createHtmlRenderer(sink: HtmlSink, flags: RendererFlags = {}): HtmlRenderer {
  const state: RenderState = {
    sink,
    xhtml: !!flags.xhtml,
    verbatimEntities: !!flags.verbatimEntities,
    error: null,
    atLineStart: true,
    imageNesting: 0,
    blocks: [],
  };

  return {
    callbacks: {
      enterBlock: block => {
        renderBlock(state, block, true);
        state.blocks.push(block);
      },
      leaveBlock: block => {
        state.blocks.pop();
        renderBlock(state, block, false);
      },
      enterSpan: span => renderSpan(state, span, true),
      leaveSpan: span => renderSpan(state, span, false),
      text: (type, text) => renderText(state, type, text),
    },
    error: () => state.error,
  };
}

function write(state: RenderState, chunk: string) {
  if (state.error || chunk === "") return;
  try {
    state.sink.write(chunk);
    state.atLineStart = chunk.endsWith("\n");
  } catch (error) {
    state.error = error instanceof AllocationError ? error : new SinkError(error);
  }
}

/** Starts a new line unless the output already is at one. */
function cr(state: RenderState) {
  if (!state.atLineStart) write(state, "\n");
}

function isTightParagraph(state: RenderState): boolean {
  const { blocks } = state;
  const item = blocks[blocks.length - 1];
  const list = blocks[blocks.length - 2];
  if (item === undefined || list === undefined || item.type !== "list_item") return false;
  return (list.type === "unordered_list" || list.type === "ordered_list") && list.isTight;
}

function renderBlock(state: RenderState, block: Block, entering: boolean) {
  switch (block.type) {
    case "document":
      break;
    case "paragraph":
      // Paragraphs of tight list items are written without tags.
      if (isTightParagraph(state)) break;
      if (entering) {
        cr(state);
        write(state, "<p>");
      } else {
        write(state, "</p>");
        cr(state);
      }
      break;
    case "heading":
      if (entering) {
        cr(state);
        write(state, `<h${block.level}>`);
      } else {
        write(state, `</h${block.level}>`);
        cr(state);
      }
      break;
    case "blockquote":
      cr(state);
      write(state, entering ? "<blockquote>" : "</blockquote>");
      cr(state);
      break;
    case "unordered_list":
      cr(state);
      write(state, entering ? "<ul>" : "</ul>");
      cr(state);
      break;
    case "ordered_list":
      cr(state);
      if (entering) {
        write(state, block.start === 1 ? "<ol>" : `<ol start="${block.start}">`);
      } else {
        write(state, "</ol>");
      }
      cr(state);
      break;
    case "list_item":
      if (!entering) {
        write(state, "</li>");
        cr(state);
      } else if (block.isTask) {
        const checked = block.taskMark === "x" || block.taskMark === "X" ? " checked" : "";
        write(
          state,
          `<li class="task-list-item"><input type="checkbox" class="task-list-item-checkbox" disabled${checked}>`,
        );
      } else {
        write(state, "<li>");
      }
      break;
    case "thematic_break":
      if (entering) {
        cr(state);
        write(state, state.xhtml ? "<hr />" : "<hr>");
        cr(state);
      }
      break;
    case "code_block":
      if (entering) {
        cr(state);
        write(state, "<pre><code");
        if (block.lang.text !== "") {
          write(state, ' class="language-');
          writeAttribute(state, block.lang, escapeHtml);
          write(state, '"');
        }
        write(state, ">");
      } else {
        write(state, "</code></pre>");
        cr(state);
      }
      break;
    case "html_block":
      cr(state);
      break;
    case "table":
    case "table_head":
    case "table_body":
    case "table_row":
      cr(state);
      write(state, entering ? `<${TABLE_TAGS[block.type]}>` : `</${TABLE_TAGS[block.type]}>`);
      cr(state);
      break;
    case "table_header":
    case "table_data": {
      const tag = block.type === "table_header" ? "th" : "td";
      if (entering) {
        write(state, block.align === "default" ? `<${tag}>` : `<${tag} align="${block.align}">`);
      } else {
        write(state, `</${tag}>`);
        cr(state);
      }
      break;
    }
  }
}

const TABLE_TAGS = {
  table: "table",
  table_head: "thead",
  table_body: "tbody",
  table_row: "tr",
} as const;

function renderSpan(state: RenderState, span: Span, entering: boolean) {
  if (span.type === "image") {
    renderImage(state, span, entering);
    return;
  }
  // Inside an image only the alt text is written.
  if (state.imageNesting > 0) return;

  switch (span.type) {
    case "emphasis":
      write(state, entering ? "<em>" : "</em>");
      break;
    case "strong":
      write(state, entering ? "<strong>" : "</strong>");
      break;
    case "strikethrough":
      write(state, entering ? "<del>" : "</del>");
      break;
    case "underline":
      write(state, entering ? "<u>" : "</u>");
      break;
    case "code_span":
      write(state, entering ? "<code>" : "</code>");
      break;
    case "latex_math":
      write(state, entering ? "<x-equation>" : "</x-equation>");
      break;
    case "latex_math_display":
      write(state, entering ? '<x-equation type="display">' : "</x-equation>");
      break;
    case "wiki_link":
      if (entering) {
        write(state, '<x-wikilink data-target="');
        writeAttribute(state, span.target, escapeHtml);
        write(state, '">');
      } else {
        write(state, "</x-wikilink>");
      }
      break;
    case "link":
      if (entering) {
        write(state, '<a href="');
        writeAttribute(state, span.href, escapeUrl);
        write(state, '"');
        if (span.title.text !== "") {
          write(state, ' title="');
          writeAttribute(state, span.title, escapeHtml);
          write(state, '"');
        }
        write(state, ">");
      } else {
        write(state, "</a>");
      }
      break;
  }
}

function renderImage(state: RenderState, span: Extract<Span, { type: "image" }>, entering: boolean) {
  if (entering) {
    if (state.imageNesting === 0) {
      write(state, '<img src="');
      writeAttribute(state, span.src, escapeUrl);
      write(state, '" alt="');
    }
    state.imageNesting++;
    return;
  }

  state.imageNesting--;
  if (state.imageNesting > 0) return;
  write(state, '"');
  if (span.title.text !== "") {
    write(state, ' title="');
    writeAttribute(state, span.title, escapeHtml);
    write(state, '"');
  }
  write(state, state.xhtml ? " />" : ">");
}

function renderText(state: RenderState, type: TextType, text: string) {
  switch (type) {
    case "null_char":
      write(state, "\uFFFD");
      break;
    case "hard_break":
      if (state.imageNesting > 0) write(state, " ");
      else write(state, state.xhtml ? "<br />\n" : "<br>\n");
      break;
    case "soft_break":
      write(state, state.imageNesting > 0 ? " " : "\n");
      break;
    case "html":
      write(state, text);
      break;
    case "entity":
      write(state, state.verbatimEntities ? text : escapeHtml(decodeEntity(text)));
      break;
    default:
      write(state, escapeHtml(text));
  }
}

function writeAttribute(state: RenderState, attribute: Attribute, escape: (text: string) => string) {
  attribute.substrTypes.forEach((type, i) => {
    const text = attribute.text.slice(attribute.substrOffsets[i], attribute.substrOffsets[i + 1]);
    if (type === "null_char") {
      write(state, escape("\uFFFD"));
    } else if (type === "entity") {
      write(state, state.verbatimEntities ? text : escape(decodeEntity(text)));
    } else {
      write(state, escape(text));
    }
  });
}

/**
 * Renders `input` as HTML into `sink`. The first failure wins: a parse that
 * stops early, or the first write the sink rejects.
 */
export function renderHtml(
  input: MarkdownInput,
  sink: HtmlSink,
  dialect: DialectFlags = DIALECT_COMMONMARK,
  options: RenderOptions = {},
): RenderResult {
  let source = toSourceText(input);
  if (options.skipUtf8Bom && source.startsWith("\uFEFF")) {
    source = source.slice(1);
  }

  const renderer = createHtmlRenderer(sink, options);
  const callbacks: ParserCallbacks = options.debug
    ? { ...renderer.callbacks, debugLog: debugLogTo(options.logger ?? createDebugLogger("markdown-renderer")) }
    : renderer.callbacks;

  const result = parseWithResult(source, callbacks, dialect);
  if (!result.ok) return result;

  const error = renderer.error();
  return error ? { ok: false, error } : { ok: true };
}

export interface MarkdownToHtmlOptions {
  dialect?: DialectFlags;
  renderer?: RenderOptions;
  /** Output size limit passed to the StringSink. */
  limit?: number;
}

/** Renders to a string, throwing whatever error stopped the render. */
export function markdownToHtml(input: MarkdownInput, options: MarkdownToHtmlOptions = {}): string {
  const sink = new StringSink({ limit: options.limit });
  const result = renderHtml(input, sink, options.dialect, options.renderer);
  if (!result.ok) throw result.error;
  return sink.toString();
}
